/**
 * Path matching utilities.
 * @packageDocumentation
 */

export { pathToSegments, segmentsToPath, expandHome, type PathContext } from './path-utils'

export { matchGlob, initialStates, advance, isAccepting } from './matcher'

export { matchSegment, variantToRegex } from './segment-matcher'
