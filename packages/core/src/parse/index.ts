/**
 * Glob parsing utilities.
 * @packageDocumentation
 */

export { parseGlob } from './parser'
export { validateGlob, isValidGlob } from './validator'
export { expandBraces, MAX_BRACE_EXPANSION, MAX_NUMERIC_RANGE, type BraceExpansion } from './brace-expansion'
