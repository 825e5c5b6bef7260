/**
 * Glob compilation utilities.
 * @packageDocumentation
 */

export { compileGlob, buildGlob, isRooted, isEmptyGlob } from './compiler'
export { buildAutomaton, getMaxSegments } from './automaton-builder'
export { partitionGlob, type GlobPartition } from './partition'
