/**
 * Path matching - runs paths through a compiled glob's automaton.
 * @packageDocumentation
 */

import type { CompiledGlob, SegmentAutomaton, AutomatonTransition, MatchState } from '../types'
import { pathToSegments } from './path-utils'

/**
 * Test if a relative path matches a compiled glob.
 *
 * The path is split on `/`; empty components are ignored. A rooted glob is
 * matched without its anchor.
 *
 * @param path - Path relative to where the glob is rooted (e.g. "src/foo.ts")
 * @param glob - Compiled glob
 *
 * @public
 */
export function matchGlob(path: string, glob: CompiledGlob): boolean {
  const segments = pathToSegments(path)

  if (glob.maxSegments !== undefined && segments.length > glob.maxSegments) {
    return false
  }

  let states = initialStates(glob)
  for (const segment of segments) {
    states = advance(glob, states, segment)
    if (states.size === 0) {
      return false
    }
  }
  return isAccepting(glob, states)
}

/**
 * States live before any component has been consumed.
 *
 * @public
 */
export function initialStates(glob: CompiledGlob): MatchState {
  return epsilonClosure(glob.automaton, [glob.automaton.initialState])
}

/**
 * Consume one path component.
 *
 * An empty result means no path below the current one can match, which is
 * what lets the walker skip whole directories.
 *
 * @public
 */
export function advance(glob: CompiledGlob, states: MatchState, segment: string): MatchState {
  const { automaton } = glob
  const next: number[] = []

  for (const stateId of states) {
    for (const transition of automaton.states[stateId].transitions) {
      const target = consume(transition, segment)
      if (target !== undefined) {
        next.push(target)
      }
    }
  }

  return epsilonClosure(automaton, next)
}

/**
 * Whether the components consumed so far form a match.
 *
 * @public
 */
export function isAccepting(glob: CompiledGlob, states: MatchState): boolean {
  for (const stateId of states) {
    if (glob.automaton.states[stateId].accepting) {
      return true
    }
  }
  return false
}

/**
 * Target state after consuming `segment`, if the transition accepts it.
 */
function consume(transition: AutomatonTransition, segment: string): number | undefined {
  switch (transition.type) {
    case 'literal':
      return transition.segment === segment ? transition.target : undefined

    case 'variant':
      return transition.pattern.test(segment) ? transition.target : undefined

    case 'globstar':
      return transition.selfLoop

    case 'epsilon':
      return undefined
  }
}

/**
 * All states reachable without consuming input: epsilon transitions and
 * the zero-component exit of a globstar.
 */
function epsilonClosure(automaton: SegmentAutomaton, seeds: readonly number[]): Set<number> {
  const closure = new Set(seeds)
  const worklist = [...seeds]

  let stateId = worklist.pop()
  while (stateId !== undefined) {
    for (const transition of automaton.states[stateId].transitions) {
      const target =
        transition.type === 'epsilon' ? transition.target : transition.type === 'globstar' ? transition.exit : undefined
      if (target !== undefined && !closure.has(target)) {
        closure.add(target)
        worklist.push(target)
      }
    }
    stateId = worklist.pop()
  }

  return closure
}
