import type { GlobAst } from './ast'

// =============================================================================
// COMPILED GLOB
// =============================================================================

/**
 * A glob compiled for matching against walked paths.
 * @public
 */
export interface CompiledGlob {
  /** Glob text the pattern was built from */
  readonly source: string

  readonly ast: GlobAst

  /** Segment automaton used for matching */
  readonly automaton: SegmentAutomaton

  /** Whether the glob denotes a location by itself (see {@link GlobAst.anchor}) */
  readonly rooted: boolean

  /** Maximum depth a match can have, `undefined` when the glob contains `**` */
  readonly maxSegments?: number
}

// =============================================================================
// SEGMENT AUTOMATON
// =============================================================================

/**
 * An NFA over path components. Each input symbol is one whole component,
 * so matching a path costs one step per directory level, and the walker can
 * advance the automaton as it descends.
 *
 * @public
 */
export interface SegmentAutomaton {
  readonly states: readonly AutomatonState[]
  readonly initialState: number
  readonly acceptingStates: readonly number[]
}

/** @public */
export interface AutomatonState {
  /** Index in {@link SegmentAutomaton.states} */
  readonly id: number
  readonly transitions: readonly AutomatonTransition[]
  readonly accepting: boolean
}

/** @public */
export type AutomatonTransition = LiteralTransition | VariantTransition | GlobstarTransition | EpsilonTransition

/** Consumes a component equal to `segment`. @public */
export interface LiteralTransition {
  readonly type: 'literal'
  readonly segment: string
  readonly target: number
}

/** Consumes a component matched by `pattern`. @public */
export interface VariantTransition {
  readonly type: 'variant'
  readonly pattern: RegExp
  readonly target: number
}

/**
 * `**`: consume any component and stay in `selfLoop`, or move to `exit`
 * without consuming.
 * @public
 */
export interface GlobstarTransition {
  readonly type: 'globstar'
  readonly selfLoop: number
  readonly exit: number
}

/** @public */
export interface EpsilonTransition {
  readonly type: 'epsilon'
  readonly target: number
}

/**
 * Set of live automaton states while matching incrementally.
 * @public
 */
export type MatchState = ReadonlySet<number>
