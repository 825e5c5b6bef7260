/**
 * Type definitions for globs and treeish expressions.
 * @packageDocumentation
 */

// AST types
export type {
  GlobAnchor,
  GlobAst,
  GlobComponent,
  PatternNode,
  SegmentSequence,
  Alternation,
  Segment,
  LiteralSegment,
  GlobstarSegment,
  VariantSegment,
  SegmentPart,
  CharClass,
  CharRange,
} from './ast'

// Compiled glob types
export type {
  CompiledGlob,
  SegmentAutomaton,
  AutomatonState,
  AutomatonTransition,
  LiteralTransition,
  VariantTransition,
  GlobstarTransition,
  EpsilonTransition,
  MatchState,
} from './automaton'

// Error types
export type { PatternErrorCode, PatternError, TreeishBuildErrorKind } from './errors'
export {
  GlobBuildError,
  RootedPatternInError,
  TreeishBuildError,
  TreeishConsumedError,
} from './errors'
