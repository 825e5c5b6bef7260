/**
 * Treeish expressions
 *
 * A library for parsing free-form "treeish" expressions (a literal path, a
 * glob, or a glob searched in an explicit tree) and walking the filesystem
 * they describe. Ships its own glob engine and directory walker.
 *
 * @packageDocumentation
 */

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
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
  // Compiled glob types
  CompiledGlob,
  SegmentAutomaton,
  AutomatonState,
  AutomatonTransition,
  LiteralTransition,
  VariantTransition,
  GlobstarTransition,
  EpsilonTransition,
  MatchState,
  // Error types
  PatternErrorCode,
  PatternError,
  TreeishBuildErrorKind,
} from './types'
export {
  GlobBuildError,
  RootedPatternInError,
  TreeishBuildError,
  TreeishConsumedError,
} from './types'

// =============================================================================
// Glob engine
// =============================================================================

export { parseGlob, validateGlob, isValidGlob, expandBraces, MAX_BRACE_EXPANSION, MAX_NUMERIC_RANGE } from './parse'
export type { BraceExpansion } from './parse'

export { compileGlob, buildGlob, isRooted, isEmptyGlob, partitionGlob } from './compile'
export type { GlobPartition } from './compile'

export { matchGlob, initialStates, advance, isAccepting, matchSegment, pathToSegments, expandHome } from './match'
export type { PathContext } from './match'

// =============================================================================
// Walking
// =============================================================================

export { walkTree, walkGlob, DEFAULT_ROOT, WalkError, walkBehaviorSchema, resolveWalkBehavior } from './walk'
export type { Walk, WalkEntry, WalkItem, FileKind, WalkBehavior, WalkBehaviorOptions } from './walk'

// =============================================================================
// Treeish
// =============================================================================

export {
  Treeish,
  parseExpression,
  partitionIntoComponents,
  SEPARATOR,
  validatePartition,
  TreeishPath,
  TreeishGlob,
  Unrooted,
  SourceText,
  isEmptyText,
  nonEmpty,
} from './treeish'
export type { Partitioned, TreeishForm, TreeishKind, Detachable } from './treeish'

// =============================================================================
// Logging
// =============================================================================

export { getTreeishLogger, LOG_CATEGORY } from './logging'
