import type { PatternError } from './errors'

// =============================================================================
// GLOB AST
// =============================================================================

/**
 * Where a glob is anchored when it denotes a location by itself.
 *
 * - `'/'` the filesystem root
 * - `'~'` the user's home directory
 *
 * @public
 */
export type GlobAnchor = '/' | '~'

/**
 * Root node of a parsed glob.
 * @public
 */
export interface GlobAst {
  /** Original glob text */
  readonly source: string

  /** Matchable structure, with braces expanded and the anchor stripped */
  readonly root: PatternNode

  /** Anchor of a rooted glob, `undefined` for relative globs */
  readonly anchor?: GlobAnchor

  /**
   * Source components split on top-level separators, before brace expansion.
   * Used to partition a glob into a literal prefix and a remainder.
   */
  readonly components: readonly GlobComponent[]

  /** Errors found while parsing, if any */
  readonly errors?: readonly PatternError[]
}

/**
 * One `/`-delimited piece of the glob source.
 *
 * @example
 * "src/{a,b}/*.ts" has components "src", "\{a,b\}" and "*.ts".
 *
 * @public
 */
export interface GlobComponent {
  /** Raw text, escapes included */
  readonly text: string

  /** Offset of the first character in the glob source */
  readonly start: number

  /** Offset one past the last character */
  readonly end: number

  /** Unescaped value when the component has no metacharacters */
  readonly literal?: string
}

/**
 * A node in the glob AST.
 * @public
 */
export type PatternNode = SegmentSequence | Alternation

/**
 * Path segments matched one after another.
 * @public
 */
export interface SegmentSequence {
  readonly type: 'sequence'
  readonly segments: readonly Segment[]
}

/**
 * Branches produced by brace expansion; any branch may match.
 * @public
 */
export interface Alternation {
  readonly type: 'alternation'
  readonly branches: readonly SegmentSequence[]
}

// =============================================================================
// SEGMENTS
// =============================================================================

/**
 * A segment matches exactly one path component, except the globstar.
 * @public
 */
export type Segment = LiteralSegment | GlobstarSegment | VariantSegment

/** @public */
export interface LiteralSegment {
  readonly type: 'literal'
  readonly value: string
}

/**
 * The `**` globstar, zero or more complete components.
 * @public
 */
export interface GlobstarSegment {
  readonly type: 'globstar'
}

/**
 * A component containing wildcards or character classes.
 *
 * @example
 * "test-[0-9]*.ts" -> literal "test-", charclass [0-9], star, literal ".ts"
 *
 * @public
 */
export interface VariantSegment {
  readonly type: 'variant'

  /** Raw text of the component */
  readonly text: string

  readonly parts: readonly SegmentPart[]
}

/** @public */
export type SegmentPart =
  | { readonly type: 'literal'; readonly value: string }
  | { readonly type: 'star' }
  | { readonly type: 'question' }
  | { readonly type: 'charclass'; readonly spec: CharClass }

/**
 * A character class like `[a-z]` or `[!0-9]`.
 * @public
 */
export interface CharClass {
  readonly negated: boolean
  readonly ranges: readonly CharRange[]
  /** Characters listed individually */
  readonly chars: string
}

/** @public */
export interface CharRange {
  readonly start: string
  readonly end: string
}
