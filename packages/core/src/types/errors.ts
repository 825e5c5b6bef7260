/**
 * Error codes for glob validation failures.
 * @public
 */
export type PatternErrorCode =
  | 'INVALID_GLOBSTAR' // ** not as complete segment
  | 'UNCLOSED_BRACKET' // [abc without ]
  | 'UNCLOSED_BRACE' // {a,b without }
  | 'EMPTY_CHARCLASS' // []
  | 'INVALID_RANGE' // [z-a] (reversed)
  | 'EXPANSION_LIMIT' // Too many brace expansions
  | 'NESTED_BRACES' // {a,{b,c}} not allowed
  | 'INVALID_ESCAPE' // Trailing backslash, or \ before a character with no glob meaning
  | 'ROOTED_ALTERNATIVE' // {/a,b} in a glob that is not rooted itself

/**
 * A glob validation error with location information.
 * @public
 */
export interface PatternError {
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Thrown when the glob engine rejects a pattern.
 * @public
 */
export class GlobBuildError extends Error {
  readonly code = 'GLOB_BUILD'

  /** The rejected glob text */
  readonly source: string

  readonly errors: readonly PatternError[]

  constructor(source: string, errors: readonly PatternError[]) {
    super(`Invalid glob "${source}": ${errors.map((error) => error.message).join('; ')}`)
    this.name = 'GlobBuildError'
    this.source = source
    this.errors = errors
  }
}

/**
 * A pattern joined to an explicit tree declares a root of its own.
 *
 * The pattern cannot be joined to the tree without discarding one of the two
 * roots, so such expressions are rejected.
 *
 * @public
 */
export class RootedPatternInError extends Error {
  readonly code = 'ROOTED_PATTERN_IN'

  readonly tree: string

  readonly pattern: string

  constructor(tree: string, pattern: string) {
    super(`Pattern "${pattern}" is rooted and cannot be searched in tree "${tree}"`)
    this.name = 'RootedPatternInError'
    this.tree = tree
    this.pattern = pattern
  }
}

/**
 * Which stage rejected a treeish expression.
 * @public
 */
export type TreeishBuildErrorKind = 'glob' | 'rule'

/**
 * Failure to build a treeish from an expression. The underlying
 * {@link GlobBuildError} or {@link RootedPatternInError} is the `cause`.
 *
 * @public
 */
export class TreeishBuildError extends Error {
  readonly code = 'TREEISH_BUILD'

  readonly kind: TreeishBuildErrorKind

  /** Expression that failed to build */
  readonly expression: string

  declare readonly cause: GlobBuildError | RootedPatternInError

  constructor(expression: string, cause: GlobBuildError | RootedPatternInError) {
    super(cause.message, { cause })
    this.name = 'TreeishBuildError'
    this.expression = expression
    this.kind = buildErrorKind(cause)
  }
}

function buildErrorKind(cause: GlobBuildError | RootedPatternInError): TreeishBuildErrorKind {
  return cause instanceof GlobBuildError ? 'glob' : 'rule'
}

/**
 * Thrown when a treeish is used after one of its consuming extractors ran.
 * @public
 */
export class TreeishConsumedError extends Error {
  readonly code = 'TREEISH_CONSUMED'

  constructor() {
    super('Treeish has already been consumed')
    this.name = 'TreeishConsumedError'
  }
}
