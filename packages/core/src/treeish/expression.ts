/**
 * Expression parser - decides which form a treeish expression takes.
 * @packageDocumentation
 */

import type { CompiledGlob } from '../types'
import { GlobBuildError, RootedPatternInError, TreeishBuildError } from '../types'
import { buildGlob, partitionGlob } from '../compile'
import { getTreeishLogger } from '../logging'
import { SourceText } from './text'
import { TreeishGlob, TreeishPath } from './values'

const log = getTreeishLogger('parse')

/**
 * Separator between an explicit tree and the pattern searched in it.
 *
 * There is no way to escape it: the first occurrence always splits.
 *
 * @public
 */
export const SEPARATOR = '::'

/**
 * An expression split into its components, before the rooting rule is
 * checked.
 * @public
 */
export type Partitioned =
  | { readonly kind: 'path'; readonly path: TreeishPath }
  | { readonly kind: 'pattern'; readonly pattern: TreeishGlob }
  | { readonly kind: 'pattern-in'; readonly tree: TreeishPath; readonly pattern: TreeishGlob }

/**
 * Parse a treeish expression into its components.
 *
 * In order of precedence:
 * 1. `tree::pattern` splits at the first separator. The pattern must be a
 *    valid glob. An empty tree is dropped.
 * 2. Otherwise the whole expression is compiled as a glob and partitioned
 *    into a literal prefix and a pattern remainder.
 * 3. If it is not a valid glob, the expression is a literal path.
 *
 * Components are borrowed from `expression` where possible.
 *
 * @returns The components, or `undefined` for an expression that denotes
 * nothing (the empty expression). Every input is consumed: there is no
 * expression this cannot read.
 * @throws {@link TreeishBuildError} of kind `glob` when the pattern after a
 * separator is invalid, or of kind `rule` when it has an alternative starting
 * at the root
 *
 * @public
 */
export function parseExpression(expression: string): Partitioned | undefined {
  const separator = expression.indexOf(SEPARATOR)
  if (separator >= 0) {
    return splitAtSeparator(expression, separator)
  }

  let glob: CompiledGlob
  try {
    glob = buildGlob(expression)
  } catch (error) {
    if (!(error instanceof GlobBuildError)) {
      throw error
    }
    log.debug`Expression ${expression} is not a glob, reading it as a path: ${error.message}`
    return combine(TreeishPath.from(SourceText.borrow(expression)), undefined)
  }

  return partitionIntoComponents(glob)
}

/**
 * Split a compiled glob into the literal path it starts with and the
 * pattern left below it. Text is borrowed from the glob's source.
 *
 * @public
 */
export function partitionIntoComponents(glob: CompiledGlob): Partitioned | undefined {
  const { prefix, remainder, remainderStart } = partitionGlob(glob)

  const tree = prefix === undefined ? undefined : TreeishPath.from(SourceText.borrowOrOwn(glob.source, 0, prefix))
  const pattern =
    remainder === undefined ? undefined : TreeishGlob.from(SourceText.borrow(glob.source, remainderStart), remainder)

  return combine(tree, pattern)
}

function splitAtSeparator(expression: string, separator: number): Partitioned | undefined {
  const patternStart = separator + SEPARATOR.length

  const tree = TreeishPath.from(SourceText.borrow(expression, 0, separator))

  let glob: CompiledGlob
  try {
    glob = buildGlob(expression.slice(patternStart))
  } catch (error) {
    if (!(error instanceof GlobBuildError)) {
      throw error
    }
    if (tree && error.errors.some((problem) => problem.code === 'ROOTED_ALTERNATIVE')) {
      throw new TreeishBuildError(expression, new RootedPatternInError(tree.value, error.source))
    }
    throw new TreeishBuildError(expression, error)
  }

  const pattern = TreeishGlob.from(SourceText.borrow(expression, patternStart), glob)
  return combine(tree, pattern)
}

/**
 * Recombine components by presence.
 */
function combine(tree: TreeishPath | undefined, pattern: TreeishGlob | undefined): Partitioned | undefined {
  if (tree && pattern) {
    return { kind: 'pattern-in', tree, pattern }
  }
  if (pattern) {
    return { kind: 'pattern', pattern }
  }
  if (tree) {
    return { kind: 'path', path: tree }
  }
  return undefined
}
