import { RootedPatternInError, TreeishBuildError } from '../types'
import type { Partitioned } from './expression'
import { Unrooted, type TreeishGlob, type TreeishPath } from './values'

/**
 * A treeish in one of its normalized forms.
 * @public
 */
export type TreeishForm =
  | { readonly kind: 'empty' }
  | { readonly kind: 'path'; readonly path: TreeishPath }
  | { readonly kind: 'pattern'; readonly pattern: TreeishGlob }
  | { readonly kind: 'pattern-in'; readonly tree: TreeishPath; readonly pattern: Unrooted<TreeishGlob> }

/** @public */
export type TreeishKind = TreeishForm['kind']

/**
 * Apply the rules a partitioned expression must satisfy to become a treeish.
 *
 * A pattern searched in an explicit tree must not be rooted itself: it could
 * not be joined onto the tree without discarding one of the two roots.
 *
 * @param expression - Reported in the error
 * @throws {@link TreeishBuildError} of kind `rule` for a rooted pattern in a tree
 *
 * @public
 */
export function validatePartition(partitioned: Partitioned | undefined, expression: string): TreeishForm {
  if (partitioned === undefined) {
    return { kind: 'empty' }
  }

  switch (partitioned.kind) {
    case 'path':
      return partitioned
    case 'pattern':
      return partitioned
    case 'pattern-in': {
      const pattern = Unrooted.check(partitioned.pattern)
      if (pattern === undefined) {
        throw new TreeishBuildError(
          expression,
          new RootedPatternInError(partitioned.tree.value, partitioned.pattern.source),
        )
      }
      return { kind: 'pattern-in', tree: partitioned.tree, pattern }
    }
  }
}
