/**
 * Treeish expressions.
 * @packageDocumentation
 */

export { Treeish } from './treeish'
export { parseExpression, partitionIntoComponents, SEPARATOR, type Partitioned } from './expression'
export { validatePartition, type TreeishForm, type TreeishKind } from './rules'
export { TreeishPath, TreeishGlob, Unrooted } from './values'
export { SourceText, type Detachable } from './text'
export { isEmptyText, nonEmpty } from './empty'
