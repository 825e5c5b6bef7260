import type { SourceText } from './text'

/**
 * Whether a path text is empty. An empty path denotes nothing, not the
 * current directory.
 *
 * @public
 */
export function isEmptyText(text: string | SourceText): boolean {
  return text.length === 0
}

/**
 * `value`, or `undefined` when `isEmpty` says it is empty.
 *
 * @example
 * nonEmpty('', isEmptyText) // => undefined
 *
 * @public
 */
export function nonEmpty<T>(value: T, isEmpty: (value: T) => boolean): T | undefined {
  return isEmpty(value) ? undefined : value
}
