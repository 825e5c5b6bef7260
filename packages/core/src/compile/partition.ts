/**
 * Splitting a glob into a literal path prefix and a pattern remainder.
 * @packageDocumentation
 */

import type { CompiledGlob } from '../types'
import { unescape } from '../parse/parser'
import { buildGlob } from './compiler'

/**
 * A glob split at its first non-literal component.
 * @public
 */
export interface GlobPartition {
  /** Unescaped literal prefix, absent when the glob starts with a pattern */
  readonly prefix?: string

  /** The glob from the first non-literal component on, absent when fully literal */
  readonly remainder?: CompiledGlob

  /** Offset of the remainder in the glob source; the source length when there is none */
  readonly remainderStart: number
}

/**
 * Partition a glob into the literal path it is anchored under and the
 * pattern left to match below it.
 *
 * A fully literal glob becomes a prefix equal to its whole unescaped source,
 * separators included, so plain paths round-trip unchanged. Otherwise the
 * prefix ends at the last literal component; a glob anchored at `/` keeps
 * `/` as its prefix.
 *
 * @example
 * partitionGlob(buildGlob('src/lib/**\/*.ts'))
 * // => { prefix: 'src/lib', remainder: <'**\/*.ts'>, remainderStart: 8 }
 *
 * @public
 */
export function partitionGlob(glob: CompiledGlob): GlobPartition {
  const { source, components, anchor } = glob.ast
  const firstVariant = components.findIndex((component) => component.literal === undefined)

  if (firstVariant < 0) {
    return { prefix: source === '' ? undefined : unescape(source), remainderStart: source.length }
  }

  let prefixEnd = 0
  if (firstVariant > 0) {
    prefixEnd = components[firstVariant - 1].end
  } else if (anchor === '/') {
    prefixEnd = 1
  }

  const remainderStart = components[firstVariant].start
  return {
    prefix: prefixEnd > 0 ? unescape(source.slice(0, prefixEnd)) : undefined,
    remainder: buildGlob(source.slice(remainderStart)),
    remainderStart,
  }
}
