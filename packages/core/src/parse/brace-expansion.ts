/**
 * Brace expansion over glob text.
 * @packageDocumentation
 */

import type { PatternError } from '../types'

/** Maximum number of branches a glob may expand to */
export const MAX_BRACE_EXPANSION = 100

/** Maximum number of items in a numeric range like `{1..50}` */
export const MAX_NUMERIC_RANGE = 50

/**
 * Result of expanding the braces of a glob.
 * @public
 */
export interface BraceExpansion {
  /** Brace-free glob texts; the input itself when expansion failed */
  readonly branches: readonly string[]
  readonly error?: PatternError
}

/**
 * Expand every top-level brace group of a glob.
 *
 * Positions in errors refer to `text`.
 *
 * @example
 * expandBraces('\{src,lib\}/*.ts').branches
 * // => ['src/*.ts', 'lib/*.ts']
 *
 * @example
 * expandBraces('file\{1..3\}.txt').branches
 * // => ['file1.txt', 'file2.txt', 'file3.txt']
 *
 * @public
 */
export function expandBraces(text: string): BraceExpansion {
  const branches: string[] = []
  const error = expandInto(text, 0, branches)
  if (error) {
    return { branches: [text], error }
  }
  return { branches }
}

interface BraceGroup {
  start: number
  end: number
  content: string
}

function expandInto(text: string, offset: number, out: string[]): PatternError | undefined {
  const group = findBraceGroup(text, 0)
  if (!group) {
    const unclosed = findUnclosedBrace(text)
    if (unclosed !== undefined) {
      return {
        code: 'UNCLOSED_BRACE',
        message: 'Unclosed brace in pattern',
        position: offset + unclosed,
        length: 1,
      }
    }
    out.push(text)
    return undefined
  }

  const position = offset + group.start
  const length = group.end - group.start + 1

  if (findBraceGroup(group.content, 0) || findUnclosedBrace(group.content) !== undefined) {
    return { code: 'NESTED_BRACES', message: 'Nested braces are not allowed', position, length }
  }

  const items = braceItems(group.content)
  if ('error' in items) {
    return { ...items.error, position, length }
  }

  const prefix = text.slice(0, group.start)
  const suffix = text.slice(group.end + 1)
  for (const item of items.values) {
    // The suffix may hold further groups; expand them per item.
    const error = expandInto(prefix + item + suffix, offset, out)
    if (error) return error
    if (out.length > MAX_BRACE_EXPANSION) {
      return {
        code: 'EXPANSION_LIMIT',
        message: `Brace expansion exceeds limit of ${MAX_BRACE_EXPANSION}`,
        position,
        length,
      }
    }
  }
  return undefined
}

function braceItems(content: string): { values: string[] } | { error: Omit<PatternError, 'position' | 'length'> } {
  const range = /^(-?\d+)\.\.(-?\d+)$/.exec(content)
  if (range) {
    const start = parseInt(range[1], 10)
    const end = parseInt(range[2], 10)
    if (Math.abs(end - start) + 1 > MAX_NUMERIC_RANGE) {
      return {
        error: {
          code: 'EXPANSION_LIMIT',
          message: `Numeric range {${start}..${end}} exceeds limit of ${MAX_NUMERIC_RANGE} elements`,
        },
      }
    }
    const step = start <= end ? 1 : -1
    const values: string[] = []
    for (let n = start; step > 0 ? n <= end : n >= end; n += step) {
      values.push(String(n))
    }
    return { values }
  }

  return { values: splitTopLevel(content, ',') }
}

/**
 * Find the first brace group at depth zero, skipping escapes and classes.
 */
function findBraceGroup(text: string, from: number): BraceGroup | undefined {
  let inBracket = false
  let depth = 0
  let start = -1

  for (let i = from; i < text.length; i++) {
    const char = text[i]
    if (char === '\\') {
      i++
      continue
    }
    if (inBracket) {
      if (char === ']') inBracket = false
      continue
    }
    if (char === '[') {
      inBracket = true
    } else if (char === '{') {
      if (depth === 0) start = i
      depth++
    } else if (char === '}' && depth > 0) {
      depth--
      if (depth === 0) {
        return { start, end: i, content: text.slice(start + 1, i) }
      }
    }
  }
  return undefined
}

/**
 * Position of a `{` that is never closed.
 */
function findUnclosedBrace(text: string): number | undefined {
  let inBracket = false
  const open: number[] = []

  for (let i = 0; i < text.length; i++) {
    const char = text[i]
    if (char === '\\') {
      i++
      continue
    }
    if (inBracket) {
      if (char === ']') inBracket = false
      continue
    }
    if (char === '[') {
      inBracket = true
    } else if (char === '{') {
      open.push(i)
    } else if (char === '}') {
      open.pop()
    }
  }
  return open.length > 0 ? open[0] : undefined
}

/**
 * Split on `separator` outside escapes, character classes and braces.
 * @internal
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = []
  let current = ''
  let inBracket = false
  let depth = 0

  for (let i = 0; i < text.length; i++) {
    const char = text[i]
    if (char === '\\' && i + 1 < text.length) {
      current += char + text[i + 1]
      i++
      continue
    }
    if (inBracket) {
      if (char === ']') inBracket = false
    } else if (char === '[') {
      inBracket = true
    } else if (char === '{') {
      depth++
    } else if (char === '}' && depth > 0) {
      depth--
    } else if (char === separator && depth === 0) {
      parts.push(current)
      current = ''
      continue
    }
    current += char
  }

  parts.push(current)
  return parts
}
