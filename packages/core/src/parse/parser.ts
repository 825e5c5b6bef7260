/**
 * Glob parser - converts glob text to an AST.
 * @packageDocumentation
 */

import type {
  GlobAnchor,
  GlobAst,
  GlobComponent,
  PatternNode,
  SegmentSequence,
  Segment,
  SegmentPart,
  CharClass,
  CharRange,
  PatternError,
} from '../types'
import { expandBraces, splitTopLevel } from './brace-expansion'

/** Characters that make a component a pattern rather than a literal */
const METACHARACTERS = '*?[{'

/** Characters a backslash may escape */
const ESCAPABLE = '*?[]{},\\/~'

/**
 * Parser state for tracking errors.
 */
interface ParserState {
  source: string
  errors: PatternError[]
}

/**
 * Parse glob text into an AST.
 *
 * Parsing never throws; problems are collected in {@link GlobAst.errors}.
 *
 * @param source - The glob text to parse
 *
 * @public
 */
export function parseGlob(source: string): GlobAst {
  const state: ParserState = { source, errors: [] }

  const escapeError = invalidEscape(source)
  if (escapeError) {
    state.errors.push(escapeError)
  }

  const anchor = detectAnchor(source)
  const body = anchor === undefined ? source : source.slice(1)

  const expansion = expandBraces(body)
  if (expansion.error) {
    const offset = source.length - body.length
    state.errors.push({
      ...expansion.error,
      position: expansion.error.position === undefined ? undefined : expansion.error.position + offset,
    })
  }

  if (anchor === undefined && expansion.branches.some((branch) => detectAnchor(branch) !== undefined)) {
    state.errors.push({
      code: 'ROOTED_ALTERNATIVE',
      message: 'A brace alternative cannot start at the root or home directory',
      position: 0,
      length: 1,
    })
  }

  let root: PatternNode
  if (expansion.branches.length === 1) {
    root = parseSequence(expansion.branches[0], state)
  } else {
    root = {
      type: 'alternation',
      branches: expansion.branches.map((branch) => parseSequence(branch, state)),
    }
  }

  return {
    source,
    root,
    anchor,
    components: splitComponents(source),
    errors: state.errors.length > 0 ? state.errors : undefined,
  }
}

/**
 * Anchor of a glob that denotes a location by itself.
 */
function detectAnchor(source: string): GlobAnchor | undefined {
  if (source.startsWith('/')) return '/'
  if (source === '~' || source.startsWith('~/')) return '~'
  return undefined
}

/**
 * First backslash that does not escape a character with a meaning in globs.
 */
function invalidEscape(source: string): PatternError | undefined {
  for (let i = 0; i < source.length; i++) {
    if (source[i] !== '\\') {
      continue
    }
    if (i === source.length - 1) {
      return { code: 'INVALID_ESCAPE', message: 'Pattern ends with an unfinished escape', position: i, length: 1 }
    }
    const escaped = source[i + 1]
    if (!ESCAPABLE.includes(escaped)) {
      return { code: 'INVALID_ESCAPE', message: `Cannot escape "${escaped}"`, position: i, length: 2 }
    }
    i++
  }
  return undefined
}

/**
 * Split the source on top-level separators, keeping offsets.
 *
 * Empty components (leading, doubled or trailing separators) are skipped.
 */
function splitComponents(source: string): GlobComponent[] {
  const components: GlobComponent[] = []
  let start = 0

  for (const text of splitTopLevel(source, '/')) {
    if (text !== '') {
      components.push({
        text,
        start,
        end: start + text.length,
        literal: hasUnescaped(text, METACHARACTERS) ? undefined : unescape(text),
      })
    }
    start += text.length + 1
  }

  return components
}

/**
 * Parse a brace-free, anchor-free sequence of components.
 */
function parseSequence(text: string, state: ParserState): SegmentSequence {
  const segments = splitTopLevel(text, '/')
    .filter((component) => component !== '')
    .map((component) => parseSegment(component, state))

  return { type: 'sequence', segments }
}

/**
 * Check if text contains any of `chars` outside an escape.
 */
function hasUnescaped(text: string, chars: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\\') {
      i++
      continue
    }
    if (chars.includes(text[i])) {
      return true
    }
  }
  return false
}

/**
 * Parse a single component into a segment.
 */
function parseSegment(text: string, state: ParserState): Segment {
  if (text === '**') {
    return { type: 'globstar' }
  }

  for (let i = 0; i < text.length - 1; i++) {
    if (text[i] === '\\') {
      i++
      continue
    }
    if (text[i] === '*' && text[i + 1] === '*') {
      state.errors.push({
        code: 'INVALID_GLOBSTAR',
        message: '** must be a complete path segment, not part of a larger pattern',
        position: positionOf(state, text),
        length: text.length,
      })
      break
    }
  }

  if (!hasUnescaped(text, '*?[')) {
    return { type: 'literal', value: unescape(text) }
  }

  return { type: 'variant', text, parts: parseParts(text, state) }
}

/**
 * Split a variant component into literals, wildcards and classes.
 */
function parseParts(text: string, state: ParserState): SegmentPart[] {
  const parts: SegmentPart[] = []
  let literal = ''

  const flushLiteral = () => {
    if (literal !== '') {
      parts.push({ type: 'literal', value: literal })
      literal = ''
    }
  }

  let i = 0
  while (i < text.length) {
    const char = text[i]

    if (char === '\\' && i + 1 < text.length) {
      literal += text[i + 1]
      i += 2
    } else if (char === '*') {
      flushLiteral()
      // Runs of stars inside a component behave as one
      if (parts.length === 0 || parts[parts.length - 1].type !== 'star') {
        parts.push({ type: 'star' })
      }
      i++
    } else if (char === '?') {
      flushLiteral()
      parts.push({ type: 'question' })
      i++
    } else if (char === '[') {
      flushLiteral()
      const { spec, next } = parseCharClass(text, i, state)
      parts.push({ type: 'charclass', spec })
      i = next
    } else {
      literal += char
      i++
    }
  }

  flushLiteral()
  return parts
}

/**
 * Parse a character class starting at the `[` at `open`.
 */
function parseCharClass(text: string, open: number, state: ParserState): { spec: CharClass; next: number } {
  let i = open + 1
  let negated = false
  const ranges: CharRange[] = []
  let chars = ''

  if (text[i] === '!' || text[i] === '^') {
    negated = true
    i++
  }

  // ] right after the opening bracket is a literal member
  if (text[i] === ']') {
    chars += ']'
    i++
  }

  while (i < text.length) {
    const char = codePointAt(text, i)

    if (char === ']') {
      if (chars === '' && ranges.length === 0) {
        state.errors.push({
          code: 'EMPTY_CHARCLASS',
          message: 'Empty character class',
          position: positionOf(state, text) + open,
          length: i - open + 1,
        })
      }
      return { spec: { negated, ranges, chars }, next: i + 1 }
    }

    if (char === '\\' && i + 1 < text.length) {
      chars += text[i + 1]
      i += 2
      continue
    }

    const dash = i + char.length
    if (dash + 1 < text.length && text[dash] === '-' && text[dash + 1] !== ']') {
      const start = char
      const end = codePointAt(text, dash + 1)
      if (compareCodePoints(start, end) > 0) {
        state.errors.push({
          code: 'INVALID_RANGE',
          message: `Invalid range [${start}-${end}]: start > end`,
          position: positionOf(state, text) + i,
          length: dash + 1 + end.length - i,
        })
      }
      ranges.push({ start, end })
      i = dash + 1 + end.length
    } else {
      chars += char
      i += char.length
    }
  }

  state.errors.push({
    code: 'UNCLOSED_BRACKET',
    message: 'Unclosed character class',
    position: positionOf(state, text) + open,
    length: text.length - open,
  })

  return { spec: { negated, ranges, chars }, next: text.length }
}

/**
 * The whole character starting at `index`, surrogate pairs included.
 */
function codePointAt(text: string, index: number): string {
  const codePoint = text.codePointAt(index)
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint)
}

/**
 * Order two characters by code point.
 *
 * @internal
 */
export function compareCodePoints(a: string, b: string): number {
  return (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0)
}

/**
 * Best-effort position of a component in the source. Components produced by
 * brace expansion may not appear verbatim.
 */
function positionOf(state: ParserState, text: string): number {
  return Math.max(state.source.indexOf(text), 0)
}

/**
 * Remove escaping backslashes.
 *
 * @internal
 */
export function unescape(text: string): string {
  let result = ''
  let i = 0

  while (i < text.length) {
    if (text[i] === '\\' && i + 1 < text.length) {
      result += text[i + 1]
      i += 2
    } else {
      result += text[i]
      i++
    }
  }

  return result
}
