/**
 * Component-level matching.
 * @packageDocumentation
 */

import type { Segment, VariantSegment, CharClass } from '../types'

/**
 * Check if a single path component matches a segment.
 *
 * A globstar matches any one component here; spanning several components is
 * the automaton's job.
 *
 * @public
 */
export function matchSegment(component: string, segment: Segment): boolean {
  switch (segment.type) {
    case 'literal':
      return component === segment.value

    case 'globstar':
      return true

    case 'variant':
      return variantToRegex(segment).test(component)
  }
}

/**
 * Build the anchored regex a variant segment compiles to.
 *
 * @example
 * variantToRegex(parsed('test-[0-9]*.ts')) // => /^test-[0-9].*\.ts$/s
 *
 * @public
 */
export function variantToRegex(segment: VariantSegment): RegExp {
  let source = '^'

  for (const part of segment.parts) {
    switch (part.type) {
      case 'literal':
        source += escapeRegex(part.value)
        break
      case 'star':
        source += '.*'
        break
      case 'question':
        source += '.'
        break
      case 'charclass':
        source += charClassToRegex(part.spec)
        break
    }
  }

  // `s`: newlines are legal in file names; `u`: `?` and classes take whole characters
  return new RegExp(source + '$', 'su')
}

function charClassToRegex(spec: CharClass): string {
  let body = spec.negated ? '^' : ''
  for (const char of spec.chars) {
    body += escapeClassChar(char)
  }
  for (const range of spec.ranges) {
    body += escapeClassChar(range.start) + '-' + escapeClassChar(range.end)
  }
  return `[${body}]`
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function escapeClassChar(char: string): string {
  return '^-]\\['.includes(char) ? '\\' + char : char
}
