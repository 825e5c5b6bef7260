/**
 * Glob validation - structural checks on a parsed glob.
 * @packageDocumentation
 */

import type { GlobAst, PatternNode, Segment, CharClass, PatternError } from '../types'
import { compareCodePoints } from './parser'

/**
 * Validate a parsed glob.
 *
 * Returns the parser's errors plus any structural problem the AST still
 * carries (empty or reversed character classes).
 * Each problem is reported once even when brace expansion repeats it.
 *
 * @param glob - The parsed glob to validate
 * @returns Validation errors, empty if valid
 *
 * @public
 */
export function validateGlob(glob: GlobAst): readonly PatternError[] {
  const errors: PatternError[] = [...(glob.errors ?? [])]
  validateNode(glob.root, errors)
  return dedupe(errors)
}

function validateNode(node: PatternNode, errors: PatternError[]): void {
  if (node.type === 'alternation') {
    for (const branch of node.branches) {
      validateNode(branch, errors)
    }
    return
  }

  for (const segment of node.segments) {
    validateSegment(segment, errors)
  }
}

function validateSegment(segment: Segment, errors: PatternError[]): void {
  if (segment.type !== 'variant') {
    return
  }

  for (const part of segment.parts) {
    if (part.type === 'charclass') {
      validateCharClass(part.spec, errors)
    }
  }
}

function validateCharClass(spec: CharClass, errors: PatternError[]): void {
  if (spec.chars === '' && spec.ranges.length === 0) {
    errors.push({ code: 'EMPTY_CHARCLASS', message: 'Empty character class' })
  }
  for (const range of spec.ranges) {
    if (compareCodePoints(range.start, range.end) > 0) {
      errors.push({
        code: 'INVALID_RANGE',
        message: `Invalid range [${range.start}-${range.end}]: start > end`,
      })
    }
  }
}

/**
 * Drop repeated errors: same code and message, keeping the first (which
 * usually carries a position).
 */
function dedupe(errors: PatternError[]): PatternError[] {
  const seen = new Set<string>()
  return errors.filter((error) => {
    const key = `${error.code}:${error.message}`
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}

/**
 * Check if a parsed glob has no errors.
 *
 * @public
 */
export function isValidGlob(glob: GlobAst): boolean {
  return validateGlob(glob).length === 0
}
