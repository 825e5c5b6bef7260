import { describe, it, expect } from 'vitest'

import type { GlobAst } from '../types'
import { parseGlob } from './parser'
import { validateGlob, isValidGlob } from './validator'

describe('validateGlob', () => {
  it('accepts well-formed globs', () => {
    expect(validateGlob(parseGlob('src/**/*.{ts,tsx}'))).toEqual([])
    expect(isValidGlob(parseGlob('[a-z]?.txt'))).toBe(true)
  })

  it('passes through parser errors', () => {
    const errors = validateGlob(parseGlob('src/[abc'))

    expect(errors).toHaveLength(1)
    expect(errors[0].code).toBe('UNCLOSED_BRACKET')
    expect(isValidGlob(parseGlob('src/[abc'))).toBe(false)
  })

  it('reports a problem repeated by brace expansion once', () => {
    expect(validateGlob(parseGlob('{a,b}/[z-a]'))).toEqual([
      { code: 'INVALID_RANGE', message: 'Invalid range [z-a]: start > end', position: 7, length: 3 },
    ])
  })

  it('reports empty character classes', () => {
    const glob: GlobAst = {
      source: 'x',
      components: [],
      root: {
        type: 'sequence',
        segments: [
          { type: 'variant', text: 'x', parts: [{ type: 'charclass', spec: { negated: false, ranges: [], chars: '' } }] },
        ],
      },
    }

    expect(validateGlob(glob)).toEqual([{ code: 'EMPTY_CHARCLASS', message: 'Empty character class' }])
  })
})
