import { describe, it, expect } from 'vitest'

import { expandBraces, splitTopLevel, MAX_NUMERIC_RANGE } from './brace-expansion'

describe('expandBraces', () => {
  describe('alternatives', () => {
    it('expands a simple group', () => {
      expect(expandBraces('{a,b}.ts')).toEqual({ branches: ['a.ts', 'b.ts'] })
    })

    it('expands every group as a product', () => {
      expect(expandBraces('{a,b}/{c,d}').branches).toEqual(['a/c', 'a/d', 'b/c', 'b/d'])
    })

    it('keeps empty alternatives', () => {
      expect(expandBraces('x{a,}').branches).toEqual(['xa', 'x'])
    })

    it('returns text without braces unchanged', () => {
      expect(expandBraces('src/*.ts')).toEqual({ branches: ['src/*.ts'] })
    })

    it('ignores escaped braces', () => {
      expect(expandBraces('\\{a,b\\}').branches).toEqual(['\\{a,b\\}'])
    })

    it('ignores braces inside character classes', () => {
      expect(expandBraces('[{]x')).toEqual({ branches: ['[{]x'] })
    })
  })

  describe('numeric ranges', () => {
    it('expands ascending ranges', () => {
      expect(expandBraces('file{1..3}').branches).toEqual(['file1', 'file2', 'file3'])
    })

    it('expands descending ranges', () => {
      expect(expandBraces('{3..1}').branches).toEqual(['3', '2', '1'])
    })

    it('accepts a range at the limit', () => {
      expect(expandBraces(`{1..${MAX_NUMERIC_RANGE}}`).branches).toHaveLength(MAX_NUMERIC_RANGE)
    })

    it('rejects a range over the limit', () => {
      const expansion = expandBraces('{1..51}')

      expect(expansion.branches).toEqual(['{1..51}'])
      expect(expansion.error).toEqual({
        code: 'EXPANSION_LIMIT',
        message: 'Numeric range {1..51} exceeds limit of 50 elements',
        position: 0,
        length: 7,
      })
    })
  })

  describe('errors', () => {
    it('rejects nested groups', () => {
      expect(expandBraces('{a,{b,c}}').error).toEqual({
        code: 'NESTED_BRACES',
        message: 'Nested braces are not allowed',
        position: 0,
        length: 9,
      })
    })

    it('rejects an unclosed group', () => {
      expect(expandBraces('x{a,b').error).toEqual({
        code: 'UNCLOSED_BRACE',
        message: 'Unclosed brace in pattern',
        position: 1,
        length: 1,
      })
    })

    it('rejects too many combined branches', () => {
      const expansion = expandBraces('{1..11}{1..10}')

      expect(expansion.error?.code).toBe('EXPANSION_LIMIT')
      expect(expansion.error?.message).toBe('Brace expansion exceeds limit of 100')
    })
  })
})

describe('splitTopLevel', () => {
  it('splits outside braces and classes', () => {
    expect(splitTopLevel('a/{b/c}/[/]/d', '/')).toEqual(['a', '{b/c}', '[/]', 'd'])
  })

  it('does not split on an escaped separator', () => {
    expect(splitTopLevel('a\\,b,c', ',')).toEqual(['a\\,b', 'c'])
  })
})
