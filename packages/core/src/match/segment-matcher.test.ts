import { describe, it, expect } from 'vitest'

import type { VariantSegment } from '../types'
import { parseGlob } from '../parse'
import { matchSegment, variantToRegex } from './segment-matcher'

function variant(source: string): VariantSegment {
  const { root } = parseGlob(source)
  if (root.type !== 'sequence') {
    throw new Error(`${source} is not a sequence`)
  }
  const [segment] = root.segments
  if (segment?.type !== 'variant') {
    throw new Error(`${source} does not start with a variant`)
  }
  return segment
}

describe('variantToRegex', () => {
  it('anchors and escapes', () => {
    const regex = variantToRegex(variant('test-[0-9]*.ts'))

    expect(regex.source).toBe('^test-[0-9].*\\.ts$')
    expect(regex.flags).toBe('su')
  })

  it('escapes class members with a meaning inside brackets', () => {
    expect(variantToRegex(variant('[!^]')).source).toBe('^[^\\^]$')
  })

  it('escapes regex syntax in literal parts', () => {
    const regex = variantToRegex(variant('(a)+*'))

    expect(regex.test('(a)+b')).toBe(true)
    expect(regex.test('aab')).toBe(false)
  })
})

describe('matchSegment', () => {
  it('compares literals exactly', () => {
    expect(matchSegment('src', { type: 'literal', value: 'src' })).toBe(true)
    expect(matchSegment('Src', { type: 'literal', value: 'src' })).toBe(false)
  })

  it('matches any single component with a globstar', () => {
    expect(matchSegment('anything', { type: 'globstar' })).toBe(true)
  })

  it('matches variants by their regex', () => {
    expect(matchSegment('notes.md', variant('*.md'))).toBe(true)
    expect(matchSegment('notes.txt', variant('*.md'))).toBe(false)
  })
})
