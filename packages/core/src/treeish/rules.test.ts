import { describe, it, expect } from 'vitest'

import { RootedPatternInError, TreeishBuildError } from '../types'
import { parseExpression } from './expression'
import { validatePartition } from './rules'

function validate(expression: string) {
  return validatePartition(parseExpression(expression), expression)
}

describe('validatePartition', () => {
  it('maps the absent partition to empty', () => {
    expect(validatePartition(undefined, '')).toEqual({ kind: 'empty' })
  })

  it('passes paths and patterns through', () => {
    expect(validate('/etc/hosts').kind).toBe('path')
    expect(validate('*.txt').kind).toBe('pattern')
  })

  it('wraps the pattern of a pattern-in as unrooted', () => {
    const form = validate('/srv::logs/*.log')

    expect(form.kind).toBe('pattern-in')
    if (form.kind === 'pattern-in') {
      expect(form.tree.value).toBe('/srv')
      expect(form.pattern.value.source).toBe('logs/*.log')
    }
  })

  it.each(['a/b::/x/*.txt', 'a::~/x', 'a::~'])('rejects the rooted pattern in %s', (expression) => {
    expect(() => validate(expression)).toThrow(TreeishBuildError)
  })

  it('reports the tree and pattern of a rule violation', () => {
    let thrown: unknown
    try {
      validate('a/b::/x/*.txt')
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(TreeishBuildError)
    if (thrown instanceof TreeishBuildError) {
      expect(thrown.kind).toBe('rule')
      expect(thrown.expression).toBe('a/b::/x/*.txt')
      expect(thrown.message).toBe('Pattern "/x/*.txt" is rooted and cannot be searched in tree "a/b"')
      expect(thrown.cause).toBeInstanceOf(RootedPatternInError)
      if (thrown.cause instanceof RootedPatternInError) {
        expect(thrown.cause.code).toBe('ROOTED_PATTERN_IN')
        expect(thrown.cause.tree).toBe('a/b')
        expect(thrown.cause.pattern).toBe('/x/*.txt')
      }
    }
  })

  it('accepts a pattern that only starts with ~', () => {
    expect(validate('a::~x').kind).toBe('pattern-in')
  })
})
