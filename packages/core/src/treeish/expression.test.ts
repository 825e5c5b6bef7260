import { describe, it, expect } from 'vitest'

import { buildGlob } from '../compile'
import { GlobBuildError, RootedPatternInError, TreeishBuildError } from '../types'
import { parseExpression, partitionIntoComponents, type Partitioned } from './expression'

/** Flatten components to plain strings */
function describePartition(partitioned: Partitioned | undefined) {
  if (partitioned === undefined) {
    return undefined
  }
  switch (partitioned.kind) {
    case 'path':
      return { kind: 'path', path: partitioned.path.value }
    case 'pattern':
      return { kind: 'pattern', pattern: partitioned.pattern.source }
    case 'pattern-in':
      return { kind: 'pattern-in', tree: partitioned.tree.value, pattern: partitioned.pattern.source }
  }
}

function buildError(expression: string): TreeishBuildError {
  try {
    parseExpression(expression)
  } catch (error) {
    if (error instanceof TreeishBuildError) {
      return error
    }
    throw error
  }
  throw new Error(`${expression} was accepted`)
}

describe('parseExpression', () => {
  describe('with a separator', () => {
    it('searches the pattern in the tree', () => {
      expect(describePartition(parseExpression('/mnt/media::**/*.txt'))).toEqual({
        kind: 'pattern-in',
        tree: '/mnt/media',
        pattern: '**/*.txt',
      })
    })

    it('drops an empty tree', () => {
      expect(describePartition(parseExpression('::*.txt'))).toEqual({ kind: 'pattern', pattern: '*.txt' })
    })

    it('drops an empty pattern', () => {
      expect(describePartition(parseExpression('dir::'))).toEqual({ kind: 'path', path: 'dir' })
      expect(parseExpression('::')).toBeUndefined()
    })

    it('splits at the first separator only', () => {
      expect(describePartition(parseExpression('a::b::c'))).toEqual({ kind: 'pattern-in', tree: 'a', pattern: 'b::c' })
    })

    it('reads the tree literally', () => {
      expect(describePartition(parseExpression('logs[old]::*.gz'))).toEqual({
        kind: 'pattern-in',
        tree: 'logs[old]',
        pattern: '*.gz',
      })
    })

    it('leaves rooted patterns to the rules', () => {
      expect(parseExpression('a/b::/x/*.txt')?.kind).toBe('pattern-in')
    })

    it('rejects an invalid pattern without falling back', () => {
      const error = buildError('src::[abc')

      expect(error.kind).toBe('glob')
      expect(error.expression).toBe('src::[abc')
      expect(error.cause).toBeInstanceOf(GlobBuildError)
      expect(error.message).toBe('Invalid glob "[abc": Unclosed character class')
    })

    it('rejects an alternative starting at the root as a rooted pattern', () => {
      const error = buildError('tmp::{/etc,x}/*')

      expect(error.kind).toBe('rule')
      expect(error.cause).toBeInstanceOf(RootedPatternInError)
      expect(error.message).toBe('Pattern "{/etc,x}/*" is rooted and cannot be searched in tree "tmp"')
    })

    it('rejects an alternative starting at the root without a tree', () => {
      const error = buildError('::{/etc,x}')

      expect(error.kind).toBe('glob')
      expect(error.message).toBe(
        'Invalid glob "{/etc,x}": A brace alternative cannot start at the root or home directory',
      )
    })

    it('borrows both components from the expression', () => {
      const expression = 'tree::*.txt'
      const partitioned = parseExpression(expression)

      expect(partitioned?.kind).toBe('pattern-in')
      if (partitioned?.kind === 'pattern-in') {
        expect(partitioned.tree.text.borrowedFrom).toBe(expression)
        expect(partitioned.pattern.text.borrowedFrom).toBe(expression)
      }
    })
  })

  describe('without a separator', () => {
    it('reads a glob without literal prefix as a pattern', () => {
      expect(describePartition(parseExpression('**/*.txt'))).toEqual({ kind: 'pattern', pattern: '**/*.txt' })
    })

    it('reads a literal path as a path', () => {
      expect(describePartition(parseExpression('/var/log/app.log'))).toEqual({
        kind: 'path',
        path: '/var/log/app.log',
      })
    })

    it('splits a literal prefix off a pattern', () => {
      expect(describePartition(parseExpression('src/lib/*.ts'))).toEqual({
        kind: 'pattern-in',
        tree: 'src/lib',
        pattern: '*.ts',
      })
    })

    it('splits / off a rooted pattern', () => {
      expect(describePartition(parseExpression('/*.txt'))).toEqual({ kind: 'pattern-in', tree: '/', pattern: '*.txt' })
    })

    it('falls back to a path when the glob is invalid', () => {
      expect(describePartition(parseExpression('[abc'))).toEqual({ kind: 'path', path: '[abc' })
      expect(describePartition(parseExpression('a**b/c'))).toEqual({ kind: 'path', path: 'a**b/c' })
      expect(describePartition(parseExpression('dir\\'))).toEqual({ kind: 'path', path: 'dir\\' })
      expect(describePartition(parseExpression('dir\\file.txt'))).toEqual({ kind: 'path', path: 'dir\\file.txt' })
      expect(describePartition(parseExpression('{/etc,/usr}/passwd'))).toEqual({
        kind: 'path',
        path: '{/etc,/usr}/passwd',
      })
    })

    it('gives nothing for the empty expression', () => {
      expect(parseExpression('')).toBeUndefined()
    })

    it('owns a prefix that unescaping changed', () => {
      const partitioned = parseExpression('my\\[dir\\]/*.ts')

      expect(describePartition(partitioned)).toEqual({ kind: 'pattern-in', tree: 'my[dir]', pattern: '*.ts' })
      if (partitioned?.kind === 'pattern-in') {
        expect(partitioned.tree.isOwned).toBe(true)
        expect(partitioned.pattern.isOwned).toBe(false)
      }
    })
  })

  it('reads a NUL character like any other', () => {
    expect(describePartition(parseExpression('a\0['))).toEqual({ kind: 'path', path: 'a\0[' })
    expect(describePartition(parseExpression('a\0b/*'))).toEqual({ kind: 'pattern-in', tree: 'a\0b', pattern: '*' })
  })
})

describe('partitionIntoComponents', () => {
  it('partitions a compiled glob', () => {
    expect(describePartition(partitionIntoComponents(buildGlob('docs/**')))).toEqual({
      kind: 'pattern-in',
      tree: 'docs',
      pattern: '**',
    })
  })

  it('gives nothing for the empty glob', () => {
    expect(partitionIntoComponents(buildGlob(''))).toBeUndefined()
  })
})
