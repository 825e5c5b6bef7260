import { describe, it, expect } from 'vitest'

import { expandHome, pathToSegments, segmentsToPath } from './path-utils'

const context = { homeDir: '/home/user' }

describe('pathToSegments', () => {
  it('splits on /', () => {
    expect(pathToSegments('src/lib/index.ts')).toEqual(['src', 'lib', 'index.ts'])
  })

  it('drops empty components', () => {
    expect(pathToSegments('/home/user//dev/file.ts/')).toEqual(['home', 'user', 'dev', 'file.ts'])
  })

  it('returns nothing for the empty path and the root', () => {
    expect(pathToSegments('')).toEqual([])
    expect(pathToSegments('/')).toEqual([])
  })
})

describe('segmentsToPath', () => {
  it('joins with /', () => {
    expect(segmentsToPath(['src', 'lib', 'index.ts'])).toBe('src/lib/index.ts')
  })

  it('gives the empty path for no segments', () => {
    expect(segmentsToPath([])).toBe('')
  })
})

describe('expandHome', () => {
  it('expands ~ alone', () => {
    expect(expandHome('~', context)).toBe('/home/user')
  })

  it('expands a leading ~/', () => {
    expect(expandHome('~/dev', context)).toBe('/home/user/dev')
  })

  it('leaves other paths alone', () => {
    expect(expandHome('~dev', context)).toBe('~dev')
    expect(expandHome('dev/~', context)).toBe('dev/~')
    expect(expandHome('/tmp', context)).toBe('/tmp')
  })
})
