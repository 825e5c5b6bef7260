import { describe, it, expect } from 'vitest'

import { buildGlob } from '../compile'
import { SourceText } from './text'
import { TreeishGlob, TreeishPath, Unrooted } from './values'

function glob(source: string): TreeishGlob {
  const value = TreeishGlob.from(SourceText.borrow(source), buildGlob(source))
  if (value === undefined) {
    throw new Error(`empty glob: ${source}`)
  }
  return value
}

describe('TreeishPath', () => {
  it('refuses the empty path', () => {
    expect(TreeishPath.from(SourceText.own(''))).toBeUndefined()
  })

  it('detaches from its source', () => {
    const path = TreeishPath.from(SourceText.borrow('/srv/data::*', 0, 9))

    expect(path?.value).toBe('/srv/data')
    expect(path?.isOwned).toBe(false)
    expect(path?.intoOwned().isOwned).toBe(true)
    expect(path?.intoOwned().value).toBe('/srv/data')
  })
})

describe('TreeishGlob', () => {
  it('refuses the empty glob', () => {
    expect(TreeishGlob.from(SourceText.own(''), buildGlob(''))).toBeUndefined()
  })

  it('reports rootedness of its glob', () => {
    expect(glob('/x/*.txt').rooted).toBe(true)
    expect(glob('*.txt').rooted).toBe(false)
  })

  it('keeps the compiled glob when detached', () => {
    const value = glob('**/*.md')
    const owned = value.intoOwned()

    expect(owned.isOwned).toBe(true)
    expect(owned.glob).toBe(value.glob)
    expect(owned.source).toBe('**/*.md')
  })
})

describe('Unrooted', () => {
  it('wraps unrooted values', () => {
    const value = glob('src/*.ts')
    expect(Unrooted.check(value)?.value).toBe(value)
  })

  it.each(['/src/*.ts', '~/src/*.ts', '~'])('refuses %s', (source) => {
    expect(Unrooted.check(glob(source))).toBeUndefined()
  })

  it('detaches the wrapped value', () => {
    const unrooted = Unrooted.check(glob('*.ts'))

    expect(unrooted?.isOwned).toBe(false)
    expect(unrooted?.intoOwned().isOwned).toBe(true)
  })
})
