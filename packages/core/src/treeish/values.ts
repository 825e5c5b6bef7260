/**
 * The never-empty components a treeish is built from.
 * @packageDocumentation
 */

import type { CompiledGlob } from '../types'
import { isEmptyGlob } from '../compile'
import { isEmptyText, nonEmpty } from './empty'
import { SourceText, type Detachable } from './text'

/**
 * A literal filesystem path, never empty.
 * @public
 */
export class TreeishPath implements Detachable<TreeishPath> {
  readonly text: SourceText

  private constructor(text: SourceText) {
    this.text = text
  }

  /**
   * Wrap a path text, or `undefined` if it is empty.
   */
  static from(text: SourceText): TreeishPath | undefined {
    const present = nonEmpty(text, isEmptyText)
    return present && new TreeishPath(present)
  }

  get value(): string {
    return this.text.toString()
  }

  get isOwned(): boolean {
    return this.text.isOwned
  }

  intoOwned(): TreeishPath {
    return this.isOwned ? this : new TreeishPath(this.text.intoOwned())
  }

  toString(): string {
    return this.value
  }
}

/**
 * A compiled glob together with its text, never empty.
 * @public
 */
export class TreeishGlob implements Detachable<TreeishGlob> {
  readonly text: SourceText

  readonly glob: CompiledGlob

  private constructor(text: SourceText, glob: CompiledGlob) {
    this.text = text
    this.glob = glob
  }

  /**
   * Wrap a compiled glob, or `undefined` if it is the empty glob.
   *
   * @param text - The glob's source as it appears in the expression
   */
  static from(text: SourceText, glob: CompiledGlob): TreeishGlob | undefined {
    const present = nonEmpty(glob, isEmptyGlob)
    return present && new TreeishGlob(text, present)
  }

  get source(): string {
    return this.text.toString()
  }

  get rooted(): boolean {
    return this.glob.rooted
  }

  get isOwned(): boolean {
    return this.text.isOwned
  }

  intoOwned(): TreeishGlob {
    return this.isOwned ? this : new TreeishGlob(this.text.intoOwned(), this.glob)
  }

  toString(): string {
    return this.source
  }
}

/**
 * A value known not to be rooted. The only way to get one is
 * {@link Unrooted.check}.
 *
 * @public
 */
export class Unrooted<T extends { readonly rooted: boolean } & Detachable<T>> implements Detachable<Unrooted<T>> {
  readonly value: T

  private constructor(value: T) {
    this.value = value
  }

  static check<T extends { readonly rooted: boolean } & Detachable<T>>(value: T): Unrooted<T> | undefined {
    return value.rooted ? undefined : new Unrooted(value)
  }

  get isOwned(): boolean {
    return this.value.isOwned
  }

  intoOwned(): Unrooted<T> {
    return this.isOwned ? this : new Unrooted(this.value.intoOwned())
  }
}
