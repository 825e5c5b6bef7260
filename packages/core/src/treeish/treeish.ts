/**
 * The treeish entity.
 * @packageDocumentation
 */

import type { CompiledGlob } from '../types'
import { TreeishConsumedError } from '../types'
import { DEFAULT_ROOT, resolveWalkBehavior, walkGlob, walkTree, type Walk, type WalkBehaviorOptions } from '../walk'
import { parseExpression, partitionIntoComponents, SEPARATOR } from './expression'
import { validatePartition, type TreeishForm, type TreeishKind } from './rules'
import { SourceText, type Detachable } from './text'
import { TreeishPath } from './values'

/**
 * A literal path, a glob, or a glob searched in an explicit tree, parsed
 * from one expression:
 *
 * - `/var/log/app.log` is a path
 * - `**\/*.txt` is a pattern searched in the working directory
 * - `/mnt/media::**\/*.txt` is a pattern searched in `/mnt/media`
 * - the empty expression is the empty treeish, which matches nothing
 *
 * A treeish is immutable. Its components may borrow from the expression it
 * was parsed from until {@link Treeish.intoOwned} detaches them.
 *
 * @public
 */
export class Treeish implements Detachable<Treeish> {
  private readonly form: TreeishForm

  private consumed = false

  private constructor(form: TreeishForm) {
    this.form = form
  }

  /**
   * Parse and validate an expression.
   *
   * @throws {@link TreeishBuildError} if the expression is rejected
   */
  static parse(expression: string): Treeish {
    return new Treeish(validatePartition(parseExpression(expression), expression))
  }

  /**
   * A treeish for a literal path, never read as a glob. The empty path gives
   * the empty treeish.
   */
  static fromPath(path: string): Treeish {
    const tree = TreeishPath.from(SourceText.borrow(path))
    return new Treeish(validatePartition(tree === undefined ? undefined : { kind: 'path', path: tree }, path))
  }

  /**
   * A treeish for a compiled glob, partitioned the same way as an expression
   * without separator.
   *
   * @throws {@link TreeishBuildError} if the glob is rejected
   */
  static fromGlob(glob: CompiledGlob): Treeish {
    return new Treeish(validatePartition(partitionIntoComponents(glob), glob.source))
  }

  get kind(): TreeishKind {
    return this.current().kind
  }

  get isOwned(): boolean {
    const form = this.current()
    switch (form.kind) {
      case 'empty':
        return true
      case 'path':
        return form.path.isOwned
      case 'pattern':
        return form.pattern.isOwned
      case 'pattern-in':
        return form.tree.isOwned && form.pattern.isOwned
    }
  }

  /**
   * Copy every borrowed component out of the source expression. Returns this
   * treeish when nothing is borrowed.
   */
  intoOwned(): Treeish {
    if (this.isOwned) {
      return this
    }

    const form = this.current()
    switch (form.kind) {
      case 'empty':
        return this
      case 'path':
        return new Treeish({ kind: 'path', path: form.path.intoOwned() })
      case 'pattern':
        return new Treeish({ kind: 'pattern', pattern: form.pattern.intoOwned() })
      case 'pattern-in':
        return new Treeish({ kind: 'pattern-in', tree: form.tree.intoOwned(), pattern: form.pattern.intoOwned() })
    }
  }

  isEmpty(): boolean {
    return this.kind === 'empty'
  }

  /** Whether there is an explicit literal path: `path` and `pattern-in` */
  hasPath(): boolean {
    const { kind } = this
    return kind === 'path' || kind === 'pattern-in'
  }

  /** Whether there is a pattern: `pattern` and `pattern-in` */
  hasPattern(): boolean {
    const { kind } = this
    return kind === 'pattern' || kind === 'pattern-in'
  }

  /**
   * Consume the treeish, returning its path if it is a `path`.
   */
  takePath(): string | undefined {
    const form = this.take()
    return form.kind === 'path' ? form.path.value : undefined
  }

  /**
   * Consume the treeish, returning its glob if it is a `pattern`.
   */
  takePattern(): CompiledGlob | undefined {
    const form = this.take()
    return form.kind === 'pattern' ? form.pattern.glob : undefined
  }

  /**
   * Consume the treeish, returning its tree and glob if it is a `pattern-in`.
   */
  takePatternIn(): [tree: string, pattern: CompiledGlob] | undefined {
    const form = this.take()
    return form.kind === 'pattern-in' ? [form.tree.value, form.pattern.value.glob] : undefined
  }

  /**
   * Walk the filesystem for this treeish.
   *
   * - `path`: every entry under the path, the path itself included
   * - `pattern`: matches under the working directory
   * - `pattern-in`: matches under the tree
   * - `empty`: nothing
   *
   * @throws ZodError if `options` are invalid
   */
  walk(options?: WalkBehaviorOptions): Walk {
    const form = this.current()
    switch (form.kind) {
      case 'empty':
        return emptyWalk(options)
      case 'path':
        return walkTree(form.path.value, options)
      case 'pattern':
        return walkGlob(form.pattern.glob, DEFAULT_ROOT, options)
      case 'pattern-in':
        return walkGlob(form.pattern.value.glob, form.tree.value, options)
    }
  }

  /**
   * The normalized expression.
   */
  toString(): string {
    const form = this.current()
    switch (form.kind) {
      case 'empty':
        return ''
      case 'path':
        return form.path.value
      case 'pattern':
        return form.pattern.source
      case 'pattern-in':
        return `${form.tree.value}${SEPARATOR}${form.pattern.value.source}`
    }
  }

  private current(): TreeishForm {
    if (this.consumed) {
      throw new TreeishConsumedError()
    }
    return this.form
  }

  private take(): TreeishForm {
    const form = this.current()
    this.consumed = true
    return form
  }
}

function emptyWalk(options: WalkBehaviorOptions | undefined): Walk {
  resolveWalkBehavior(options)
  return (function* (): Walk {})()
}
