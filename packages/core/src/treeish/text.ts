/**
 * Borrowed or owned text taken from a treeish expression.
 * @packageDocumentation
 */

/**
 * A value that may refer back to the text it was parsed from and can be
 * detached from it.
 *
 * `intoOwned` is idempotent: detaching an owned value returns it unchanged.
 *
 * @public
 */
export interface Detachable<T> {
  /** Whether the value holds no reference to its source expression */
  readonly isOwned: boolean

  intoOwned(): T
}

type TextRepr =
  | { readonly kind: 'borrowed'; readonly source: string; readonly start: number; readonly end: number }
  | { readonly kind: 'owned'; readonly value: string }

/**
 * Text that is either a view of a span of an expression, or a copy.
 *
 * A borrowed view keeps the whole expression reachable for as long as the
 * view lives. {@link SourceText.intoOwned} copies the span out and drops
 * the expression.
 *
 * @public
 */
export class SourceText implements Detachable<SourceText> {
  private readonly repr: TextRepr

  private constructor(repr: TextRepr) {
    this.repr = repr
  }

  /**
   * View `source[start, end)` without copying.
   *
   * @throws RangeError if the span is outside the source
   */
  static borrow(source: string, start = 0, end = source.length): SourceText {
    if (start < 0 || end < start || end > source.length) {
      throw new RangeError(`Span [${start}, ${end}) is outside text of length ${source.length}`)
    }
    return new SourceText({ kind: 'borrowed', source, start, end })
  }

  static own(value: string): SourceText {
    return new SourceText({ kind: 'owned', value })
  }

  /**
   * Borrow `value` from `source` when it is the span starting at `start`;
   * own it otherwise (for instance after unescaping changed it).
   */
  static borrowOrOwn(source: string, start: number, value: string): SourceText {
    if (source.startsWith(value, start)) {
      return SourceText.borrow(source, start, start + value.length)
    }
    return SourceText.own(value)
  }

  get isOwned(): boolean {
    return this.repr.kind === 'owned'
  }

  get length(): number {
    return this.repr.kind === 'owned' ? this.repr.value.length : this.repr.end - this.repr.start
  }

  /** The expression a borrowed view points into */
  get borrowedFrom(): string | undefined {
    return this.repr.kind === 'borrowed' ? this.repr.source : undefined
  }

  intoOwned(): SourceText {
    if (this.repr.kind === 'owned') {
      return this
    }
    return SourceText.own(this.toString())
  }

  toString(): string {
    if (this.repr.kind === 'owned') {
      return this.repr.value
    }
    const { source, start, end } = this.repr
    return start === 0 && end === source.length ? source : source.slice(start, end)
  }
}
