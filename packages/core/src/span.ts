import { invariant, isIndex } from "./safety.js";

/**
 * Half-open byte range `[start, end)`.
 *
 * Spans are plain offsets. They never hold the bytes they describe, so an
 * error carrying one stays valid after the input it came from is sliced or
 * dropped; rendering resolves it against the input passed in at that point.
 */
export class Span {
  private constructor(
    readonly start: number,
    readonly end: number,
  ) {}

  /** Span covering `[start, end)`. Throws `RangeError` if `start > end`. */
  static of(start: number, end: number): Span {
    invariant(isIndex(start) && isIndex(end), `invalid span ${start}..${end}`);
    invariant(start <= end, `span start ${start} is past its end ${end}`);
    return new Span(start, end);
  }

  /** Empty span at `offset`. */
  static at(offset: number): Span {
    return Span.of(offset, offset);
  }

  get len(): number {
    return this.end - this.start;
  }

  isEmpty(): boolean {
    return this.start === this.end;
  }

  /** True if `other` lies entirely inside this span. */
  contains(other: Span): boolean {
    return other.start >= this.start && other.end <= this.end;
  }

  /** True if `offset` is inside `[start, end)`. */
  containsOffset(offset: number): boolean {
    return offset >= this.start && offset < this.end;
  }

  /** This span moved right by `delta` bytes. */
  shift(delta: number): Span {
    return Span.of(this.start + delta, this.end + delta);
  }

  /** Smallest span covering both `this` and `other`. */
  cover(other: Span): Span {
    return Span.of(Math.min(this.start, other.start), Math.max(this.end, other.end));
  }

  equals(other: Span): boolean {
    return this.start === other.start && this.end === other.end;
  }

  toString(): string {
    return `${this.start}..${this.end}`;
  }
}
