/**
 * Reader: the cursor over an Input.
 *
 * The Reader is the only thing that advances through input. Every operation
 * either succeeds and moves the cursor forward, or fails and leaves it
 * exactly where it was. Backtracking is done by branching: `try` runs a
 * sub-read on a clone and commits the clone's cursor only on success.
 */

import type { ReadError, LengthRequirement } from "./error.js";
import { describeValue } from "./error.js";
import type { Encoding, Input, Needle, UnitPredicate } from "./input.js";
import { exact, unknown, type RetryRequirement } from "./retry.js";
import { invariant, isIndex } from "./safety.js";
import { Span } from "./span.js";
import { fail, ok, type ReadResult } from "./types.js";
import { encodeUtf8, utf8CharLen } from "./utf8.js";

/** A saved cursor position, restorable on the Reader that made it. */
export interface Checkpoint {
  readonly input: Input;
  readonly position: number;
}

function needleBytes(needle: Needle): Uint8Array | undefined {
  if (typeof needle === "number") return Uint8Array.of(needle);
  if (typeof needle === "string") return encodeUtf8(needle);
  if (needle instanceof Uint8Array) return needle;
  return undefined;
}

function describeNeedle(needle: Needle): string {
  const bytes = needleBytes(needle);
  return bytes === undefined ? "a matching unit" : describeValue(bytes);
}

export class Reader<E extends Encoding = Encoding> {
  private cursor: number;

  constructor(
    readonly input: Input<E>,
    position = 0,
  ) {
    invariant(isIndex(position) && position <= input.len, `position ${position} outside input of length ${input.len}`);
    this.cursor = position;
  }

  /** Bytes consumed so far. */
  get position(): number {
    return this.cursor;
  }

  /** Bytes left to read. */
  get remaining(): number {
    return this.input.len - this.cursor;
  }

  atEnd(): boolean {
    return this.cursor === this.input.len;
  }

  // ---------------------------------------------------------------------------
  // Error construction
  // ---------------------------------------------------------------------------

  /** Absolute span of `length` bytes from the cursor, clamped to the input. */
  spanHere(length = 0): Span {
    const to = Math.min(this.cursor + Math.max(0, length), this.input.len);
    return this.input.spanAt(this.cursor, to);
  }

  /** An `invalid` error over `length` bytes at the cursor. */
  invalid(operation: string, description: string, length = 1): ReadError {
    return this.input.env.errors.invalid(this.spanHere(length), operation, description);
  }

  /** An `expected` error over `length` bytes at the cursor. */
  expected(operation: string, what: string, length = 1): ReadError {
    return this.input.env.errors.expected(this.spanHere(length), operation, what);
  }

  private shortfall(
    operation: string,
    what: string,
    requirement: RetryRequirement,
    length?: LengthRequirement,
  ): ReadError {
    return this.input.env.errors.shortfall(
      this.spanHere(this.remaining),
      operation,
      what,
      requirement,
      this.input.bound,
      length,
    );
  }

  private lengthShortfall(operation: string, needed: number): ReadError {
    const found = this.remaining;
    return this.shortfall(operation, "enough input", exact(needed - found), { min: needed, max: null, found });
  }

  private rest(): Input<E> {
    return this.input.view(this.cursor, this.input.len);
  }

  // ---------------------------------------------------------------------------
  // Fixed-length reads
  // ---------------------------------------------------------------------------

  /** The next `n` bytes, without advancing. */
  peek(n: number): ReadResult<Input<E>> {
    invariant(isIndex(n), `peek length must be a non-negative integer, got ${n}`);
    if (this.remaining < n) return fail(this.lengthShortfall("peek", n));
    return this.input.slice(this.cursor, this.cursor + n, "peek");
  }

  /** The next `n` bytes, advancing past them. */
  take(n: number): ReadResult<Input<E>> {
    invariant(isIndex(n), `take length must be a non-negative integer, got ${n}`);
    if (this.remaining < n) return fail(this.lengthShortfall("take", n));
    const result = this.input.slice(this.cursor, this.cursor + n, "take");
    if (result.ok) this.cursor += n;
    return result;
  }

  /** Advance past `n` bytes. */
  skip(n: number): ReadResult<void> {
    const result = this.take(n);
    return result.ok ? ok(undefined) : result;
  }

  /** The next byte, without advancing. */
  peekByte(): ReadResult<number> {
    const byte = this.input.byteAt(this.cursor);
    if (byte === undefined) return fail(this.lengthShortfall("peek byte", 1));
    return ok(byte);
  }

  /** The next byte, advancing past it. */
  readByte(this: Reader<"bytes">): ReadResult<number> {
    const byte = this.input.byteAt(this.cursor);
    if (byte === undefined) return fail(this.lengthShortfall("read byte", 1));
    this.cursor += 1;
    return ok(byte);
  }

  /** The next unit (a byte, or a code point on text), without advancing. */
  peekUnit(): ReadResult<number> {
    const split = this.rest().splitFirst("peek unit");
    return split.ok ? ok(split.value[0]) : split;
  }

  /** The next unit, advancing past it. */
  readUnit(): ReadResult<number> {
    return this.nextUnit("read unit");
  }

  /** The next character of text, without advancing. */
  peekChar(this: Reader<"utf8">): ReadResult<string> {
    const split = this.rest().splitFirst("peek char");
    return split.ok ? ok(String.fromCodePoint(split.value[0])) : split;
  }

  /** The next character of text, advancing past it. */
  readChar(this: Reader<"utf8">): ReadResult<string> {
    const unit = this.nextUnit("read char");
    return unit.ok ? ok(String.fromCodePoint(unit.value)) : unit;
  }

  private nextUnit(operation: string): ReadResult<number> {
    const split = this.rest().splitFirst(operation);
    if (!split.ok) return split;
    const [unit, tail] = split.value;
    this.cursor = this.input.len - tail.len;
    return ok(unit);
  }

  /** True if the next byte is `byte`. Never fails. */
  peekEq(byte: number): boolean {
    return this.input.byteAt(this.cursor) === byte;
  }

  /** Everything left, advancing to the end. */
  takeRemaining(): Input<E> {
    const rest = this.rest();
    this.cursor = this.input.len;
    return rest;
  }

  // ---------------------------------------------------------------------------
  // Predicate reads
  // ---------------------------------------------------------------------------

  /**
   * Longest run of units satisfying `predicate`. Never fails: no match is an
   * empty input and the cursor stays put.
   */
  takeWhile(predicate: UnitPredicate): Input<E> {
    const [matched] = this.rest().splitPrefix(predicate);
    this.cursor += matched.len;
    return matched;
  }

  /**
   * `takeWhile` with a predicate that can fail. A failing predicate fails the
   * whole read and the cursor stays put.
   */
  tryTakeWhile(predicate: (unit: number) => ReadResult<boolean>): ReadResult<Input<E>> {
    return this.context("try take while", (r) => {
      const rest = r.rest();
      let index = 0;
      for (let next = rest.unitAt(0); next !== undefined; next = rest.unitAt(index)) {
        const keep = predicate(next.unit);
        if (!keep.ok) return keep;
        if (!keep.value) break;
        index += next.len;
      }
      return r.take(index);
    });
  }

  /** Advance past the longest run satisfying `predicate`; returns bytes skipped. */
  skipWhile(predicate: UnitPredicate): number {
    return this.takeWhile(predicate).len;
  }

  // ---------------------------------------------------------------------------
  // Scanning reads
  // ---------------------------------------------------------------------------

  /**
   * Everything before the first `needle`, leaving the cursor on the needle.
   * Not finding it is retryable: more input may still contain it.
   */
  takeUntil(needle: Needle): ReadResult<Input<E>> {
    const index = this.rest().find(needle);
    if (index === undefined) {
      return fail(this.shortfall("take until", describeNeedle(needle), unknown()));
    }
    const result = this.input.slice(this.cursor, this.cursor + index, "take until");
    if (result.ok) this.cursor += index;
    return result;
  }

  /** Like `takeUntil`, then also advances past the needle itself. */
  takeUntilConsume(needle: Needle): ReadResult<Input<E>> {
    const index = this.rest().find(needle);
    if (index === undefined) {
      return fail(this.shortfall("take until consume", describeNeedle(needle), unknown()));
    }
    const head = this.input.slice(this.cursor, this.cursor + index, "take until consume");
    if (!head.ok) return head;
    const width = this.needleWidth(needle, this.cursor + index);
    const after = this.input.slice(this.cursor + index + width, this.input.len, "take until consume");
    if (!after.ok) return after;
    this.cursor += index + width;
    return head;
  }

  /** Advance up to (not past) the first `needle`. */
  skipUntil(needle: Needle): ReadResult<void> {
    const index = this.rest().find(needle);
    if (index === undefined) {
      return fail(this.shortfall("skip until", describeNeedle(needle), unknown()));
    }
    if (!this.input.isBoundary(this.cursor + index)) {
      return fail(this.input.env.errors.invalid(this.input.spanAt(this.cursor + index, this.cursor + index + 1), "skip until", "split inside a utf-8 code point"));
    }
    this.cursor += index;
    return ok(undefined);
  }

  /** Width in bytes of the needle matched at `at`. */
  private needleWidth(needle: Needle, at: number): number {
    const bytes = needleBytes(needle);
    if (bytes !== undefined) return bytes.length;
    if (this.input.encoding === "bytes") return 1;
    // A predicate on text matches one whole code point
    const first = this.input.byteAt(at);
    return first === undefined ? 0 : Math.max(1, utf8CharLen(first));
  }

  // ---------------------------------------------------------------------------
  // Exact values
  // ---------------------------------------------------------------------------

  /**
   * Consume exactly `value`. If what is left is a strict prefix of `value`
   * the failure is retryable, otherwise it is a fatal mismatch.
   */
  consume(value: Uint8Array | string | number): ReadResult<Input<E>> {
    const expected = needleBytes(value) ?? new Uint8Array(0);
    const rest = this.rest();
    if (rest.hasPrefix(expected)) {
      return this.take(expected.length);
    }
    const available = rest.len;
    if (available < expected.length && startsWith(expected, rest.asBytes())) {
      return fail(this.shortfall("consume", "exact value", exact(expected.length - available), undefined));
    }
    const span = this.spanHere(Math.max(1, Math.min(expected.length, available)));
    return fail(this.input.env.errors.expected(span, "consume", "exact value", { value: expected }));
  }

  /** Consume `value` if it is next; returns whether it was. Never fails. */
  consumeOpt(value: Uint8Array | string | number): boolean {
    const expected = needleBytes(value) ?? new Uint8Array(0);
    if (!this.rest().hasPrefix(expected)) return false;
    if (!this.input.isBoundary(this.cursor + expected.length)) return false;
    this.cursor += expected.length;
    return true;
  }

  // ---------------------------------------------------------------------------
  // Expectation reads
  // ---------------------------------------------------------------------------

  /**
   * Run `f` on a branch; `undefined` means "not what was expected" and fails
   * with `expected(what)` over the bytes `f` looked at.
   */
  expect<T>(what: string, f: (r: Reader<E>) => T | undefined): ReadResult<T> {
    const branch = this.clone();
    const value = f(branch);
    if (value === undefined) {
      const span = this.input.spanAt(this.cursor, Math.max(branch.cursor, Math.min(this.cursor + 1, this.input.len)));
      return fail(this.input.env.errors.expected(span, "expect", what));
    }
    this.cursor = branch.cursor;
    return ok(value);
  }

  /** `expect` for an `f` that can itself fail; its errors pass through. */
  tryExpect<T>(what: string, f: (r: Reader<E>) => ReadResult<T | undefined>): ReadResult<T> {
    const branch = this.clone();
    const result = f(branch);
    if (!result.ok) return result;
    if (result.value === undefined) {
      const span = this.input.spanAt(this.cursor, Math.max(branch.cursor, Math.min(this.cursor + 1, this.input.len)));
      return fail(this.input.env.errors.expected(span, "try expect", what));
    }
    this.cursor = branch.cursor;
    return ok(result.value);
  }

  // ---------------------------------------------------------------------------
  // Numbers
  // ---------------------------------------------------------------------------

  private readFixed<T>(size: number, operation: string, decode: (view: DataView) => T): ReadResult<T> {
    if (this.remaining < size) return fail(this.lengthShortfall(operation, size));
    const bytes = this.input.asBytes();
    const view = new DataView(bytes.buffer, bytes.byteOffset + this.cursor, size);
    this.cursor += size;
    return ok(decode(view));
  }

  readU8(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(1, "read u8", (v) => v.getUint8(0));
  }

  readI8(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(1, "read i8", (v) => v.getInt8(0));
  }

  readU16Le(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(2, "read little-endian u16", (v) => v.getUint16(0, true));
  }

  readU16Be(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(2, "read big-endian u16", (v) => v.getUint16(0, false));
  }

  readI16Le(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(2, "read little-endian i16", (v) => v.getInt16(0, true));
  }

  readI16Be(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(2, "read big-endian i16", (v) => v.getInt16(0, false));
  }

  readU32Le(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(4, "read little-endian u32", (v) => v.getUint32(0, true));
  }

  readU32Be(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(4, "read big-endian u32", (v) => v.getUint32(0, false));
  }

  readI32Le(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(4, "read little-endian i32", (v) => v.getInt32(0, true));
  }

  readI32Be(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(4, "read big-endian i32", (v) => v.getInt32(0, false));
  }

  readU64Le(this: Reader<"bytes">): ReadResult<bigint> {
    return this.readFixed(8, "read little-endian u64", (v) => v.getBigUint64(0, true));
  }

  readU64Be(this: Reader<"bytes">): ReadResult<bigint> {
    return this.readFixed(8, "read big-endian u64", (v) => v.getBigUint64(0, false));
  }

  readI64Le(this: Reader<"bytes">): ReadResult<bigint> {
    return this.readFixed(8, "read little-endian i64", (v) => v.getBigInt64(0, true));
  }

  readI64Be(this: Reader<"bytes">): ReadResult<bigint> {
    return this.readFixed(8, "read big-endian i64", (v) => v.getBigInt64(0, false));
  }

  readF32Le(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(4, "read little-endian f32", (v) => v.getFloat32(0, true));
  }

  readF32Be(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(4, "read big-endian f32", (v) => v.getFloat32(0, false));
  }

  readF64Le(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(8, "read little-endian f64", (v) => v.getFloat64(0, true));
  }

  readF64Be(this: Reader<"bytes">): ReadResult<number> {
    return this.readFixed(8, "read big-endian f64", (v) => v.getFloat64(0, false));
  }

  // ---------------------------------------------------------------------------
  // Branching
  // ---------------------------------------------------------------------------

  /** Independent reader at the same position. */
  clone(): Reader<E> {
    return new Reader(this.input, this.cursor);
  }

  checkpoint(): Checkpoint {
    return { input: this.input, position: this.cursor };
  }

  /** Move back (or forward) to a checkpoint taken on this reader's input. */
  restore(checkpoint: Checkpoint): void {
    invariant(checkpoint.input === this.input, "checkpoint belongs to a different input");
    this.cursor = checkpoint.position;
  }

  /**
   * Run `f` on a clone. On success the clone's position is committed; on
   * failure this reader is left exactly as it was.
   */
  try<T>(f: (r: Reader<E>) => ReadResult<T>): ReadResult<T> {
    const branch = this.clone();
    const result = f(branch);
    if (result.ok) this.cursor = branch.cursor;
    return result;
  }

  /** Run `f`, which cannot fail, and return the input it consumed. */
  takeConsumed(f: (r: Reader<E>) => void): Input<E> {
    const start = this.cursor;
    f(this);
    return this.input.view(start, this.cursor);
  }

  /**
   * Run `f` as with `try` and return the input it consumed along with its
   * value. On failure the cursor is left where it was.
   */
  tryTakeConsumed<T>(f: (r: Reader<E>) => ReadResult<T>): ReadResult<[Input<E>, T]> {
    const start = this.cursor;
    const result = this.try(f);
    if (!result.ok) return result;
    return ok([this.input.view(start, this.cursor), result.value]);
  }

  /** Run `f` on a clone and never commit. */
  peekWith<T>(f: (r: Reader<E>) => ReadResult<T>): ReadResult<T> {
    return f(this.clone());
  }

  /** Run `f` that cannot fail on a clone and never commit. */
  peekInfallible<T>(f: (r: Reader<E>) => T): T {
    return f(this.clone());
  }

  // ---------------------------------------------------------------------------
  // Context
  // ---------------------------------------------------------------------------

  /**
   * Run `f` as the named operation `name`. A failure escaping `f` gains the
   * frame `{ name, span }`, where the span runs from the cursor at entry to
   * the furthest point the attempt reached.
   */
  context<T>(name: string, f: (r: Reader<E>) => ReadResult<T>): ReadResult<T> {
    const entry = this.input.offset + this.cursor;
    const result = f(this);
    if (result.ok) return result;
    const error = result.error;
    const end = Math.max(entry, error.span.end, error.context.outermostSpan().end, this.input.offset + this.cursor);
    return fail(error.withFrame({ operation: name, span: Span.of(entry, end) }));
  }
}

function startsWith(haystack: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > haystack.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (haystack[i] !== prefix[i]) return false;
  }
  return true;
}
