/**
 * Input: an immutable, zero-copy view over caller-owned bytes.
 *
 * Every Input derived from another shares its root buffer; slicing only
 * moves `[start, end)`. A `utf8` Input was validated when it was created and
 * can only be split on code point boundaries, so every sub-Input is valid
 * text on its own.
 *
 * Indices passed to Input methods are relative to the Input itself. Spans
 * on errors are absolute, i.e. relative to the root buffer.
 */

import { resolveFeatures, type Features } from "./config.js";
import { ErrorFactory } from "./error.js";
import { Reader } from "./reader.js";
import { exact } from "./retry.js";
import { invariant, isIndex } from "./safety.js";
import { scanBackend, type BytePredicate, type ScanBackend } from "./scan.js";
import { Span } from "./span.js";
import { ok, fail, type ReadResult } from "./types.js";
import { checkUtf8, decodeAt, encodeUtf8, isCharBoundary } from "./utf8.js";

export type Encoding = "bytes" | "utf8";

/**
 * Receives a byte for `bytes` inputs and a code point for `utf8` inputs.
 */
export type UnitPredicate = (unit: number) => boolean;

/** What `find` and the Reader's `*Until` operations look for. */
export type Needle = number | Uint8Array | string | UnitPredicate;

export interface InputOptions {
  /** The input is complete; boundary shortfalls are fatal. */
  bound?: boolean;
  /** Overrides for the configured capability flags. */
  features?: Partial<Features>;
}

/** Per-parse environment shared by an Input and everything derived from it. */
export interface ParseEnv {
  readonly features: Features;
  readonly scan: ScanBackend;
  readonly errors: ErrorFactory;
}

function createEnv(options: InputOptions): ParseEnv {
  const features = resolveFeatures(options.features);
  return { features, scan: scanBackend(features), errors: new ErrorFactory(features) };
}

const decoder = new TextDecoder("utf-8");

export class Input<E extends Encoding = Encoding> {
  private constructor(
    readonly encoding: E,
    private readonly root: Uint8Array,
    private readonly start: number,
    private readonly end: number,
    /** True when no more bytes will ever follow this input. */
    readonly bound: boolean,
    readonly env: ParseEnv,
  ) {}

  /** Wrap `bytes` without copying. */
  static bytes(bytes: Uint8Array, options: InputOptions = {}): Input<"bytes"> {
    return new Input("bytes", bytes, 0, bytes.length, options.bound ?? false, createEnv(options));
  }

  get len(): number {
    return this.end - this.start;
  }

  /** Absolute offset of this input within the root buffer. */
  get offset(): number {
    return this.start;
  }

  isEmpty(): boolean {
    return this.start === this.end;
  }

  /** Read-only view of the underlying bytes. Not a copy: do not write to it. */
  asBytes(): Uint8Array {
    return this.root.subarray(this.start, this.end);
  }

  /** The whole input relative to its own origin: `0..len`. */
  span(): Span {
    return Span.of(0, this.len);
  }

  /** The whole input relative to the root buffer. */
  absoluteSpan(): Span {
    return Span.of(this.start, this.end);
  }

  /** Absolute span for the local range `[from, to)`. */
  spanAt(from: number, to: number): Span {
    return Span.of(this.start + from, this.start + to);
  }

  /** Byte at `index`, or `undefined` outside the input. */
  byteAt(index: number): number | undefined {
    if (!isIndex(index) || index >= this.len) return undefined;
    return this.root[this.start + index];
  }

  /** True if `index` is a valid split point for this input's encoding. */
  isBoundary(index: number): boolean {
    if (!isIndex(index) || index > this.len) return false;
    return this.encoding === "bytes" || isCharBoundary(this.asBytes(), index);
  }

  // ---------------------------------------------------------------------------
  // Slicing
  // ---------------------------------------------------------------------------

  /**
   * Sub-input `[from, to)` for a range the caller already knows is a valid
   * split. Throws `RangeError` otherwise.
   */
  view(from: number, to: number): Input<E> {
    invariant(isIndex(from) && isIndex(to) && from <= to && to <= this.len, `range ${from}..${to} outside input of length ${this.len}`);
    invariant(this.isBoundary(from) && this.isBoundary(to), `range ${from}..${to} splits a utf-8 code point`);
    return new Input(this.encoding, this.root, this.start + from, this.start + to, this.bound, this.env);
  }

  /**
   * Sub-input `[from, to)`. An out-of-range index is a programming error
   * and throws; a range that splits a code point fails `invalid`.
   */
  slice(from: number, to: number, operation = "slice"): ReadResult<Input<E>> {
    invariant(isIndex(from) && isIndex(to) && from <= to && to <= this.len, `range ${from}..${to} outside input of length ${this.len}`);
    for (const at of [from, to]) {
      if (!this.isBoundary(at)) {
        return fail(this.env.errors.invalid(this.spanAt(at, at + 1), operation, "split inside a utf-8 code point"));
      }
    }
    return ok(this.view(from, to));
  }

  /** `[0, index)` and `[index, len)`. Concatenating the two gives back this input. */
  splitAt(index: number): ReadResult<[Input<E>, Input<E>]> {
    invariant(isIndex(index) && index <= this.len, `index ${index} outside input of length ${this.len}`);
    if (!this.isBoundary(index)) {
      return fail(this.env.errors.invalid(this.spanAt(index, index + 1), "split at", "split inside a utf-8 code point"));
    }
    return ok([this.view(0, index), this.view(index, this.len)]);
  }

  /**
   * The unit starting at `index` (a byte, or a code point on text) and its
   * length in bytes. `undefined` at the end or inside a code point.
   */
  unitAt(index: number): { unit: number; len: number } | undefined {
    const first = this.byteAt(index);
    if (first === undefined || !this.isBoundary(index)) return undefined;
    if (this.encoding === "bytes") return { unit: first, len: 1 };
    const { codePoint, len } = decodeAt(this.asBytes(), index);
    return { unit: codePoint, len };
  }

  /** The first unit and the rest. An empty input is a length shortfall. */
  splitFirst(operation = "split first"): ReadResult<[number, Input<E>]> {
    const first = this.unitAt(0);
    if (first === undefined) {
      return fail(
        this.env.errors.shortfall(this.absoluteSpan(), operation, "enough input", exact(1), this.bound, {
          min: 1,
          max: null,
          found: 0,
        }),
      );
    }
    return ok([first.unit, this.view(first.len, this.len)]);
  }

  /**
   * Longest prefix whose units all satisfy `predicate`, and the rest.
   * Never fails; the prefix may be empty.
   */
  splitPrefix(predicate: UnitPredicate): [Input<E>, Input<E>] {
    const index = this.prefixLength(predicate);
    return [this.view(0, index), this.view(index, this.len)];
  }

  private prefixLength(predicate: UnitPredicate): number {
    const bytes = this.asBytes();
    if (this.encoding === "bytes") {
      return this.env.scan.findIndex(bytes, (b) => !predicate(b)) ?? bytes.length;
    }
    let i = 0;
    while (i < bytes.length) {
      const { codePoint, len } = decodeAt(bytes, i);
      if (!predicate(codePoint)) break;
      i += len;
    }
    return i;
  }

  // ---------------------------------------------------------------------------
  // Searching
  // ---------------------------------------------------------------------------

  /** Offset of the first match of `needle`, or `undefined`. */
  find(needle: Needle): number | undefined {
    const bytes = this.asBytes();
    const scan = this.env.scan;
    if (typeof needle === "number") return scan.findByte(bytes, needle);
    if (typeof needle === "string") return scan.findSubstring(bytes, encodeUtf8(needle));
    if (needle instanceof Uint8Array) return scan.findSubstring(bytes, needle);
    if (this.encoding === "bytes") return scan.findIndex(bytes, needle);
    const index = this.prefixLength((unit) => !needle(unit));
    return index < bytes.length ? index : undefined;
  }

  hasPrefix(prefix: Uint8Array | string): boolean {
    const expected = typeof prefix === "string" ? encodeUtf8(prefix) : prefix;
    if (expected.length > this.len) return false;
    for (let i = 0; i < expected.length; i++) {
      if (this.root[this.start + i] !== expected[i]) return false;
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Relations
  // ---------------------------------------------------------------------------

  /** True if this input lies inside `parent` in the same buffer. */
  isWithin(parent: Input): boolean {
    return this.root === parent.root && this.start >= parent.start && this.end <= parent.end;
  }

  /** Span of this input relative to `parent`, or `undefined` if not within it. */
  spanOf(parent: Input): Span | undefined {
    if (!this.isWithin(parent)) return undefined;
    return Span.of(this.start - parent.start, this.end - parent.start);
  }

  /** Same bytes, marked complete: shortfalls on it are never retryable. */
  intoBound(): Input<E> {
    if (this.bound) return this;
    return new Input(this.encoding, this.root, this.start, this.end, true, this.env);
  }

  // ---------------------------------------------------------------------------
  // Text
  // ---------------------------------------------------------------------------

  /**
   * Validate these bytes as UTF-8. A sequence cut short by the end of an
   * unbound input is retryable; any other bad byte is `invalid`.
   */
  toText(): ReadResult<Input<"utf8">> {
    const check = checkUtf8(this.asBytes());
    if (check.valid) {
      return ok(new Input("utf8", this.root, this.start, this.end, this.bound, this.env));
    }
    const errors = this.env.errors;
    if (check.missing !== null) {
      return fail(
        errors.shortfall(
          this.spanAt(check.offset, this.len),
          "decode utf-8",
          "complete utf-8 code point",
          exact(check.missing),
          this.bound,
        ),
      );
    }
    return fail(errors.invalid(this.spanAt(check.offset, check.offset + 1), "decode utf-8", "invalid utf-8 code point"));
  }

  /** Decode into a JS string. Allocates. */
  asString(this: Input<"utf8">): string {
    return decoder.decode(this.asBytes());
  }

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  reader(): Reader<E> {
    return new Reader(this);
  }

  /**
   * Run `f` over the whole input. Fails if `f` does or if it leaves any
   * input unread.
   */
  readAll<T>(f: (r: Reader<E>) => ReadResult<T>): ReadResult<T> {
    const r = this.reader();
    const result = r.context("read all", f);
    if (!result.ok || r.atEnd()) return result;
    const trailing = r.takeRemaining();
    return fail(
      this.env.errors.expected(trailing.absoluteSpan(), "read all", "no trailing input", {
        length: { min: 0, max: 0, found: trailing.len },
      }),
    );
  }

  /** Run `f` and return its value with the unread rest of the input. */
  readPartial<T>(f: (r: Reader<E>) => ReadResult<T>): ReadResult<[T, Input<E>]> {
    const r = this.reader();
    const result = r.context("read partial", f);
    if (!result.ok) return result;
    return ok([result.value, r.takeRemaining()]);
  }

  /** Run an `f` that cannot fail and return its value with the rest. */
  readInfallible<T>(f: (r: Reader<E>) => T): [T, Input<E>] {
    const r = this.reader();
    const value = f(r);
    return [value, r.takeRemaining()];
  }

  toString(): string {
    return `Input<${this.encoding}>(${this.start}..${this.end}${this.bound ? ", bound" : ""})`;
  }
}

/** Wrap untrusted bytes. */
export function input(bytes: Uint8Array, options?: InputOptions): Input<"bytes"> {
  return Input.bytes(bytes, options);
}

/**
 * Wrap untrusted text. Strings are encoded (and so always valid); byte
 * arrays are validated as UTF-8.
 */
export function text(source: string | Uint8Array, options?: InputOptions): ReadResult<Input<"utf8">> {
  const bytes = typeof source === "string" ? encodeUtf8(source) : source;
  return Input.bytes(bytes, options).toText();
}

export type { BytePredicate };
