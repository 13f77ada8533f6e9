/**
 * Parser combinators over the Reader contract.
 *
 * Every combinator returns a `Parser<T>` that can be composed freely, and
 * every one leaves the cursor where it was when it fails. PEG semantics:
 * ordered alternation, first match wins.
 */

import { mergeErrors } from "./error.js";
import type { Encoding, Input } from "./input.js";
import type { Reader } from "./reader.js";
import { fail, ok, type Parser, type ReadResult } from "./types.js";

const ZERO = 0x30;
const NINE = 0x39;

export function isDigit(unit: number): boolean {
  return unit >= ZERO && unit <= NINE;
}

export function isWhitespace(unit: number): boolean {
  return unit === 0x20 || unit === 0x09 || unit === 0x0a || unit === 0x0d;
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match one exact byte. */
export function byte<E extends Encoding>(b: number): Parser<number, E> {
  return (r) => {
    const result = r.consume(b);
    return result.ok ? ok(b) : result;
  };
}

/** Match an exact byte sequence or string. */
export function literal<E extends Encoding>(value: string | Uint8Array): Parser<Input<E>, E> {
  return (r) => r.consume(value);
}

/** Match a single ASCII digit and return its value. */
export function digit<E extends Encoding>(): Parser<number, E> {
  return (r) => {
    const next = r.peekByte();
    if (!next.ok) return next;
    if (!isDigit(next.value)) return fail(r.expected("read digit", "decimal digit"));
    r.consumeOpt(next.value);
    return ok(next.value - ZERO);
  };
}

/**
 * Exactly `count` ASCII digits as a number. Too few bytes is retryable; a
 * non-digit among them is fatal.
 */
export function digits<E extends Encoding>(count: number): Parser<number, E> {
  return (r) =>
    r.try((branch) => {
      const taken = branch.take(count);
      if (!taken.ok) return taken;
      const bytes = taken.value.asBytes();
      let value = 0;
      for (let i = 0; i < bytes.length; i++) {
        if (!isDigit(bytes[i])) {
          return fail(r.input.env.errors.expected(taken.value.spanAt(i, i + 1), "read digits", "decimal digit"));
        }
        value = value * 10 + (bytes[i] - ZERO);
      }
      return ok(value);
    });
}

/**
 * Unsigned decimal integer: one or more digits. Values past
 * `Number.MAX_SAFE_INTEGER` are `invalid`.
 */
export function decimal<E extends Encoding>(): Parser<number, E> {
  return (r) => {
    const first = r.peekByte();
    if (!first.ok) return first;
    if (!isDigit(first.value)) return fail(r.expected("read decimal", "decimal digit"));
    const run = r.peekInfallible((branch) => branch.takeWhile(isDigit));
    let value = 0;
    for (const b of run.asBytes()) {
      value = value * 10 + (b - ZERO);
    }
    if (!Number.isSafeInteger(value)) {
      return fail(r.invalid("read decimal", "integer out of range", run.len));
    }
    r.takeWhile(isDigit);
    return ok(value);
  };
}

/** Succeed only at the end of input. */
export function end<E extends Encoding>(): Parser<null, E> {
  return (r) => (r.atEnd() ? ok(null) : fail(r.expected("read end", "end of input", r.remaining)));
}

/** Zero or more whitespace bytes. Never fails. */
export function whitespace<E extends Encoding>(): Parser<Input<E>, E> {
  return (r) => ok(r.takeWhile(isWhitespace));
}

/**
 * Bytes between two `quote` bytes, quotes excluded. A missing closing quote
 * is retryable.
 */
export function quoted<E extends Encoding>(quote = 0x22): Parser<Input<E>, E> {
  return (r) =>
    r.try((branch) => {
      const open = branch.consume(quote);
      if (!open.ok) return open;
      return branch.takeUntilConsume(quote);
    });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B, E extends Encoding>(a: Parser<A, E>, b: Parser<B, E>): Parser<[A, B], E> {
  return (r) =>
    r.try((branch) => {
      const ra = a(branch);
      if (!ra.ok) return ra;
      const rb = b(branch);
      if (!rb.ok) return rb;
      return ok([ra.value, rb.value]);
    });
}

/** Sequence three parsers. */
export function seq3<A, B, C, E extends Encoding>(
  a: Parser<A, E>,
  b: Parser<B, E>,
  c: Parser<C, E>,
): Parser<[A, B, C], E> {
  return (r) =>
    r.try((branch) => {
      const ra = a(branch);
      if (!ra.ok) return ra;
      const rb = b(branch);
      if (!rb.ok) return rb;
      const rc = c(branch);
      if (!rc.ok) return rc;
      return ok([ra.value, rb.value, rc.value]);
    });
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Ordered alternation (PEG): the first branch that succeeds wins. When every
 * branch fails the errors are merged with `mergeErrors`, so a fatal branch
 * is reported over a retryable one.
 */
export function alt<T, E extends Encoding>(...parsers: [Parser<T, E>, ...Parser<T, E>[]]): Parser<T, E> {
  return (r) => {
    const [first, ...rest] = parsers;
    const initial = r.try(first);
    if (initial.ok) return initial;
    let error = initial.error;
    for (const p of rest) {
      const result = r.try(p);
      if (result.ok) return result;
      error = mergeErrors(error, result.error);
    }
    return fail(error);
  };
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. Always succeeds. */
export function many<T, E extends Encoding>(p: Parser<T, E>): Parser<T[], E> {
  return (r) => {
    const results: T[] = [];
    for (;;) {
      const before = r.position;
      const result = r.try(p);
      if (!result.ok) break;
      results.push(result.value);
      if (r.position === before) break; // zero-width match would loop forever
    }
    return ok(results);
  };
}

/** One or more repetitions. */
export function many1<T, E extends Encoding>(p: Parser<T, E>): Parser<T[], E> {
  return (r) =>
    r.try((branch) => {
      const first = p(branch);
      if (!first.ok) return first;
      const rest = many(p)(branch);
      return rest.ok ? ok([first.value, ...rest.value]) : rest;
    });
}

/** Optional: `null` if `p` fails; the cursor is left untouched. */
export function optional<T, E extends Encoding>(p: Parser<T, E>): Parser<T | null, E> {
  return (r) => {
    const result = r.try(p);
    return result.ok ? result : ok(null);
  };
}

// ---------------------------------------------------------------------------
// Lookahead / negation
// ---------------------------------------------------------------------------

/** Negative lookahead: succeeds with null only if `p` fails here. Never consumes. */
export function not<T, E extends Encoding>(p: Parser<T, E>, what = "something else"): Parser<null, E> {
  return (r) => {
    const result = r.peekWith(p);
    return result.ok ? fail(r.expected("look ahead", what)) : ok(null);
  };
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B, E extends Encoding>(p: Parser<A, E>, f: (a: A) => B): Parser<B, E> {
  return (r) => {
    const result = p(r);
    return result.ok ? ok(f(result.value)) : result;
  };
}

/** Run `p` as the named operation `name`, adding a context frame on failure. */
export function named<T, E extends Encoding>(name: string, p: Parser<T, E>): Parser<T, E> {
  return (r) => r.context(name, p);
}

// ---------------------------------------------------------------------------
// Separation combinators
// ---------------------------------------------------------------------------

function sepTail<T, S, E extends Encoding>(
  r: Reader<E>,
  item: Parser<T, E>,
  sep: Parser<S, E>,
  results: T[],
): ReadResult<T[]> {
  for (;;) {
    const pair = r.try(seq(sep, item));
    if (!pair.ok) break;
    results.push(pair.value[1]);
  }
  return ok(results);
}

/** Zero or more items separated by `sep`. */
export function sepBy<T, S, E extends Encoding>(item: Parser<T, E>, sep: Parser<S, E>): Parser<T[], E> {
  return (r) => {
    const first = r.try(item);
    if (!first.ok) return ok([]);
    return sepTail(r, item, sep, [first.value]);
  };
}

/** One or more items separated by `sep`. */
export function sepBy1<T, S, E extends Encoding>(item: Parser<T, E>, sep: Parser<S, E>): Parser<T[], E> {
  return (r) => {
    const first = r.try(item);
    if (!first.ok) return first;
    return sepTail(r, item, sep, [first.value]);
  };
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C, E extends Encoding>(
  open: Parser<O, E>,
  p: Parser<T, E>,
  close: Parser<C, E>,
): Parser<T, E> {
  return map(seq3(open, p, close), ([, value]) => value);
}

/** Parse `p` surrounded by optional whitespace. */
export function token<T, E extends Encoding>(p: Parser<T, E>): Parser<T, E> {
  return between(whitespace<E>(), p, whitespace<E>());
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T, E extends Encoding>(f: () => Parser<T, E>): Parser<T, E> {
  let cached: Parser<T, E> | null = null;
  return (r) => {
    if (!cached) cached = f();
    return cached(r);
  };
}
