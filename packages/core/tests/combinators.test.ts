import { describe, it, expect } from "vitest";
import {
  alt,
  between,
  byte,
  decimal,
  digit,
  digits,
  end,
  lazy,
  literal,
  many,
  many1,
  map,
  named,
  not,
  optional,
  quoted,
  sepBy,
  sepBy1,
  seq,
  token,
} from "../src/combinators.js";
import { input } from "../src/input.js";
import { encodeUtf8 } from "../src/utf8.js";
import { ok, unwrap, type Parser } from "../src/types.js";

const bytes = (s: string, bound = false) => input(encodeUtf8(s), { bound });
const decode = (b: Uint8Array) => new TextDecoder().decode(b);

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("decimal", () => {
  it("reads a whole number", () => {
    const r = bytes("42").reader();
    expect(decimal()(r)).toEqual({ ok: true, value: 42 });
    expect(r.atEnd()).toBe(true);
  });

  it("stops at the first non-digit", () => {
    const r = bytes("17ms").reader();
    expect(unwrap(decimal()(r))).toBe(17);
    expect(r.position).toBe(2);
  });

  it("fails on a non-digit", () => {
    const r = bytes("x1").reader();
    const result = decimal()(r);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.toString()).toBe("error attempting to read decimal: expected decimal digit");
  });

  it("asks for a byte on empty input", () => {
    const result = decimal()(bytes("").reader());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.retryRequirement()).toEqual({ kind: "exact", bytes: 1 });
  });

  it("rejects values past the safe integer range", () => {
    const r = bytes("99999999999999999").reader();
    const result = decimal()(r);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("invalid");
    expect(result.error.span.toString()).toBe("0..17");
    expect(r.position).toBe(0);
  });
});

describe("digits", () => {
  it("reads a fixed number of digits", () => {
    const r = bytes("2024-").reader();
    expect(unwrap(digits(4)(r))).toBe(2024);
    expect(r.position).toBe(4);
  });

  it("asks for the missing digits", () => {
    const result = bytes("4").readAll(digits(2));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.retryRequirement()).toEqual({ kind: "exact", bytes: 1 });
  });

  it("is fatal on bound input", () => {
    const result = bytes("4", true).readAll(digits(2));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.isFatal()).toBe(true);
  });

  it("points at the first non-digit", () => {
    const r = bytes("4a").reader();
    const result = digits(2)(r);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.span.toString()).toBe("1..2");
    expect(result.error.toString()).toBe("error attempting to read digits: expected decimal digit");
    expect(r.position).toBe(0);
  });
});

describe("digit and byte", () => {
  it("reads a single digit", () => {
    const r = bytes("7").reader();
    expect(unwrap(digit()(r))).toBe(7);
    expect(r.atEnd()).toBe(true);
  });

  it("matches one byte", () => {
    expect(byte(0x3a)(bytes(":").reader())).toEqual({ ok: true, value: 0x3a });
    expect(byte(0x3a)(bytes(";").reader()).ok).toBe(false);
  });
});

describe("end", () => {
  it("succeeds only at the end", () => {
    expect(end()(bytes("").reader())).toEqual({ ok: true, value: null });
    const result = end()(bytes("ab").reader());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.description()).toBe("expected end of input");
    expect(result.error.span.toString()).toBe("0..2");
  });
});

describe("quoted", () => {
  it("reads between quotes", () => {
    const r = bytes('"ab" rest').reader();
    expect(decode(unwrap(quoted()(r)).asBytes())).toBe("ab");
    expect(r.position).toBe(4);
  });

  it("asks for more input without a closing quote", () => {
    const r = bytes('"ab').reader();
    const result = quoted()(r);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.retryRequirement()).toEqual({ kind: "unknown" });
    expect(r.position).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

describe("alt", () => {
  const bool = alt(map(literal("true"), () => true), map(literal("false"), () => false));

  it("returns the first branch that succeeds", () => {
    expect(unwrap(bool(bytes("false").reader()))).toBe(false);
    expect(unwrap(bool(bytes("true").reader()))).toBe(true);
  });

  it("reports a fatal branch over a retryable one", () => {
    const result = bool(bytes("tr").reader());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.isFatal()).toBe(true);
    expect(result.error.description()).toBe('expected "false"');
  });

  it("keeps the larger requirement when every branch can retry", () => {
    const p = alt(literal("true"), literal("trust"));
    const result = p(bytes("tr").reader());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.retryRequirement()).toEqual({ kind: "exact", bytes: 3 });
  });
});

describe("seq", () => {
  it("restores the cursor when a later part fails", () => {
    const r = bytes("ab").reader();
    const result = seq(literal("a"), literal("c"))(r);
    expect(result.ok).toBe(false);
    expect(r.position).toBe(0);
  });
});

describe("repetition", () => {
  it("collects zero or more", () => {
    const r = bytes("123a").reader();
    expect(unwrap(many(digit())(r))).toEqual([1, 2, 3]);
    expect(r.position).toBe(3);
    expect(unwrap(many(digit())(r))).toEqual([]);
  });

  it("requires at least one with many1", () => {
    expect(many1(digit())(bytes("a").reader()).ok).toBe(false);
    expect(unwrap(many1(digit())(bytes("9").reader()))).toEqual([9]);
  });

  it("stops on a zero-width match", () => {
    const nothing: Parser<null, "bytes"> = () => ok(null);
    expect(unwrap(many(nothing)(bytes("abc").reader()))).toEqual([null]);
  });

  it("returns null for a missing optional", () => {
    const r = bytes("x").reader();
    expect(unwrap(optional(digit())(r))).toBeNull();
    expect(r.position).toBe(0);
  });
});

describe("separated lists", () => {
  const list = sepBy(decimal(), byte(0x2c));

  it("reads separated items", () => {
    expect(unwrap(list(bytes("1,22,333").reader()))).toEqual([1, 22, 333]);
  });

  it("leaves a trailing separator unread", () => {
    const r = bytes("1,2,").reader();
    expect(unwrap(list(r))).toEqual([1, 2]);
    expect(r.position).toBe(3);
  });

  it("accepts an empty list unless one item is required", () => {
    expect(unwrap(list(bytes("").reader()))).toEqual([]);
    expect(sepBy1(decimal(), byte(0x2c))(bytes("").reader()).ok).toBe(false);
  });

  it("reads a bracketed list", () => {
    const array = between(byte(0x5b), list, byte(0x5d));
    const result = bytes("[4,5]").readAll(array);
    expect(result).toEqual({ ok: true, value: [4, 5] });
  });

  it("skips surrounding whitespace with token", () => {
    const r = bytes("  7 ").reader();
    expect(unwrap(token(decimal())(r))).toBe(7);
    expect(r.atEnd()).toBe(true);
  });
});

describe("lookahead", () => {
  it("succeeds only when the parser would fail", () => {
    const r = bytes("a").reader();
    expect(not(digit())(r)).toEqual({ ok: true, value: null });
    expect(not(literal("a"))(r).ok).toBe(false);
    expect(r.position).toBe(0);
  });
});

describe("lazy", () => {
  it("supports recursive grammars", () => {
    const depth: Parser<number, "bytes"> = lazy(() =>
      alt(
        map(between(byte(0x28), depth, byte(0x29)), (d) => d + 1),
        () => ok(0),
      ),
    );
    expect(bytes("((()))").readAll(depth)).toEqual({ ok: true, value: 3 });
  });
});

describe("named", () => {
  it("adds a context frame on failure", () => {
    const result = bytes("x").readAll(named("read count", decimal()));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.context.operationNames()).toEqual(["read all", "read count"]);
    expect(result.error.operation).toBe("read decimal");
  });
});
