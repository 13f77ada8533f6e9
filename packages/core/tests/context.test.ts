import { describe, it, expect } from "vitest";
import { input } from "../src/input.js";
import { encodeUtf8 } from "../src/utf8.js";
import type { Reader } from "../src/reader.js";
import { fail, type ReadResult } from "../src/types.js";
import { Span } from "../src/span.js";
import type { Input } from "../src/input.js";

/** outer > middle > inner, each consuming one byte before descending. */
function nested(r: Reader<"bytes">): ReadResult<Input<"bytes">> {
  return r.context("outer", (o) => {
    o.skip(1);
    return o.context("middle", (m) => {
      m.skip(1);
      return m.context("inner", (i) => i.take(10));
    });
  });
}

describe("full context", () => {
  it("records every named operation, outermost first", () => {
    const result = nested(input(encodeUtf8("abcdef")).reader());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    const chain = result.error.context;
    expect(chain.depth).toBe(3);
    expect(chain.operationNames()).toEqual(["outer", "middle", "inner"]);
    expect(Array.from(chain.frames(), (f) => f.span.toString())).toEqual(["0..6", "1..6", "2..6"]);
    expect(chain.innermostSpan().toString()).toBe("2..6");
    const [outer, middle, inner] = chain.frames();
    expect(outer.span.contains(middle.span)).toBe(true);
    expect(middle.span.contains(inner.span)).toBe(true);
    expect(result.error.operation).toBe("take");
  });

  it("yields the failing operation when nothing was named", () => {
    const result = input(encodeUtf8("ab")).reader().take(5);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    const chain = result.error.context;
    expect(chain.depth).toBe(1);
    expect(chain.operationNames()).toEqual(["take"]);
    expect(chain.innermostSpan().toString()).toBe("0..2");
  });

  it("spans from the entry cursor to the furthest byte reached", () => {
    const r = input(encodeUtf8("abc=")).reader();
    const result = r.context("read pair", (p) => {
      p.skip(3);
      return p.consume("==");
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    const [frame] = result.error.context.frames();
    expect(frame.operation).toBe("read pair");
    expect(frame.span.toString()).toBe("0..4");
  });
});

describe("frames across branches", () => {
  it("extends an outer frame over an inner one reached on a branch", () => {
    const src = input(encodeUtf8("abcdef"));
    const result = src.reader().context("outer", (o) =>
      o.try((b) =>
        b.context("inner", (i) => {
          const skipped = i.skip(4);
          if (!skipped.ok) return skipped;
          return fail<void>(src.env.errors.invalid(Span.of(0, 1), "check", "bad header"));
        }),
      ),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    const [outer, inner] = result.error.context.frames();
    expect(inner.span.toString()).toBe("0..4");
    expect(outer.span.toString()).toBe("0..4");
    expect(outer.span.contains(inner.span)).toBe(true);
  });
});

describe("minimal context", () => {
  it("keeps only the terminal failure", () => {
    const src = input(encodeUtf8("abcdef"), { features: { fullContext: false } });
    const result = nested(src.reader());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    const chain = result.error.context;
    expect(chain.depth).toBe(1);
    expect(chain.operationNames()).toEqual(["take"]);
    expect(chain.innermostSpan().toString()).toBe("2..6");
  });

  it("reports the same error kind and span as full mode", () => {
    const full = nested(input(encodeUtf8("abcdef")).reader());
    const minimal = nested(input(encodeUtf8("abcdef"), { features: { fullContext: false } }).reader());
    expect(full.ok || minimal.ok).toBe(false);
    if (full.ok || minimal.ok) return;
    expect(minimal.error.kind).toBe(full.error.kind);
    expect(minimal.error.span.equals(full.error.span)).toBe(true);
    expect(minimal.error.retryRequirement()).toEqual(full.error.retryRequirement());
  });
});
