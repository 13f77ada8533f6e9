import { describe, it, expect } from "vitest";
import { encodeUtf8, input, text, unwrap } from "@wary/core";
import { displayWidth, expandTabs } from "../src/width.js";
import { locate } from "../src/location.js";

describe("displayWidth", () => {
  it("counts wide glyphs double", () => {
    expect(displayWidth("abc")).toBe(3);
    expect(displayWidth("日本")).toBe(4);
  });

  it("counts code points without unicode widths", () => {
    expect(displayWidth("日本", false)).toBe(2);
  });

  it("expands tabs", () => {
    expect(expandTabs("a\tb")).toBe("a    b");
    expect(displayWidth("a\tb")).toBe(6);
  });
});

describe("locate", () => {
  const src = unwrap(text("ab\n日本x\n"));

  it("finds the line and display column", () => {
    expect(locate(src, 9)).toEqual({ line: 2, column: 5, byteColumn: 7 });
  });

  it("counts code points when unicode widths are off", () => {
    expect(locate(src, 9, { unicode: false })).toEqual({ line: 2, column: 3, byteColumn: 7 });
  });

  it("follows the input's unicode flag by default", () => {
    const narrow = unwrap(text("ab\n日本x\n", { features: { unicode: false } }));
    expect(locate(narrow, 9).column).toBe(3);
  });

  it("locates line starts", () => {
    expect(locate(src, 0)).toEqual({ line: 1, column: 1, byteColumn: 1 });
    expect(locate(src, 3)).toEqual({ line: 2, column: 1, byteColumn: 1 });
  });

  it("clamps offsets past the end", () => {
    expect(locate(src, 100)).toEqual({ line: 3, column: 1, byteColumn: 1 });
  });

  it("falls back to byte columns on invalid utf-8", () => {
    expect(locate(input(Uint8Array.of(0x61, 0xff, 0x62)), 2)).toEqual({ line: 1, column: 3, byteColumn: 3 });
  });

  it("resolves absolute offsets against a sub-input", () => {
    const root = input(encodeUtf8("xx\nabc"));
    const tail = root.view(3, 6);
    expect(locate(tail, 5)).toEqual({ line: 1, column: 3, byteColumn: 3 });
  });
});
