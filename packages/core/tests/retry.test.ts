import { describe, it, expect } from "vitest";
import {
  byteCount,
  combineRetry,
  continueAfter,
  describeRetry,
  exact,
  fromHadAndNeeded,
  unknown,
} from "../src/retry.js";

describe("exact", () => {
  it("requires a positive byte count", () => {
    expect(exact(3)).toEqual({ kind: "exact", bytes: 3 });
    expect(() => exact(0)).toThrow(RangeError);
    expect(() => exact(-2)).toThrow(RangeError);
  });
});

describe("fromHadAndNeeded", () => {
  it("returns the shortfall", () => {
    expect(fromHadAndNeeded(1, 4)).toEqual({ kind: "exact", bytes: 3 });
  });

  it("returns null when nothing is missing", () => {
    expect(fromHadAndNeeded(4, 4)).toBeNull();
    expect(fromHadAndNeeded(5, 4)).toBeNull();
  });
});

describe("combineRetry", () => {
  it("is fatal when either side is fatal", () => {
    expect(combineRetry(null, null)).toBeNull();
    expect(combineRetry(null, exact(2))).toBeNull();
    expect(combineRetry(exact(2), null)).toBeNull();
    expect(combineRetry(unknown(), null)).toBeNull();
    expect(combineRetry(null, unknown())).toBeNull();
  });

  it("keeps the larger of two exact requirements", () => {
    expect(combineRetry(exact(2), exact(5))).toEqual({ kind: "exact", bytes: 5 });
    expect(combineRetry(exact(5), exact(2))).toEqual({ kind: "exact", bytes: 5 });
  });

  it("is unknown when either side is unknown", () => {
    expect(combineRetry(exact(2), unknown())).toEqual({ kind: "unknown" });
    expect(combineRetry(unknown(), exact(2))).toEqual({ kind: "unknown" });
    expect(combineRetry(unknown(), unknown())).toEqual({ kind: "unknown" });
  });
});

describe("describeRetry", () => {
  it("describes each requirement", () => {
    expect(describeRetry(null)).toBe("fatal");
    expect(describeRetry(unknown())).toBe("more input required");
    expect(describeRetry(exact(1))).toBe("at least 1 byte more required");
    expect(describeRetry(exact(4))).toBe("at least 4 bytes more required");
  });

  it("exposes the byte count to resume after", () => {
    expect(continueAfter(exact(7))).toBe(7);
    expect(continueAfter(unknown())).toBeUndefined();
    expect(byteCount(0)).toBe("0 bytes");
  });
});
