import { describe, it, expect } from "vitest";
import { describeLength, describeValue, ErrorFactory, mergeErrors } from "../src/error.js";
import { DEFAULT_FEATURES } from "../src/config.js";
import { combineRetry, exact, unknown } from "../src/retry.js";
import { Span } from "../src/span.js";

const errors = new ErrorFactory(DEFAULT_FEATURES);
const span = Span.of(0, 1);

const fatal = errors.expected(span, "consume", "comma");
const invalid = errors.invalid(span, "read tag", "unknown tag");
const needTwo = errors.shortfall(span, "take", "enough input", exact(2), false);
const needFive = errors.shortfall(span, "take", "enough input", exact(5), false);
const needSome = errors.shortfall(span, "take until", "newline", unknown(), false);

describe("mergeErrors", () => {
  it("prefers a fatal error", () => {
    expect(mergeErrors(needTwo, fatal)).toBe(fatal);
    expect(mergeErrors(fatal, needTwo)).toBe(fatal);
  });

  it("keeps the first of two fatal errors", () => {
    expect(mergeErrors(invalid, fatal)).toBe(invalid);
  });

  it("prefers unknown over exact", () => {
    expect(mergeErrors(needTwo, needSome)).toBe(needSome);
    expect(mergeErrors(needSome, needFive)).toBe(needSome);
  });

  it("keeps the larger exact requirement", () => {
    expect(mergeErrors(needTwo, needFive)).toBe(needFive);
    expect(mergeErrors(needFive, needTwo)).toBe(needFive);
  });

  it("keeps the requirement combineRetry picks for every pair", () => {
    const all = [fatal, needTwo, needFive, needSome];
    for (const a of all) {
      for (const b of all) {
        expect(mergeErrors(a, b).retryRequirement()).toEqual(combineRetry(a.retryRequirement(), b.retryRequirement()));
      }
    }
  });
});

describe("ErrorFactory.shortfall", () => {
  it("is retryable on unbound input", () => {
    expect(needTwo.kind).toBe("retry");
    expect(needTwo.isRetryable()).toBe(true);
  });

  it("is fatal on bound input", () => {
    const error = errors.shortfall(span, "take", "enough input", exact(2), true);
    expect(error.kind).toBe("expected");
    expect(error.description()).toBe("expected enough input");
  });

  it("is fatal when retry signalling is disabled", () => {
    const noRetry = new ErrorFactory({ ...DEFAULT_FEATURES, retry: false });
    expect(noRetry.shortfall(span, "take", "enough input", exact(2), false).kind).toBe("expected");
  });
});

describe("descriptions", () => {
  it("describes length requirements", () => {
    expect(describeLength({ min: 2, max: 2, found: 1 })).toBe("found 1 byte when exactly 2 bytes was expected");
    expect(describeLength({ min: 4, max: null, found: 0 })).toBe("found 0 bytes when at least 4 bytes was expected");
    expect(describeLength({ min: 0, max: 3, found: 5 })).toBe("found 5 bytes when at most 3 bytes was expected");
    expect(describeLength({ min: 1, max: 3, found: 5 })).toBe(
      "found 5 bytes when at least 1 byte and at most 3 bytes was expected",
    );
  });

  it("describes values", () => {
    expect(describeValue(new TextEncoder().encode("ok"))).toBe('"ok"');
    expect(describeValue(Uint8Array.of(0x0d, 0x0a))).toBe("[0d 0a]");
  });

  it("formats the error line", () => {
    expect(invalid.toString()).toBe("error attempting to read tag: unknown tag");
    expect(needSome.toString()).toBe("error attempting to take until: expected newline (more input required)");
  });

  it("adds frames without touching the original", () => {
    const framed = fatal.withFrame({ operation: "read list", span: Span.of(0, 3) });
    expect(framed.context.operationNames()).toEqual(["read list"]);
    expect(fatal.context.operationNames()).toEqual(["consume"]);
    expect(framed.span).toBe(fatal.span);
  });
});
