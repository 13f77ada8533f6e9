/**
 * Retry requirements.
 *
 * A retryable failure means the input read so far is a valid prefix and a
 * longer input could still parse. `null` stands for a fatal failure: no
 * amount of extra input will help.
 */

import { invariant, isIndex } from "./safety.js";

export type RetryRequirement =
  | { readonly kind: "exact"; readonly bytes: number }
  | { readonly kind: "unknown" };

/** At least `bytes` more bytes are needed before the read can be decided. */
export function exact(bytes: number): RetryRequirement {
  invariant(isIndex(bytes) && bytes > 0, `retry requirement must be positive, got ${bytes}`);
  return { kind: "exact", bytes };
}

const UNKNOWN: RetryRequirement = Object.freeze({ kind: "unknown" });

/** More input is needed but the amount cannot be known yet. */
export function unknown(): RetryRequirement {
  return UNKNOWN;
}

/**
 * Requirement for a read that had `had` bytes and needed `needed`.
 * Returns `null` when nothing was missing.
 */
export function fromHadAndNeeded(had: number, needed: number): RetryRequirement | null {
  return had < needed ? exact(needed - had) : null;
}

/**
 * Combine the requirements of two failures from one combined operation.
 *
 * | a \ b     | null | exact(m)          | unknown |
 * | --------- | ---- | ----------------- | ------- |
 * | null      | null | null              | null    |
 * | exact(n)  | null | exact(max(n, m))  | unknown |
 * | unknown   | null | unknown           | unknown |
 */
export function combineRetry(
  a: RetryRequirement | null,
  b: RetryRequirement | null,
): RetryRequirement | null {
  if (a === null || b === null) return null;
  if (a.kind === "exact" && b.kind === "exact") {
    return a.bytes >= b.bytes ? a : b;
  }
  return UNKNOWN;
}

/** Minimum number of extra bytes, or `undefined` when unknown. */
export function continueAfter(requirement: RetryRequirement): number | undefined {
  return requirement.kind === "exact" ? requirement.bytes : undefined;
}

export function describeRetry(requirement: RetryRequirement | null): string {
  if (requirement === null) return "fatal";
  if (requirement.kind === "unknown") return "more input required";
  return `at least ${byteCount(requirement.bytes)} more required`;
}

/** "1 byte", "3 bytes". */
export function byteCount(n: number): string {
  return n === 1 ? "1 byte" : `${n} bytes`;
}
