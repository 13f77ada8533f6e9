/**
 * Runtime Safety Primitives
 *
 * Assertions for caller mistakes, kept apart from input-data errors:
 *
 * - `invariant(condition, message)`: throws `RangeError` on a broken precondition
 * - `unreachable(value?)`: marks impossible code paths
 *
 * A malformed input never reaches these; they fire only when a caller hands
 * the library an index or length outside the documented range.
 *
 * @example
 * ```typescript
 * function splitAt(index: number) {
 *   invariant(index >= 0 && index <= this.len, `index ${index} out of range`);
 *   ...
 * }
 * ```
 */

/**
 * Runtime invariant check for programming errors.
 *
 * @throws RangeError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new RangeError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param _value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(_value?: never): never {
  throw new Error("Unreachable code reached");
}

/** True for a non-negative safe integer. */
export function isIndex(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}
