/**
 * Core types for @wary/core
 *
 * Defines the read result and the parser function shape combinators share.
 */

import { InputError, type ReadError } from "./error.js";
import type { Encoding } from "./input.js";
import type { Reader } from "./reader.js";

/** Result of a read: either success with a value or failure with one error. */
export type ReadResult<T> = { ok: true; value: T } | { ok: false; error: ReadError };

/** A parser consumes from a Reader and either advances it or fails. */
export type Parser<T, E extends Encoding = Encoding> = (r: Reader<E>) => ReadResult<T>;

export function ok<T>(value: T): ReadResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: ReadError): ReadResult<T> {
  return { ok: false, error };
}

/** The success value, or throws `InputError`. */
export function unwrap<T>(result: ReadResult<T>): T {
  if (!result.ok) {
    throw new InputError(result.error);
  }
  return result.value;
}
