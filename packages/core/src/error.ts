/**
 * Read errors.
 *
 * Three kinds of failure, matching what a caller can do about them:
 *
 * - `invalid` : the data is semantically wrong; fatal.
 * - `expected`: a specific value, length or token was not found; fatal.
 * - `retry`   : the input ends too early to decide; a longer input may parse.
 *
 * Only a boundary shortfall on unbound input (see `ErrorFactory.shortfall`)
 * can produce `retry`.
 */

import type { Features } from "./config.js";
import { contextStrategy, type ContextChain, type ContextFrame, type ContextStrategy } from "./context.js";
import { byteCount, combineRetry, describeRetry, type RetryRequirement } from "./retry.js";
import { Span } from "./span.js";

/** Length requirement that was not met. `max === null` means "at least". */
export interface LengthRequirement {
  readonly min: number;
  readonly max: number | null;
  /** Bytes that were available. */
  readonly found: number;
}

export type Failure =
  | { readonly kind: "invalid"; readonly description: string }
  | {
      readonly kind: "expected";
      readonly what: string;
      /** The exact value that was expected, if any. */
      readonly value?: Uint8Array;
      readonly length?: LengthRequirement;
    }
  | {
      readonly kind: "retry";
      readonly what: string;
      readonly requirement: RetryRequirement;
      readonly length?: LengthRequirement;
    };

export type FailureKind = Failure["kind"];

export class ReadError {
  constructor(
    readonly failure: Failure,
    /** Absolute span the failure is about. */
    readonly span: Span,
    /** Primitive operation that failed, e.g. `"take"`. */
    readonly operation: string,
    readonly context: ContextChain,
  ) {}

  get kind(): FailureKind {
    return this.failure.kind;
  }

  retryRequirement(): RetryRequirement | null {
    return this.failure.kind === "retry" ? this.failure.requirement : null;
  }

  isFatal(): boolean {
    return this.failure.kind !== "retry";
  }

  isRetryable(): boolean {
    return this.failure.kind === "retry";
  }

  /** Same failure with `frame` as its new outermost context. */
  withFrame(frame: ContextFrame): ReadError {
    return new ReadError(this.failure, this.span, this.operation, this.context.push(frame));
  }

  /** One-line description of what went wrong. */
  description(): string {
    const failure = this.failure;
    switch (failure.kind) {
      case "invalid":
        return failure.description;
      case "expected":
        if (failure.value !== undefined) {
          return `expected ${describeValue(failure.value)}`;
        }
        if (failure.length !== undefined) {
          return describeLength(failure.length);
        }
        return `expected ${failure.what}`;
      case "retry": {
        const base = failure.length !== undefined ? describeLength(failure.length) : `expected ${failure.what}`;
        return `${base} (${describeRetry(failure.requirement)})`;
      }
    }
  }

  toString(): string {
    return `error attempting to ${this.operation}: ${this.description()}`;
  }
}

/** `found 1 byte when exactly 2 bytes was expected`. */
export function describeLength(length: LengthRequirement): string {
  const { min, max, found } = length;
  let wanted: string;
  if (max === null) {
    wanted = `at least ${byteCount(min)}`;
  } else if (min === max) {
    wanted = `exactly ${byteCount(min)}`;
  } else if (min === 0) {
    wanted = `at most ${byteCount(max)}`;
  } else {
    wanted = `at least ${byteCount(min)} and at most ${byteCount(max)}`;
  }
  return `found ${byteCount(found)} when ${wanted} was expected`;
}

/** Printable ASCII as a quoted string, anything else as hex. */
export function describeValue(bytes: Uint8Array): string {
  const printable = bytes.every((b) => b >= 0x20 && b <= 0x7e);
  if (printable) {
    return JSON.stringify(String.fromCharCode(...bytes));
  }
  return `[${Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ")}]`;
}

/**
 * Builds errors for one parse. Created once per root Input so the retry and
 * context flags are fixed for everything read from it.
 */
export class ErrorFactory {
  private readonly startChain: ContextStrategy;

  constructor(readonly features: Features) {
    this.startChain = contextStrategy(features);
  }

  private make(failure: Failure, span: Span, operation: string): ReadError {
    return new ReadError(failure, span, operation, this.startChain({ operation, span }));
  }

  invalid(span: Span, operation: string, description: string): ReadError {
    return this.make({ kind: "invalid", description }, span, operation);
  }

  expected(
    span: Span,
    operation: string,
    what: string,
    detail: { value?: Uint8Array; length?: LengthRequirement } = {},
  ): ReadError {
    return this.make({ kind: "expected", what, ...detail }, span, operation);
  }

  /**
   * The input ended before `operation` could decide. Retryable unless the
   * input is bound or retry signalling is disabled, in which case it is a
   * fatal `expected`.
   */
  shortfall(
    span: Span,
    operation: string,
    what: string,
    requirement: RetryRequirement,
    bound: boolean,
    length?: LengthRequirement,
  ): ReadError {
    if (bound || !this.features.retry) {
      return this.expected(span, operation, what, length !== undefined ? { length } : {});
    }
    const failure: Failure =
      length !== undefined
        ? { kind: "retry", what, requirement, length }
        : { kind: "retry", what, requirement };
    return this.make(failure, span, operation);
  }
}

/**
 * Pick the error to report when two failures arise from one combined
 * operation: the one whose requirement `combineRetry` keeps. A fatal error
 * always wins (the first, if both are).
 */
export function mergeErrors(a: ReadError, b: ReadError): ReadError {
  const ra = a.retryRequirement();
  const rb = b.retryRequirement();
  const combined = combineRetry(ra, rb);
  if (combined === null) return ra === null ? a : b;
  return ra !== null && sameRequirement(ra, combined) ? a : b;
}

function sameRequirement(a: RetryRequirement, b: RetryRequirement): boolean {
  if (a.kind === "exact" && b.kind === "exact") return a.bytes === b.bytes;
  return a.kind === b.kind;
}

/** A `ReadError` thrown as an exception. */
export class InputError extends Error {
  readonly error: ReadError;

  constructor(error: ReadError) {
    super(error.toString());
    this.name = "InputError";
    this.error = error;
  }
}
