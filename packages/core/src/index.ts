/**
 * Core module exports for @wary/core
 *
 * This package provides:
 * - Input, a zero-copy view over untrusted bytes or validated text
 * - Reader, the cursor that reads from it and never panics on bad data
 * - ReadError with retry requirements and a context chain
 * - Parser combinators built on Reader
 */

export * from "./types.js";
export { Span } from "./span.js";
export {
  Input,
  input,
  text,
  type Encoding,
  type InputOptions,
  type Needle,
  type ParseEnv,
  type UnitPredicate,
  type BytePredicate,
} from "./input.js";
export { Reader, type Checkpoint } from "./reader.js";

// Errors
export {
  ReadError,
  InputError,
  ErrorFactory,
  mergeErrors,
  describeLength,
  describeValue,
  type Failure,
  type FailureKind,
  type LengthRequirement,
} from "./error.js";
export {
  exact,
  unknown,
  fromHadAndNeeded,
  combineRetry,
  continueAfter,
  describeRetry,
  byteCount,
  type RetryRequirement,
} from "./retry.js";
export {
  FullContextChain,
  MinimalContextChain,
  contextStrategy,
  type ContextChain,
  type ContextFrame,
  type ContextStrategy,
} from "./context.js";

// Scanning and text
export { linearScan, nativeScan, scanBackend, type ScanBackend } from "./scan.js";
export { utf8CharLen, isCharBoundary, checkUtf8, decodeAt, encodeUtf8, type Utf8Check } from "./utf8.js";

// Combinators
export * from "./combinators.js";

// Runtime Safety Primitives
export { invariant, unreachable, isIndex } from "./safety.js";

// Configuration System
export { config, resolveFeatures, DEFAULT_FEATURES, type Features, type WaryConfig } from "./config.js";
export { debug, warn, isDebugEnabled } from "./log.js";
