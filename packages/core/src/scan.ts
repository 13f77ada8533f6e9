/**
 * Fast-scan capability.
 *
 * Every backend must return exactly what the naive byte-by-byte scan
 * returns; swapping backends never changes a parse result.
 */

import type { Features } from "./config.js";
import { debug } from "./log.js";

export type BytePredicate = (byte: number) => boolean;

export interface ScanBackend {
  readonly name: string;
  /** Offset of the first `byte` in `haystack`. */
  findByte(haystack: Uint8Array, byte: number): number | undefined;
  /** Offset of the first occurrence of `needle`. An empty needle matches at 0. */
  findSubstring(haystack: Uint8Array, needle: Uint8Array): number | undefined;
  /** Offset of the first byte satisfying `predicate`. */
  findIndex(haystack: Uint8Array, predicate: BytePredicate): number | undefined;
  /** Number of occurrences of `byte`. */
  countByte(haystack: Uint8Array, byte: number): number;
}

// ---------------------------------------------------------------------------
// Linear fallback
// ---------------------------------------------------------------------------

function matchesAt(haystack: Uint8Array, needle: Uint8Array, at: number): boolean {
  for (let j = 0; j < needle.length; j++) {
    if (haystack[at + j] !== needle[j]) return false;
  }
  return true;
}

export const linearScan: ScanBackend = {
  name: "linear",

  findByte(haystack, byte) {
    for (let i = 0; i < haystack.length; i++) {
      if (haystack[i] === byte) return i;
    }
    return undefined;
  },

  findSubstring(haystack, needle) {
    for (let i = 0; i + needle.length <= haystack.length; i++) {
      if (matchesAt(haystack, needle, i)) return i;
    }
    return undefined;
  },

  findIndex(haystack, predicate) {
    for (let i = 0; i < haystack.length; i++) {
      if (predicate(haystack[i])) return i;
    }
    return undefined;
  },

  countByte(haystack, byte) {
    let count = 0;
    for (let i = 0; i < haystack.length; i++) {
      if (haystack[i] === byte) count++;
    }
    return count;
  },
};

// ---------------------------------------------------------------------------
// Native backend: V8's typed-array indexOf is vectorised (memchr-style)
// ---------------------------------------------------------------------------

export const nativeScan: ScanBackend = {
  name: "native",

  findByte(haystack, byte) {
    const i = haystack.indexOf(byte);
    return i === -1 ? undefined : i;
  },

  findSubstring(haystack, needle) {
    if (needle.length === 0) return 0;
    const last = haystack.length - needle.length;
    let from = 0;
    while (from <= last) {
      const i = haystack.indexOf(needle[0], from);
      if (i === -1 || i > last) return undefined;
      if (matchesAt(haystack, needle, i)) return i;
      from = i + 1;
    }
    return undefined;
  },

  findIndex(haystack, predicate) {
    const i = haystack.findIndex(predicate);
    return i === -1 ? undefined : i;
  },

  countByte(haystack, byte) {
    let count = 0;
    let i = haystack.indexOf(byte);
    while (i !== -1) {
      count++;
      i = haystack.indexOf(byte, i + 1);
    }
    return count;
  },
};

/** Backend selected by the `fastScan` flag. */
export function scanBackend(features: Features): ScanBackend {
  const backend = features.fastScan ? nativeScan : linearScan;
  debug(`scan backend: ${backend.name}`);
  return backend;
}
