/**
 * Line and column lookup for offsets into an Input.
 *
 * Offsets are absolute (as on `ReadError.span`); anything outside the input
 * is clamped, so a stale span still resolves to some position.
 */

import { checkUtf8, type Input } from "@wary/core";
import { displayWidth } from "./width.js";

const NEWLINE = 0x0a;

export interface Location {
  /** 1-based line. */
  readonly line: number;
  /** 1-based display column; the byte column when the line is not text. */
  readonly column: number;
  /** 1-based byte offset within the line. */
  readonly byteColumn: number;
}

export interface LocateOptions {
  /** Measure columns by display width. Defaults to the input's `unicode` flag. */
  unicode?: boolean;
}

/** Local `[start, end)` of the line holding `local`, newline excluded. */
export interface LineBounds {
  readonly start: number;
  readonly end: number;
}

const decoder = new TextDecoder("utf-8");

/** `bytes` as a string, or `undefined` if they are not valid UTF-8. */
export function decodeText(bytes: Uint8Array): string | undefined {
  return checkUtf8(bytes).valid ? decoder.decode(bytes) : undefined;
}

/** Absolute offset to a local one, clamped to `[0, len]`. */
export function toLocal(input: Input, offset: number): number {
  return Math.min(Math.max(0, offset - input.offset), input.len);
}

export function lineBounds(input: Input, local: number): LineBounds {
  const bytes = input.asBytes();
  const start = local === 0 ? 0 : bytes.lastIndexOf(NEWLINE, local - 1) + 1;
  const next = input.env.scan.findByte(bytes.subarray(local), NEWLINE);
  return { start, end: next === undefined ? bytes.length : local + next };
}

export function locate(input: Input, offset: number, options: LocateOptions = {}): Location {
  const unicode = options.unicode ?? input.env.features.unicode;
  const bytes = input.asBytes();
  const local = toLocal(input, offset);
  const line = 1 + input.env.scan.countByte(bytes.subarray(0, local), NEWLINE);
  const { start } = lineBounds(input, local);
  const byteColumn = local - start + 1;
  const prefix = decodeText(bytes.subarray(start, local));
  const column = prefix === undefined ? byteColumn : displayWidth(prefix, unicode) + 1;
  return { line, column, byteColumn };
}
