/**
 * Structured diagnostic reports.
 *
 * A report is built from a terminal ReadError and the Input it came from.
 * The error holds offsets only; every byte shown here is read back from the
 * Input passed in, never from the error.
 */

import type { Input, ReadError, RetryRequirement, Span } from "@wary/core";
import { decodeText, lineBounds, locate, toLocal, type Location } from "./location.js";
import { displayWidth, expandTabs } from "./width.js";

/** `incomplete` means more input may still parse. */
export type Severity = "error" | "incomplete";

/** A line of text shown around the failing one. */
export interface SourceLine {
  readonly line: number;
  readonly text: string;
}

export type Excerpt =
  | {
      readonly kind: "text";
      readonly line: number;
      /** The whole line, tabs expanded, without its line break. */
      readonly text: string;
      /** 1-based display column of the caret. */
      readonly caretColumn: number;
      readonly caretWidth: number;
      /** Lines just before the failing one, in order. */
      readonly before: readonly SourceLine[];
      readonly after: readonly SourceLine[];
    }
  | {
      readonly kind: "hex";
      /** Absolute offset of the first byte shown. */
      readonly offset: number;
      readonly bytes: Uint8Array;
      /** Index into `bytes` of the first marked byte. */
      readonly caretIndex: number;
      readonly caretLength: number;
    };

export interface BacktraceEntry {
  readonly operation: string;
  readonly span: Span;
  readonly location: Location;
}

export interface DiagnosticReport {
  readonly severity: Severity;
  readonly message: string;
  /** Primitive operation that failed. */
  readonly operation: string;
  readonly span: Span;
  readonly location: Location;
  readonly excerpt: Excerpt;
  /** Named operations, outermost first. */
  readonly backtrace: readonly BacktraceEntry[];
  readonly retry: RetryRequirement | null;
}

export interface ReportOptions {
  /** Measure columns by display width. Defaults to the input's `unicode` flag. */
  unicode?: boolean;
  /** Bytes per row of a binary excerpt (default: 16). */
  hexWidth?: number;
  /** Text lines shown before and after the failing one (default: 2). */
  contextLines?: number;
}

function isTextLine(bytes: Uint8Array): boolean {
  for (const b of bytes) {
    // \t and \r are the only control bytes a text line may hold
    if (b < 0x20 && b !== 0x09 && b !== 0x0d) return false;
    if (b === 0x7f) return false;
  }
  return true;
}

/** Display text of a line, or `undefined` if it is not text. */
function lineText(bytes: Uint8Array): string | undefined {
  if (!isTextLine(bytes)) return undefined;
  const line = decodeText(bytes);
  return line === undefined ? undefined : expandTabs(line.replace(/\r$/, ""));
}

/**
 * Up to `count` text lines next to the line at `[lineStart, lineEnd)`,
 * stopping at the first one that is not text.
 */
function neighbours(
  input: Input,
  lineStart: number,
  lineEnd: number,
  line: number,
  count: number,
): { before: SourceLine[]; after: SourceLine[] } {
  const bytes = input.asBytes();
  const before: SourceLine[] = [];
  for (let start = lineStart, n = line - 1; before.length < count && start > 0; n--) {
    const bounds = lineBounds(input, start - 1);
    const text = lineText(bytes.subarray(bounds.start, bounds.end));
    if (text === undefined) break;
    before.unshift({ line: n, text });
    start = bounds.start;
  }
  const after: SourceLine[] = [];
  // A trailing newline does not start another line
  for (let end = lineEnd, n = line + 1; after.length < count && end + 1 < bytes.length; n++) {
    const bounds = lineBounds(input, end + 1);
    const text = lineText(bytes.subarray(bounds.start, bounds.end));
    if (text === undefined) break;
    after.push({ line: n, text });
    end = bounds.end;
  }
  return { before, after };
}

function textExcerpt(
  input: Input,
  span: Span,
  location: Location,
  unicode: boolean,
  contextLines: number,
): Excerpt | undefined {
  const bytes = input.asBytes();
  const start = toLocal(input, span.start);
  const { start: lineStart, end: lineEnd } = lineBounds(input, start);
  const line = lineText(bytes.subarray(lineStart, lineEnd));
  if (line === undefined) return undefined;

  const end = Math.min(Math.max(start, toLocal(input, span.end)), lineEnd);
  const marked = decodeText(bytes.subarray(start, end));
  const width = marked === undefined ? end - start : displayWidth(marked, unicode);
  const { before, after } = neighbours(input, lineStart, lineEnd, location.line, contextLines);
  return {
    kind: "text",
    line: location.line,
    text: line,
    caretColumn: location.column,
    caretWidth: Math.max(1, width),
    before,
    after,
  };
}

function hexExcerpt(input: Input, span: Span, hexWidth: number): Excerpt {
  const bytes = input.asBytes();
  const start = toLocal(input, span.start);
  const end = Math.max(start, toLocal(input, span.end));
  const rowStart = Math.max(0, Math.min(start - (start % hexWidth), bytes.length - hexWidth));
  const row = bytes.subarray(rowStart, Math.min(bytes.length, rowStart + hexWidth));
  const caretIndex = start - rowStart;
  return {
    kind: "hex",
    offset: input.offset + rowStart,
    bytes: row,
    caretIndex,
    caretLength: Math.max(1, Math.min(end - start, row.length - caretIndex)),
  };
}

/**
 * Build a report for `error` against `input`. Never throws, whatever the
 * input bytes are; spans outside `input` are clamped to it.
 */
export function buildReport(error: ReadError, input: Input, options: ReportOptions = {}): DiagnosticReport {
  const unicode = options.unicode ?? input.env.features.unicode;
  const requested = options.hexWidth ?? 16;
  const hexWidth = Number.isFinite(requested) && requested >= 1 ? Math.floor(requested) : 16;
  const around = options.contextLines ?? 2;
  const contextLines = Number.isFinite(around) && around > 0 ? Math.floor(around) : 0;
  const location = locate(input, error.span.start, { unicode });
  const excerpt =
    textExcerpt(input, error.span, location, unicode, contextLines) ?? hexExcerpt(input, error.span, hexWidth);
  const backtrace = Array.from(error.context.frames(), (frame) => ({
    operation: frame.operation,
    span: frame.span,
    location: locate(input, frame.span.start, { unicode }),
  }));

  return {
    severity: error.isRetryable() ? "incomplete" : "error",
    message: error.description(),
    operation: error.operation,
    span: error.span,
    location,
    excerpt,
    backtrace,
    retry: error.retryRequirement(),
  };
}
