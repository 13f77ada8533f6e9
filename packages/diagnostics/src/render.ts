// ============================================================================
// CLI Renderer: Compiler-Style Error Output
// ============================================================================

import { describeRetry } from "@wary/core";
import type { DiagnosticReport, Excerpt, Severity } from "./report.js";

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or WARY_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  green: "\x1b[32m",
} as const;

type Style = keyof typeof COLORS;

/**
 * Check if color output should be enabled.
 */
export function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.WARY_NO_COLOR && env.FORCE_COLOR !== "0";
}

type Paint = (text: string, ...styles: Style[]) => string;

function painter(enabled: boolean): Paint {
  return (text, ...styles) => {
    if (!enabled) return text;
    const prefix = styles.map((s) => COLORS[s]).join("");
    return `${prefix}${text}${COLORS.reset}`;
  };
}

function severityColor(severity: Severity): "red" | "yellow" {
  return severity === "error" ? "red" : "yellow";
}

/**
 * Calculate the width needed for line numbers.
 */
function lineNumberWidth(rows: readonly ExcerptRow[]): number {
  return Math.max(3, ...rows.map((row) => row.label.length));
}

/**
 * Create an underline annotation string.
 */
function createUnderline(startColumn: number, length: number): string {
  return " ".repeat(Math.max(0, startColumn - 1)) + "^".repeat(Math.max(1, length));
}

function hexRow(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

interface ExcerptRow {
  /** Gutter label; empty for an underline row. */
  readonly label: string;
  readonly content: string;
  readonly underline: boolean;
}

/** Rows of an excerpt: neighbouring lines, the source row and its underline. */
function excerptRows(excerpt: Excerpt): ExcerptRow[] {
  if (excerpt.kind === "text") {
    const source = (line: number, content: string): ExcerptRow => ({ label: String(line), content, underline: false });
    return [
      ...excerpt.before.map((l) => source(l.line, l.text)),
      source(excerpt.line, excerpt.text),
      { label: "", content: createUnderline(excerpt.caretColumn, excerpt.caretWidth), underline: true },
      ...excerpt.after.map((l) => source(l.line, l.text)),
    ];
  }
  // Each byte takes "xx " on the row
  return [
    { label: excerpt.offset.toString(16).padStart(4, "0"), content: hexRow(excerpt.bytes), underline: false },
    {
      label: "",
      content: createUnderline(excerpt.caretIndex * 3 + 1, excerpt.caretLength * 3 - 1),
      underline: true,
    },
  ];
}

/**
 * Options for CLI rendering.
 */
export interface RenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (text: string) => void;
}

/**
 * Render a report to CLI output in compiler-style format.
 *
 * @example Output:
 * ```
 * error: expected "GET "
 *   --> 1:1
 *      |
 *    1 | POST / HTTP/1.1
 *      | ^^^^
 *      |
 *    = note: while attempting to consume
 *    = note: context backtrace:
 *            1. `read request` at 1:1
 * ```
 */
export function renderReport(report: DiagnosticReport, options: RenderOptions = {}): string {
  const color = painter(options.colors ?? colorsEnabled());
  const severityClr = severityColor(report.severity);
  const lines: string[] = [];

  // Header line: error: message
  lines.push(`${color(report.severity, "bold", severityClr)}: ${color(report.message, "bold")}`);

  // Location line: --> line:column, or the byte offset for binary input
  const where =
    report.excerpt.kind === "text"
      ? `${report.location.line}:${report.location.column}`
      : `byte ${report.span.start}`;
  lines.push(`  ${color("-->", "blue")} ${where}`);

  // Source excerpt with the caret underline
  const rows = excerptRows(report.excerpt);
  const numWidth = lineNumberWidth(rows);
  const gutter = " ".repeat(numWidth);
  const bar = color("|", "blue");
  lines.push(` ${gutter} ${bar}`);
  for (const row of rows) {
    if (row.underline) {
      lines.push(` ${gutter} ${bar} ${color(row.content, severityClr)}`);
    } else {
      lines.push(` ${color(row.label.padStart(numWidth, " "), "blue")} ${bar} ${row.content}`);
    }
  }
  lines.push(` ${gutter} ${bar}`);

  lines.push(`   ${color("= note:", "bold")} while attempting to ${report.operation}`);

  if (report.backtrace.length > 0) {
    lines.push(`   ${color("= note:", "bold")} context backtrace:`);
    report.backtrace.forEach((entry, i) => {
      const at = `${entry.location.line}:${entry.location.column}`;
      lines.push(`           ${i + 1}. \`${entry.operation}\` at ${at}`);
    });
  }

  if (report.retry !== null) {
    lines.push(`   ${color("= help:", "bold", "green")} ${describeRetry(report.retry)}`);
  }

  return lines.join("\n");
}

/**
 * Print a report to the console (stderr).
 */
export function printReport(report: DiagnosticReport, options: RenderOptions = {}): void {
  const writer = options.writer ?? ((text: string) => console.error(text));
  writer(renderReport(report, options));
}
