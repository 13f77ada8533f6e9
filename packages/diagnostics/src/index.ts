/**
 * @wary/diagnostics
 *
 * Turns a ReadError and the Input it was read from into a report with
 * line/column, an annotated excerpt and the context backtrace.
 */

import type { Input, ReadError } from "@wary/core";
import { buildReport, type ReportOptions } from "./report.js";
import { renderReport, type RenderOptions } from "./render.js";

export { locate, decodeText, lineBounds, type Location, type LocateOptions, type LineBounds } from "./location.js";
export { displayWidth, expandTabs, TAB_WIDTH } from "./width.js";
export {
  buildReport,
  type BacktraceEntry,
  type DiagnosticReport,
  type Excerpt,
  type ReportOptions,
  type Severity,
  type SourceLine,
} from "./report.js";
export { renderReport, printReport, colorsEnabled, type RenderOptions } from "./render.js";

/** `buildReport` then `renderReport`. */
export function formatError(error: ReadError, input: Input, options: ReportOptions & RenderOptions = {}): string {
  return renderReport(buildReport(error, input, options), options);
}
