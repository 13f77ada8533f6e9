/**
 * Console logging for @wary/core.
 *
 * `debug` lines are written only when the `debug` config flag is set.
 * Nothing here runs on the success path of a parse.
 */

import { config } from "./config.js";

const PREFIX = "[wary]";

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  yellow: "\x1b[33m",
} as const;

function colorsEnabled(): boolean {
  const env = process.env;
  return !env.NO_COLOR && !env.WARY_NO_COLOR && env.FORCE_COLOR !== "0";
}

function paint(text: string, code: string): string {
  return colorsEnabled() ? `${code}${text}${COLORS.reset}` : text;
}

export function isDebugEnabled(): boolean {
  return config.get("debug") === true;
}

export function debug(message: string): void {
  if (!isDebugEnabled()) return;
  console.debug(`${paint(PREFIX, COLORS.dim)} ${message}`);
}

export function warn(message: string): void {
  console.warn(`${paint(PREFIX, COLORS.yellow)} ⚠ ${message}`);
}
