import stringWidth from "string-width";

/** Tabs count as this many columns. */
export const TAB_WIDTH = 4;

export function expandTabs(text: string): string {
  return text.replaceAll("\t", " ".repeat(TAB_WIDTH));
}

/**
 * Columns `fragment` occupies in a terminal. With `unicode` on, wide glyphs
 * (CJK, most emoji) count double and combining marks count zero; otherwise
 * every code point is one column.
 */
export function displayWidth(fragment: string, unicode = true): number {
  const expanded = expandTabs(fragment);
  return unicode ? stringWidth(expanded) : Array.from(expanded).length;
}
