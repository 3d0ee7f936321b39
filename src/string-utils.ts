import type { ListItem } from "./numbering-types.ts";

const LIST_ITEM_LINE_PATTERN = /^(\S+)(?:\s+(.*))?$/u;

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Splits "B. Second item" into its label and item text. Blank lines give undefined. */
export function parseListItemLine(line: string): ListItem | undefined {
  const match = LIST_ITEM_LINE_PATTERN.exec(normalizeSpacing(line));
  if (!match) return undefined;
  return { label: match[1], text: match[2] ?? "" };
}
