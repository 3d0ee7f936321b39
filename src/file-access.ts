import { constants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { extname } from "node:path";

import type { ListItem } from "./numbering-types.ts";
import { collectLabels } from "./infer-numbering.ts";
import { parseListItemLine } from "./string-utils.ts";

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new Error(`Cannot read input list: ${filePath}`);
  }
}

/**
 * Reads list items from a text file (one "label text" item per line) or from
 * a `.json` file holding an array of label strings.
 */
export async function readListFile(filePath: string): Promise<ListItem[]> {
  await assertReadableFile(filePath);
  const content = await readFile(filePath, "utf8");
  if (extname(filePath).toLowerCase() === ".json") {
    return parseJsonLabels(content, filePath);
  }
  return content
    .split(/\r?\n/)
    .map((line) => parseListItemLine(line))
    .filter((item): item is ListItem => item !== undefined);
}

/** Labels for `infer`: either positional arguments or the labels of a list file, never both. */
export async function readInferLabels(
  positionalLabels: string[],
  inputPath: string | undefined,
): Promise<string[]> {
  if (inputPath === undefined) return positionalLabels;
  if (positionalLabels.length > 0) {
    throw new Error("Pass labels as arguments or with --input, not both");
  }
  const items = await readListFile(inputPath);
  return items.map((item) => item.label);
}

function parseJsonLabels(content: string, filePath: string): ListItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`Invalid JSON in ${filePath}: ${message}`);
  }
  return collectLabels(parsed).map((label) => ({ label, text: "" }));
}
