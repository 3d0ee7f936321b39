import type {
  InferNumberingOptions,
  ListItem,
  NumberingInference,
  RecognizedNumbering,
} from "./numbering-types.ts";
import { DEFAULT_DOCUMENT_TITLE, FALLBACK_TABLE_CLASS } from "./numbering-types.ts";
import { inferNumbering } from "./infer-numbering.ts";

export function renderListDocument(bodyLines: string[], title = DEFAULT_DOCUMENT_TITLE): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="UTF-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `  <title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    ...bodyLines,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");
}

/**
 * Renders `items` as an `<ol>` styled after the inferred numbering scheme.
 * `value` attributes are written only when the labels skip or reorder
 * numbers; unrecognized labels fall back to a two-column table.
 */
export function renderOrderedList(items: ListItem[], options: InferNumberingOptions = {}): string[] {
  const inference = inferNumbering(
    items.map((item) => item.label),
    options,
  );
  return renderInferredList(items, inference);
}

export function renderInferredList(items: ListItem[], inference: NumberingInference): string[] {
  if (inference.numberingType === undefined) {
    return renderFallbackTable(items, inference.values);
  }
  return renderListElement(items, inference);
}

function renderListElement(items: ListItem[], inference: RecognizedNumbering): string[] {
  const listItems = items.map((item, index) => {
    const value = inference.values[index];
    const valueAttribute = inference.defaultOrder ? "" : ` value="${value}"`;
    return `  <li${valueAttribute}>${escapeHtml(item.text)}</li>`;
  });
  return [
    `<ol style="list-style-type: ${inference.numberingType};">`,
    ...listItems,
    "</ol>",
  ];
}

function renderFallbackTable(items: ListItem[], labels: string[]): string[] {
  const rows = items.map(
    (item, index) =>
      `  <tr><td>${escapeHtml(labels[index])}</td><td>${escapeHtml(item.text)}</td></tr>`,
  );
  return [`<table class="${FALLBACK_TABLE_CLASS}">`, ...rows, "</table>"];
}
