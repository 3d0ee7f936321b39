import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import type { ConvertListToHtmlInput, ConvertListToHtmlResult } from "./numbering-types.ts";
import { readListFile } from "./file-access.ts";
import { renderInferredList, renderListDocument } from "./html-render.ts";
import { inferNumbering } from "./infer-numbering.ts";

export async function convertListToHtml(
  input: ConvertListToHtmlInput,
): Promise<ConvertListToHtmlResult> {
  const resolvedInputListPath = resolve(input.inputListPath);
  const resolvedOutputHtmlPath = resolve(input.outputHtmlPath);

  const items = await readListFile(resolvedInputListPath);
  const inference = inferNumbering(
    items.map((item) => item.label),
    { requireDot: input.requireDot, mixedCase: input.mixedCase },
  );
  const html = renderListDocument(renderInferredList(items, inference), input.title);

  await mkdir(dirname(resolvedOutputHtmlPath), { recursive: true });
  await writeFile(resolvedOutputHtmlPath, html, "utf8");

  return { outputHtmlPath: resolvedOutputHtmlPath, numberingType: inference.numberingType };
}
