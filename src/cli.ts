#!/usr/bin/env node

import { Command } from "commander";
import { readInferLabels } from "./file-access.ts";
import { inferNumbering } from "./infer-numbering.ts";
import { convertListToHtml } from "./list-to-html.ts";

interface InferCommandOptions {
  input?: string;
  requireDot: boolean;
  mixedCase?: boolean;
}

interface List2HtmlCommandOptions {
  requireDot: boolean;
  mixedCase?: boolean;
  title?: string;
}

const program = new Command();

program
  .name("list-numbering")
  .description("Infer ordered-list numbering schemes from item labels")
  .showHelpAfterError();

program
  .command("infer")
  .description("Print the numbering scheme, ordinal values and default-order flag as JSON")
  .argument("[labels...]", "Item labels such as A. B. D.")
  .option("-i, --input <path>", "Read labels from a text or JSON list file instead of arguments")
  .option("--no-require-dot", "Accept labels without a trailing period")
  .option("--mixed-case", "Accept letters of both cases in one list")
  .action(async (labels: string[], options: InferCommandOptions) => {
    const inputLabels = await readInferLabels(labels, options.input);
    const inference = inferNumbering(inputLabels, {
      requireDot: options.requireDot,
      mixedCase: options.mixedCase,
    });

    console.log(
      JSON.stringify({ ...inference, numberingType: inference.numberingType ?? null }),
    );
  });

program.action(() => {
  program.outputHelp();
});

program
  .command("list2html")
  .description("Convert a plain-text list to an HTML ordered list")
  .argument("<inputPath>", "Path to input list file, one item per line")
  .argument("<outputHtmlPath>", "Path to output HTML file")
  .option("--no-require-dot", "Accept labels without a trailing period")
  .option("--mixed-case", "Accept letters of both cases in one list")
  .option("--title <title>", "Document title")
  .action(async (inputPath: string, outputHtmlPath: string, options: List2HtmlCommandOptions) => {
    const conversion = await convertListToHtml({
      inputListPath: inputPath,
      outputHtmlPath,
      requireDot: options.requireDot,
      mixedCase: options.mixedCase,
      title: options.title,
    });

    const scheme = conversion.numberingType ?? "fallback table";
    console.log(`Generated HTML file at ${conversion.outputHtmlPath} (${scheme})`);
  });

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
