import { describe, expect, it } from "vitest";

import { escapeHtml, renderListDocument, renderOrderedList } from "./html-render.ts";

describe("renderOrderedList", () => {
  it("omits value attributes for a list in default order", () => {
    const items = [
      { label: "A.", text: "Apples" },
      { label: "B.", text: "Bananas" },
    ];
    expect(renderOrderedList(items)).toEqual([
      '<ol style="list-style-type: upper-alpha;">',
      "  <li>Apples</li>",
      "  <li>Bananas</li>",
      "</ol>",
    ]);
  });

  it("writes a value attribute on every item when letters are skipped", () => {
    const items = [
      { label: "A.", text: "Apples" },
      { label: "B.", text: "Bananas" },
      { label: "D.", text: "Dates" },
    ];
    expect(renderOrderedList(items)).toEqual([
      '<ol style="list-style-type: upper-alpha;">',
      '  <li value="1">Apples</li>',
      '  <li value="2">Bananas</li>',
      '  <li value="4">Dates</li>',
      "</ol>",
    ]);
  });

  it("passes the inference options through", () => {
    expect(
      renderOrderedList(
        [
          { label: "1", text: "One" },
          { label: "3", text: "Three" },
        ],
        { requireDot: false },
      ),
    ).toEqual([
      '<ol style="list-style-type: decimal;">',
      '  <li value="1">One</li>',
      '  <li value="3">Three</li>',
      "</ol>",
    ]);
    expect(
      renderOrderedList(
        [
          { label: "a.", text: "x" },
          { label: "B.", text: "y" },
        ],
        { mixedCase: true },
      )[0],
    ).toBe('<ol style="list-style-type: upper-alpha;">');
  });

  it("falls back to a table instead of writing an inexact value", () => {
    const items = [
      { label: "1.", text: "One" },
      { label: `${"9".repeat(400)}.`, text: "Many" },
    ];
    expect(renderOrderedList(items)[0]).toBe('<table class="list-fallback">');
  });

  it("falls back to a table with the trimmed labels", () => {
    const items = [
      { label: " 1. ", text: "One" },
      { label: "a.", text: "<b>bold</b>" },
    ];
    expect(renderOrderedList(items)).toEqual([
      '<table class="list-fallback">',
      "  <tr><td>1.</td><td>One</td></tr>",
      "  <tr><td>a.</td><td>&lt;b&gt;bold&lt;/b&gt;</td></tr>",
      "</table>",
    ]);
  });
});

describe("renderListDocument", () => {
  it("wraps body lines in an HTML document", () => {
    expect(renderListDocument(["<p>x</p>"], "A & B")).toBe(
      [
        "<!DOCTYPE html>",
        '<html lang="en">',
        "<head>",
        '  <meta charset="UTF-8">',
        '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
        "  <title>A &amp; B</title>",
        "</head>",
        "<body>",
        "<p>x</p>",
        "</body>",
        "</html>",
        "",
      ].join("\n"),
    );
  });

  it("uses a default title", () => {
    expect(renderListDocument([]).split("\n")[5]).toBe("  <title>Converted list</title>");
  });
});

describe("escapeHtml", () => {
  it("escapes markup and attribute characters", () => {
    expect(escapeHtml('Fish & "Chips" <b>')).toBe("Fish &amp; &quot;Chips&quot; &lt;b&gt;");
  });
});
