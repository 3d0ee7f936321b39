export type {
  ConvertListToHtmlInput,
  ConvertListToHtmlResult,
  InferNumberingOptions,
  ListItem,
  ListStyleType,
  NumberingInference,
  NumberingScheme,
  RecognizedNumbering,
  UnrecognizedNumbering,
} from "./numbering-types.ts";
export { DEFAULT_INFER_OPTIONS } from "./numbering-types.ts";
export { categorizeLabel, SCHEME_CHARACTER_SETS, SCHEME_CONVERTERS } from "./numbering-schemes.ts";
export {
  collectLabels,
  inferNumbering,
  isDefaultOrder,
  normalizeLabels,
  resolveScheme,
} from "./infer-numbering.ts";
export { escapeHtml, renderInferredList, renderListDocument, renderOrderedList } from "./html-render.ts";
export { parseListItemLine } from "./string-utils.ts";
export { readInferLabels, readListFile } from "./file-access.ts";
export { convertListToHtml } from "./list-to-html.ts";
