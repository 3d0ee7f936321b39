export type NumberingScheme = "decimal" | "lower-alpha" | "upper-alpha" | "mixed-alpha";

/** Scheme names a caller can hand to CSS `list-style-type`. */
export type ListStyleType = Exclude<NumberingScheme, "mixed-alpha">;

export interface InferNumberingOptions {
  /** Every label must end in "." (default). When false, a trailing "." is optional. */
  requireDot?: boolean;
  /** Accept letters of both cases in one list, reported as `upper-alpha`. */
  mixedCase?: boolean;
}

export interface RecognizedNumbering {
  numberingType: ListStyleType;
  values: number[];
  /** True when an unmodified counter would produce `values` (1, 2, ..., N). */
  defaultOrder: boolean;
}

export interface UnrecognizedNumbering {
  numberingType: undefined;
  /** The input labels, trimmed but otherwise untouched. */
  values: string[];
  defaultOrder: false;
}

export type NumberingInference = RecognizedNumbering | UnrecognizedNumbering;

export interface ListItem {
  label: string;
  text: string;
}

export interface ConvertListToHtmlInput extends InferNumberingOptions {
  inputListPath: string;
  outputHtmlPath: string;
  /** Document `<title>`; defaults to DEFAULT_DOCUMENT_TITLE. */
  title?: string;
}

export interface ConvertListToHtmlResult {
  outputHtmlPath: string;
  numberingType: ListStyleType | undefined;
}

export const DEFAULT_INFER_OPTIONS: Required<InferNumberingOptions> = {
  requireDot: true,
  mixedCase: false,
};

export const ALL_SCHEMES: readonly NumberingScheme[] = [
  "decimal",
  "lower-alpha",
  "upper-alpha",
  "mixed-alpha",
];
export const ALPHABET_SIZE = 26;
export const LABEL_DOT = ".";
export const DEFAULT_DOCUMENT_TITLE = "Converted list";
export const FALLBACK_TABLE_CLASS = "list-fallback";
