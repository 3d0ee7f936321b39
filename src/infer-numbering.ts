import type {
  InferNumberingOptions,
  ListStyleType,
  NumberingInference,
  NumberingScheme,
} from "./numbering-types.ts";
import { ALL_SCHEMES, DEFAULT_INFER_OPTIONS, LABEL_DOT } from "./numbering-types.ts";
import { SCHEME_CONVERTERS, categorizeLabel } from "./numbering-schemes.ts";

type CandidateFilter = (
  candidates: ReadonlySet<NumberingScheme>,
  options: Required<InferNumberingOptions>,
) => Set<NumberingScheme>;

// Applied in order after intersection.
const TIE_BREAK_FILTERS: readonly CandidateFilter[] = [
  dropMixedAlphaWhenCaseSensitive,
  preferExactCaseScheme,
];

/**
 * Works out which `<ol>` numbering scheme produced `labels` and each label's
 * ordinal within it.
 *
 * ```ts
 * inferNumbering(["A.", "B.", "D."]);
 * // { numberingType: "upper-alpha", values: [1, 2, 4], defaultOrder: false }
 * ```
 *
 * Labels that fit no scheme are not an error: the result has no
 * `numberingType` and `values` holds the trimmed labels for a fallback
 * rendering. An empty list is never recognized, and neither is a list with
 * an ordinal above `Number.MAX_SAFE_INTEGER`.
 *
 * @throws TypeError when `labels` is not iterable or holds a non-string.
 */
export function inferNumbering(
  labels: Iterable<string>,
  options: InferNumberingOptions = {},
): NumberingInference {
  const resolvedOptions = resolveInferOptions(options);
  const trimmedLabels = collectLabels(labels).map((label) => label.trim());
  const unrecognized: NumberingInference = {
    numberingType: undefined,
    values: trimmedLabels,
    defaultOrder: false,
  };

  const normalizedLabels = normalizeLabels(trimmedLabels, resolvedOptions.requireDot);
  if (normalizedLabels === undefined) return unrecognized;

  const scheme = resolveScheme(normalizedLabels, resolvedOptions);
  if (scheme === undefined) return unrecognized;

  const convert = SCHEME_CONVERTERS[scheme];
  const values = normalizedLabels.map((label) => convert(label));
  // Past 2^53 an ordinal is no longer exact, and very long labels overflow to Infinity.
  if (!values.every((value) => Number.isSafeInteger(value))) return unrecognized;
  return {
    numberingType: toListStyleType(scheme),
    values,
    defaultOrder: isDefaultOrder(values),
  };
}

/** Materializes untyped input into a label array, rejecting anything that is not a string. */
export function collectLabels(input: unknown): string[] {
  if (!isIterable(input)) {
    throw new TypeError(`Labels must be an iterable of strings, got ${describeType(input)}`);
  }
  const labels: string[] = [];
  for (const label of input) {
    if (typeof label !== "string") {
      throw new TypeError(
        `Label at index ${labels.length} must be a string, got ${describeType(label)}`,
      );
    }
    labels.push(label);
  }
  return labels;
}

/**
 * Strips the trailing dot from already-trimmed labels, or returns undefined
 * when a label breaks the dot policy or ends up empty.
 */
export function normalizeLabels(labels: string[], requireDot: boolean): string[] | undefined {
  const normalized: string[] = [];
  for (const label of labels) {
    const hasDot = label.endsWith(LABEL_DOT);
    if (requireDot && (!hasDot || label.length < 2)) return undefined;
    const stripped = hasDot ? label.slice(0, -LABEL_DOT.length) : label;
    if (stripped.length === 0) return undefined;
    normalized.push(stripped);
  }
  return normalized;
}

export function resolveScheme(
  labels: string[],
  options: InferNumberingOptions = {},
): NumberingScheme | undefined {
  const resolvedOptions = resolveInferOptions(options);
  let candidates = intersectCandidates(labels);
  for (const filter of TIE_BREAK_FILTERS) {
    candidates = filter(candidates, resolvedOptions);
  }
  // Two or more survivors would need a rule between overlapping schemes.
  if (candidates.size !== 1) return undefined;
  const [scheme] = candidates;
  return scheme;
}

export function isDefaultOrder(values: readonly number[]): boolean {
  return values.every((value, index) => value === index + 1);
}

function resolveInferOptions(options: InferNumberingOptions): Required<InferNumberingOptions> {
  return {
    requireDot: options.requireDot ?? DEFAULT_INFER_OPTIONS.requireDot,
    mixedCase: options.mixedCase ?? DEFAULT_INFER_OPTIONS.mixedCase,
  };
}

function intersectCandidates(labels: string[]): Set<NumberingScheme> {
  let candidates = new Set<NumberingScheme>(ALL_SCHEMES);
  for (const label of labels) {
    const labelSchemes = categorizeLabel(label);
    candidates = new Set([...candidates].filter((scheme) => labelSchemes.has(scheme)));
    if (candidates.size === 0) break;
  }
  return candidates;
}

function dropMixedAlphaWhenCaseSensitive(
  candidates: ReadonlySet<NumberingScheme>,
  options: Required<InferNumberingOptions>,
): Set<NumberingScheme> {
  if (options.mixedCase) return new Set(candidates);
  return withoutScheme(candidates, "mixed-alpha");
}

/** An exact-case alphabet beats the case-insensitive one whenever both fit. */
function preferExactCaseScheme(candidates: ReadonlySet<NumberingScheme>): Set<NumberingScheme> {
  if (candidates.size > 1 && candidates.has("mixed-alpha")) {
    return withoutScheme(candidates, "mixed-alpha");
  }
  return new Set(candidates);
}

function withoutScheme(
  candidates: ReadonlySet<NumberingScheme>,
  excluded: NumberingScheme,
): Set<NumberingScheme> {
  return new Set([...candidates].filter((scheme) => scheme !== excluded));
}

function toListStyleType(scheme: NumberingScheme): ListStyleType {
  return scheme === "mixed-alpha" ? "upper-alpha" : scheme;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export const inferNumberingInternals = {
  intersectCandidates,
  dropMixedAlphaWhenCaseSensitive,
  preferExactCaseScheme,
  toListStyleType,
};
