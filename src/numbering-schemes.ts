import type { NumberingScheme } from "./numbering-types.ts";
import { ALL_SCHEMES, ALPHABET_SIZE } from "./numbering-types.ts";

const DIGITS = "0123456789";
const LOWERCASE_LETTERS = "abcdefghijklmnopqrstuvwxyz";
const UPPERCASE_LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWERCASE_A_CODE = "a".charCodeAt(0);
const UPPERCASE_A_CODE = "A".charCodeAt(0);

export const SCHEME_CHARACTER_SETS: Readonly<Record<NumberingScheme, ReadonlySet<string>>> = {
  decimal: new Set(DIGITS),
  "lower-alpha": new Set(LOWERCASE_LETTERS),
  "upper-alpha": new Set(UPPERCASE_LETTERS),
  "mixed-alpha": new Set(LOWERCASE_LETTERS + UPPERCASE_LETTERS),
};

export const SCHEME_CONVERTERS: Readonly<Record<NumberingScheme, (label: string) => number>> = {
  decimal: convertDecimal,
  "lower-alpha": (label) => convertAlphabetic(label, LOWERCASE_A_CODE),
  "upper-alpha": (label) => convertAlphabetic(label, UPPERCASE_A_CODE),
  "mixed-alpha": (label) => convertAlphabetic(label.toUpperCase(), UPPERCASE_A_CODE),
};

/**
 * Every scheme whose character set covers all characters of `label`.
 * Only the characters matter: "007" is still a decimal candidate.
 */
export function categorizeLabel(label: string): Set<NumberingScheme> {
  const schemes = new Set<NumberingScheme>();
  for (const scheme of ALL_SCHEMES) {
    if (everyCharacterIn(label, SCHEME_CHARACTER_SETS[scheme])) schemes.add(scheme);
  }
  return schemes;
}

function everyCharacterIn(label: string, charset: ReadonlySet<string>): boolean {
  for (const character of label) {
    if (!charset.has(character)) return false;
  }
  return true;
}

function convertDecimal(label: string): number {
  return Number.parseInt(label, 10);
}

/** Bijective base-26: "a" = 1, "z" = 26, "aa" = 27. */
function convertAlphabetic(label: string, firstLetterCode: number): number {
  let value = 0;
  for (let index = 0; index < label.length; index += 1) {
    value = value * ALPHABET_SIZE + (label.charCodeAt(index) - firstLetterCode + 1);
  }
  return value;
}
