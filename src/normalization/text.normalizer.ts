import type { NormalizedText } from "../shared/types/extraction.types";

// Applied only inside number-shaped tokens that touch no letters.
export const OCR_DIGIT_SUBSTITUTIONS: Readonly<Record<string, string>> = {
  O: "0",
  o: "0",
  l: "1",
  I: "1",
};

const CHARACTER_REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\u0000/g, ""],
  [/[\u200B-\u200D\uFEFF]/g, ""],
  [/[\u00A0\u2007\u202F]/g, " "],
  [/[\u2018\u2019\u201A\u2032]/g, "'"],
  [/[\u201C\u201D\u201E\u2033]/g, "\""],
  [/[\u2010\u2011\u2012]/g, "-"],
];

const CURRENCY_BEFORE_NUMBER = /([\u20B9$\u20AC\u00A3\u00A5]|\b(?:Rs\.?|INR|USD|EUR|GBP)(?=\s?\d))\s?(?=\d)/g;
const CURRENCY_AFTER_NUMBER = /(?<=\d)\s?([\u20B9$\u20AC\u00A3\u00A5])/g;
// A comma is a grouping separator only when the run ends in a three-digit group.
const THOUSANDS_SEPARATOR = /(\d),(?=(?:\d{2},)*\d{3}\b)/g;
const NUMBER_SHAPED_RUN = /[0-9OoIl.,]+/g;

export function normalizeText(raw: string): NormalizedText {
  let text = raw.replace(/\r\n?/g, "\n");
  for (const [pattern, replacement] of CHARACTER_REPLACEMENTS) {
    text = text.replace(pattern, replacement);
  }

  const currencySymbols = new Set<string>();
  text = text.replace(CURRENCY_BEFORE_NUMBER, (_match, symbol: string) => {
    currencySymbols.add(symbol.replace(/\.$/, ""));
    return "";
  });
  text = text.replace(CURRENCY_AFTER_NUMBER, (_match, symbol: string) => {
    currencySymbols.add(symbol);
    return "";
  });

  const lines = text
    .split("\n")
    .map((line) => substituteOcrDigits(line.replace(/[ \t\f\v]+/g, " ").trim()).replace(THOUSANDS_SEPARATOR, "$1"))
    .filter((line) => line.length > 0);

  return {
    text: lines.join("\n"),
    lines,
    currencySymbols: Array.from(currencySymbols),
  };
}

export function substituteOcrDigits(line: string): string {
  return line.replace(NUMBER_SHAPED_RUN, (run: string, offset: number) => {
    if (!/\d/.test(run)) {
      return run;
    }
    const before = offset > 0 ? line[offset - 1] : "";
    const after = line[offset + run.length] ?? "";
    if (/[A-Za-z]/.test(before) || /[A-Za-z]/.test(after)) {
      return run;
    }
    return run.replace(/[OoIl]/g, (char) => OCR_DIGIT_SUBSTITUTIONS[char] ?? char);
  });
}
