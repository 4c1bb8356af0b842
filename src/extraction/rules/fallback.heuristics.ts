import type { ExtractionCandidate } from "../../shared/types/extraction.types";
import type { FallbackRule } from "../../shared/types/pattern-bank.types";
import { compareIsoDates, findDates, type FoundDate } from "../../shared/utils/dates";
import { findLexiconTerms } from "../lexicons";
import { matchHeading, type RuleContext } from "./rule.runner";

// A date right after "Date:" or "Dated" is when the document was issued, not an event in it.
const ISSUE_DATE_PREFIX = /(?:\bdate\s*[:-]?|\bdated\s*[:-]?)\s*$/i;
const AMOUNT_TOKEN = /\b\d+(?:\.\d{1,2})?\b/g;
const CAPITALIZED_TOKEN = /^[A-Z][A-Za-z.'&-]*$/;

export function runFallback(rule: FallbackRule, context: RuleContext): ExtractionCandidate[] {
  const lines = rule.lines === null ? context.normalized.lines : context.normalized.lines.slice(0, rule.lines);
  switch (rule.heuristic) {
    case "largest_amount_in_last_lines":
      return largestAmountInLastLines(context.normalized.lines, rule.lines ?? 5);
    case "first_capitalized_line":
      return firstCapitalizedLine(lines, context.knownHeadings);
    case "earliest_date":
      return pickDate(lines.join("\n"), (left, right) => compareIsoDates(left, right) < 0);
    case "latest_date":
      return pickDate(lines.join("\n"), (left, right) => compareIsoDates(left, right) > 0);
    case "technical_skills_anywhere":
      return asListCandidate(findLexiconTerms(lines.join("\n"), context.lexicons.technicalSkills));
    case "soft_skills_anywhere":
      return asListCandidate(findLexiconTerms(lines.join("\n"), context.lexicons.softSkills));
  }
}

function largestAmountInLastLines(lines: ReadonlyArray<string>, count: number): ExtractionCandidate[] {
  let best: { raw: string; amount: number } | null = null;
  for (const line of lines.slice(-count)) {
    let withoutDates = line;
    for (const found of findDates(line)) {
      withoutDates = withoutDates.replace(found.raw, " ");
    }
    for (const match of withoutDates.matchAll(AMOUNT_TOKEN)) {
      const amount = Number(match[0]);
      if (Number.isFinite(amount) && amount > 0 && (!best || amount > best.amount)) {
        best = { raw: match[0], amount };
      }
    }
  }
  return best ? [{ raw: best.raw, value: best.raw }] : [];
}

function firstCapitalizedLine(lines: ReadonlyArray<string>, knownHeadings: ReadonlyArray<string>): ExtractionCandidate[] {
  for (const line of lines) {
    if (/[\d@:]/.test(line) || matchHeading(line, knownHeadings)) {
      continue;
    }
    const tokens = line.split(" ");
    if (tokens.length < 2 || tokens.length > 6) {
      continue;
    }
    if (tokens.every((token) => CAPITALIZED_TOKEN.test(token) || /^(?:of|and|the|for|&)$/.test(token))) {
      return [{ raw: line, value: line }];
    }
  }
  return [];
}

function pickDate(text: string, prefer: (candidate: string, current: string) => boolean): ExtractionCandidate[] {
  let chosen: FoundDate | null = null;
  for (const found of findDates(text)) {
    if (ISSUE_DATE_PREFIX.test(text.slice(Math.max(0, found.index - 12), found.index))) {
      continue;
    }
    if (!chosen || prefer(found.iso, chosen.iso)) {
      chosen = found;
    }
  }
  return chosen ? [{ raw: chosen.raw, value: chosen.iso }] : [];
}

function asListCandidate(items: string[]): ExtractionCandidate[] {
  return items.length > 0 ? [{ raw: items.join(", "), value: items }] : [];
}
