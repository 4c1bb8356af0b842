import type { ExtractionCandidate, NormalizedText } from "../../shared/types/extraction.types";
import type { KeywordWindowRule, MatchRule, PatternRule, SectionRule } from "../../shared/types/pattern-bank.types";
import type { Lexicons } from "../lexicons";
import { parseSection } from "./section.parsers";

export interface SectionBlock {
  heading: string;
  lines: string[];
}

export interface RuleContext {
  normalized: NormalizedText;
  sections: ReadonlyArray<SectionBlock>;
  knownHeadings: ReadonlyArray<string>;
  lexicons: Lexicons;
}

export function runMatchRule(rule: MatchRule, context: RuleContext): ExtractionCandidate[] {
  switch (rule.type) {
    case "pattern":
      return runPatternRule(rule, context.normalized);
    case "keyword_window":
      return runKeywordWindowRule(rule, context.normalized);
    case "section":
      return runSectionRule(rule, context);
  }
}

export function captureValue(match: RegExpMatchArray): string | null {
  const named = match.groups?.value;
  if (named !== undefined) {
    return named;
  }
  if (match.length > 1 && match[1] !== undefined) {
    return match[1];
  }
  return match[0] ?? null;
}

export function indexSections(lines: ReadonlyArray<string>, knownHeadings: ReadonlyArray<string>): SectionBlock[] {
  const headings = [...knownHeadings].sort((left, right) => right.length - left.length);
  const blocks: SectionBlock[] = [];
  let current: SectionBlock | null = null;

  for (const line of lines) {
    const heading = matchHeading(line, headings);
    if (heading) {
      current = { heading: heading.heading, lines: [] };
      blocks.push(current);
      if (heading.inline) {
        current.lines.push(heading.inline);
      }
      continue;
    }
    if (current) {
      current.lines.push(line);
    }
  }
  return blocks;
}

export function matchHeading(
  line: string,
  headings: ReadonlyArray<string>,
): { heading: string; inline: string | null } | null {
  const cleaned = line.replace(/^[#*=\s]+/, "").trim();
  const lower = cleaned.toLowerCase();
  for (const heading of headings) {
    if (lower === heading || lower === `${heading}:`) {
      return { heading, inline: null };
    }
    if (!lower.startsWith(heading)) {
      continue;
    }
    const rest = cleaned.slice(heading.length).match(/^\s*[:|]\s*(.+)$/);
    if (rest) {
      return { heading, inline: rest[1].trim() };
    }
  }
  return null;
}

function runPatternRule(rule: PatternRule, normalized: NormalizedText): ExtractionCandidate[] {
  const text = rule.scopeLines === null ? normalized.text : normalized.lines.slice(0, rule.scopeLines).join("\n");
  const candidates: ExtractionCandidate[] = [];
  for (const match of text.matchAll(rule.regex)) {
    const raw = captureValue(match);
    if (raw && raw.trim()) {
      candidates.push({ raw: raw.trim(), value: raw });
    }
  }
  return candidates;
}

function runKeywordWindowRule(rule: KeywordWindowRule, normalized: NormalizedText): ExtractionCandidate[] {
  const hits: Array<{ index: number; raw: string }> = [];
  for (const keyword of rule.keywords) {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&").replace(/\s+/g, "\\s+");
    for (const match of normalized.text.matchAll(new RegExp(`\\b${escaped}\\b`, "gi"))) {
      const start = (match.index ?? 0) + match[0].length;
      const window = normalized.text.slice(start, start + rule.window);
      const captured = window.match(rule.capture);
      const raw = captured ? captureValue(captured) : null;
      if (raw && raw.trim()) {
        hits.push({ index: match.index ?? 0, raw: raw.trim() });
      }
    }
  }
  return hits
    .sort((left, right) => left.index - right.index)
    .map((hit) => ({ raw: hit.raw, value: hit.raw }));
}

function runSectionRule(rule: SectionRule, context: RuleContext): ExtractionCandidate[] {
  const lines = context.sections
    .filter((block) => rule.headings.includes(block.heading))
    .flatMap((block) => block.lines);
  if (lines.length === 0) {
    return [];
  }
  const items = parseSection(rule.parser, lines, context.lexicons);
  if (items.length === 0) {
    return [];
  }
  return [{ raw: lines.join("\n"), value: items }];
}
