import type {
  ExtractionCandidate,
  FieldExtraction,
  FieldExtractionResult,
  FieldValue,
  NormalizedText,
} from "../shared/types/extraction.types";
import type { FieldSpec, PatternBank } from "../shared/types/pattern-bank.types";
import type { Lexicons } from "./lexicons";
import { runComputed } from "./rules/computed.operations";
import { runFallback } from "./rules/fallback.heuristics";
import { indexSections, runMatchRule, type RuleContext } from "./rules/rule.runner";
import { coerceValue } from "./value.coercion";

export interface ExtractOptions {
  lexicons: Lexicons;
}

interface AcceptedCandidate {
  raw: string;
  value: FieldValue;
}

export function extractFields(
  bank: PatternBank,
  normalized: NormalizedText,
  options: ExtractOptions,
): FieldExtractionResult {
  const context: RuleContext = {
    normalized,
    sections: indexSections(normalized.lines, bank.sections),
    knownHeadings: bank.sections,
    lexicons: options.lexicons,
  };

  const fields: Record<string, FieldExtraction> = {};
  for (const field of bank.fields) {
    fields[field.name] = resolveField(field, context);
  }

  // Second pass: each computed field sees explicit values plus computed fields before it.
  for (const field of bank.fields) {
    if (fields[field.name].extraction_method !== "unresolved") {
      continue;
    }
    for (const rule of field.computed) {
      const value = runComputed(rule, { ...fields });
      if (value !== null) {
        fields[field.name] = {
          value,
          raw_matches: [],
          extraction_method: "computed",
          rule_id: rule.id,
        };
        break;
      }
    }
  }

  return {
    kind: bank.kind,
    bank_version: bank.version,
    fields,
  };
}

export function unresolvedField(): FieldExtraction {
  return { value: null, raw_matches: [], extraction_method: "unresolved", rule_id: null };
}

function resolveField(field: FieldSpec, context: RuleContext): FieldExtraction {
  let winner: { ruleId: string; accepted: AcceptedCandidate[] } | null = null;
  const laterMatches: string[] = [];

  for (const rule of field.rules) {
    const accepted = accept(field, runMatchRule(rule, context));
    if (accepted.length === 0) {
      continue;
    }
    if (!winner) {
      winner = { ruleId: rule.id, accepted };
    } else {
      laterMatches.push(...accepted.map((candidate) => candidate.raw));
    }
  }

  if (winner) {
    return {
      value: winner.accepted[0].value,
      raw_matches: unique([...winner.accepted.map((candidate) => candidate.raw), ...laterMatches]),
      extraction_method: "explicit_pattern",
      rule_id: winner.ruleId,
    };
  }

  for (const fallback of field.fallbacks) {
    const accepted = accept(field, runFallback(fallback, context));
    if (accepted.length > 0) {
      return {
        value: accepted[0].value,
        raw_matches: unique(accepted.map((candidate) => candidate.raw)),
        extraction_method: "fallback_heuristic",
        rule_id: `fallback:${fallback.heuristic}`,
      };
    }
  }

  return unresolvedField();
}

function accept(field: FieldSpec, candidates: ExtractionCandidate[]): AcceptedCandidate[] {
  const accepted: AcceptedCandidate[] = [];
  for (const candidate of candidates) {
    const value = coerceValue(field.shape, candidate.value);
    if (value !== null) {
      accepted.push({ raw: candidate.raw, value });
    }
  }
  return accepted;
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
