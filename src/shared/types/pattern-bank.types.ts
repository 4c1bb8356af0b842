import type { DocumentKind } from "./document.types";
import type { AnomalyType } from "./validation.types";

export type FieldShape =
  | "text"
  | "name"
  | "identifier"
  | "email"
  | "phone"
  | "contact"
  | "handle"
  | "amount"
  | "number"
  | "duration"
  | "date"
  | "list";

export type SectionParserName =
  | "education_entries"
  | "experience_entries"
  | "line_items"
  | "comma_items"
  | "technical_skills"
  | "soft_skills";

export type FallbackHeuristicName =
  | "largest_amount_in_last_lines"
  | "first_capitalized_line"
  | "earliest_date"
  | "latest_date"
  | "technical_skills_anywhere"
  | "soft_skills_anywhere";

export type ComputedOperation = "sum" | "difference" | "years_between";

export interface PatternRule {
  readonly type: "pattern";
  readonly id: string;
  readonly regex: RegExp;
  readonly scopeLines: number | null;
}

export interface KeywordWindowRule {
  readonly type: "keyword_window";
  readonly id: string;
  readonly keywords: ReadonlyArray<string>;
  readonly window: number;
  readonly capture: RegExp;
}

export interface SectionRule {
  readonly type: "section";
  readonly id: string;
  readonly headings: ReadonlyArray<string>;
  readonly parser: SectionParserName;
}

export type MatchRule = PatternRule | KeywordWindowRule | SectionRule;

export interface FallbackRule {
  readonly heuristic: FallbackHeuristicName;
  readonly lines: number | null;
}

export interface ComputedRule {
  readonly type: "computed";
  readonly id: string;
  readonly operation: ComputedOperation;
  readonly inputs: ReadonlyArray<string>;
  readonly optionalInputs: ReadonlyArray<string>;
}

export interface FieldSpec {
  readonly name: string;
  readonly shape: FieldShape;
  readonly required: boolean;
  readonly rules: ReadonlyArray<MatchRule>;
  readonly fallbacks: ReadonlyArray<FallbackRule>;
  readonly computed: ReadonlyArray<ComputedRule>;
}

interface CheckBase {
  readonly name: string;
  readonly anomaly: AnomalyType;
}

export type LogicalCheck =
  | (CheckBase & { readonly type: "date_order"; readonly start: string; readonly end: string })
  | (CheckBase & { readonly type: "sum_equals"; readonly items: ReadonlyArray<string>; readonly total: string })
  | (CheckBase & {
      readonly type: "difference_equals";
      readonly minuend: string;
      readonly subtrahend: string;
      readonly result: string;
    })
  | (CheckBase & { readonly type: "range"; readonly field: string; readonly min: number; readonly max: number | null })
  // Bounds are in years relative to the validation reference date; null leaves that side open.
  | (CheckBase & {
      readonly type: "date_window";
      readonly field: string;
      readonly maxYearsBefore: number | null;
      readonly maxYearsAfter: number | null;
    })
  | (CheckBase & { readonly type: "any_present"; readonly fields: ReadonlyArray<string> })
  | (CheckBase & { readonly type: "entries_date_order"; readonly field: string });

export interface PatternBank {
  readonly kind: DocumentKind;
  readonly version: string;
  // Every heading that ends a section, including ones no field reads.
  readonly sections: ReadonlyArray<string>;
  readonly fields: ReadonlyArray<FieldSpec>;
  readonly checks: ReadonlyArray<LogicalCheck>;
}

export type PatternBankRegistry = ReadonlyMap<DocumentKind, PatternBank>;
