import type { DocumentKind } from "./document.types";

export type ExtractionMethod = "explicit_pattern" | "fallback_heuristic" | "computed" | "unresolved";

export interface EducationEntry {
  institution: string | null;
  degree: string | null;
  field: string | null;
  dates: string | null;
  gpa: string | null;
}

export interface ExperienceEntry {
  company: string | null;
  title: string | null;
  dates: string | null;
  achievements: string[];
}

export type ListItem = string | EducationEntry | ExperienceEntry;

export type FieldValue = string | number | ReadonlyArray<ListItem> | null;

export interface FieldExtraction {
  value: FieldValue;
  raw_matches: string[];
  extraction_method: ExtractionMethod;
  rule_id: string | null;
}

export interface FieldExtractionResult {
  kind: DocumentKind;
  bank_version: string;
  fields: Record<string, FieldExtraction>;
}

export interface NormalizedText {
  text: string;
  lines: ReadonlyArray<string>;
  currencySymbols: ReadonlyArray<string>;
}

export interface ExtractionCandidate {
  raw: string;
  value: FieldValue;
}

export function isEducationEntry(item: unknown): item is EducationEntry {
  return typeof item === "object" && item !== null && "institution" in item && "degree" in item;
}

export function isExperienceEntry(item: unknown): item is ExperienceEntry {
  return typeof item === "object" && item !== null && "company" in item && "achievements" in item;
}
