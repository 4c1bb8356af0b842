import type { GpaScale } from "../config/env";
import type { DocumentExtractOptions } from "../engine/document.engine";
import { isDocumentKind } from "../shared/types/document.types";
import type {
  EducationEntry,
  ExperienceEntry,
  ExtractionMethod,
  FieldExtraction,
  FieldExtractionResult,
  FieldValue,
  ListItem,
} from "../shared/types/extraction.types";
import { parseDate } from "../shared/utils/dates";
import { isPositiveInteger, isRecord, isStringArray } from "../shared/utils/records";

const EXTRACTION_METHODS: ReadonlyArray<ExtractionMethod> = [
  "explicit_pattern",
  "fallback_heuristic",
  "computed",
  "unresolved",
];

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function readExtractOptions(body: Record<string, unknown>): ParseResult<DocumentExtractOptions> {
  const options: DocumentExtractOptions = {};
  const { anonymize, redactDates } = body;
  if (anonymize !== undefined) {
    if (typeof anonymize !== "boolean") {
      return { ok: false, error: "anonymize must be a boolean" };
    }
    options.anonymize = anonymize;
  }
  if (redactDates !== undefined) {
    if (typeof redactDates !== "boolean") {
      return { ok: false, error: "redactDates must be a boolean" };
    }
    options.redactDates = redactDates;
  }

  const nested = body.options;
  if (nested === undefined) {
    return { ok: true, value: options };
  }
  if (!isRecord(nested)) {
    return { ok: false, error: "options must be an object" };
  }
  const tolerance = nested.earningsTolerance;
  if (tolerance !== undefined) {
    if (typeof tolerance !== "number" || !Number.isFinite(tolerance) || tolerance < 0) {
      return { ok: false, error: "options.earningsTolerance must be a non-negative number" };
    }
    options.earningsTolerance = tolerance;
  }
  if (nested.gpaScale !== undefined) {
    const scale = readGpaScale(nested.gpaScale);
    if (scale === null) {
      return { ok: false, error: "options.gpaScale must be 4 or 10" };
    }
    options.gpaScale = scale;
  }
  const asOf = readAsOf(nested.asOf);
  if (!asOf.ok) {
    return { ok: false, error: `options.${asOf.error}` };
  }
  if (asOf.value !== undefined) {
    options.asOf = asOf.value;
  }
  return { ok: true, value: options };
}

export function readThreshold(value: unknown): ParseResult<number | undefined> {
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 100) {
    return { ok: false, error: "threshold must be a number between 0 and 100" };
  }
  return { ok: true, value };
}

export function readMaxCandidates(value: unknown): ParseResult<number | null | undefined> {
  if (value === undefined || value === null) {
    return { ok: true, value };
  }
  if (!isPositiveInteger(value)) {
    return { ok: false, error: "maxCandidates must be a positive integer" };
  }
  return { ok: true, value };
}

export function readAsOf(value: unknown): ParseResult<string | undefined> {
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  if (typeof value !== "string" || !/^\d{4}-\d{2}-\d{2}$/.test(value) || parseDate(value) !== value) {
    return { ok: false, error: "asOf must be a YYYY-MM-DD date" };
  }
  return { ok: true, value };
}

// Re-reads a result that travelled through JSON, e.g. one stored by a caller after extraction.
export function readFieldExtractionResult(value: unknown): ParseResult<FieldExtractionResult> {
  if (!isRecord(value)) {
    return { ok: false, error: "fields must be an extraction result object" };
  }
  const { kind, bank_version: bankVersion, fields: rawFields } = value;
  if (!isRecord(rawFields)) {
    return { ok: false, error: "fields.fields must be an object" };
  }
  if (!isDocumentKind(kind)) {
    return { ok: false, error: "fields.kind must be a document kind" };
  }
  if (typeof bankVersion !== "string") {
    return { ok: false, error: "fields.bank_version must be a string" };
  }

  const fields: Record<string, FieldExtraction> = {};
  for (const [name, raw] of Object.entries(rawFields)) {
    const extraction = readFieldExtraction(raw);
    if (!extraction) {
      return { ok: false, error: `fields.${name} is not a field extraction` };
    }
    fields[name] = extraction;
  }
  return { ok: true, value: { kind, bank_version: bankVersion, fields } };
}

function readFieldExtraction(raw: unknown): FieldExtraction | null {
  if (!isRecord(raw)) {
    return null;
  }
  const rawMatches = raw.raw_matches;
  if (!isStringArray(rawMatches)) {
    return null;
  }
  const method = EXTRACTION_METHODS.find((item) => item === raw.extraction_method);
  if (!method) {
    return null;
  }
  const ruleId = raw.rule_id;
  if (ruleId !== null && typeof ruleId !== "string") {
    return null;
  }
  const fieldValue = readFieldValue(raw.value);
  if (fieldValue === undefined) {
    return null;
  }
  return { value: fieldValue, raw_matches: rawMatches, extraction_method: method, rule_id: ruleId };
}

function readFieldValue(raw: unknown): FieldValue | undefined {
  if (raw === null || typeof raw === "string" || (typeof raw === "number" && Number.isFinite(raw))) {
    return raw;
  }
  if (!Array.isArray(raw)) {
    return undefined;
  }
  const items: ListItem[] = [];
  const rawItems: ReadonlyArray<unknown> = raw;
  for (const rawItem of rawItems) {
    const item = readListItem(rawItem);
    if (item === null) {
      return undefined;
    }
    items.push(item);
  }
  return items;
}

function readListItem(raw: unknown): ListItem | null {
  if (typeof raw === "string") {
    return raw;
  }
  if (!isRecord(raw)) {
    return null;
  }
  if ("achievements" in raw) {
    const achievements = raw.achievements;
    if (!isStringArray(achievements)) {
      return null;
    }
    const entry: ExperienceEntry = {
      company: nullableText(raw.company),
      title: nullableText(raw.title),
      dates: nullableText(raw.dates),
      achievements,
    };
    return entry;
  }
  if ("institution" in raw || "degree" in raw) {
    const entry: EducationEntry = {
      institution: nullableText(raw.institution),
      degree: nullableText(raw.degree),
      field: nullableText(raw.field),
      dates: nullableText(raw.dates),
      gpa: nullableText(raw.gpa),
    };
    return entry;
  }
  return null;
}

function nullableText(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value : null;
}

function readGpaScale(value: unknown): GpaScale | null {
  if (value === 4 || value === 10) {
    return value;
  }
  return null;
}
