import type { AnonymizedEntities, AnonymizeOptions } from "../shared/types/anonymization.types";
import type {
  EducationEntry,
  ExperienceEntry,
  FieldExtraction,
  FieldExtractionResult,
  FieldValue,
  ListItem,
} from "../shared/types/extraction.types";
import { isEducationEntry, isExperienceEntry } from "../shared/types/extraction.types";

export const PII_REDACTION_TOKENS: ReadonlyMap<string, string> = new Map([
  ["personal_info.name", "[NAME REDACTED]"],
  ["personal_info.email", "[EMAIL REDACTED]"],
  ["personal_info.phone", "[PHONE REDACTED]"],
  ["personal_info.linkedin", "[LINKEDIN REDACTED]"],
  ["personal_info.github", "[GITHUB REDACTED]"],
  ["personal_info.location", "[LOCATION REDACTED]"],
]);

export const DATE_REDACTION_TOKEN = "[DATE REDACTED]";

interface Replacement {
  pattern: RegExp;
  token: string;
  length: number;
}

type Scrub = (text: string) => string;

export function anonymizeResume(
  result: FieldExtractionResult,
  options: AnonymizeOptions = {},
): AnonymizedEntities {
  const redactDates = options.redactDates ?? true;
  // Lives for this call only, so the same organization maps differently across documents.
  const organizations = new Map<string, string>();
  const placeholderFor = (name: string | null): string | null => {
    const key = name?.trim().toLowerCase();
    if (!key) {
      return null;
    }
    const existing = organizations.get(key);
    if (existing) {
      return existing;
    }
    const placeholder = `[ORGANIZATION ${organizations.size + 1}]`;
    organizations.set(key, placeholder);
    return placeholder;
  };

  const replacements: Replacement[] = [];
  const redactedFields: string[] = [];
  for (const [name, token] of PII_REDACTION_TOKENS) {
    const value = result.fields[name]?.value;
    if (typeof value === "string" && value.trim()) {
      replacements.push(buildReplacement(value, token));
      redactedFields.push(name);
    }
  }

  for (const item of listItems(result)) {
    if (isEducationEntry(item)) {
      placeholderFor(item.institution);
      if (redactDates && item.dates) {
        replacements.push(buildReplacement(item.dates, DATE_REDACTION_TOKEN));
      }
    } else if (isExperienceEntry(item)) {
      placeholderFor(item.company);
      if (redactDates && item.dates) {
        replacements.push(buildReplacement(item.dates, DATE_REDACTION_TOKEN));
      }
    }
  }
  for (const [organization, placeholder] of organizations) {
    replacements.push(buildReplacement(organization, placeholder));
  }

  const scrub = buildScrubber(replacements);
  const fields: Record<string, FieldExtraction> = {};
  for (const [name, extraction] of Object.entries(result.fields)) {
    const token = PII_REDACTION_TOKENS.get(name);
    if (token && extraction.value !== null) {
      fields[name] = {
        ...extraction,
        value: token,
        raw_matches: extraction.raw_matches.map(() => token),
      };
      continue;
    }
    fields[name] = {
      ...extraction,
      value: anonymizeValue(extraction.value, { scrub, placeholderFor, redactDates }),
      raw_matches: extraction.raw_matches.map(scrub),
    };
  }

  return {
    kind: result.kind,
    bank_version: result.bank_version,
    fields,
    redacted_fields: redactedFields,
    organization_count: organizations.size,
  };
}

interface ValueContext {
  scrub: Scrub;
  placeholderFor: (name: string | null) => string | null;
  redactDates: boolean;
}

function anonymizeValue(value: FieldValue, context: ValueContext): FieldValue {
  if (typeof value === "string") {
    return context.scrub(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: ListItem) => anonymizeItem(item, context));
  }
  return value;
}

function anonymizeItem(item: ListItem, context: ValueContext): ListItem {
  if (typeof item === "string") {
    return context.scrub(item);
  }
  if (isEducationEntry(item)) {
    const entry: EducationEntry = {
      institution: context.placeholderFor(item.institution),
      degree: item.degree === null ? null : context.scrub(item.degree),
      field: item.field === null ? null : context.scrub(item.field),
      dates: redactEntryDates(item.dates, context.redactDates),
      gpa: item.gpa,
    };
    return entry;
  }
  const entry: ExperienceEntry = {
    company: context.placeholderFor(item.company),
    title: item.title === null ? null : context.scrub(item.title),
    dates: redactEntryDates(item.dates, context.redactDates),
    achievements: item.achievements.map(context.scrub),
  };
  return entry;
}

function redactEntryDates(dates: string | null, redactDates: boolean): string | null {
  if (dates === null || !redactDates) {
    return dates;
  }
  return DATE_REDACTION_TOKEN;
}

function listItems(result: FieldExtractionResult): ListItem[] {
  const items: ListItem[] = [];
  for (const extraction of Object.values(result.fields)) {
    if (Array.isArray(extraction.value)) {
      items.push(...extraction.value);
    }
  }
  return items;
}

function buildReplacement(needle: string, token: string): Replacement {
  const body = needle
    .trim()
    .split(/\s+/)
    .map((part) => part.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&"))
    .join("\\s+");
  return {
    pattern: new RegExp(`(?<![A-Za-z0-9])${body}(?![A-Za-z0-9])`, "gi"),
    token,
    length: needle.trim().length,
  };
}

function buildScrubber(replacements: ReadonlyArray<Replacement>): Scrub {
  // Longer needles first so "Acme Labs Pvt Ltd" wins over "Acme Labs".
  const ordered = [...replacements].sort((left, right) => right.length - left.length);
  return (text) => ordered.reduce((current, replacement) => current.replace(replacement.pattern, replacement.token), text);
}
