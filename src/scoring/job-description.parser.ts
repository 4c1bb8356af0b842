import { findLexiconTerms, hasLexiconTerm, normalizeFieldName, type Lexicons } from "../extraction/lexicons";
import { normalizeText } from "../normalization/text.normalizer";
import type { DegreeLevel, JobDescription } from "../shared/types/scoring.types";
import { isRecord, toStringArray, toText } from "../shared/utils/records";
import { phraseOf } from "../shared/utils/scoring.util";

export const DEFAULT_MIN_AVERAGE_TENURE_MONTHS = 6;
const MAX_KEYWORDS = 25;

const TITLE_LINE = /^(?:job\s+title|title|position|role|designation)\s*[:-]\s*(.+)$/i;
const FIELD_OF_STUDY =
  /\b(?:degree|bachelor(?:'?s)?|master(?:'?s)?|b\.?\s?tech|m\.?\s?tech|b\.e\.|m\.e\.|b\.?sc|m\.?sc|diploma|ph\.?\s?d\.?)\s+(?:degree\s+)?in\s+([A-Za-z&][A-Za-z& ]{1,60})/i;
const FIELD_TAIL = /\s+(?:or|with|from|and\s+related|preferred|required)\b.*$/i;

export type JobDescriptionReadResult =
  | {
      ok: true;
      job: JobDescription;
    }
  | {
      ok: false;
      error: string;
    };

export function parseJobDescription(
  text: string,
  lexicons: Lexicons,
  minAverageTenureMonths = DEFAULT_MIN_AVERAGE_TENURE_MONTHS,
): JobDescription {
  const normalized = normalizeText(text);
  const titleLine = normalized.lines.map((line) => line.match(TITLE_LINE)).find((match) => match !== null);
  const title = titleLine ? titleLine[1].trim() : normalized.lines[0] ?? "";
  const requiredField = readFieldOfStudy(normalized.text);

  return {
    title,
    keywords: extractKeywords(normalized.text, lexicons.stopwords),
    required_skills: [
      ...findLexiconTerms(normalized.text, lexicons.technicalSkills),
      ...findLexiconTerms(normalized.text, lexicons.softSkills),
    ],
    required_degree: lowestDegreeLevel(normalized.text, lexicons),
    required_field: requiredField,
    related_fields: requiredField ? relatedFields(requiredField, lexicons) : [],
    min_average_tenure_months: minAverageTenureMonths,
  };
}

// Accepts free text or an already structured description from a caller.
export function readJobDescription(input: unknown, lexicons: Lexicons): JobDescriptionReadResult {
  if (typeof input === "string") {
    if (!input.trim()) {
      return { ok: false, error: "job description text is empty" };
    }
    return { ok: true, job: parseJobDescription(input, lexicons) };
  }
  if (!isRecord(input)) {
    return { ok: false, error: "job description must be text or an object" };
  }

  const title = toText(input.title);
  const requiredSkills = toStringArray(input.required_skills);
  const degree = input.required_degree;
  if (degree !== undefined && degree !== null && !isDegreeLevel(degree)) {
    return { ok: false, error: `unknown required_degree: ${String(degree)}` };
  }
  const tenure = input.min_average_tenure_months ?? DEFAULT_MIN_AVERAGE_TENURE_MONTHS;
  if (typeof tenure !== "number" || !Number.isFinite(tenure) || tenure < 0) {
    return { ok: false, error: "min_average_tenure_months must be a non-negative number" };
  }
  const requiredField = toText(input.required_field);
  const field = requiredField ? normalizeFieldName(requiredField) : null;
  const explicitRelated = toStringArray(input.related_fields).map((item) => normalizeFieldName(item));

  return {
    ok: true,
    job: {
      title,
      keywords: toStringArray(input.keywords)
        .map((keyword) => phraseOf(keyword))
        .filter((keyword) => keyword.length > 0),
      required_skills: requiredSkills,
      required_degree: isDegreeLevel(degree) ? degree : null,
      required_field: field,
      related_fields: explicitRelated.length > 0 || !field ? explicitRelated : relatedFields(field, lexicons),
      min_average_tenure_months: tenure,
    },
  };
}

export function relatedFields(field: string, lexicons: Lexicons): string[] {
  const normalized = normalizeFieldName(field);
  const related = new Set<string>();
  for (const group of lexicons.relatedFieldGroups) {
    if (group.includes(normalized)) {
      group.filter((item) => item !== normalized).forEach((item) => related.add(item));
    }
  }
  return Array.from(related);
}

function lowestDegreeLevel(text: string, lexicons: Lexicons): DegreeLevel | null {
  let lowest: DegreeLevel | null = null;
  for (const { level, terms } of lexicons.degreeLevels) {
    if (hasLexiconTerm(text, terms)) {
      lowest = level;
    }
  }
  return lowest;
}

function readFieldOfStudy(text: string): string | null {
  const match = text.match(FIELD_OF_STUDY);
  if (!match) {
    return null;
  }
  const field = normalizeFieldName(match[1].replace(FIELD_TAIL, ""));
  return field || null;
}

function extractKeywords(text: string, stopwords: ReadonlySet<string>): string[] {
  const keywords: string[] = [];
  for (const token of text.toLowerCase().split(/[^a-z0-9+#]+/)) {
    if (token.length < 4 || /^\d+$/.test(token) || stopwords.has(token) || keywords.includes(token)) {
      continue;
    }
    keywords.push(token);
    if (keywords.length >= MAX_KEYWORDS) {
      break;
    }
  }
  return keywords;
}

function isDegreeLevel(value: unknown): value is DegreeLevel {
  return value === "diploma" || value === "bachelor" || value === "master" || value === "doctorate";
}
