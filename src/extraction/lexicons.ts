import { readFile } from "node:fs/promises";
import path from "node:path";
import { ConfigurationError, errorMessage } from "../shared/errors";
import type { DegreeLevel } from "../shared/types/scoring.types";
import { deepFreeze, isRecord, isStringArray } from "../shared/utils/records";

export interface LexiconTerm {
  readonly label: string;
  readonly pattern: RegExp;
}

export type ClassifiedKind = "resume" | "cover_letter" | "reference_letter";

export interface DocumentIndicators {
  readonly minIndicators: number;
  readonly scanChars: number;
  readonly indicators: Readonly<Record<ClassifiedKind, ReadonlyArray<string>>>;
  readonly filenameHints: Readonly<Record<ClassifiedKind, ReadonlyArray<string>>>;
}

export interface SeniorityLexicon {
  readonly defaultRank: number;
  readonly ranks: ReadonlyArray<{ readonly term: LexiconTerm; readonly rank: number }>;
  readonly roleWords: ReadonlyArray<LexiconTerm>;
}

export interface AuthenticityLexicon {
  readonly verificationKeywords: ReadonlyArray<LexiconTerm>;
  readonly recognizedInstitutions: ReadonlyArray<LexiconTerm>;
  // Matched as lowercase substrings of a PDF's producer and creator.
  readonly signingTools: ReadonlyArray<string>;
}

export interface Lexicons {
  readonly technicalSkills: ReadonlyArray<LexiconTerm>;
  readonly softSkills: ReadonlyArray<LexiconTerm>;
  // Highest level first, so a string naming several levels resolves to the most specific.
  readonly degreeLevels: ReadonlyArray<{ readonly level: DegreeLevel; readonly terms: ReadonlyArray<LexiconTerm> }>;
  readonly relatedFieldGroups: ReadonlyArray<ReadonlyArray<string>>;
  readonly seniority: SeniorityLexicon;
  readonly documentIndicators: DocumentIndicators;
  readonly stopwords: ReadonlySet<string>;
  readonly certificateAuthenticity: AuthenticityLexicon;
}

const DEGREE_LEVEL_ORDER: ReadonlyArray<DegreeLevel> = ["doctorate", "master", "bachelor", "diploma"];
const CLASSIFIED_KINDS: ReadonlyArray<ClassifiedKind> = ["resume", "cover_letter", "reference_letter"];

const LEXICON_FILES = {
  skills: "skills.json",
  degrees: "degrees.json",
  relatedFields: "related-fields.json",
  seniority: "seniority.json",
  documentIndicators: "document-indicators.json",
  stopwords: "stopwords.json",
  certificateAuthenticity: "certificate-authenticity.json",
} as const;

export type RawLexiconFiles = Record<keyof typeof LEXICON_FILES, unknown>;

export async function loadLexicons(dir: string): Promise<Lexicons> {
  const raw: RawLexiconFiles = {
    skills: await readJson(dir, LEXICON_FILES.skills),
    degrees: await readJson(dir, LEXICON_FILES.degrees),
    relatedFields: await readJson(dir, LEXICON_FILES.relatedFields),
    seniority: await readJson(dir, LEXICON_FILES.seniority),
    documentIndicators: await readJson(dir, LEXICON_FILES.documentIndicators),
    stopwords: await readJson(dir, LEXICON_FILES.stopwords),
    certificateAuthenticity: await readJson(dir, LEXICON_FILES.certificateAuthenticity),
  };
  return compileLexicons(raw);
}

export function compileLexicons(raw: RawLexiconFiles): Lexicons {
  const skills = requireRecord(raw.skills, LEXICON_FILES.skills);
  const degrees = requireRecord(requireRecord(raw.degrees, LEXICON_FILES.degrees).levels, `${LEXICON_FILES.degrees} levels`);
  const relatedFields = requireRecord(raw.relatedFields, LEXICON_FILES.relatedFields);
  const seniority = requireRecord(raw.seniority, LEXICON_FILES.seniority);
  const stopwords = requireRecord(raw.stopwords, LEXICON_FILES.stopwords);
  const authenticity = requireRecord(raw.certificateAuthenticity, LEXICON_FILES.certificateAuthenticity);

  const groups = relatedFields.groups;
  if (!Array.isArray(groups) || !groups.every((group) => isStringArray(group))) {
    throw new ConfigurationError("lexicons", `${LEXICON_FILES.relatedFields} groups must be arrays of strings`);
  }

  const ranksRaw = requireRecord(seniority.ranks, `${LEXICON_FILES.seniority} ranks`);
  const ranks = Object.entries(ranksRaw).map(([term, rank]) => {
    if (typeof rank !== "number" || !Number.isFinite(rank)) {
      throw new ConfigurationError("lexicons", `${LEXICON_FILES.seniority} rank for "${term}" must be a number`);
    }
    return { term: compileTerm(term), rank };
  });
  const defaultRank = seniority.default_rank;
  if (typeof defaultRank !== "number" || !Number.isFinite(defaultRank)) {
    throw new ConfigurationError("lexicons", `${LEXICON_FILES.seniority} default_rank must be a number`);
  }

  return deepFreeze({
    technicalSkills: compileTerms(skills.technical, `${LEXICON_FILES.skills} technical`),
    softSkills: compileTerms(skills.soft, `${LEXICON_FILES.skills} soft`),
    degreeLevels: DEGREE_LEVEL_ORDER.map((level) => ({
      level,
      terms: compileTerms(degrees[level], `${LEXICON_FILES.degrees} ${level}`),
    })),
    relatedFieldGroups: groups.map((group) => group.map((item) => normalizeFieldName(item))),
    seniority: {
      defaultRank,
      ranks,
      roleWords: compileTerms(seniority.role_words, `${LEXICON_FILES.seniority} role_words`),
    },
    documentIndicators: compileIndicators(raw.documentIndicators),
    stopwords: new Set(requireStrings(stopwords.words, `${LEXICON_FILES.stopwords} words`).map((word) => word.toLowerCase())),
    certificateAuthenticity: {
      verificationKeywords: compileTerms(
        authenticity.verification_keywords,
        `${LEXICON_FILES.certificateAuthenticity} verification_keywords`,
      ),
      recognizedInstitutions: compileTerms(
        authenticity.recognized_institutions,
        `${LEXICON_FILES.certificateAuthenticity} recognized_institutions`,
      ),
      signingTools: requireStrings(
        authenticity.signing_tools,
        `${LEXICON_FILES.certificateAuthenticity} signing_tools`,
      ).map((tool) => tool.toLowerCase()),
    },
  });
}

export function compileTerm(label: string): LexiconTerm {
  const body = label
    .trim()
    .split(/\s+/)
    .map((part) => part.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&"))
    .join("\\s+");
  // Two-letter terms like "Go" or "MS" only count in their written case.
  const flags = label.trim().length <= 2 ? "" : "i";
  return { label: label.trim(), pattern: new RegExp(`(?<![A-Za-z0-9+#])${body}(?![A-Za-z0-9+#])`, flags) };
}

export function findLexiconTerms(text: string, terms: ReadonlyArray<LexiconTerm>): string[] {
  const found: Array<{ label: string; index: number }> = [];
  const seen = new Set<string>();
  for (const term of terms) {
    const match = term.pattern.exec(text);
    if (!match || seen.has(term.label.toLowerCase())) {
      continue;
    }
    seen.add(term.label.toLowerCase());
    found.push({ label: term.label, index: match.index });
  }
  return found.sort((left, right) => left.index - right.index).map((item) => item.label);
}

export function hasLexiconTerm(text: string, terms: ReadonlyArray<LexiconTerm>): boolean {
  return terms.some((term) => term.pattern.test(text));
}

export function normalizeFieldName(value: string): string {
  return value
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9 ]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function compileIndicators(raw: unknown): DocumentIndicators {
  const source = requireRecord(raw, LEXICON_FILES.documentIndicators);
  const indicators = requireRecord(source.indicators, `${LEXICON_FILES.documentIndicators} indicators`);
  const hints = requireRecord(source.filename_hints, `${LEXICON_FILES.documentIndicators} filename_hints`);
  const minIndicators = source.min_indicators;
  const scanChars = source.scan_chars;
  if (typeof minIndicators !== "number" || minIndicators < 1) {
    throw new ConfigurationError("lexicons", `${LEXICON_FILES.documentIndicators} min_indicators must be a positive number`);
  }
  if (typeof scanChars !== "number" || scanChars < 1) {
    throw new ConfigurationError("lexicons", `${LEXICON_FILES.documentIndicators} scan_chars must be a positive number`);
  }

  const byKind = (record: Record<string, unknown>, label: string): Record<ClassifiedKind, string[]> => ({
    resume: requireStrings(record.resume ?? [], `${label} resume`).map((word) => word.toLowerCase()),
    cover_letter: requireStrings(record.cover_letter ?? [], `${label} cover_letter`).map((word) => word.toLowerCase()),
    reference_letter: requireStrings(record.reference_letter ?? [], `${label} reference_letter`).map((word) =>
      word.toLowerCase(),
    ),
  });

  for (const key of Object.keys(indicators)) {
    if (!CLASSIFIED_KINDS.some((kind) => kind === key)) {
      throw new ConfigurationError("lexicons", `${LEXICON_FILES.documentIndicators} has unknown kind "${key}"`);
    }
  }

  return {
    minIndicators,
    scanChars,
    indicators: byKind(indicators, "indicators"),
    filenameHints: byKind(hints, "filename_hints"),
  };
}

function compileTerms(value: unknown, label: string): LexiconTerm[] {
  return requireStrings(value, label).map((item) => compileTerm(item));
}

function requireStrings(value: unknown, label: string): string[] {
  if (!isStringArray(value) || value.some((item) => !item.trim())) {
    throw new ConfigurationError("lexicons", `${label} must be an array of non-empty strings`);
  }
  return value;
}

function requireRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigurationError("lexicons", `${label} must be an object`);
  }
  return value;
}

async function readJson(dir: string, fileName: string): Promise<unknown> {
  const filePath = path.join(dir, fileName);
  try {
    const raw = await readFile(filePath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ConfigurationError("lexicons", `cannot read ${filePath}: ${errorMessage(error)}`);
  }
}
