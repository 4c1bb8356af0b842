import type { EducationEntry, ExperienceEntry, ListItem } from "../../shared/types/extraction.types";
import type { SectionParserName } from "../../shared/types/pattern-bank.types";
import { findDateRange } from "../../shared/utils/dates";
import { findLexiconTerms, hasLexiconTerm, type Lexicons } from "../lexicons";

const BULLET_PREFIX = /^(?:[-*•▪●◦]|\d{1,2}[.)])\s+/;
const INSTITUTION_WORD = /\b(?:university|college|institute|school|academy|polytechnic|vidyapeeth)\b/i;
const DEGREE_PHRASE =
  /\b((?:bachelor|master|doctor)(?:'?s)?(?:\s+of\s+[A-Za-z]+)?|diploma|b\.?\s?tech|m\.?\s?tech|b\.e\.|m\.e\.|b\.?sc|m\.?sc|b\.?com|m\.?com|mba|bba|bca|mca|ph\.?\s?d\.?)(?![A-Za-z])(?:\s*(?:in|of)\s+([A-Za-z&][A-Za-z& ]{1,60}))?/i;
const GPA_PHRASE = /\b(?:cgpa|gpa|cpi)\s*[:=-]?\s*(\d{1,2}(?:\.\d{1,2})?)/i;
const COMPANY_SUFFIX = /\b(?:pvt\.?\s+ltd\.?|private\s+limited|ltd\.?|limited|inc\.?|llc|llp|corporation|corp\.?|technologies|solutions|systems|labs|group)$/i;
const HEADER_AT = /\s+(?:at|@)\s+/i;
const HEADER_SEPARATOR = /\s*[|,]\s*|\s+[-–]\s+/;

export function parseSection(
  parser: SectionParserName,
  lines: ReadonlyArray<string>,
  lexicons: Lexicons,
): ListItem[] {
  switch (parser) {
    case "education_entries":
      return parseEducationEntries(lines);
    case "experience_entries":
      return parseExperienceEntries(lines, lexicons);
    case "line_items":
      return parseLineItems(lines);
    case "comma_items":
      return parseCommaItems(lines);
    case "technical_skills":
      return findLexiconTerms(lines.join("\n"), lexicons.technicalSkills);
    case "soft_skills":
      return findLexiconTerms(lines.join("\n"), lexicons.softSkills);
  }
}

export function parseEducationEntries(lines: ReadonlyArray<string>): EducationEntry[] {
  const entries: EducationEntry[] = [];
  let current: EducationEntry | null = null;

  for (const rawLine of lines) {
    const line = stripBullet(rawLine);
    const found = readEducationLine(line);
    if (!hasAny(found)) {
      continue;
    }
    if (current && conflicts(current, found)) {
      entries.push(current);
      current = null;
    }
    current = mergeSlots(current ?? emptyEducationEntry(), found);
  }
  if (current) {
    entries.push(current);
  }
  return entries;
}

export function parseExperienceEntries(lines: ReadonlyArray<string>, lexicons: Lexicons): ExperienceEntry[] {
  const entries: ExperienceEntry[] = [];
  let current: ExperienceEntry | null = null;

  for (const rawLine of lines) {
    if (BULLET_PREFIX.test(rawLine)) {
      const achievement = stripBullet(rawLine);
      if (achievement) {
        current = current ?? emptyExperienceEntry();
        current.achievements.push(achievement);
      }
      continue;
    }

    const header = readExperienceHeader(rawLine, lexicons);
    if (!header.title && !header.company && !header.dates) {
      if (current) {
        current.achievements.push(rawLine);
      }
      continue;
    }

    if (current && (current.achievements.length > 0 || conflicts(current, header))) {
      entries.push(current);
      current = null;
    }
    const base: ExperienceEntry = current ?? emptyExperienceEntry();
    current = {
      company: base.company ?? header.company,
      title: base.title ?? header.title,
      dates: base.dates ?? header.dates,
      achievements: base.achievements,
    };
  }
  if (current) {
    entries.push(current);
  }
  return entries;
}

export function parseLineItems(lines: ReadonlyArray<string>): string[] {
  return lines.map((line) => stripBullet(line)).filter((line) => line.length > 2 && line.length < 200);
}

export function parseCommaItems(lines: ReadonlyArray<string>): string[] {
  const items: string[] = [];
  for (const line of lines) {
    for (const part of stripBullet(line).split(/\s*(?:[,;|/]|\band\b)\s*/i)) {
      const item = part.replace(/\s*\([^)]*\)\s*/g, " ").replace(/\s*[-:].*$/, "").trim();
      if (item.length >= 2 && item.length < 50 && !items.includes(item)) {
        items.push(item);
      }
    }
  }
  return items;
}

function readEducationLine(line: string): Partial<EducationEntry> {
  const found: Partial<EducationEntry> = {};
  const range = findDateRange(line);
  const yearOnly = range ? null : line.match(/\b(?:19|20)\d{2}\b/);
  if (range) {
    found.dates = range.raw;
  } else if (yearOnly) {
    found.dates = yearOnly[0];
  }

  const gpa = line.match(GPA_PHRASE);
  if (gpa) {
    found.gpa = gpa[1];
  }

  const segments = line.split(/\s*[|,;]\s*|\s+[-–]\s+/).filter((segment) => segment.length > 0);
  const institution = segments.find((segment) => INSTITUTION_WORD.test(segment) && !DEGREE_PHRASE.test(segment));
  if (institution) {
    found.institution = institution.replace(/\s*\(?(?:19|20)\d{2}.*$/, "").trim();
  }

  const degree = line.match(DEGREE_PHRASE);
  if (degree) {
    found.degree = degree[1].trim();
    if (degree[2]) {
      found.field = degree[2].replace(/\b(?:with|from|at)\b.*$/i, "").trim();
    }
  }
  return found;
}

function readExperienceHeader(line: string, lexicons: Lexicons): Pick<ExperienceEntry, "company" | "title" | "dates"> {
  const range = findDateRange(line);
  const dates = range ? range.raw : null;
  const rest = (range ? line.slice(0, range.index) + line.slice(range.index + range.raw.length) : line)
    .replace(/[()]/g, " ")
    .replace(/^[\s|,–-]+|[\s|,–-]+$/g, "")
    .replace(/\s+/g, " ")
    .trim();

  if (!rest) {
    return { company: null, title: null, dates };
  }

  const isRole = (value: string): boolean => hasLexiconTerm(value, lexicons.seniority.roleWords);

  const atSplit = rest.split(HEADER_AT);
  if (atSplit.length === 2) {
    return { title: atSplit[0].trim(), company: atSplit[1].trim(), dates };
  }

  const parts = rest.split(HEADER_SEPARATOR).filter((part) => part.length > 0);
  if (parts.length >= 2) {
    const titleIndex = parts.findIndex((part) => isRole(part));
    if (titleIndex >= 0) {
      const company = parts.find((_part, index) => index !== titleIndex) ?? null;
      return { title: parts[titleIndex], company, dates };
    }
    return { title: parts[0], company: parts[1], dates };
  }

  if (isRole(rest) && rest.split(" ").length <= 6) {
    return { title: rest, company: null, dates };
  }
  if (COMPANY_SUFFIX.test(rest) || dates) {
    return { title: null, company: rest, dates };
  }
  return { title: null, company: null, dates: null };
}

function stripBullet(line: string): string {
  return line.replace(BULLET_PREFIX, "").trim();
}

function hasAny<T extends object>(found: Partial<T>): boolean {
  return Object.values(found).some((value) => value !== undefined && value !== null);
}

function conflicts(current: object, found: object): boolean {
  const existing = new Map<string, unknown>(Object.entries(current));
  return Object.entries(found).some(
    ([key, value]) => value !== undefined && value !== null && !Array.isArray(value) && existing.get(key) !== null,
  );
}

function mergeSlots(current: EducationEntry, found: Partial<EducationEntry>): EducationEntry {
  return {
    institution: current.institution ?? found.institution ?? null,
    degree: current.degree ?? found.degree ?? null,
    field: current.field ?? found.field ?? null,
    dates: current.dates ?? found.dates ?? null,
    gpa: current.gpa ?? found.gpa ?? null,
  };
}

function emptyEducationEntry(): EducationEntry {
  return { institution: null, degree: null, field: null, dates: null, gpa: null };
}

function emptyExperienceEntry(): ExperienceEntry {
  return { company: null, title: null, dates: null, achievements: [] };
}
