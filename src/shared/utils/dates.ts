import { round2 } from "./scoring.util";

const MONTH_NAMES: Record<string, number> = {
  january: 1,
  jan: 1,
  february: 2,
  feb: 2,
  march: 3,
  mar: 3,
  april: 4,
  apr: 4,
  may: 5,
  june: 6,
  jun: 6,
  july: 7,
  jul: 7,
  august: 8,
  aug: 8,
  september: 9,
  sept: 9,
  sep: 9,
  october: 10,
  oct: 10,
  november: 11,
  nov: 11,
  december: 12,
  dec: 12,
};

const MS_PER_DAY = 86_400_000;

export const DATE_PATTERN_SOURCE = [
  "\\d{4}[-/.]\\d{1,2}[-/.]\\d{1,2}",
  "\\d{1,2}[-/.]\\d{1,2}[-/.]\\d{4}",
  "\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?[A-Za-z]{3,9}\\.?,?\\s+\\d{4}",
  "[A-Za-z]{3,9}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}",
  "[A-Za-z]{3,9}\\.?,?\\s+\\d{4}",
].join("|");

const MONTH_PREFIX =
  "(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?\\s+";
const RANGE_ENDPOINT = `(?:${MONTH_PREFIX})?(?:\\d{1,2}/)?(?:19|20)\\d{2}`;
const OPEN_END_SOURCE = "present|current|now|till\\s+date|to\\s+date|ongoing";
const DATE_RANGE_PATTERN = new RegExp(
  `\\b(${RANGE_ENDPOINT})\\s*(?:-|–|—|\\bto\\b|\\buntil\\b|\\btill\\b)\\s*(${RANGE_ENDPOINT}|${OPEN_END_SOURCE}|date)\\b`,
  "i",
);
const OPEN_END = new RegExp(`^(?:${OPEN_END_SOURCE}|date)$`, "i");
const RANGE_SEPARATORS = [/\s+(?:to|until|till)\s+/i, /\s*[–—]\s*/, /\s+-\s+/];

export interface FoundDate {
  raw: string;
  iso: string;
  index: number;
}

export interface DateRange {
  start: string;
  end: string | null;
  open: boolean;
}

export interface FoundDateRange {
  raw: string;
  index: number;
  range: DateRange;
}

export function toIsoDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 1900 || year > 2100 || month < 1 || month > 12 || day < 1) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

export function parseDate(raw: string): string | null {
  const value = raw.trim().replace(/\s+/g, " ");
  if (!value) {
    return null;
  }

  const isoMatch = value.match(/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/);
  if (isoMatch) {
    return toIsoDate(Number(isoMatch[1]), Number(isoMatch[2]), Number(isoMatch[3]));
  }

  const numericMatch = value.match(/^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/);
  if (numericMatch) {
    const first = Number(numericMatch[1]);
    const second = Number(numericMatch[2]);
    const year = Number(numericMatch[3]);
    if (second > 12 && first <= 12) {
      return toIsoDate(year, first, second);
    }
    return toIsoDate(year, second, first);
  }

  const dayMonthMatch = value.match(/^(\d{1,2})(?:st|nd|rd|th)?\s+(?:of\s+)?([A-Za-z]{3,9})\.?,?\s+(\d{4})$/i);
  if (dayMonthMatch) {
    return withMonthName(dayMonthMatch[2], Number(dayMonthMatch[3]), Number(dayMonthMatch[1]));
  }

  const monthDayMatch = value.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i);
  if (monthDayMatch) {
    return withMonthName(monthDayMatch[1], Number(monthDayMatch[3]), Number(monthDayMatch[2]));
  }

  const monthYearMatch = value.match(/^([A-Za-z]{3,9})\.?,?\s+(\d{4})$/i);
  if (monthYearMatch) {
    return withMonthName(monthYearMatch[1], Number(monthYearMatch[2]), 1);
  }

  const slashMonthYear = value.match(/^(\d{1,2})[/-](\d{4})$/);
  if (slashMonthYear) {
    return toIsoDate(Number(slashMonthYear[2]), Number(slashMonthYear[1]), 1);
  }

  return null;
}

export function findDates(text: string): FoundDate[] {
  const found: FoundDate[] = [];
  const regex = new RegExp(`\\b(?:${DATE_PATTERN_SOURCE})\\b`, "g");
  for (const match of text.matchAll(regex)) {
    const iso = parseDate(match[0]);
    if (iso && match.index !== undefined) {
      found.push({ raw: match[0], iso, index: match.index });
    }
  }
  return found;
}

export function parseDateRange(raw: string): DateRange | null {
  const cleaned = raw.replace(/[()]/g, " ").replace(/\s+/g, " ").trim();
  if (!cleaned) {
    return null;
  }

  for (const separator of RANGE_SEPARATORS) {
    const match = cleaned.match(separator);
    if (!match || match.index === undefined) {
      continue;
    }
    const range = buildRange(cleaned.slice(0, match.index), cleaned.slice(match.index + match[0].length));
    if (range) {
      return range;
    }
  }

  for (let index = cleaned.indexOf("-"); index >= 0; index = cleaned.indexOf("-", index + 1)) {
    const range = buildRange(cleaned.slice(0, index), cleaned.slice(index + 1));
    if (range) {
      return range;
    }
  }

  return null;
}

export function findDateRange(text: string): FoundDateRange | null {
  const match = text.match(DATE_RANGE_PATTERN);
  if (!match || match.index === undefined) {
    return null;
  }
  const range = parseDateRange(match[0]);
  if (!range) {
    return null;
  }
  return { raw: match[0], index: match.index, range };
}

export function resolveRangeEnd(range: DateRange, asOf: string | null): string | null {
  if (range.end) {
    return range.end;
  }
  return range.open ? asOf : null;
}

export function compareIsoDates(left: string, right: string): number {
  return isoToUtc(left) - isoToUtc(right);
}

export function daysBetween(startIso: string, endIso: string): number {
  return Math.round((isoToUtc(endIso) - isoToUtc(startIso)) / MS_PER_DAY);
}

export function yearsBetween(startIso: string, endIso: string): number {
  return round2(daysBetween(startIso, endIso) / 365.25);
}

export function monthsBetween(startIso: string, endIso: string): number {
  return round2(daysBetween(startIso, endIso) / 30.4375);
}

function buildRange(left: string, right: string): DateRange | null {
  const start = parseRangeEndpoint(left);
  if (!start) {
    return null;
  }
  const rightTrimmed = right.trim();
  if (OPEN_END.test(rightTrimmed)) {
    return { start, end: null, open: true };
  }
  const end = parseRangeEndpoint(rightTrimmed);
  if (!end) {
    return null;
  }
  return { start, end, open: false };
}

function parseRangeEndpoint(value: string): string | null {
  const trimmed = value.trim();
  const parsed = parseDate(trimmed);
  if (parsed) {
    return parsed;
  }
  const yearOnly = trimmed.match(/^(\d{4})$/);
  if (yearOnly) {
    return toIsoDate(Number(yearOnly[1]), 1, 1);
  }
  return null;
}

function withMonthName(monthName: string, year: number, day: number): string | null {
  const month = MONTH_NAMES[monthName.toLowerCase()];
  if (month === undefined) {
    return null;
  }
  return toIsoDate(year, month, day);
}

function isoToUtc(iso: string): number {
  const [year, month, day] = iso.split("-").map((part) => Number(part));
  return Date.UTC(year, month - 1, day);
}

function pad2(value: number): string {
  return value < 10 ? `0${value}` : String(value);
}
