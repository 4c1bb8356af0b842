import path from "node:path";
import type { Logger } from "../config/logger";
import { loadLexicons, type Lexicons } from "../extraction/lexicons";
import { loadPatternBanks } from "../extraction/pattern-bank.loader";
import type { DocumentKind } from "../shared/types/document.types";
import type {
  EducationEntry,
  ExperienceEntry,
  FieldExtraction,
  FieldExtractionResult,
  FieldValue,
} from "../shared/types/extraction.types";
import type { PatternBank, PatternBankRegistry } from "../shared/types/pattern-bank.types";

export const PATTERN_BANK_DIR = path.resolve(__dirname, "../../config/pattern-banks");
export const LEXICON_DIR = path.resolve(__dirname, "../../config/lexicons");

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface Fixtures {
  banks: PatternBankRegistry;
  lexicons: Lexicons;
}

let fixtures: Promise<Fixtures> | null = null;

export function loadFixtures(): Promise<Fixtures> {
  if (!fixtures) {
    fixtures = (async () => ({
      banks: await loadPatternBanks(PATTERN_BANK_DIR),
      lexicons: await loadLexicons(LEXICON_DIR),
    }))();
  }
  return fixtures;
}

export function bankFor(registry: PatternBankRegistry, kind: DocumentKind): PatternBank {
  const bank = registry.get(kind);
  if (!bank) {
    throw new Error(`bank ${kind} not loaded`);
  }
  return bank;
}

export function extracted(value: FieldValue): FieldExtraction {
  if (value === null) {
    return { value: null, raw_matches: [], extraction_method: "unresolved", rule_id: null };
  }
  return {
    value,
    raw_matches: typeof value === "string" || typeof value === "number" ? [String(value)] : [],
    extraction_method: "explicit_pattern",
    rule_id: "test_rule",
  };
}

export function resultOf(kind: DocumentKind, values: Record<string, FieldValue>): FieldExtractionResult {
  const fields: Record<string, FieldExtraction> = {};
  for (const [name, value] of Object.entries(values)) {
    fields[name] = extracted(value);
  }
  return { kind, bank_version: "2024.06.1", fields };
}

export function experienceEntry(
  title: string | null,
  company: string | null,
  dates: string | null,
  achievements: string[] = [],
): ExperienceEntry {
  return { company, title, dates, achievements };
}

export function educationEntry(
  degree: string | null,
  field: string | null,
  overrides: Partial<EducationEntry> = {},
): EducationEntry {
  return { institution: null, degree, field, dates: null, gpa: null, ...overrides };
}
