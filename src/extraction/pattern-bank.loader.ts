import { readFile } from "node:fs/promises";
import path from "node:path";
import { ConfigurationError, errorMessage } from "../shared/errors";
import { DOCUMENT_KINDS, isDocumentKind, type DocumentKind } from "../shared/types/document.types";
import type {
  ComputedOperation,
  ComputedRule,
  FallbackHeuristicName,
  FallbackRule,
  FieldShape,
  FieldSpec,
  LogicalCheck,
  MatchRule,
  PatternBank,
  PatternBankRegistry,
  SectionParserName,
} from "../shared/types/pattern-bank.types";
import type { AnomalyType } from "../shared/types/validation.types";
import { DATE_PATTERN_SOURCE } from "../shared/utils/dates";
import { deepFreeze, isPositiveInteger, isRecord, isStringArray } from "../shared/utils/records";

const FIELD_SHAPES: ReadonlyArray<FieldShape> = [
  "text",
  "name",
  "identifier",
  "email",
  "phone",
  "contact",
  "handle",
  "amount",
  "number",
  "duration",
  "date",
  "list",
];
const SECTION_PARSERS: ReadonlyArray<SectionParserName> = [
  "education_entries",
  "experience_entries",
  "line_items",
  "comma_items",
  "technical_skills",
  "soft_skills",
];
const FALLBACK_HEURISTICS: ReadonlyArray<FallbackHeuristicName> = [
  "largest_amount_in_last_lines",
  "first_capitalized_line",
  "earliest_date",
  "latest_date",
  "technical_skills_anywhere",
  "soft_skills_anywhere",
];
const COMPUTED_OPERATIONS: ReadonlyArray<ComputedOperation> = ["sum", "difference", "years_between"];
const ANOMALY_TYPES: ReadonlyArray<AnomalyType> = [
  "dates_illogical",
  "start_date_in_future",
  "start_date_implausible",
  "earnings_mismatch",
  "net_pay_mismatch",
  "gpa_out_of_range",
  "missing_contact",
  "experience_dates_illogical",
];

export const BUILTIN_MACROS: Readonly<Record<string, string>> = {
  DATE: `(?<value>(?:${DATE_PATTERN_SOURCE}))\\b`,
  AMOUNT: "(?<value>\\d+(?:\\.\\d{1,2})?)\\b",
  EMAIL: "(?<value>[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Za-z]{2,})",
  PHONE: "(?<value>(?:\\+\\d{1,3}[\\s-]?)?(?:\\(\\d{2,5}\\)[\\s-]?)?\\d{3,5}(?:[\\s.-]?\\d{2,5}){1,3})",
};

const MACRO_REFERENCE = /\{\{([A-Z_]+)\}\}/g;
const DEFAULT_FLAGS = "i";

export async function loadPatternBank(kind: DocumentKind, dir: string): Promise<PatternBank> {
  const filePath = path.join(dir, `${kind}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(kind, `cannot read ${filePath}: ${errorMessage(error)}`);
  }
  return compilePatternBank(kind, raw);
}

export async function loadPatternBanks(dir: string): Promise<PatternBankRegistry> {
  const registry = new Map<DocumentKind, PatternBank>();
  for (const kind of DOCUMENT_KINDS) {
    registry.set(kind, await loadPatternBank(kind, dir));
  }
  return registry;
}

export function compilePatternBank(kind: string, raw: unknown): PatternBank {
  if (!isDocumentKind(kind)) {
    throw new ConfigurationError("unknown", `unknown document kind "${kind}"`);
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(kind, "bank must be a JSON object");
  }
  if (raw.kind !== kind) {
    throw new ConfigurationError(kind, `bank declares kind "${String(raw.kind)}"`);
  }
  if (typeof raw.version !== "string" || !raw.version.trim()) {
    throw new ConfigurationError(kind, "missing version");
  }

  const macros = readMacros(kind, raw.macros);
  if (!Array.isArray(raw.fields) || raw.fields.length === 0) {
    throw new ConfigurationError(kind, "fields must be a non-empty array");
  }

  const rawFields: ReadonlyArray<unknown> = raw.fields;
  const fields: FieldSpec[] = [];
  const names = new Set<string>();
  for (const rawField of rawFields) {
    const field = compileField(kind, rawField, macros);
    if (names.has(field.name)) {
      throw new ConfigurationError(kind, `duplicate field "${field.name}"`);
    }
    names.add(field.name);
    fields.push(field);
  }

  for (const field of fields) {
    for (const rule of field.computed) {
      for (const input of [...rule.inputs, ...rule.optionalInputs]) {
        if (!names.has(input) || input === field.name) {
          throw new ConfigurationError(kind, `field "${field.name}" rule "${rule.id}" reads unknown field "${input}"`);
        }
      }
    }
  }

  const checks = readChecks(kind, raw.checks, names);
  const sectionNames = raw.sections === undefined ? [] : raw.sections;
  if (!isStringArray(sectionNames)) {
    throw new ConfigurationError(kind, "sections must be an array of strings");
  }
  const sections = new Set(sectionNames.map((section) => section.toLowerCase().trim()));
  for (const field of fields) {
    for (const rule of field.rules) {
      if (rule.type === "section") {
        rule.headings.forEach((heading) => sections.add(heading));
      }
    }
  }

  return deepFreeze({
    kind,
    version: raw.version.trim(),
    sections: Array.from(sections),
    fields,
    checks,
  });
}

function compileField(kind: DocumentKind, raw: unknown, macros: Record<string, string>): FieldSpec {
  if (!isRecord(raw) || typeof raw.name !== "string" || !raw.name.trim()) {
    throw new ConfigurationError(kind, "every field needs a name");
  }
  const name = raw.name.trim();
  const fail = (detail: string): never => {
    throw new ConfigurationError(kind, `field "${name}": ${detail}`);
  };

  const shape = FIELD_SHAPES.find((item) => item === raw.shape) ?? fail(`unknown shape "${String(raw.shape)}"`);
  if (raw.required !== undefined && typeof raw.required !== "boolean") {
    fail("required must be a boolean");
  }
  const rulesRaw = raw.rules ?? [];
  const fallbacksRaw = raw.fallbacks ?? [];
  if (!Array.isArray(rulesRaw) || !Array.isArray(fallbacksRaw)) {
    return fail("rules and fallbacks must be arrays");
  }
  const rawRules: ReadonlyArray<unknown> = rulesRaw;
  const rawFallbacks: ReadonlyArray<unknown> = fallbacksRaw;

  const rules: MatchRule[] = [];
  const computed: ComputedRule[] = [];
  for (const rawRule of rawRules) {
    if (!isRecord(rawRule)) {
      return fail("rule must be an object");
    }
    const id = typeof rawRule.id === "string" && rawRule.id.trim() ? rawRule.id.trim() : fail("rule without id");
    const ruleFail = (detail: string): never => fail(`rule "${id}": ${detail}`);

    switch (rawRule.type) {
      case "pattern": {
        const source = typeof rawRule.regex === "string" ? rawRule.regex : ruleFail("regex must be a string");
        const scopeLines = rawRule.scopeLines ?? null;
        if (scopeLines !== null && !isPositiveInteger(scopeLines)) {
          ruleFail("scopeLines must be a positive integer");
        }
        rules.push({
          type: "pattern",
          id,
          regex: compileRegex(source, readFlags(rawRule.flags, ruleFail), true, macros, ruleFail),
          scopeLines: isPositiveInteger(scopeLines) ? scopeLines : null,
        });
        break;
      }
      case "keyword_window": {
        const keywords = rawRule.keywords;
        if (!isStringArray(keywords) || keywords.length === 0) {
          return ruleFail("keywords must be a non-empty array of strings");
        }
        const window = isPositiveInteger(rawRule.window) ? rawRule.window : ruleFail("window must be a positive integer");
        const capture = typeof rawRule.capture === "string" ? rawRule.capture : ruleFail("capture must be a string");
        rules.push({
          type: "keyword_window",
          id,
          keywords: keywords.map((keyword) => keyword.trim()),
          window,
          capture: compileRegex(capture, readFlags(rawRule.flags, ruleFail), false, macros, ruleFail),
        });
        break;
      }
      case "section": {
        const headings = rawRule.headings;
        if (!isStringArray(headings) || headings.length === 0) {
          return ruleFail("headings must be a non-empty array of strings");
        }
        const parser =
          SECTION_PARSERS.find((item) => item === rawRule.parser) ?? ruleFail(`unknown parser "${String(rawRule.parser)}"`);
        rules.push({
          type: "section",
          id,
          headings: headings.map((heading) => heading.toLowerCase().trim()),
          parser,
        });
        break;
      }
      case "computed": {
        const operation =
          COMPUTED_OPERATIONS.find((item) => item === rawRule.operation) ??
          ruleFail(`unknown operation "${String(rawRule.operation)}"`);
        const inputs = rawRule.inputs;
        const optionalInputs = rawRule.optionalInputs ?? [];
        if (!isStringArray(inputs) || inputs.length === 0 || !isStringArray(optionalInputs)) {
          return ruleFail("inputs must be a non-empty array of field names");
        }
        if (operation === "years_between" && (inputs.length !== 2 || optionalInputs.length > 0)) {
          ruleFail("years_between takes exactly two inputs");
        }
        if (operation === "difference" && inputs.length < 2) {
          ruleFail("difference takes at least two inputs");
        }
        computed.push({ type: "computed", id, operation, inputs, optionalInputs });
        break;
      }
      default:
        ruleFail(`unknown rule type "${String(rawRule.type)}"`);
    }
  }

  const fallbacks: FallbackRule[] = rawFallbacks.map((rawFallback) => {
    if (!isRecord(rawFallback)) {
      return fail("fallback must be an object");
    }
    const heuristic =
      FALLBACK_HEURISTICS.find((item) => item === rawFallback.heuristic) ??
      fail(`unknown fallback heuristic "${String(rawFallback.heuristic)}"`);
    const lines = rawFallback.lines ?? null;
    if (lines !== null && !isPositiveInteger(lines)) {
      fail(`fallback "${heuristic}" lines must be a positive integer`);
    }
    return { heuristic, lines: isPositiveInteger(lines) ? lines : null };
  });

  return {
    name,
    shape,
    required: raw.required !== false,
    rules,
    fallbacks,
    computed,
  };
}

function readMacros(kind: DocumentKind, raw: unknown): Record<string, string> {
  const macros: Record<string, string> = { ...BUILTIN_MACROS };
  if (raw === undefined) {
    return macros;
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(kind, "macros must be an object");
  }
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value !== "string") {
      throw new ConfigurationError(kind, `macro "${name}" must be a string`);
    }
    macros[name] = value;
  }
  return macros;
}

function readFlags(raw: unknown, fail: (detail: string) => never): string {
  if (raw === undefined) {
    return DEFAULT_FLAGS;
  }
  if (typeof raw !== "string" || !/^[imsu]*$/.test(raw)) {
    return fail(`flags must use only i, m, s or u`);
  }
  return raw;
}

function compileRegex(
  source: string,
  flags: string,
  global: boolean,
  macros: Record<string, string>,
  fail: (detail: string) => never,
): RegExp {
  const expanded = source.replace(MACRO_REFERENCE, (_match, name: string) => {
    const macro = macros[name];
    return macro === undefined ? fail(`undefined macro "{{${name}}}"`) : macro;
  });
  try {
    return new RegExp(expanded, global ? `${flags}g` : flags);
  } catch (error) {
    return fail(`invalid regex: ${errorMessage(error)}`);
  }
}

function readChecks(kind: DocumentKind, raw: unknown, names: ReadonlySet<string>): LogicalCheck[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ConfigurationError(kind, "checks must be an array");
  }

  const rawChecks: ReadonlyArray<unknown> = raw;
  const seen = new Set<string>();
  return rawChecks.map((rawCheck): LogicalCheck => {
    if (!isRecord(rawCheck) || typeof rawCheck.name !== "string" || !rawCheck.name.trim()) {
      throw new ConfigurationError(kind, "every check needs a name");
    }
    const name = rawCheck.name.trim();
    const fail = (detail: string): never => {
      throw new ConfigurationError(kind, `check "${name}": ${detail}`);
    };
    if (seen.has(name)) {
      fail("duplicate check name");
    }
    seen.add(name);

    const anomaly =
      ANOMALY_TYPES.find((item) => item === rawCheck.anomaly) ?? fail(`unknown anomaly "${String(rawCheck.anomaly)}"`);
    const field = (key: string): string => {
      const value = rawCheck[key];
      return typeof value === "string" && names.has(value) ? value : fail(`${key} must name a known field`);
    };
    const fieldList = (key: string): string[] => {
      const value = rawCheck[key];
      if (!isStringArray(value) || value.length === 0 || value.some((item) => !names.has(item))) {
        return fail(`${key} must list known fields`);
      }
      return value;
    };

    switch (rawCheck.type) {
      case "date_order":
        return { name, anomaly, type: "date_order", start: field("start"), end: field("end") };
      case "sum_equals":
        return { name, anomaly, type: "sum_equals", items: fieldList("items"), total: field("total") };
      case "difference_equals":
        return {
          name,
          anomaly,
          type: "difference_equals",
          minuend: field("minuend"),
          subtrahend: field("subtrahend"),
          result: field("result"),
        };
      case "range": {
        const min = typeof rawCheck.min === "number" ? rawCheck.min : fail("min must be a number");
        const max = rawCheck.max ?? null;
        if (max !== null && typeof max !== "number") {
          fail("max must be a number or null");
        }
        return { name, anomaly, type: "range", field: field("field"), min, max: typeof max === "number" ? max : null };
      }
      case "date_window": {
        const bound = (key: string): number | null => {
          const value = rawCheck[key];
          if (value === undefined || value === null) {
            return null;
          }
          if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
            return fail(`${key} must be a non-negative number or null`);
          }
          return value;
        };
        const maxYearsBefore = bound("max_years_before");
        const maxYearsAfter = bound("max_years_after");
        if (maxYearsBefore === null && maxYearsAfter === null) {
          fail("max_years_before or max_years_after is required");
        }
        return { name, anomaly, type: "date_window", field: field("field"), maxYearsBefore, maxYearsAfter };
      }
      case "any_present":
        return { name, anomaly, type: "any_present", fields: fieldList("fields") };
      case "entries_date_order":
        return { name, anomaly, type: "entries_date_order", field: field("field") };
      default:
        return fail(`unknown check type "${String(rawCheck.type)}"`);
    }
  });
}
