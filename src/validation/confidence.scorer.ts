import type { GpaScale } from "../config/env";
import type { FieldExtraction, FieldExtractionResult } from "../shared/types/extraction.types";
import { isExperienceEntry } from "../shared/types/extraction.types";
import type { LogicalCheck, PatternBank } from "../shared/types/pattern-bank.types";
import type { ValidationAnomaly, ValidationReport } from "../shared/types/validation.types";
import { compareIsoDates, daysBetween, parseDate, parseDateRange } from "../shared/utils/dates";
import { clampScore, round2 } from "../shared/utils/scoring.util";
import { isValidShape } from "./field-shape.validators";

export const DEFAULT_EARNINGS_TOLERANCE = 1.0;
export const DEFAULT_GPA_SCALE: GpaScale = 10;
const DAYS_PER_YEAR = 365.25;

export interface ValidationOptions {
  earningsTolerance?: number;
  gpaScale?: GpaScale;
  // ISO date that date_window checks measure against; defaults to today (UTC).
  asOf?: string;
}

type CheckOutcome = { passed: true } | { passed: false; description: string };

export function validateFields(
  bank: PatternBank,
  result: FieldExtractionResult,
  options: ValidationOptions = {},
): ValidationReport {
  const tolerance = options.earningsTolerance ?? DEFAULT_EARNINGS_TOLERANCE;
  const gpaScale = options.gpaScale ?? DEFAULT_GPA_SCALE;
  const asOf = options.asOf ?? todayIso();
  const perFieldValidity: Record<string, boolean> = {};
  const anomalies: ValidationAnomaly[] = [];
  let requiredCount = 0;
  let validRequired = 0;

  for (const field of bank.fields) {
    const extraction = result.fields[field.name];
    const value = extraction ? extraction.value : null;
    const valid = isValidShape(field.shape, value);
    perFieldValidity[field.name] = valid;

    if (field.required) {
      requiredCount += 1;
      if (valid) {
        validRequired += 1;
      }
    }
    if (value === null && field.required) {
      anomalies.push({
        type: "missing_required_field",
        field: field.name,
        description: `Required field ${field.name} could not be extracted`,
      });
    } else if (value !== null && !valid) {
      anomalies.push({
        type: "invalid_field_shape",
        field: field.name,
        description: `Field ${field.name} does not look like a valid ${field.shape}: ${describeValue(value)}`,
      });
    }
  }

  const logicalChecks: Record<string, boolean> = {};
  let passedChecks = 0;
  for (const check of bank.checks) {
    const outcome = evaluateCheck(check, result.fields, tolerance, gpaScale, asOf);
    logicalChecks[check.name] = outcome.passed;
    if (outcome.passed) {
      passedChecks += 1;
    } else {
      anomalies.push({ type: check.anomaly, check: check.name, description: outcome.description });
    }
  }

  return {
    per_field_validity: perFieldValidity,
    logical_checks: logicalChecks,
    anomalies,
    confidence_score: computeConfidence(validRequired + passedChecks, requiredCount + bank.checks.length),
  };
}

export function computeConfidence(satisfied: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return clampScore(round2((100 * satisfied) / total));
}

export function evaluateCheck(
  check: LogicalCheck,
  fields: Readonly<Record<string, FieldExtraction>>,
  tolerance: number,
  gpaScale: GpaScale,
  asOf: string = todayIso(),
): CheckOutcome {
  const numberOf = (name: string): number | null => {
    const value = fields[name]?.value;
    return typeof value === "number" && Number.isFinite(value) ? value : null;
  };
  const dateOf = (name: string): string | null => {
    const value = fields[name]?.value;
    return typeof value === "string" ? parseDate(value) : null;
  };

  switch (check.type) {
    case "date_order": {
      const start = dateOf(check.start);
      const end = dateOf(check.end);
      if (!start || !end) {
        return missingInputs(check.name, [check.start, check.end].filter((name) => !dateOf(name)));
      }
      if (compareIsoDates(start, end) < 0) {
        return { passed: true };
      }
      return { passed: false, description: `${check.start} ${start} is not before ${check.end} ${end}` };
    }
    case "sum_equals": {
      const inputs = [...check.items, check.total];
      const absent = inputs.filter((name) => numberOf(name) === null);
      if (absent.length > 0) {
        return missingInputs(check.name, absent);
      }
      const total = numberOf(check.total) ?? 0;
      const items = check.items.map((name) => numberOf(name) ?? 0);
      const sum = round2(items.reduce((accumulator, value) => accumulator + value, 0));
      if (Math.abs(sum - total) <= tolerance) {
        return { passed: true };
      }
      return {
        passed: false,
        description: `Itemized ${check.items.join(" + ")} = ${sum} differs from ${check.total} ${total} by more than ${tolerance}`,
      };
    }
    case "difference_equals": {
      const minuend = numberOf(check.minuend);
      const subtrahend = numberOf(check.subtrahend);
      const expected = numberOf(check.result);
      if (minuend === null || subtrahend === null || expected === null) {
        const inputs = [check.minuend, check.subtrahend, check.result];
        return missingInputs(check.name, inputs.filter((name) => numberOf(name) === null));
      }
      const difference = round2(minuend - subtrahend);
      if (Math.abs(difference - expected) <= tolerance) {
        return { passed: true };
      }
      return {
        passed: false,
        description: `${check.minuend} - ${check.subtrahend} = ${difference} differs from ${check.result} ${expected} by more than ${tolerance}`,
      };
    }
    case "range": {
      const value = numberOf(check.field);
      if (value === null) {
        return missingInputs(check.name, [check.field]);
      }
      const max = check.max ?? gpaScale;
      if (value >= check.min && value <= max) {
        return { passed: true };
      }
      return { passed: false, description: `${check.field} ${value} is outside ${check.min}-${max}` };
    }
    case "date_window": {
      const date = dateOf(check.field);
      if (!date) {
        return missingInputs(check.name, [check.field]);
      }
      const daysAfter = daysBetween(asOf, date);
      if (check.maxYearsAfter !== null && daysAfter > check.maxYearsAfter * DAYS_PER_YEAR) {
        return {
          passed: false,
          description:
            check.maxYearsAfter === 0
              ? `${check.field} ${date} is after ${asOf}`
              : `${check.field} ${date} is more than ${check.maxYearsAfter} years after ${asOf}`,
        };
      }
      if (check.maxYearsBefore !== null && -daysAfter > check.maxYearsBefore * DAYS_PER_YEAR) {
        return {
          passed: false,
          description: `${check.field} ${date} is more than ${check.maxYearsBefore} years before ${asOf}`,
        };
      }
      return { passed: true };
    }
    case "any_present": {
      const present = check.fields.some((name) => {
        const value = fields[name]?.value;
        return value !== null && value !== undefined;
      });
      if (present) {
        return { passed: true };
      }
      return { passed: false, description: `None of ${check.fields.join(", ")} could be extracted` };
    }
    case "entries_date_order": {
      const value = fields[check.field]?.value;
      if (!Array.isArray(value)) {
        return missingInputs(check.name, [check.field]);
      }
      const reversed = value
        .filter(isExperienceEntry)
        .filter((entry) => {
          const range = entry.dates ? parseDateRange(entry.dates) : null;
          return range !== null && range.end !== null && compareIsoDates(range.start, range.end) > 0;
        })
        .map((entry) => entry.dates ?? "");
      if (reversed.length === 0) {
        return { passed: true };
      }
      return { passed: false, description: `Date ranges end before they start: ${reversed.join("; ")}` };
    }
  }
}

function missingInputs(checkName: string, inputs: ReadonlyArray<string>): CheckOutcome {
  return {
    passed: false,
    description: `Check ${checkName} could not run: missing ${inputs.join(", ")}`,
  };
}

function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `list of ${value.length}`;
  }
  return String(value);
}
