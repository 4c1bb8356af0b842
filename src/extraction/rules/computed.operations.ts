import type { FieldExtraction } from "../../shared/types/extraction.types";
import type { ComputedRule } from "../../shared/types/pattern-bank.types";
import { parseDate, yearsBetween } from "../../shared/utils/dates";
import { round2 } from "../../shared/utils/scoring.util";

export type FieldSnapshot = Readonly<Record<string, Readonly<FieldExtraction>>>;

export function runComputed(rule: ComputedRule, snapshot: FieldSnapshot): number | null {
  switch (rule.operation) {
    case "sum": {
      const required = readNumbers(rule.inputs, snapshot);
      if (!required) {
        return null;
      }
      const optional = rule.optionalInputs
        .map((name) => readNumber(snapshot[name]))
        .filter((value): value is number => value !== null);
      return round2([...required, ...optional].reduce((total, value) => total + value, 0));
    }
    case "difference": {
      const values = readNumbers(rule.inputs, snapshot);
      if (!values || values.length < 2) {
        return null;
      }
      return round2(values.slice(1).reduce((total, value) => total - value, values[0]));
    }
    case "years_between": {
      const [startName, endName] = rule.inputs;
      const start = readDate(snapshot[startName]);
      const end = readDate(snapshot[endName]);
      if (!start || !end) {
        return null;
      }
      return yearsBetween(start, end);
    }
  }
}

function readNumbers(names: ReadonlyArray<string>, snapshot: FieldSnapshot): number[] | null {
  const values: number[] = [];
  for (const name of names) {
    const value = readNumber(snapshot[name]);
    if (value === null) {
      return null;
    }
    values.push(value);
  }
  return values;
}

function readNumber(field: Readonly<FieldExtraction> | undefined): number | null {
  if (!field || typeof field.value !== "number" || !Number.isFinite(field.value)) {
    return null;
  }
  return field.value;
}

function readDate(field: Readonly<FieldExtraction> | undefined): string | null {
  if (!field || typeof field.value !== "string") {
    return null;
  }
  return parseDate(field.value);
}
