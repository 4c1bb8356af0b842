import type { FieldValue } from "../shared/types/extraction.types";
import type { FieldShape } from "../shared/types/pattern-bank.types";
import { parseDate } from "../shared/utils/dates";

// Words that open the next label on the same line ("Ravi Kumar Employee ID").
const LABEL_WORDS = new Set([
  "employee",
  "emp",
  "designation",
  "department",
  "dept",
  "id",
  "code",
  "net",
  "basic",
  "pf",
  "uan",
  "pan",
  "date",
  "location",
  "month",
  "grade",
  "salary",
  "gross",
  "hra",
  "bank",
  "account",
  "pay",
  "name",
  "doj",
  "email",
  "phone",
  "mobile",
]);

const TRAILING_CONNECTOR = /\s+(?:from|since|to|till|until|with|at|during|effective|as|w\.e\.f)\b.*$/i;
const TRAILING_PUNCTUATION = /[\s.,;:(|-]+$/;
const EMAIL_SHAPE = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;
const IDENTIFIER_SHAPE = /^[A-Za-z0-9][A-Za-z0-9/-]*$/;

// Returns null when the candidate does not have the field's shape; such a candidate is not a match.
export function coerceValue(shape: FieldShape, value: FieldValue): FieldValue {
  if (value === null) {
    return null;
  }
  if (shape === "list") {
    return Array.isArray(value) && value.length > 0 ? value : null;
  }
  if (typeof value === "number") {
    return coerceNumber(shape, value);
  }
  if (typeof value !== "string") {
    return null;
  }

  const raw = value.replace(/\s+/g, " ").trim();
  switch (shape) {
    case "amount":
    case "number":
    case "duration":
      return coerceNumber(shape, Number(raw.replace(/,/g, "")));
    case "date":
      return parseDate(raw);
    case "name":
      return coerceName(raw);
    case "text":
      return coerceText(raw);
    case "identifier":
      return coerceIdentifier(raw);
    case "email":
      return coerceEmail(raw);
    case "phone":
      return coercePhone(raw);
    case "contact":
      return coerceEmail(raw) ?? coercePhone(raw);
    case "handle":
      return coerceHandle(raw);
  }
}

export function coerceName(raw: string): string | null {
  const kept: string[] = [];
  for (const token of raw.split(" ")) {
    if (!/^[A-Z][A-Za-z.'-]*$/.test(token) || LABEL_WORDS.has(token.toLowerCase().replace(/\.$/, ""))) {
      break;
    }
    kept.push(token);
  }
  const name = kept.join(" ").replace(TRAILING_PUNCTUATION, "");
  return name.length >= 2 && /[A-Za-z]{2,}/.test(name) ? name : null;
}

export function coerceText(raw: string): string | null {
  const tokens = raw.split(" ");
  const labelIndex = tokens.findIndex(
    (token, index) => index > 0 && LABEL_WORDS.has(token.toLowerCase().replace(/[.:]+$/, "")),
  );
  const withoutLabels = labelIndex > 0 ? tokens.slice(0, labelIndex).join(" ") : raw;
  const text = withoutLabels.replace(TRAILING_CONNECTOR, "").replace(TRAILING_PUNCTUATION, "").trim();
  if (text.length < 2 || !/[A-Za-z]/.test(text) || /^\d+$/.test(text)) {
    return null;
  }
  return text;
}

function coerceNumber(shape: FieldShape, value: number): number | null {
  if (!Number.isFinite(value)) {
    return null;
  }
  if (shape === "amount") {
    return value > 0 ? value : null;
  }
  if (shape === "number" || shape === "duration") {
    return value;
  }
  return null;
}

function coerceIdentifier(raw: string): string | null {
  const value = raw.replace(TRAILING_PUNCTUATION, "");
  return IDENTIFIER_SHAPE.test(value) && /\d/.test(value) ? value : null;
}

function coerceEmail(raw: string): string | null {
  const value = raw.replace(/\.+$/, "");
  return EMAIL_SHAPE.test(value) ? value : null;
}

function coercePhone(raw: string): string | null {
  const value = raw.trim();
  if (parseDate(value) !== null) {
    return null;
  }
  const digits = value.replace(/\D/g, "").length;
  return digits >= 7 && digits <= 15 ? value : null;
}

function coerceHandle(raw: string): string | null {
  const value = raw.replace(/\/+$/, "");
  return value.length > 0 && !/\s/.test(value) ? value : null;
}
