import type { FieldValue } from "../shared/types/extraction.types";
import type { FieldShape } from "../shared/types/pattern-bank.types";
import { parseDate } from "../shared/utils/dates";

const EMAIL_SHAPE = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export function isValidShape(shape: FieldShape, value: FieldValue): boolean {
  if (value === null) {
    return false;
  }
  switch (shape) {
    case "amount":
    case "duration":
      return typeof value === "number" && Number.isFinite(value) && value >= 0;
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "list":
      return Array.isArray(value) && value.length > 0;
    case "date":
      return typeof value === "string" && parseDate(value) === value;
    case "name":
      return typeof value === "string" && isValidName(value);
    case "text":
      return typeof value === "string" && /[A-Za-z]/.test(value);
    case "identifier":
      return typeof value === "string" && value.trim().length > 0;
    case "email":
      return typeof value === "string" && EMAIL_SHAPE.test(value);
    case "phone":
      return typeof value === "string" && isValidPhone(value);
    case "contact":
      return typeof value === "string" && (EMAIL_SHAPE.test(value) || isValidPhone(value));
    case "handle":
      return typeof value === "string" && value.length > 0 && !/\s/.test(value);
  }
}

export function isValidName(value: string): boolean {
  const trimmed = value.trim();
  if (!trimmed || /^[\d\s.,-]+$/.test(trimmed)) {
    return false;
  }
  return trimmed.split(/\s+/).some((token) => /^[A-Za-z][A-Za-z.'-]*$/.test(token));
}

export function isValidPhone(value: string): boolean {
  const digits = value.replace(/\D/g, "").length;
  return digits >= 7 && digits <= 15;
}
