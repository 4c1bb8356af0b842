import type { DocumentKind } from "./document.types";
import type { FieldExtraction } from "./extraction.types";

export interface AnonymizedEntities {
  kind: DocumentKind;
  bank_version: string;
  fields: Record<string, FieldExtraction>;
  redacted_fields: string[];
  organization_count: number;
}

export interface AnonymizeOptions {
  redactDates?: boolean;
}
