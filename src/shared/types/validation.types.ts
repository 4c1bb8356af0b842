import type { DocumentMetadata } from "./document.types";

export type AnomalyType =
  | "missing_required_field"
  | "invalid_field_shape"
  | "dates_illogical"
  | "start_date_in_future"
  | "start_date_implausible"
  | "earnings_mismatch"
  | "net_pay_mismatch"
  | "gpa_out_of_range"
  | "missing_contact"
  | "experience_dates_illogical";

export interface ValidationAnomaly {
  type: AnomalyType;
  description: string;
  field?: string;
  check?: string;
}

export interface ValidationReport {
  per_field_validity: Record<string, boolean>;
  logical_checks: Record<string, boolean>;
  anomalies: ValidationAnomaly[];
  confidence_score: number;
}

export interface AuthenticityReport {
  document_hash: string;
  verification_keywords: string[];
  recognized_institutions: string[];
  signing_tools: string[];
  metadata: DocumentMetadata | null;
  authenticity_score: number;
  indicators: string[];
  risk_factors: string[];
  recommendations: string[];
}
