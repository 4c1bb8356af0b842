import type { FieldExtractionResult } from "./extraction.types";

export type DegreeLevel = "diploma" | "bachelor" | "master" | "doctorate";

export interface JobDescription {
  title: string;
  keywords: string[];
  required_skills: string[];
  required_degree: DegreeLevel | null;
  required_field: string | null;
  related_fields: string[];
  min_average_tenure_months: number;
}

export interface FitCriteria {
  skills_match: number;
  experience_relevance: number;
  education_match: number;
  tenure_stability: number;
  growth_trajectory: number;
}

export interface FitScore extends FitCriteria {
  total_fit: number;
}

export interface CandidateInput {
  candidate_ref: string;
  fields: FieldExtractionResult;
}

export interface RankedCandidate {
  candidate_ref: string;
  fit_score: FitScore;
  rank: number;
  shortlisted: boolean;
}

export interface ScoreOptions {
  asOf?: string;
}

export interface RankOptions extends ScoreOptions {
  threshold?: number;
  maxCandidates?: number | null;
}
