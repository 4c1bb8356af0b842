import type { Lexicons } from "../extraction/lexicons";
import type { CandidateInput, JobDescription, RankedCandidate, RankOptions } from "../shared/types/scoring.types";
import { scoreCandidate } from "./fit-score.calculator";

export const DEFAULT_SHORTLIST_THRESHOLD = 70;

export function rankCandidates(
  candidates: ReadonlyArray<CandidateInput>,
  job: JobDescription,
  lexicons: Lexicons,
  options: RankOptions = {},
): RankedCandidate[] {
  const threshold = options.threshold ?? DEFAULT_SHORTLIST_THRESHOLD;
  const scored = candidates.map((candidate, index) => ({
    candidate,
    index,
    fitScore: scoreCandidate(candidate.fields, job, lexicons, { asOf: options.asOf }),
  }));

  scored.sort((left, right) => {
    const diff = right.fitScore.total_fit - left.fitScore.total_fit;
    return diff !== 0 ? diff : left.index - right.index;
  });

  // Shortlisting is decided before the cap, so a capped-out candidate keeps its flag.
  const ranked = scored.map(({ candidate, fitScore }, position) => ({
    candidate_ref: candidate.candidate_ref,
    fit_score: fitScore,
    rank: position + 1,
    shortlisted: fitScore.total_fit >= threshold,
  }));

  const cap = options.maxCandidates ?? null;
  return cap === null ? ranked : ranked.slice(0, cap);
}
