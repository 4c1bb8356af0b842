import { Request, Response, Router } from "express";
import type { Logger } from "../config/logger";
import type { DocumentEngine } from "../engine/document.engine";
import type { Lexicons } from "../extraction/lexicons";
import { readJobDescription } from "../scoring/job-description.parser";
import { errorMessage } from "../shared/errors";
import type { FieldExtractionResult } from "../shared/types/extraction.types";
import type { CandidateInput } from "../shared/types/scoring.types";
import { isRecord } from "../shared/utils/records";
import {
  readAsOf,
  readFieldExtractionResult,
  readMaxCandidates,
  readThreshold,
  type ParseResult,
} from "./request.parsers";

interface ResumesControllerDeps {
  engine: DocumentEngine;
  lexicons: Lexicons;
  logger: Logger;
}

export function buildResumesController(deps: ResumesControllerDeps): Router {
  const router = Router();

  // A candidate arrives either as raw resume text or as a previously extracted result.
  const readCandidateFields = (raw: Record<string, unknown>): ParseResult<FieldExtractionResult> => {
    const { text, fields } = raw;
    if (typeof text === "string" && text.trim()) {
      const outcome = deps.engine.extract("resume", text);
      if (!outcome.ok) {
        return { ok: false, error: outcome.message };
      }
      const classified = outcome.result.classification?.document_class;
      if (classified === "cover_letter" || classified === "reference_letter") {
        return { ok: false, error: `document looks like a ${classified}, not a resume` };
      }
      return { ok: true, value: outcome.result.fields };
    }
    if (fields === undefined) {
      return { ok: false, error: "text or fields is required" };
    }
    const parsed = readFieldExtractionResult(fields);
    if (parsed.ok && parsed.value.kind !== "resume") {
      return { ok: false, error: "fields must come from a resume" };
    }
    return parsed;
  };

  router.post("/score", (request: Request, response: Response) => {
    const body: unknown = request.body;
    if (!isRecord(body)) {
      response.status(400).json({ ok: false, error: "Invalid body" });
      return;
    }
    const job = readJobDescription(body.job, deps.lexicons);
    const asOf = readAsOf(body.asOf);
    if (!job.ok) {
      response.status(400).json({ ok: false, error: job.error });
      return;
    }
    if (!asOf.ok) {
      response.status(400).json({ ok: false, error: asOf.error });
      return;
    }

    try {
      const fields = readCandidateFields(body);
      if (!fields.ok) {
        response.status(422).json({ ok: false, error: fields.error });
        return;
      }
      const fitScore = deps.engine.score(fields.value, job.job, { asOf: asOf.value });
      response.status(200).json({ ok: true, fit_score: fitScore, job: job.job });
    } catch (error) {
      deps.logger.error("Failed to score resume", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Scoring failed" });
    }
  });

  router.post("/rank", (request: Request, response: Response) => {
    const body: unknown = request.body;
    const rawCandidates: unknown = isRecord(body) ? body.candidates : undefined;
    if (!isRecord(body) || !Array.isArray(rawCandidates) || rawCandidates.length === 0) {
      response.status(400).json({ ok: false, error: "candidates must be a non-empty array" });
      return;
    }
    const job = readJobDescription(body.job, deps.lexicons);
    if (!job.ok) {
      response.status(400).json({ ok: false, error: job.error });
      return;
    }
    const threshold = readThreshold(body.threshold);
    const maxCandidates = readMaxCandidates(body.maxCandidates);
    const asOf = readAsOf(body.asOf);
    if (!threshold.ok || !maxCandidates.ok || !asOf.ok) {
      response.status(400).json({ ok: false, error: firstError([threshold, maxCandidates, asOf]) });
      return;
    }

    try {
      const candidates: CandidateInput[] = [];
      const entries: ReadonlyArray<unknown> = rawCandidates;
      for (const [index, entry] of entries.entries()) {
        if (!isRecord(entry)) {
          response.status(400).json({ ok: false, error: `candidates[${index}] must be an object` });
          return;
        }
        const fields = readCandidateFields(entry);
        if (!fields.ok) {
          response.status(422).json({ ok: false, error: `candidates[${index}]: ${fields.error}` });
          return;
        }
        const ref = entry.candidate_ref;
        candidates.push({
          candidate_ref: typeof ref === "string" && ref.trim() ? ref.trim() : `candidate-${index + 1}`,
          fields: fields.value,
        });
      }

      const ranked = deps.engine.rank(candidates, job.job, {
        threshold: threshold.value,
        maxCandidates: maxCandidates.value,
        asOf: asOf.value,
      });
      response.status(200).json({ ok: true, ranked });
    } catch (error) {
      deps.logger.error("Failed to rank resumes", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Ranking failed" });
    }
  });

  return router;
}

function firstError(results: ReadonlyArray<ParseResult<unknown>>): string {
  for (const result of results) {
    if (!result.ok) {
      return result.error;
    }
  }
  return "Invalid request";
}
