import { anonymizeResume } from "../anonymization/resume.anonymizer";
import { classifyDocument, type ClassificationResult } from "../classification/document.classifier";
import type { GpaScale } from "../config/env";
import { logContext, type Logger } from "../config/logger";
import { extractFields } from "../extraction/field-extraction.engine";
import type { Lexicons } from "../extraction/lexicons";
import { normalizeText } from "../normalization/text.normalizer";
import { rankCandidates } from "../scoring/candidate.ranker";
import { scoreCandidate } from "../scoring/fit-score.calculator";
import { errorMessage } from "../shared/errors";
import type { AnonymizedEntities } from "../shared/types/anonymization.types";
import type { DocumentKind, DocumentMetadata, DocumentSource, TextAcquirer } from "../shared/types/document.types";
import type { FieldExtractionResult } from "../shared/types/extraction.types";
import type { PatternBankRegistry } from "../shared/types/pattern-bank.types";
import type {
  CandidateInput,
  FitScore,
  JobDescription,
  RankedCandidate,
  ScoreOptions,
} from "../shared/types/scoring.types";
import type { AuthenticityReport, ValidationReport } from "../shared/types/validation.types";
import { sha256Hex } from "../shared/utils/hashing";
import { assessCertificateAuthenticity } from "../validation/certificate.authenticity";
import { validateFields } from "../validation/confidence.scorer";

export interface EngineSettings {
  earningsTolerance: number;
  gpaScale: GpaScale;
  shortlistThreshold: number;
  maxCandidates: number | null;
  batchConcurrency: number;
}

export interface DocumentExtractOptions {
  anonymize?: boolean;
  redactDates?: boolean;
  earningsTolerance?: number;
  gpaScale?: GpaScale;
  asOf?: string;
  fileName?: string;
  // Set by acquisition; text submitted directly is hashed as UTF-8.
  contentHash?: string;
  metadata?: DocumentMetadata;
}

export interface DocumentResult {
  kind: DocumentKind;
  fields: FieldExtractionResult;
  validation: ValidationReport;
  confidence: number;
  anonymized?: AnonymizedEntities;
  classification?: ClassificationResult;
  authenticity?: AuthenticityReport;
}

export type ExtractOutcome =
  | {
      ok: true;
      result: DocumentResult;
    }
  | {
      ok: false;
      error_code: "kind_unavailable";
      message: string;
    };

export type BatchRecord =
  | {
      source_path: string;
      document_kind: DocumentKind;
      ok: true;
      result: DocumentResult;
    }
  | {
      source_path: string;
      document_kind: DocumentKind;
      ok: false;
      extraction_failure: string;
    };

export interface RankRequest {
  threshold?: number;
  maxCandidates?: number | null;
  asOf?: string;
}

export class DocumentEngine {
  constructor(
    private readonly banks: PatternBankRegistry,
    private readonly lexicons: Lexicons,
    private readonly settings: EngineSettings,
    private readonly logger: Logger,
  ) {}

  supportedKinds(): DocumentKind[] {
    return Array.from(this.banks.keys());
  }

  bankVersions(): Record<string, string> {
    const versions: Record<string, string> = {};
    for (const [kind, bank] of this.banks) {
      versions[kind] = bank.version;
    }
    return versions;
  }

  extract(kind: DocumentKind, rawText: string, options: DocumentExtractOptions = {}): ExtractOutcome {
    const bank = this.banks.get(kind);
    if (!bank) {
      return {
        ok: false,
        error_code: "kind_unavailable",
        message: `No pattern bank loaded for ${kind}`,
      };
    }

    const startedAt = Date.now();
    const normalized = normalizeText(rawText);
    const fields = extractFields(bank, normalized, { lexicons: this.lexicons });
    const validation = validateFields(bank, fields, {
      earningsTolerance: options.earningsTolerance ?? this.settings.earningsTolerance,
      gpaScale: options.gpaScale ?? this.settings.gpaScale,
      asOf: options.asOf,
    });

    const result: DocumentResult = {
      kind,
      fields,
      validation,
      confidence: validation.confidence_score,
    };
    if (kind === "resume") {
      result.classification = classifyDocument(normalized.text, this.lexicons.documentIndicators, options.fileName);
      if (options.anonymize) {
        result.anonymized = anonymizeResume(fields, { redactDates: options.redactDates });
      }
    }
    if (kind === "certificate") {
      result.authenticity = assessCertificateAuthenticity(
        {
          text: normalized.text,
          documentHash: options.contentHash ?? sha256Hex(rawText),
          metadata: options.metadata ?? null,
        },
        this.lexicons.certificateAuthenticity,
      );
    }

    logContext(this.logger, "info", "document.extracted", {
      document_kind: kind,
      bank_version: bank.version,
      latency_ms: Date.now() - startedAt,
      ok: true,
    }, {
      confidence: result.confidence,
      anomalies: validation.anomalies.length,
    });
    return { ok: true, result };
  }

  score(fields: FieldExtractionResult, job: JobDescription, options: ScoreOptions = {}): FitScore {
    return scoreCandidate(fields, job, this.lexicons, options);
  }

  rank(candidates: ReadonlyArray<CandidateInput>, job: JobDescription, request: RankRequest = {}): RankedCandidate[] {
    const ranked = rankCandidates(candidates, job, this.lexicons, {
      threshold: request.threshold ?? this.settings.shortlistThreshold,
      maxCandidates: request.maxCandidates === undefined ? this.settings.maxCandidates : request.maxCandidates,
      asOf: request.asOf,
    });
    this.logger.info("resumes.ranked", {
      candidates: candidates.length,
      returned: ranked.length,
      shortlisted: ranked.filter((candidate) => candidate.shortlisted).length,
    });
    return ranked;
  }

  // Documents run in slices of batchConcurrency; records come back in submission order.
  async processBatch(
    sources: ReadonlyArray<DocumentSource>,
    acquirer: TextAcquirer,
    options: DocumentExtractOptions = {},
  ): Promise<BatchRecord[]> {
    const records: BatchRecord[] = [];
    const sliceSize = Math.max(1, this.settings.batchConcurrency);
    for (let start = 0; start < sources.length; start += sliceSize) {
      const slice = sources.slice(start, start + sliceSize);
      records.push(...(await Promise.all(slice.map((source) => this.processOne(source, acquirer, options)))));
    }

    this.logger.info("batch.completed", {
      documents: sources.length,
      failed: records.filter((record) => !record.ok).length,
    });
    return records;
  }

  private async processOne(
    source: DocumentSource,
    acquirer: TextAcquirer,
    options: DocumentExtractOptions,
  ): Promise<BatchRecord> {
    const base = { source_path: source.sourcePath, document_kind: source.kind };
    try {
      const acquired = await acquirer.acquire(source);
      if (!acquired.ok) {
        const failure = acquired.detail ? `${acquired.reason}: ${acquired.detail}` : acquired.reason;
        return { ...base, ok: false, extraction_failure: failure };
      }
      const outcome = this.extract(source.kind, acquired.rawText, {
        ...options,
        fileName: source.sourcePath,
        contentHash: acquired.contentHash,
        metadata: acquired.metadata,
      });
      if (!outcome.ok) {
        return { ...base, ok: false, extraction_failure: outcome.error_code };
      }
      return { ...base, ok: true, result: outcome.result };
    } catch (error) {
      // Acquirers report failures as data; anything thrown still stays with this one document.
      logContext(this.logger, "error", "batch.document_failed", {
        document_kind: source.kind,
        source_path: source.sourcePath,
        ok: false,
      }, { error: errorMessage(error) });
      return { ...base, ok: false, extraction_failure: errorMessage(error) };
    }
  }
}
