export type DocumentKind = "resume" | "payslip" | "experience_letter" | "certificate";

export const DOCUMENT_KINDS: ReadonlyArray<DocumentKind> = [
  "resume",
  "payslip",
  "experience_letter",
  "certificate",
];

export type SourceFormat = "pdf" | "docx" | "image" | "text" | "unknown";

export interface DocumentSource {
  readonly sourcePath: string;
  readonly kind: DocumentKind;
  readonly format?: SourceFormat;
}

export interface DocumentMetadata {
  producer: string | null;
  creator: string | null;
  creation_date: string | null;
  page_count: number | null;
}

export type AcquisitionResult =
  | {
      ok: true;
      rawText: string;
      // SHA-256 of the bytes the text was read from.
      contentHash?: string;
      metadata?: DocumentMetadata;
    }
  | {
      ok: false;
      reason: AcquisitionFailureReason;
      detail?: string;
    };

export type AcquisitionFailureReason =
  | "unsupported_format"
  | "ocr_unavailable"
  | "read_failed"
  | "empty_text";

export function isDocumentKind(value: unknown): value is DocumentKind {
  return typeof value === "string" && DOCUMENT_KINDS.some((kind) => kind === value);
}

export interface TextAcquirer {
  acquire(source: DocumentSource): Promise<AcquisitionResult>;
}
