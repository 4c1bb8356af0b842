import { readFile } from "node:fs/promises";
import { logContext, type Logger } from "../config/logger";
import { errorMessage } from "../shared/errors";
import type {
  AcquisitionFailureReason,
  AcquisitionResult,
  DocumentMetadata,
  DocumentSource,
  SourceFormat,
  TextAcquirer,
} from "../shared/types/document.types";
import { sha256Hex } from "../shared/utils/hashing";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfContent } from "./extractors/pdf.extractor";

export type OcrFunction = (buffer: Buffer) => Promise<string>;

const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".tif", ".tiff", ".bmp", ".gif", ".webp"];
const TEXT_EXTENSIONS = [".txt", ".text", ".md"];
const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class DocumentService implements TextAcquirer {
  constructor(
    private readonly logger: Logger,
    private readonly ocr?: OcrFunction,
  ) {}

  detectSourceFormat(fileName?: string, mimeType?: string): SourceFormat {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }
    if (normalizedMime.includes(DOCX_MIME) || normalizedFileName.endsWith(".docx")) {
      return "docx";
    }
    if (normalizedMime.startsWith("image/") || IMAGE_EXTENSIONS.some((ext) => normalizedFileName.endsWith(ext))) {
      return "image";
    }
    if (normalizedMime.startsWith("text/") || TEXT_EXTENSIONS.some((ext) => normalizedFileName.endsWith(ext))) {
      return "text";
    }
    return "unknown";
  }

  async acquire(source: DocumentSource): Promise<AcquisitionResult> {
    const format = source.format ?? this.detectSourceFormat(source.sourcePath);
    if (format === "unknown") {
      return this.fail(source, "unsupported_format");
    }

    let buffer: Buffer;
    try {
      buffer = await readFile(source.sourcePath);
    } catch (error) {
      return this.fail(source, "read_failed", errorMessage(error));
    }
    return this.acquireBuffer(buffer, { ...source, format });
  }

  async acquireBuffer(buffer: Buffer, source: DocumentSource): Promise<AcquisitionResult> {
    const format = source.format ?? this.detectSourceFormat(source.sourcePath);
    let text: string;
    let metadata: DocumentMetadata | undefined;
    try {
      switch (format) {
        case "pdf": {
          const content = await extractPdfContent(buffer);
          text = content.text;
          metadata = content.metadata;
          break;
        }
        case "docx":
          text = await extractDocxText(buffer);
          break;
        case "text":
          text = buffer.toString("utf8");
          break;
        case "image":
          if (!this.ocr) {
            return this.fail(source, "ocr_unavailable");
          }
          text = await this.ocr(buffer);
          break;
        default:
          return this.fail(source, "unsupported_format");
      }
    } catch (error) {
      return this.fail(source, "read_failed", errorMessage(error));
    }

    const rawText = text.replace(/\u0000/g, "").trim();
    if (!rawText) {
      return this.fail(source, "empty_text");
    }

    logContext(this.logger, "info", "document.text_acquired", {
      document_kind: source.kind,
      source_path: source.sourcePath,
      ok: true,
    }, { format, chars: rawText.length });
    return { ok: true, rawText, contentHash: sha256Hex(buffer), metadata };
  }

  private fail(
    source: DocumentSource,
    reason: AcquisitionFailureReason,
    detail?: string,
  ): AcquisitionResult {
    logContext(this.logger, "warn", "document.acquisition_failed", {
      document_kind: source.kind,
      source_path: source.sourcePath,
      ok: false,
      error_code: reason,
    }, detail ? { detail } : undefined);
    return detail ? { ok: false, reason, detail } : { ok: false, reason };
  }
}
