import pdfParse from "pdf-parse";
import type { DocumentMetadata } from "../../shared/types/document.types";
import { isRecord, toText } from "../../shared/utils/records";

export interface PdfContent {
  text: string;
  metadata: DocumentMetadata;
}

export async function extractPdfContent(buffer: Buffer): Promise<PdfContent> {
  const result = await pdfParse(buffer);
  const info: unknown = result.info;
  return {
    // Page breaks come through as form feeds; lines matter downstream, pages do not.
    text: result.text.replace(/\f/g, "\n").trim(),
    metadata: readPdfMetadata(info, result.numpages),
  };
}

export function readPdfMetadata(info: unknown, pageCount: number): DocumentMetadata {
  const record = isRecord(info) ? info : {};
  return {
    producer: toText(record.Producer) || null,
    creator: toText(record.Creator) || null,
    creation_date: toText(record.CreationDate) || null,
    page_count: Number.isInteger(pageCount) && pageCount > 0 ? pageCount : null,
  };
}
