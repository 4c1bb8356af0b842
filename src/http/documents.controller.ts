import { Request, Response, Router } from "express";
import type { Logger } from "../config/logger";
import type { DocumentService } from "../documents/document.service";
import type { DocumentEngine } from "../engine/document.engine";
import { errorMessage } from "../shared/errors";
import {
  isDocumentKind,
  type AcquisitionResult,
  type DocumentKind,
  type DocumentSource,
  type TextAcquirer,
} from "../shared/types/document.types";
import { isRecord } from "../shared/utils/records";
import { readExtractOptions } from "./request.parsers";

interface DocumentsControllerDeps {
  engine: DocumentEngine;
  documentService: DocumentService;
  logger: Logger;
}

type InlinePayload = { text: string } | { buffer: Buffer; mimeType?: string };

const BASE64_SHAPE = /^[A-Za-z0-9+/\r\n]*={0,2}\s*$/;

export function buildDocumentsController(deps: DocumentsControllerDeps): Router {
  const router = Router();

  router.post("/batch", async (request: Request, response: Response) => {
    const body: unknown = request.body;
    const documents: unknown = isRecord(body) ? body.documents : undefined;
    if (!isRecord(body) || !Array.isArray(documents) || documents.length === 0) {
      response.status(400).json({ ok: false, error: "documents must be a non-empty array" });
      return;
    }
    const options = readExtractOptions(body);
    if (!options.ok) {
      response.status(400).json({ ok: false, error: options.error });
      return;
    }

    const payloads = new Map<DocumentSource, InlinePayload>();
    const rawDocuments: ReadonlyArray<unknown> = documents;
    for (const [index, rawDocument] of rawDocuments.entries()) {
      const parsed = readInlineDocument(rawDocument, index);
      if (!parsed.ok) {
        response.status(400).json({ ok: false, error: parsed.error });
        return;
      }
      payloads.set(parsed.source, parsed.payload);
    }

    const inlineAcquirer: TextAcquirer = {
      acquire: async (source): Promise<AcquisitionResult> => {
        const payload = payloads.get(source);
        if (!payload) {
          return { ok: false, reason: "read_failed", detail: "document payload missing" };
        }
        if ("text" in payload) {
          return payload.text.trim() ? { ok: true, rawText: payload.text } : { ok: false, reason: "empty_text" };
        }
        const format = deps.documentService.detectSourceFormat(source.sourcePath, payload.mimeType);
        return deps.documentService.acquireBuffer(payload.buffer, { ...source, format });
      },
    };

    try {
      const records = await deps.engine.processBatch(Array.from(payloads.keys()), inlineAcquirer, options.value);
      response.status(200).json({ ok: true, records });
    } catch (error) {
      deps.logger.error("Failed to process document batch", { error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Batch processing failed" });
    }
  });

  router.post("/:kind/extract", (request: Request, response: Response) => {
    const kind = request.params.kind;
    if (!isDocumentKind(kind)) {
      response.status(404).json({ ok: false, error: `Unknown document kind: ${kind}` });
      return;
    }
    const body: unknown = request.body;
    const text: unknown = isRecord(body) ? body.text : undefined;
    if (!isRecord(body) || typeof text !== "string" || !text.trim()) {
      response.status(400).json({ ok: false, error: "text must be a non-empty string" });
      return;
    }
    const options = readExtractOptions(body);
    if (!options.ok) {
      response.status(400).json({ ok: false, error: options.error });
      return;
    }

    try {
      const outcome = deps.engine.extract(kind, text, options.value);
      if (!outcome.ok) {
        response.status(503).json({ ok: false, error: outcome.message });
        return;
      }
      response.status(200).json({ ok: true, result: outcome.result });
    } catch (error) {
      deps.logger.error("Failed to extract document", { kind, error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Extraction failed" });
    }
  });

  router.post("/:kind/upload", async (request: Request, response: Response) => {
    const kind = request.params.kind;
    if (!isDocumentKind(kind)) {
      response.status(404).json({ ok: false, error: `Unknown document kind: ${kind}` });
      return;
    }
    const body: unknown = request.body;
    if (!isRecord(body)) {
      response.status(400).json({ ok: false, error: "Invalid body" });
      return;
    }
    const parsed = readInlineDocument({ ...body, kind }, 0);
    if (!parsed.ok || "text" in parsed.payload) {
      response.status(400).json({ ok: false, error: parsed.ok ? "contentBase64 is required" : parsed.error });
      return;
    }
    const options = readExtractOptions(body);
    if (!options.ok) {
      response.status(400).json({ ok: false, error: options.error });
      return;
    }

    try {
      const format = deps.documentService.detectSourceFormat(parsed.source.sourcePath, parsed.payload.mimeType);
      const acquired = await deps.documentService.acquireBuffer(parsed.payload.buffer, { ...parsed.source, format });
      if (!acquired.ok) {
        response.status(422).json({ ok: false, error: acquired.reason, detail: acquired.detail });
        return;
      }
      const outcome = deps.engine.extract(kind, acquired.rawText, {
        ...options.value,
        fileName: parsed.source.sourcePath,
        contentHash: acquired.contentHash,
        metadata: acquired.metadata,
      });
      if (!outcome.ok) {
        response.status(503).json({ ok: false, error: outcome.message });
        return;
      }
      response.status(200).json({ ok: true, result: outcome.result });
    } catch (error) {
      deps.logger.error("Failed to extract uploaded document", { kind, error: errorMessage(error) });
      response.status(500).json({ ok: false, error: "Extraction failed" });
    }
  });

  return router;
}

function readInlineDocument(
  raw: unknown,
  index: number,
): { ok: true; source: DocumentSource; payload: InlinePayload } | { ok: false; error: string } {
  if (!isRecord(raw)) {
    return { ok: false, error: `documents[${index}] must be an object` };
  }
  const { kind, text, fileName, mimeType, contentBase64 } = raw;
  if (!isDocumentKind(kind)) {
    return { ok: false, error: `documents[${index}].kind must be a document kind` };
  }
  const sourcePath = typeof fileName === "string" && fileName.trim() ? fileName.trim() : `document-${index + 1}`;
  const documentKind: DocumentKind = kind;

  if (typeof text === "string") {
    return { ok: true, source: { sourcePath, kind: documentKind }, payload: { text } };
  }
  if (typeof contentBase64 !== "string" || !contentBase64.trim() || !BASE64_SHAPE.test(contentBase64)) {
    return { ok: false, error: `documents[${index}] needs text or base64 contentBase64` };
  }
  return {
    ok: true,
    source: { sourcePath, kind: documentKind },
    payload: {
      buffer: Buffer.from(contentBase64, "base64"),
      mimeType: typeof mimeType === "string" ? mimeType : undefined,
    },
  };
}
