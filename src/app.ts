import express, { Express, NextFunction, Request, Response } from "express";
import type { EnvConfig } from "./config/env";
import type { Logger } from "./config/logger";
import { DocumentService } from "./documents/document.service";
import { DocumentEngine } from "./engine/document.engine";
import type { Lexicons } from "./extraction/lexicons";
import { buildDocumentsController } from "./http/documents.controller";
import { buildResumesController } from "./http/resumes.controller";
import { errorMessage } from "./shared/errors";
import type { PatternBankRegistry } from "./shared/types/pattern-bank.types";

export interface AppDeps {
  env: EnvConfig;
  banks: PatternBankRegistry;
  lexicons: Lexicons;
  logger: Logger;
}

export interface AppContext {
  app: Express;
  engine: DocumentEngine;
  documentService: DocumentService;
}

export function createApp(deps: AppDeps): AppContext {
  const { env, banks, lexicons, logger } = deps;
  const app = express();

  app.use(express.json({ limit: "10mb" }));

  const documentService = new DocumentService(logger);
  const engine = new DocumentEngine(
    banks,
    lexicons,
    {
      earningsTolerance: env.earningsTolerance,
      gpaScale: env.gpaScale,
      shortlistThreshold: env.shortlistThreshold,
      maxCandidates: env.maxCandidates,
      batchConcurrency: env.batchConcurrency,
    },
    logger,
  );

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      ok: true,
      kinds: engine.supportedKinds(),
      bank_versions: engine.bankVersions(),
    });
  });

  app.use("/documents", buildDocumentsController({ engine, documentService, logger }));
  app.use("/resumes", buildResumesController({ engine, lexicons, logger }));

  app.use((error: unknown, request: Request, response: Response, _next: NextFunction) => {
    logger.warn("Request failed before reaching a handler", {
      route: request.path,
      error: errorMessage(error),
    });
    response.status(400).json({ ok: false, error: "Malformed request" });
  });

  return { app, engine, documentService };
}
