import path from "node:path";
import dotenv from "dotenv";
import type { LogLevel } from "./logger";

dotenv.config();

export type GpaScale = 4 | 10;

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  patternBankDir: string;
  lexiconDir: string;
  shortlistThreshold: number;
  maxCandidates: number | null;
  earningsTolerance: number;
  gpaScale: GpaScale;
  batchConcurrency: number;
}

function getOptionalTrimmed(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const thresholdRaw = source.SHORTLIST_THRESHOLD ?? "70";
  const shortlistThreshold = Number(thresholdRaw);
  const maxCandidatesRaw = getOptionalTrimmed(source, "MAX_CANDIDATES");
  const maxCandidates = maxCandidatesRaw === undefined ? null : Number(maxCandidatesRaw);
  const toleranceRaw = source.EARNINGS_TOLERANCE ?? "1.0";
  const earningsTolerance = Number(toleranceRaw);
  const gpaScaleRaw = source.GPA_SCALE ?? "10";
  const concurrencyRaw = source.BATCH_CONCURRENCY ?? "4";
  const batchConcurrency = Number(concurrencyRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isFinite(shortlistThreshold) || shortlistThreshold < 0 || shortlistThreshold > 100) {
    throw new Error(
      `Invalid SHORTLIST_THRESHOLD value: ${thresholdRaw}. Expected number between 0 and 100.`,
    );
  }
  if (maxCandidates !== null && (!Number.isInteger(maxCandidates) || maxCandidates < 1)) {
    throw new Error(`Invalid MAX_CANDIDATES value: ${maxCandidatesRaw}`);
  }
  if (!Number.isFinite(earningsTolerance) || earningsTolerance < 0) {
    throw new Error(`Invalid EARNINGS_TOLERANCE value: ${toleranceRaw}`);
  }
  if (!Number.isInteger(batchConcurrency) || batchConcurrency < 1) {
    throw new Error(`Invalid BATCH_CONCURRENCY value: ${concurrencyRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    patternBankDir: path.resolve(getOptionalTrimmed(source, "PATTERN_BANK_DIR") ?? "config/pattern-banks"),
    lexiconDir: path.resolve(getOptionalTrimmed(source, "LEXICON_DIR") ?? "config/lexicons"),
    shortlistThreshold,
    maxCandidates,
    earningsTolerance,
    gpaScale: parseGpaScale(gpaScaleRaw),
    batchConcurrency,
  };
}

function parseGpaScale(value: string): GpaScale {
  const normalized = value.trim();
  if (normalized === "4") {
    return 4;
  }
  if (normalized === "10") {
    return 10;
  }
  throw new Error(`Invalid GPA_SCALE value: ${value}. Expected 4 or 10.`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
