import "dotenv/config";
import { readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { DocumentService } from "../src/documents/document.service";
import { DocumentEngine } from "../src/engine/document.engine";
import { loadLexicons } from "../src/extraction/lexicons";
import { loadPatternBanks } from "../src/extraction/pattern-bank.loader";
import { isDocumentKind, type DocumentSource } from "../src/shared/types/document.types";

// Usage: npm run extract:folder -- <kind> <folder> [output.json] [--anonymize]
async function main(): Promise<void> {
  const args = process.argv.slice(2).filter((arg) => !arg.startsWith("--"));
  const anonymize = process.argv.includes("--anonymize");
  const [kind, folder, output] = args;
  if (!isDocumentKind(kind) || !folder) {
    throw new Error("Expected <kind> <folder>; kind is resume, payslip, experience_letter or certificate");
  }

  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const engine = new DocumentEngine(
    await loadPatternBanks(env.patternBankDir),
    await loadLexicons(env.lexiconDir),
    {
      earningsTolerance: env.earningsTolerance,
      gpaScale: env.gpaScale,
      shortlistThreshold: env.shortlistThreshold,
      maxCandidates: env.maxCandidates,
      batchConcurrency: env.batchConcurrency,
    },
    logger,
  );

  const entries = await readdir(folder, { withFileTypes: true });
  const sources: DocumentSource[] = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ sourcePath: path.join(folder, name), kind }));

  const records = await engine.processBatch(sources, new DocumentService(logger), { anonymize });
  const json = JSON.stringify(records, null, 2);
  if (output) {
    await writeFile(output, `${json}\n`, "utf8");
    logger.info("extract_folder.written", { output, documents: records.length });
    return;
  }
  process.stdout.write(`${json}\n`);
}

void main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error("[extract:folder] failed", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
