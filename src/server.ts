import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { createLogger } from "./config/logger";
import { loadLexicons } from "./extraction/lexicons";
import { loadPatternBanks } from "./extraction/pattern-bank.loader";
import { errorMessage } from "./shared/errors";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });

  const banks = await loadPatternBanks(env.patternBankDir);
  const lexicons = await loadLexicons(env.lexiconDir);
  const { app, engine } = createApp({ env, banks, lexicons, logger });

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("Pattern banks loaded", { versions: engine.bankVersions() });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
