import { config as loadEnv } from "dotenv";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { createLogger, describeError } from "@daybar/logger";

import { loadConfig } from "./config.js";
import { buildIngestService, type IngestService } from "./service.js";

export { ConfigError, loadConfig } from "./config.js";
export { NoDataFetchedError, runIngestion, type IngestionDependencies } from "./pipeline.js";
export { IngestScheduler, assertCronExpression, type RunOutcome } from "./scheduler.js";
export { buildIngestService, type IngestService, type IngestServiceOverrides } from "./service.js";
export { PersistenceError, PriceBarStore, serializeRaw } from "./store.js";

const logger = createLogger("services/ingest-worker");

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/** Runs a single ingestion and resolves to the process exit code. */
export const runOnceAndExit = async (service: IngestService): Promise<number> => {
  try {
    const summary = await service.runOnce();
    logger.info("Ingestion finished", {
      runId: summary.runId,
      barsPersisted: summary.barsPersisted,
      failedSymbols: summary.failedSymbols,
    });
    return 0;
  } catch (error) {
    logger.error("Ingestion failed", { error: describeError(error) });
    return 1;
  } finally {
    await service.close();
  }
};

const main = async (argv: ReadonlyArray<string>): Promise<void> => {
  const config = loadConfig();
  const service = await buildIngestService(config);

  if (argv.includes("--once")) {
    process.exitCode = await runOnceAndExit(service);
    return;
  }

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      logger.info("Shutting down", { signal });
      service.close().catch((error: unknown) => {
        logger.error("Shutdown failed", { error: describeError(error) });
        process.exitCode = 1;
      });
    });
  }

  service.scheduler.start();
  logger.info("Ingest worker scheduled", {
    cron: config.cron,
    symbols: config.symbols,
    databasePath: config.databasePath,
  });

  if (config.runOnStart) {
    await service.scheduler.trigger();
  }
};

const shouldAutostart = process.env.INGEST_WORKER_AUTOSTART !== "false";

if (shouldAutostart) {
  void main(process.argv.slice(2)).catch((error) => {
    logger.error("Worker initialization failed", { error: describeError(error) });
    process.exit(1);
  });
}
