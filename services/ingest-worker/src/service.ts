import {
  createAlphaVantageFetcher,
  createHttpClient,
  type HttpClient,
  type IDailySeriesSource,
  type Sleep,
} from "@daybar/data";
import { createLogger, type Logger } from "@daybar/logger";
import type { IngestConfig, RunSummary } from "@daybar/sdk";

import { createPriceBarDatabase, type PriceBarDatabase } from "./db/index.js";
import { runIngestion } from "./pipeline.js";
import { IngestScheduler } from "./scheduler.js";
import { PriceBarStore } from "./store.js";

export interface IngestServiceOverrides {
  readonly httpClient?: HttpClient;
  readonly source?: IDailySeriesSource;
  readonly database?: PriceBarDatabase;
  readonly sleep?: Sleep;
  readonly random?: () => number;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export interface IngestService {
  readonly config: IngestConfig;
  readonly database: PriceBarDatabase;
  readonly scheduler: IngestScheduler;
  /** Transport the fetcher uses; absent when a source was injected. */
  readonly httpClient?: HttpClient;
  runOnce(): Promise<RunSummary>;
  close(): Promise<void>;
}

/**
 * Wires the fetcher, store and scheduler for one configuration. Pieces passed
 * in `overrides` are used as given and are not closed by {@link IngestService.close}.
 */
export const buildIngestService = async (
  config: IngestConfig,
  overrides: IngestServiceOverrides = {},
): Promise<IngestService> => {
  const logger = overrides.logger ?? createLogger("ingest-worker", { level: config.logLevel });
  // Only a fetcher built here needs a transport; one created here is closed here.
  const ownedHttpClient =
    overrides.source === undefined && overrides.httpClient === undefined
      ? createHttpClient()
      : undefined;

  const source =
    overrides.source ??
    createAlphaVantageFetcher({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      httpClient: overrides.httpClient ?? ownedHttpClient,
      timeoutMs: config.fetch.timeoutMs,
      maxRetries: config.fetch.maxRetries,
      backoffBaseMs: config.fetch.backoffBaseMs,
      sleep: overrides.sleep,
      random: overrides.random,
      logger: logger.child({ component: "fetcher" }),
    });

  const ownsDatabase = overrides.database === undefined;
  const database =
    overrides.database ??
    (await createPriceBarDatabase({
      filename: config.databasePath,
      logger: logger.child({ component: "db" }),
    }));

  const store = new PriceBarStore({
    database,
    batchSize: config.store.batchSize,
    maxRetries: config.store.maxRetries,
    backoffBaseMs: config.store.backoffBaseMs,
    sleep: overrides.sleep,
    logger: logger.child({ component: "store" }),
  });

  const runOnce = (): Promise<RunSummary> =>
    runIngestion({
      symbols: config.symbols,
      source,
      store,
      symbolDelayMs: config.symbolDelayMs,
      sleep: overrides.sleep,
      now: overrides.now,
      logger: logger.child({ component: "pipeline" }),
    });

  let scheduler: IngestScheduler;
  try {
    scheduler = new IngestScheduler({
      cron: config.cron,
      run: runOnce,
      logger: logger.child({ component: "scheduler" }),
    });
  } catch (error) {
    ownedHttpClient?.close?.();
    if (ownsDatabase) {
      await database.close();
    }
    throw error;
  }

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    scheduler.stop();
    ownedHttpClient?.close?.();
    if (ownsDatabase) {
      await database.close();
    }
  };

  const httpClient = overrides.source === undefined ? (overrides.httpClient ?? ownedHttpClient) : undefined;

  return { config, database, scheduler, httpClient, runOnce, close };
};
