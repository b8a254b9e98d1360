import { randomUUID } from "node:crypto";

import {
  defaultSleep,
  normalizeDailySeries,
  type IDailySeriesSource,
  type Sleep,
} from "@daybar/data";
import { createLogger, describeError, type Logger } from "@daybar/logger";
import type { PriceBar, RunSummary } from "@daybar/sdk";

import type { PriceBarStore } from "./store.js";

export const DEFAULT_SYMBOL_DELAY_MS = 12_000;

/** Raised when not a single symbol produced a bar during a run. */
export class NoDataFetchedError extends Error {
  public constructor(public readonly symbols: ReadonlyArray<string>) {
    super(`No data fetched for any symbol (${symbols.join(", ") || "none configured"})`);
    this.name = "NoDataFetchedError";
  }
}

export interface IngestionDependencies {
  readonly symbols: ReadonlyArray<string>;
  readonly source: IDailySeriesSource;
  readonly store: Pick<PriceBarStore, "upsertBatch">;
  /** Pause between consecutive symbols; none after the last one. */
  readonly symbolDelayMs?: number;
  readonly sleep?: Sleep;
  readonly logger?: Logger;
  readonly normalize?: typeof normalizeDailySeries;
  readonly now?: () => Date;
  readonly runId?: string;
}

/**
 * Runs one ingestion pass: fetch and normalize each symbol in order, then
 * persist everything in a single batch.
 *
 * Per-symbol failures are logged and skipped. Rejects with
 * {@link NoDataFetchedError} when every symbol came back empty, and with the
 * store's PersistenceError when the batch cannot be written.
 */
export const runIngestion = async (deps: IngestionDependencies): Promise<RunSummary> => {
  const now = deps.now ?? (() => new Date());
  const runId = deps.runId ?? randomUUID();
  const logger = (deps.logger ?? createLogger("ingest-worker/pipeline")).child({ runId });
  const sleep = deps.sleep ?? defaultSleep;
  const normalize = deps.normalize ?? normalizeDailySeries;
  const symbolDelayMs = deps.symbolDelayMs ?? DEFAULT_SYMBOL_DELAY_MS;
  const startedAt = now().toISOString();

  const bars: PriceBar[] = [];
  const failedSymbols: string[] = [];
  let symbolsSucceeded = 0;

  for (const [index, symbol] of deps.symbols.entries()) {
    logger.info("Fetching symbol", {
      symbol,
      position: index + 1,
      total: deps.symbols.length,
    });

    const symbolBars = await collectSymbol(symbol, deps.source, normalize, logger);
    if (symbolBars.length > 0) {
      symbolsSucceeded += 1;
      bars.push(...symbolBars);
    } else {
      failedSymbols.push(symbol);
    }

    if (index < deps.symbols.length - 1) {
      await sleep(symbolDelayMs);
    }
  }

  logger.info("Total bars fetched", { bars: bars.length, symbolsSucceeded });

  if (symbolsSucceeded === 0) {
    throw new NoDataFetchedError(deps.symbols);
  }

  const persisted = await deps.store.upsertBatch(bars);
  logger.info("Upserted bars", { bars: persisted });

  return {
    runId,
    startedAt,
    finishedAt: now().toISOString(),
    symbolsRequested: deps.symbols.length,
    symbolsSucceeded,
    failedSymbols,
    barsFetched: bars.length,
    barsPersisted: persisted,
  };
};

const collectSymbol = async (
  symbol: string,
  source: IDailySeriesSource,
  normalize: typeof normalizeDailySeries,
  logger: Logger,
): Promise<PriceBar[]> => {
  try {
    const payload = await source.fetchDaily(symbol);
    if (!payload) {
      logger.warn("No data returned", { symbol });
      return [];
    }

    const bars = normalize(symbol, payload, logger);
    if (bars.length === 0) {
      logger.warn("Parsed 0 bars", { symbol });
    } else {
      logger.info("Parsed bars", { symbol, bars: bars.length });
    }
    return bars;
  } catch (error) {
    logger.error("Symbol failed", { symbol, error: describeError(error) });
    return [];
  }
};
