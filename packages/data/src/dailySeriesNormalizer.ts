import { z } from "zod";

import { createLogger, type Logger } from "@daybar/logger";
import { formatIssues, type PriceBar } from "@daybar/sdk";

import type { AlphaVantagePayload } from "./IDataSource.js";
import {
  findTimeSeriesKey,
  isRecord,
  parsePriceField,
  parseVolumeField,
  type LooseRecord,
} from "./internalUtils.js";

const OPEN_LABELS = ["1. open", "open"] as const;
const HIGH_LABELS = ["2. high", "high"] as const;
const LOW_LABELS = ["3. low", "low"] as const;
const CLOSE_LABELS = ["4. close", "close"] as const;
const VOLUME_LABELS = ["6. volume", "volume"] as const;

const DayValuesSchema = z.record(z.string(), z.unknown());

let defaultLogger: Logger | undefined;

// Built on first use so LOG_LEVEL loaded from .env after import still applies.
const getDefaultLogger = (): Logger => {
  defaultLogger ??= createLogger("data/normalizer");
  return defaultLogger;
};

/**
 * Builds one bar from a single trading-day mapping. Individual fields that
 * fail to parse fall back to 0.
 */
export const toPriceBar = (
  symbol: string,
  timestamp: string,
  values: LooseRecord,
  raw: unknown = values,
): PriceBar => {
  return {
    symbol,
    timestamp,
    open: parsePriceField(values, OPEN_LABELS),
    high: parsePriceField(values, HIGH_LABELS),
    low: parsePriceField(values, LOW_LABELS),
    close: parsePriceField(values, CLOSE_LABELS),
    volume: parseVolumeField(values, VOLUME_LABELS),
    raw,
  };
};

/**
 * Converts a daily time-series payload into bars, one per trading day, in the
 * order the payload lists them. Malformed days are skipped; a payload without
 * a time-series block yields no bars.
 */
export const normalizeDailySeries = (
  symbol: string,
  payload: AlphaVantagePayload,
  logger: Logger = getDefaultLogger(),
): PriceBar[] => {
  const trimmedSymbol = symbol.trim();
  const seriesKey = findTimeSeriesKey(payload);
  if (seriesKey === null) {
    logger.error("No time series block in payload", {
      symbol: trimmedSymbol,
      keys: Object.keys(payload).slice(0, 5),
    });
    return [];
  }

  const series = payload[seriesKey];
  if (!isRecord(series)) {
    logger.error("Time series block is not an object", {
      symbol: trimmedSymbol,
      seriesKey,
    });
    return [];
  }

  const bars: PriceBar[] = [];
  for (const [timestamp, values] of Object.entries(series)) {
    const parsed = DayValuesSchema.safeParse(values);
    if (!parsed.success || timestamp.trim().length === 0) {
      logger.warn("Skipping malformed trading day", {
        symbol: trimmedSymbol,
        timestamp,
        error: parsed.success ? "empty date key" : formatIssues(parsed.error),
      });
      continue;
    }
    bars.push(toPriceBar(trimmedSymbol, timestamp, parsed.data, values));
  }
  return bars;
};
