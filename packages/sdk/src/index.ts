// Shared shapes for the daily bar ingestion pipeline.
// Every workspace imports its record and config types from here.

import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Shared primitives
 *  -------------------------------------------------------------------- */

/** Trading-day key exactly as the upstream API reports it (e.g. "2024-01-02"). */
export type TradingDay = string;

/** ISO-8601 timestamp string (UTC). */
export type ISODate = string;

/** Minimum severity written by the structured logger. */
export type LogLevelName = "debug" | "info" | "warn" | "error";

/** -----------------------------------------------------------------------
 *  PriceBar
 *  -------------------------------------------------------------------- */

/**
 * One daily observation for one symbol.
 * `(symbol, timestamp)` is the natural key; a later write for the same key
 * replaces every measurement field of the earlier one.
 */
export interface PriceBar {
  /** Ticker as provided by the source, trimmed. */
  readonly symbol: string;
  /** Trading day the bar describes. */
  readonly timestamp: TradingDay;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  /** Shares traded; always a non-negative integer. */
  readonly volume: number;
  /** The upstream per-day mapping the bar was built from, kept for audit. */
  readonly raw: unknown;
}

/** Runtime validator for {@link PriceBar}. */
export const PriceBarSchema = z.object({
  symbol: z.string().trim().min(1),
  timestamp: z.string().min(1),
  open: z.number().finite().nonnegative(),
  high: z.number().finite().nonnegative(),
  low: z.number().finite().nonnegative(),
  close: z.number().finite().nonnegative(),
  volume: z.number().int().nonnegative(),
  raw: z.unknown(),
});

/** -----------------------------------------------------------------------
 *  IngestConfig
 *  -------------------------------------------------------------------- */

/**
 * Typed runtime configuration for one ingestion worker process.
 * Durations are milliseconds.
 */
export interface IngestConfig {
  readonly apiKey: string;
  /** Symbols processed strictly in this order. */
  readonly symbols: ReadonlyArray<string>;
  readonly baseUrl: string;
  readonly fetch: {
    readonly timeoutMs: number;
    /** Total attempts per symbol, first one included. */
    readonly maxRetries: number;
    readonly backoffBaseMs: number;
  };
  readonly store: {
    /** Total attempts per chunk, first one included. */
    readonly maxRetries: number;
    readonly backoffBaseMs: number;
    readonly batchSize: number;
  };
  /** Pause between two consecutive symbol fetches. */
  readonly symbolDelayMs: number;
  /** Cron expression evaluated in UTC. */
  readonly cron: string;
  readonly runOnStart: boolean;
  readonly databasePath: string;
  readonly logLevel: LogLevelName;
}

/** Runtime validator for {@link IngestConfig}. */
export const IngestConfigSchema = z.object({
  apiKey: z.string().min(1),
  symbols: z.array(z.string().trim().min(1)).min(1),
  baseUrl: z.string().url(),
  fetch: z.object({
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().positive(),
    backoffBaseMs: z.number().nonnegative(),
  }),
  store: z.object({
    maxRetries: z.number().int().positive(),
    backoffBaseMs: z.number().nonnegative(),
    batchSize: z.number().int().positive(),
  }),
  symbolDelayMs: z.number().nonnegative(),
  cron: z.string().min(1),
  runOnStart: z.boolean(),
  databasePath: z.string().min(1),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
});

/** -----------------------------------------------------------------------
 *  RunSummary
 *  -------------------------------------------------------------------- */

/** Outcome of one completed ingestion run. */
export interface RunSummary {
  readonly runId: string;
  readonly startedAt: ISODate;
  readonly finishedAt: ISODate;
  readonly symbolsRequested: number;
  readonly symbolsSucceeded: number;
  /** Symbols that yielded no bars this run, in processing order. */
  readonly failedSymbols: ReadonlyArray<string>;
  readonly barsFetched: number;
  /** Rows sent to the store; not a count of rows the database changed. */
  readonly barsPersisted: number;
}

/** Runtime validator for {@link RunSummary}. */
export const RunSummarySchema = z.object({
  runId: z.string().min(1),
  startedAt: z.string().min(1),
  finishedAt: z.string().min(1),
  symbolsRequested: z.number().int().nonnegative(),
  symbolsSucceeded: z.number().int().nonnegative(),
  failedSymbols: z.array(z.string()),
  barsFetched: z.number().int().nonnegative(),
  barsPersisted: z.number().int().nonnegative(),
});

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Parses `value` with `schema`, throwing an Error that lists every issue.
 */
export function assertValid<T>(schema: z.ZodType<T>, value: unknown, label = "payload"): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${label}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Renders zod issues as `path: message` pairs joined by "; ". */
export const formatIssues = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
};

/** Namespaced access to the primary schemas. */
export const Schemas = {
  PriceBar: PriceBarSchema,
  IngestConfig: IngestConfigSchema,
  RunSummary: RunSummarySchema,
};
