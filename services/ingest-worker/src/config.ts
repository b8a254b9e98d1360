import { z } from "zod";

import { IngestConfigSchema, formatIssues, type IngestConfig } from "@daybar/sdk";

import { DEFAULT_DB_PATH } from "./db/index.js";

const DEFAULT_BASE_URL = "https://www.alphavantage.co/query";
const DEFAULT_CRON = "0 6 * * *";

export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Blank values (`FOO=` in a .env file) count as unset so the default applies. */
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const seconds = (fallback: number) =>
  unsetIfBlank(z.coerce.number().nonnegative().default(fallback));
const count = (fallback: number) =>
  unsetIfBlank(z.coerce.number().int().positive().default(fallback));

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((value) => value === "true" || value === "1");

/** Environment variables understood by the worker, with their defaults. */
const EnvSchema = z.object({
  API_KEY: z.string().trim().min(1, "API_KEY is required"),
  STOCK_SYMBOLS: z
    .string()
    .default("AAPL")
    .transform((value) =>
      value
        .split(",")
        .map((symbol) => symbol.trim())
        .filter((symbol) => symbol.length > 0),
    )
    .refine((symbols) => symbols.length > 0, "STOCK_SYMBOLS must list at least one symbol"),
  ALPHA_VANTAGE_BASE_URL: unsetIfBlank(z.string().url().default(DEFAULT_BASE_URL)),
  FETCH_TIMEOUT: unsetIfBlank(z.coerce.number().positive().default(15)),
  FETCH_MAX_RETRIES: count(5),
  FETCH_BACKOFF_BASE: seconds(1),
  DB_MAX_RETRIES: count(3),
  DB_BACKOFF_BASE: seconds(1),
  DB_BATCH_SIZE: count(200),
  API_POLITE_DELAY_SEC: seconds(12),
  DAG_SCHEDULE_CRON: unsetIfBlank(z.string().trim().min(1).default(DEFAULT_CRON)),
  DATABASE_PATH: unsetIfBlank(z.string().trim().min(1).default(DEFAULT_DB_PATH)),
  LOG_LEVEL: unsetIfBlank(
    z
      .string()
      .default("info")
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(["debug", "info", "warn", "error"])),
  ),
  INGEST_RUN_ON_START: flag,
});

const toMs = (secondsValue: number): number => Math.round(secondsValue * 1000);

/**
 * Builds the typed worker configuration from environment variables.
 * Throws {@link ConfigError} listing every invalid or missing variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): IngestConfig => {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
  }
  const vars = parsedEnv.data;

  const candidate: IngestConfig = {
    apiKey: vars.API_KEY,
    symbols: vars.STOCK_SYMBOLS,
    baseUrl: vars.ALPHA_VANTAGE_BASE_URL,
    fetch: {
      timeoutMs: toMs(vars.FETCH_TIMEOUT),
      maxRetries: vars.FETCH_MAX_RETRIES,
      backoffBaseMs: toMs(vars.FETCH_BACKOFF_BASE),
    },
    store: {
      maxRetries: vars.DB_MAX_RETRIES,
      backoffBaseMs: toMs(vars.DB_BACKOFF_BASE),
      batchSize: vars.DB_BATCH_SIZE,
    },
    symbolDelayMs: toMs(vars.API_POLITE_DELAY_SEC),
    cron: vars.DAG_SCHEDULE_CRON,
    runOnStart: vars.INGEST_RUN_ON_START,
    databasePath: vars.DATABASE_PATH,
    logLevel: vars.LOG_LEVEL,
  };

  const checked = IngestConfigSchema.safeParse(candidate);
  if (!checked.success) {
    throw new ConfigError(`Invalid ingest config: ${formatIssues(checked.error)}`);
  }
  return checked.data;
};
