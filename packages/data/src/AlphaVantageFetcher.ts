import { createLogger, describeError, type Logger } from "@daybar/logger";

import type { AlphaVantagePayload, IDailySeriesSource } from "./IDataSource.js";
import { computeBackoffMs, defaultSleep, type Sleep } from "./backoff.js";
import { createHttpClient, type HttpClient, type HttpResponse } from "./httpClient.js";
import { findTimeSeriesKey, isRecord, previewKeys } from "./internalUtils.js";

export const DEFAULT_BASE_URL = "https://www.alphavantage.co/query";
export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_BACKOFF_BASE_MS = 1_000;
const BACKOFF_JITTER = 0.2;

/** Keys Alpha Vantage uses to signal throttling instead of an HTTP 429. */
const RATE_LIMIT_KEYS = ["Note", "Information"] as const;
const ERROR_MESSAGE_KEY = "Error Message";

export interface AlphaVantageFetcherOptions {
  readonly apiKey?: string;
  readonly baseUrl?: string;
  /** Shared transport; one client should serve every symbol of a run. */
  readonly httpClient?: HttpClient;
  readonly timeoutMs?: number;
  /** Total attempts per symbol, first one included. */
  readonly maxRetries?: number;
  readonly backoffBaseMs?: number;
  readonly sleep?: Sleep;
  readonly random?: () => number;
  readonly logger?: Logger;
}

/** Failure worth another attempt: network trouble, throttling, odd payloads. */
export class TransientFetchError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "TransientFetchError";
  }
}

/** Failure that retrying cannot fix: invalid symbol or undecodable body. */
export class PermanentFetchError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "PermanentFetchError";
  }
}

/**
 * Fetches TIME_SERIES_DAILY_ADJUSTED (compact) for one symbol with bounded,
 * jittered exponential retries. Never rejects: a symbol that cannot be fetched
 * resolves to null.
 */
export class AlphaVantageFetcher implements IDailySeriesSource {
  public readonly id = "alpha-vantage";

  private readonly apiKeyOverride?: string;
  private readonly baseUrl: string;
  private readonly httpClient: HttpClient;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger: Logger;

  public constructor(options: AlphaVantageFetcherOptions = {}) {
    this.apiKeyOverride = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.httpClient = options.httpClient ?? createHttpClient();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger("data/alpha-vantage");
  }

  public async fetchDaily(symbol: string): Promise<AlphaVantagePayload | null> {
    const apiKey = this.resolveApiKey();
    if (!apiKey) {
      this.logger.error("Alpha Vantage API key missing. Set API_KEY environment variable.");
      return null;
    }
    const trimmed = symbol.trim();
    if (!trimmed) {
      this.logger.error("Refusing to fetch an empty symbol");
      return null;
    }

    let lastError: unknown = null;
    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      this.logger.debug("Fetching daily series", {
        symbol: trimmed,
        attempt: attempt + 1,
      });
      try {
        return await this.requestOnce(trimmed, apiKey);
      } catch (error) {
        if (error instanceof PermanentFetchError) {
          this.logger.error("Permanent failure fetching daily series", {
            symbol: trimmed,
            error: error.message,
          });
          return null;
        }
        lastError = error;
        this.logger.warn("Transient failure fetching daily series", {
          symbol: trimmed,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          error: describeError(error),
        });
      }

      if (attempt + 1 < this.maxRetries) {
        await this.sleep(
          computeBackoffMs({
            baseMs: this.backoffBaseMs,
            exponent: attempt,
            jitter: BACKOFF_JITTER,
            random: this.random,
          }),
        );
      }
    }

    this.logger.error("Exhausted retries fetching daily series", {
      symbol: trimmed,
      attempts: this.maxRetries,
      error: describeError(lastError),
    });
    return null;
  }

  private async requestOnce(symbol: string, apiKey: string): Promise<AlphaVantagePayload> {
    const url = new URL(this.baseUrl);
    url.searchParams.set("function", "TIME_SERIES_DAILY_ADJUSTED");
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("outputsize", "compact");
    url.searchParams.set("apikey", apiKey);

    let response: HttpResponse;
    try {
      response = await this.httpClient.get(url.toString(), { timeoutMs: this.timeoutMs });
    } catch (error) {
      throw new TransientFetchError(`Network error for ${symbol}: ${describeError(error)}`);
    }

    if (response.statusCode >= 500 && response.statusCode < 600) {
      throw new TransientFetchError(`Server error ${response.statusCode} for ${symbol}`);
    }
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new TransientFetchError(`Unexpected status ${response.statusCode} for ${symbol}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      throw new PermanentFetchError(
        `Unable to parse Alpha Vantage response for ${symbol}: ${describeError(error)}`,
      );
    }
    if (!isRecord(payload)) {
      throw new PermanentFetchError(`Alpha Vantage returned a non-object body for ${symbol}`);
    }

    for (const key of RATE_LIMIT_KEYS) {
      if (key in payload) {
        throw new TransientFetchError(
          `Rate limit or notice for ${symbol}: ${String(payload[key]).slice(0, 200)}`,
        );
      }
    }

    if (ERROR_MESSAGE_KEY in payload) {
      throw new PermanentFetchError(
        `API error for ${symbol}: ${String(payload[ERROR_MESSAGE_KEY]).slice(0, 200)}`,
      );
    }

    if (findTimeSeriesKey(payload) === null) {
      throw new TransientFetchError(
        `Unexpected response structure for ${symbol}. Keys: ${JSON.stringify(previewKeys(payload))}`,
      );
    }

    return payload;
  }

  private resolveApiKey(): string {
    return this.apiKeyOverride ?? process.env.API_KEY ?? "";
  }
}

export const createAlphaVantageFetcher = (
  options?: AlphaVantageFetcherOptions,
): AlphaVantageFetcher => {
  return new AlphaVantageFetcher(options);
};
