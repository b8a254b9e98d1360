import { computeBackoffMs, defaultSleep, type Sleep } from "@daybar/data";
import { createLogger, describeError, type Logger } from "@daybar/logger";
import type { PriceBar } from "@daybar/sdk";

import type { PriceBarDatabase, PriceBarRow } from "./db/index.js";

export const DEFAULT_BATCH_SIZE = 200;
export const DEFAULT_STORE_MAX_RETRIES = 3;
export const DEFAULT_STORE_BACKOFF_BASE_MS = 1_000;

/** Error codes that point at a connection or lock problem rather than bad data. */
const RECOVERABLE_CODES = new Set([
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_IOERR",
  "SQLITE_CANTOPEN",
  "SQLITE_PROTOCOL",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
]);

export type ChunkWriter = Pick<PriceBarDatabase, "upsertChunk">;

export interface PriceBarStoreOptions {
  readonly database: ChunkWriter;
  readonly batchSize?: number;
  /** Total attempts per chunk, first one included. */
  readonly maxRetries?: number;
  readonly backoffBaseMs?: number;
  readonly sleep?: Sleep;
  readonly logger?: Logger;
}

export class PersistenceError extends Error {
  public constructor(
    message: string,
    public readonly chunkIndex: number,
    public readonly chunkSize: number,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(message, { cause });
    this.name = "PersistenceError";
  }
}

export const isRecoverableDbError = (error: unknown): boolean => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return typeof error.code === "string" && RECOVERABLE_CODES.has(error.code);
};

/**
 * Text form of a bar's raw payload: strings pass through, everything else is
 * JSON, and values JSON cannot express fall back to `String()`.
 */
export const serializeRaw = (raw: unknown): string | null => {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === "string") {
    return raw;
  }
  try {
    const json: string | undefined = JSON.stringify(raw);
    return json ?? String(raw);
  } catch {
    return String(raw);
  }
};

export const toRow = (bar: PriceBar): PriceBarRow => ({
  symbol: bar.symbol,
  ts: bar.timestamp,
  open: bar.open,
  high: bar.high,
  low: bar.low,
  close: bar.close,
  volume: bar.volume,
  raw: serializeRaw(bar.raw),
});

/**
 * Chunked, retried bulk upsert of price bars keyed by `(symbol, timestamp)`.
 */
export class PriceBarStore {
  private readonly database: ChunkWriter;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  public constructor(options: PriceBarStoreOptions) {
    this.database = options.database;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_STORE_MAX_RETRIES);
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_STORE_BACKOFF_BASE_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger("ingest-worker/store");
  }

  /**
   * Upserts every record and resolves to the number of records sent.
   * Rejects with {@link PersistenceError} as soon as one chunk exhausts its
   * attempts; chunks committed before it stay committed.
   */
  public async upsertBatch(records: ReadonlyArray<PriceBar>): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    const rows = records.map(toRow);
    const chunkCount = Math.ceil(rows.length / this.batchSize);
    let total = 0;

    for (let index = 0; index < chunkCount; index += 1) {
      const chunk = rows.slice(index * this.batchSize, (index + 1) * this.batchSize);
      await this.writeChunk(chunk, index + 1, chunkCount);
      total += chunk.length;
    }

    this.logger.info("Completed upsert", { rows: total, chunks: chunkCount });
    return total;
  }

  private async writeChunk(
    chunk: ReadonlyArray<PriceBarRow>,
    chunkIndex: number,
    chunkCount: number,
  ): Promise<void> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.database.upsertChunk(chunk);
        this.logger.info("Upserted chunk", { chunk: chunkIndex, chunks: chunkCount, rows: chunk.length });
        return;
      } catch (error) {
        const meta = {
          chunk: chunkIndex,
          rows: chunk.length,
          attempt,
          maxRetries: this.maxRetries,
          error: describeError(error),
        };
        if (isRecoverableDbError(error)) {
          this.logger.warn("Recoverable database error on chunk upsert", meta);
        } else {
          this.logger.error("Error upserting chunk", meta);
        }

        if (attempt >= this.maxRetries) {
          throw new PersistenceError(
            `Failed to upsert chunk ${chunkIndex} (${chunk.length} rows) after ${attempt} attempts: ${describeError(error)}`,
            chunkIndex,
            chunk.length,
            attempt,
            error,
          );
        }
        await this.sleep(computeBackoffMs({ baseMs: this.backoffBaseMs, exponent: attempt }));
      }
    }
  }
}
