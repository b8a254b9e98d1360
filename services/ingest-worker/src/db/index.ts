import sqlite3 from "sqlite3";
import { createLogger, describeError, type Logger } from "@daybar/logger";
import { open, type Database as SQLiteDatabase } from "sqlite";
import { mkdirSync, readFileSync } from "node:fs";
import { dirname, join, normalize } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..", "..");
export const DEFAULT_DB_PATH = join(REPO_ROOT, "storage", "stock_data.sqlite");
const SCHEMA_PATH = join(REPO_ROOT, "services", "ingest-worker", "src", "db", "schema.sql");

export type SqliteInstance = SQLiteDatabase<sqlite3.Database, sqlite3.Statement>;

export interface PriceBarDatabaseOptions {
  readonly filename?: string;
  readonly logger?: Logger;
}

/** Column values for one `stock_data` row, `raw` already serialized. */
export interface PriceBarRow {
  readonly symbol: string;
  readonly ts: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly raw: string | null;
}

export interface StoredPriceBar extends PriceBarRow {
  readonly id: number;
}

const UPSERT_SQL = `insert into stock_data (symbol, ts, open, high, low, close, volume, raw)
     values (:symbol, :ts, :open, :high, :low, :close, :volume, :raw)
on conflict (symbol, ts) do update
        set open = excluded.open,
            high = excluded.high,
            low = excluded.low,
            close = excluded.close,
            volume = excluded.volume,
            raw = excluded.raw`;

export class PriceBarDatabase {
  private readonly logger: Logger;

  public constructor(
    private readonly db: SqliteInstance,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger("ingest-worker/db");
  }

  /**
   * Writes every row in one transaction. Rows whose `(symbol, ts)` already
   * exists have all measurement columns replaced. Nothing is kept on failure.
   */
  public async upsertChunk(rows: ReadonlyArray<PriceBarRow>): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    await this.db.exec("begin immediate transaction");
    try {
      const statement = await this.db.prepare(UPSERT_SQL);
      try {
        for (const row of rows) {
          await statement.run({
            ":symbol": row.symbol,
            ":ts": row.ts,
            ":open": row.open,
            ":high": row.high,
            ":low": row.low,
            ":close": row.close,
            ":volume": row.volume,
            ":raw": row.raw,
          });
        }
      } finally {
        await statement.finalize();
      }
      await this.db.exec("commit");
    } catch (error) {
      await this.rollbackAfter(error);
      throw error;
    }
  }

  /**
   * SQLite ends the transaction on its own for some failures (`RAISE(ROLLBACK)`,
   * full disk, I/O errors), so the explicit rollback may find nothing to undo.
   * Its failure is logged and the original error stays the one reported.
   */
  private async rollbackAfter(cause: unknown): Promise<void> {
    try {
      await this.db.exec("rollback");
    } catch (rollbackError) {
      this.logger.warn("Rollback after failed chunk write did not run", {
        error: describeError(cause),
        rollbackError: describeError(rollbackError),
      });
    }
  }

  public async getBar(symbol: string, ts: string): Promise<StoredPriceBar | undefined> {
    return this.db.get<StoredPriceBar>(
      `select id, symbol, ts, open, high, low, close, volume, raw
         from stock_data
        where symbol = :symbol
          and ts = :ts`,
      { ":symbol": symbol, ":ts": ts },
    );
  }

  public async listBars(symbol: string): Promise<StoredPriceBar[]> {
    return this.db.all<StoredPriceBar[]>(
      `select id, symbol, ts, open, high, low, close, volume, raw
         from stock_data
        where symbol = :symbol
     order by ts asc`,
      { ":symbol": symbol },
    );
  }

  public async countBars(symbol?: string): Promise<number> {
    const row =
      symbol === undefined
        ? await this.db.get<{ total: number }>(`select count(*) as total from stock_data`)
        : await this.db.get<{ total: number }>(
            `select count(*) as total from stock_data where symbol = :symbol`,
            { ":symbol": symbol },
          );
    return row?.total ?? 0;
  }

  public async close(): Promise<void> {
    await this.db.close();
  }
}

/**
 * Opens (creating if needed) the sqlite file and applies the schema. Create one
 * per process and share it; each chunk write takes and releases its own
 * transaction.
 */
export const createPriceBarDatabase = async (
  options: PriceBarDatabaseOptions = {},
): Promise<PriceBarDatabase> => {
  const filename = normalize(options.filename ?? DEFAULT_DB_PATH);
  if (filename !== ":memory:") {
    mkdirSync(dirname(filename), { recursive: true });
  }

  const db = await open({
    filename,
    driver: sqlite3.Database,
  });

  await db.exec("pragma journal_mode = WAL;");
  await db.exec("pragma busy_timeout = 5000;");
  await applySchema(db);

  return new PriceBarDatabase(db, options.logger);
};

/** Creates the `stock_data` table and its indexes when missing. */
export const applySchema = async (db: SqliteInstance): Promise<void> => {
  const schema = readFileSync(SCHEMA_PATH, "utf-8");
  await db.exec(schema);
};
