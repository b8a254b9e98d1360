import type { AlphaVantagePayload, IDailySeriesSource } from "@daybar/data";
import type { LogLevel, LogMeta, Logger } from "@daybar/logger";
import type { PriceBar } from "@daybar/sdk";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly meta: LogMeta;
}

export const createRecordingLogger = (
  entries: RecordedEntry[] = [],
  bindings: LogMeta = {},
): { logger: Logger; entries: RecordedEntry[] } => {
  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    entries.push({ level, msg, meta: { ...bindings, ...meta } });
  };
  const logger: Logger = {
    module: "test",
    level: "debug",
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) => createRecordingLogger(entries, { ...bindings, ...extra }).logger,
  };
  return { logger, entries };
};

export const recordingSleep = (): { sleep: (ms: number) => Promise<void>; delays: number[] } => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number): Promise<void> => {
      delays.push(ms);
    },
  };
};

export const makeBar = (overrides: Partial<PriceBar> = {}): PriceBar => ({
  symbol: "AAPL",
  timestamp: "2024-01-02",
  open: 10,
  high: 11,
  low: 9,
  close: 10.5,
  volume: 1000,
  raw: { "1. open": "10" },
  ...overrides,
});

/** Trading days 2024-01-01 onward, one per index, for bulk fixtures. */
export const makeBars = (count: number, symbol = "AAPL"): PriceBar[] =>
  Array.from({ length: count }, (_, index) => {
    const day = new Date(Date.UTC(2024, 0, 1 + index));
    return makeBar({ symbol, timestamp: day.toISOString().slice(0, 10) });
  });

export const dailyPayload = (
  days: Record<string, Record<string, string>>,
): AlphaVantagePayload => ({
  "Meta Data": { "1. Information": "Daily Time Series" },
  "Time Series (Daily)": days,
});

/**
 * Source answering from a fixed table; a symbol mapped to an Error rejects.
 */
export class FakeSource implements IDailySeriesSource {
  public readonly id = "fake";
  public readonly requested: string[] = [];

  public constructor(
    private readonly replies: Readonly<Record<string, AlphaVantagePayload | null | Error>>,
  ) {}

  public async fetchDaily(symbol: string): Promise<AlphaVantagePayload | null> {
    this.requested.push(symbol);
    const reply = this.replies[symbol];
    if (reply instanceof Error) {
      throw reply;
    }
    return reply ?? null;
  }
}
