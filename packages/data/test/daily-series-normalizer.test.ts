import { strict as assert } from "node:assert";
import test, { type TestContext } from "node:test";

import { normalizeDailySeries, toPriceBar } from "../src/dailySeriesNormalizer.js";
import { createRecordingLogger } from "./support.js";

test("normalizes a well formed trading day", () => {
  const { logger } = createRecordingLogger();
  const day = {
    "1. open": "10.5",
    "2. high": "11.0",
    "3. low": "10.0",
    "4. close": "10.8",
    "6. volume": "1000",
  };

  const bars = normalizeDailySeries("AAPL", { "Time Series (Daily)": { "2024-01-02": day } }, logger);

  assert.equal(bars.length, 1);
  const [bar] = bars;
  assert.deepEqual(
    {
      symbol: bar?.symbol,
      timestamp: bar?.timestamp,
      open: bar?.open,
      high: bar?.high,
      low: bar?.low,
      close: bar?.close,
      volume: bar?.volume,
    },
    {
      symbol: "AAPL",
      timestamp: "2024-01-02",
      open: 10.5,
      high: 11.0,
      low: 10.0,
      close: 10.8,
      volume: 1000,
    },
  );
  assert.equal(bar?.raw, day);
});

test("emits one bar per date entry in source order", () => {
  const { logger } = createRecordingLogger();
  const series: Record<string, Record<string, string>> = {};
  const dates = ["2024-01-05", "2024-01-02", "2024-01-04", "2024-01-03"];
  for (const date of dates) {
    series[date] = { "1. open": "1", "2. high": "2", "3. low": "0.5", "4. close": "1.5", "6. volume": "10" };
  }

  const bars = normalizeDailySeries("MSFT", { "Meta Data": {}, "Time Series (Daily)": series }, logger);

  assert.deepEqual(
    bars.map((bar) => bar.timestamp),
    dates,
  );
  assert.ok(bars.every((bar) => bar.symbol === "MSFT"));
});

test("accepts plain labels when numbered labels are absent", () => {
  const bar = toPriceBar("IBM", "2024-01-02", {
    open: "20",
    high: "21.5",
    low: "19.25",
    close: "21",
    volume: "42",
  });

  assert.equal(bar.open, 20);
  assert.equal(bar.high, 21.5);
  assert.equal(bar.low, 19.25);
  assert.equal(bar.close, 21);
  assert.equal(bar.volume, 42);
});

test("falls through empty numbered labels to plain labels", () => {
  const bar = toPriceBar("IBM", "2024-01-02", { "1. open": "", open: "7.5" });

  assert.equal(bar.open, 7.5);
});

test("substitutes zero for each unparseable field independently", () => {
  const bar = toPriceBar("IBM", "2024-01-02", {
    "1. open": "n/a",
    "2. high": "12.5",
    "3. low": "-3",
    "4. close": { nested: true },
    "6. volume": "12.7",
  });

  assert.equal(bar.open, 0);
  assert.equal(bar.high, 12.5);
  assert.equal(bar.low, 0);
  assert.equal(bar.close, 0);
  assert.equal(bar.volume, 0);
});

test("missing fields default to zero", () => {
  const bar = toPriceBar("IBM", "2024-01-02", {});

  assert.deepEqual(
    [bar.open, bar.high, bar.low, bar.close, bar.volume],
    [0, 0, 0, 0, 0],
  );
});

test("numeric field values are accepted as-is", () => {
  const bar = toPriceBar("IBM", "2024-01-02", { "1. open": 3.25, "6. volume": 500 });

  assert.equal(bar.open, 3.25);
  assert.equal(bar.volume, 500);
});

test("skips a malformed day and keeps the rest", () => {
  const { logger, entries } = createRecordingLogger();
  const payload = {
    "Time Series (Daily)": {
      "2024-01-04": { "4. close": "12" },
      "2024-01-03": "garbage",
      "2024-01-02": ["not", "a", "mapping"],
      "2024-01-01": { "4. close": "10" },
    },
  };

  const bars = normalizeDailySeries("AAPL", payload, logger);

  assert.deepEqual(
    bars.map((bar) => [bar.timestamp, bar.close]),
    [
      ["2024-01-04", 12],
      ["2024-01-01", 10],
    ],
  );
  const skipped = entries.filter((entry) => entry.msg === "Skipping malformed trading day");
  assert.deepEqual(
    skipped.map((entry) => entry.meta.timestamp),
    ["2024-01-03", "2024-01-02"],
  );
});

test("returns no bars when the time series block is missing", () => {
  const { logger, entries } = createRecordingLogger();

  const bars = normalizeDailySeries("AAPL", { "Meta Data": {} }, logger);

  assert.deepEqual(bars, []);
  assert.equal(entries[0]?.level, "error");
  assert.equal(entries[0]?.msg, "No time series block in payload");
});

test("returns no bars when the time series block is not an object", () => {
  const { logger } = createRecordingLogger();

  assert.deepEqual(normalizeDailySeries("AAPL", { "Time Series (Daily)": "oops" }, logger), []);
});

test("trims the symbol on every bar", () => {
  const { logger } = createRecordingLogger();

  const bars = normalizeDailySeries(
    " AAPL ",
    { "Time Series (Daily)": { "2024-01-02": { "4. close": "1" } } },
    logger,
  );

  assert.equal(bars[0]?.symbol, "AAPL");
});

const captureStdout = (t: TestContext): string[] => {
  const lines: string[] = [];
  const originalWrite = process.stdout.write.bind(process.stdout);
  process.stdout.write = (chunk: string | Uint8Array): boolean => {
    lines.push(chunk.toString());
    return true;
  };
  t.after(() => {
    process.stdout.write = originalWrite;
  });
  return lines;
};

test("the default logger honours a LOG_LEVEL set after import", (t) => {
  const previous = process.env.LOG_LEVEL;
  process.env.LOG_LEVEL = "error";
  t.after(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });
  const lines = captureStdout(t);

  const bars = normalizeDailySeries("AAPL", {
    "Time Series (Daily)": { "2024-01-02": "not a mapping", "2024-01-03": { "4. close": "5" } },
  });

  assert.equal(bars.length, 1);
  assert.deepEqual(lines, []);
});
