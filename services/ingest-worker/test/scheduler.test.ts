import { strict as assert } from "node:assert";
import test from "node:test";

import type { RunSummary } from "@daybar/sdk";

import { IngestScheduler, assertCronExpression } from "../src/scheduler.js";
import { createRecordingLogger } from "./support.js";

const summary: RunSummary = {
  runId: "run-1",
  startedAt: "2024-01-10T06:00:00.000Z",
  finishedAt: "2024-01-10T06:00:30.000Z",
  symbolsRequested: 1,
  symbolsSucceeded: 1,
  failedSymbols: [],
  barsFetched: 2,
  barsPersisted: 2,
};

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

test("trigger reports a successful run", async () => {
  const { logger, entries } = createRecordingLogger();
  const scheduler = new IngestScheduler({ cron: "0 6 * * *", run: async () => summary, logger });

  const outcome = await scheduler.trigger();

  assert.deepEqual(outcome, { status: "succeeded", summary });
  const info = entries.find((entry) => entry.msg === "Run succeeded");
  assert.deepEqual(info?.meta, { runId: "run-1", barsPersisted: 2, failedSymbols: [] });
});

test("trigger absorbs a failed run and logs it", async () => {
  const { logger, entries } = createRecordingLogger();
  const scheduler = new IngestScheduler({
    cron: "0 6 * * *",
    run: async () => {
      throw new TypeError("store unavailable");
    },
    logger,
  });

  const outcome = await scheduler.trigger();

  assert.deepEqual(outcome, { status: "failed", error: "store unavailable" });
  const failure = entries.find((entry) => entry.msg === "Run failed");
  assert.equal(failure?.level, "error");
  assert.deepEqual(failure?.meta, { error: "store unavailable", errorName: "TypeError" });
  assert.equal(scheduler.isRunning, false);
});

test("a tick during a running ingestion is skipped", async () => {
  const { logger, entries } = createRecordingLogger();
  const gate = deferred<RunSummary>();
  let runs = 0;
  const scheduler = new IngestScheduler({
    cron: "0 6 * * *",
    run: () => {
      runs += 1;
      return gate.promise;
    },
    logger,
  });

  const first = scheduler.trigger();
  assert.equal(scheduler.isRunning, true);

  const second = await scheduler.trigger();
  assert.deepEqual(second, { status: "skipped" });
  assert.equal(entries.at(-1)?.msg, "Previous run still in progress; skipping tick");

  gate.resolve(summary);
  assert.deepEqual(await first, { status: "succeeded", summary });
  assert.equal(runs, 1);
  assert.equal(scheduler.isRunning, false);

  assert.deepEqual((await scheduler.trigger()).status, "succeeded");
  assert.equal(runs, 2);
});

test("nextRunAt follows the cron expression in UTC", () => {
  const scheduler = new IngestScheduler({
    cron: "0 6 * * *",
    run: async () => summary,
    logger: createRecordingLogger().logger,
  });

  const before = Date.now();
  const next = scheduler.nextRunAt();

  assert.equal(next.getUTCHours(), 6);
  assert.equal(next.getUTCMinutes(), 0);
  assert.ok(next.getTime() > before);
  assert.ok(next.getTime() - before <= 24 * 60 * 60 * 1000);
});

test("start logs the next run and stop halts the job", (t) => {
  const { logger, entries } = createRecordingLogger();
  const scheduler = new IngestScheduler({ cron: "0 6 * * *", run: async () => summary, logger });
  t.after(() => {
    scheduler.stop();
  });

  scheduler.start();

  const started = entries.find((entry) => entry.msg === "Scheduler started");
  assert.equal(started?.meta.cron, "0 6 * * *");
  assert.equal(typeof started?.meta.nextRunAt, "string");
});

test("an invalid cron expression is rejected when the scheduler is created", () => {
  assert.throws(
    () =>
      new IngestScheduler({
        cron: "every morning",
        run: async () => summary,
        logger: createRecordingLogger().logger,
      }),
  );
  assert.throws(() => assertCronExpression("61 * * * *"));
  assert.doesNotThrow(() => assertCronExpression("*/15 9-17 * * 1-5"));
});
