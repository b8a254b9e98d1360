import { CronJob } from "cron";

import { createLogger, describeError, type Logger } from "@daybar/logger";
import type { RunSummary } from "@daybar/sdk";

export type RunOutcome =
  | { readonly status: "succeeded"; readonly summary: RunSummary }
  | { readonly status: "failed"; readonly error: string }
  | { readonly status: "skipped" };

export interface IngestSchedulerOptions {
  /** Five or six field cron expression. */
  readonly cron: string;
  readonly timeZone?: string;
  /** One full ingestion run; receives no input. */
  readonly run: () => Promise<RunSummary>;
  readonly logger?: Logger;
}

/**
 * Fires the ingestion run on a cron schedule. A tick that arrives while a run
 * is still going is skipped. Failed runs are logged and left for the next tick.
 */
export class IngestScheduler {
  private readonly job: CronJob;
  private readonly run: () => Promise<RunSummary>;
  private readonly logger: Logger;
  private readonly cron: string;
  private inFlight: Promise<RunOutcome> | null = null;

  public constructor(options: IngestSchedulerOptions) {
    this.run = options.run;
    this.cron = options.cron;
    this.logger = options.logger ?? createLogger("ingest-worker/scheduler");
    this.job = CronJob.from({
      cronTime: options.cron,
      onTick: () => {
        void this.trigger();
      },
      start: false,
      timeZone: options.timeZone ?? "UTC",
    });
  }

  public get isRunning(): boolean {
    return this.inFlight !== null;
  }

  public start(): void {
    this.job.start();
    this.logger.info("Scheduler started", {
      cron: this.cron,
      nextRunAt: this.nextRunAt().toISOString(),
    });
  }

  public stop(): void {
    this.job.stop();
  }

  public nextRunAt(): Date {
    return this.job.nextDate().toJSDate();
  }

  /**
   * Starts a run now unless one is already in progress. Never rejects.
   */
  public async trigger(): Promise<RunOutcome> {
    if (this.inFlight) {
      this.logger.warn("Previous run still in progress; skipping tick");
      return { status: "skipped" };
    }

    this.inFlight = this.execute();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async execute(): Promise<RunOutcome> {
    try {
      const summary = await this.run();
      this.logger.info("Run succeeded", {
        runId: summary.runId,
        barsPersisted: summary.barsPersisted,
        failedSymbols: summary.failedSymbols,
      });
      return { status: "succeeded", summary };
    } catch (error) {
      const message = describeError(error);
      this.logger.error("Run failed", {
        error: message,
        errorName: error instanceof Error ? error.name : undefined,
      });
      return { status: "failed", error: message };
    }
  }
}

/** Throws when `expression` is not a cron expression the scheduler accepts. */
export const assertCronExpression = (expression: string): void => {
  CronJob.from({ cronTime: expression, onTick: () => undefined, start: false, timeZone: "UTC" });
};
