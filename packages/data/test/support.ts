import type { LogLevel, LogMeta, Logger } from "@daybar/logger";

import type { HttpClient, HttpRequestOptions, HttpResponse } from "../src/httpClient.js";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly meta: LogMeta;
}

/**
 * Logger that keeps entries in memory so tests can assert on them quietly.
 */
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

export type ScriptedReply = HttpResponse | Error;

export const jsonReply = (body: unknown, statusCode = 200): HttpResponse => ({
  statusCode,
  body: typeof body === "string" ? body : JSON.stringify(body),
  headers: { "content-type": "application/json" },
});

/**
 * Replays canned responses in order; the last one repeats once the script runs out.
 */
export class ScriptedHttpClient implements HttpClient {
  public readonly calls: Array<{ url: string; options?: HttpRequestOptions }> = [];

  public constructor(private readonly script: ReadonlyArray<ScriptedReply>) {}

  public async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    this.calls.push({ url, options });
    const index = Math.min(this.calls.length - 1, this.script.length - 1);
    const reply = this.script[index];
    if (reply === undefined) {
      throw new Error("ScriptedHttpClient has no replies");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export const recordingSleep = (): { sleep: (ms: number) => Promise<void>; delays: number[] } => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number): Promise<void> => {
      delays.push(ms);
    },
  };
};
