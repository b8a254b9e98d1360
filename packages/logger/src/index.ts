export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly runId?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /**
   * Returns a logger that merges `bindings` into every entry it writes.
   * Per-call metadata wins over bindings with the same key.
   */
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  /** Minimum level written. Defaults to `LOG_LEVEL` from the environment, then "info". */
  readonly level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
};

const resolveLevel = (explicit?: LogLevel): LogLevel => {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const writeLine = (level: LogLevel, line: string): void => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { runId, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...rest,
  };
};

const buildLogger = (moduleName: string, minLevel: LogLevel, bindings: LogMeta): Logger => {
  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, { ...bindings, ...meta });
    writeLine(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    level: minLevel,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) => buildLogger(moduleName, minLevel, { ...bindings, ...extra }),
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  return buildLogger(moduleName, resolveLevel(options.level), {});
};

/**
 * Flattens an unknown thrown value into something safe to put in log metadata.
 */
export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
