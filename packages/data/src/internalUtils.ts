/**
 * Shared helpers used by the fetcher and the normalizer to read loosely typed
 * upstream payloads.
 */

/** Key prefix shared by every Alpha Vantage time-series block. */
export const TIME_SERIES_PREFIX = "Time Series";

export type LooseRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is LooseRecord => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

/**
 * Returns the first key that starts with {@link TIME_SERIES_PREFIX}, or null.
 */
export const findTimeSeriesKey = (payload: LooseRecord): string | null => {
  return Object.keys(payload).find((key) => key.startsWith(TIME_SERIES_PREFIX)) ?? null;
};

/**
 * First value among `labels` that is present and not an empty string.
 * Mirrors the upstream mixing numbered ("1. open") and plain ("open") labels.
 */
const pickLabelled = (values: LooseRecord, labels: ReadonlyArray<string>): unknown => {
  for (const label of labels) {
    const value = values[label];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    return value;
  }
  return undefined;
};

const toPrice = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
  }
  return null;
};

const toVolume = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!/^\d+$/u.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
};

/**
 * Reads a price under the first usable label. Falls back to `fallback` when
 * nothing parses to a finite, non-negative number.
 */
export const parsePriceField = (
  values: LooseRecord,
  labels: ReadonlyArray<string>,
  fallback = 0,
): number => {
  return toPrice(pickLabelled(values, labels)) ?? fallback;
};

/**
 * Reads a share count under the first usable label. Falls back to `fallback`
 * when the value is not a non-negative integer.
 */
export const parseVolumeField = (
  values: LooseRecord,
  labels: ReadonlyArray<string>,
  fallback = 0,
): number => {
  return toVolume(pickLabelled(values, labels)) ?? fallback;
};

/** Key listing used in log metadata; upstream error bodies can be large. */
export const previewKeys = (payload: LooseRecord, limit = 5): string[] => {
  return Object.keys(payload).slice(0, limit);
};
