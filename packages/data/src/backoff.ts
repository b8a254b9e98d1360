export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};

export interface BackoffOptions {
  readonly baseMs: number;
  /** Exponent applied to 2; callers decide whether attempts count from 0 or 1. */
  readonly exponent: number;
  /** Relative spread, e.g. 0.2 for a multiplier drawn from [0.8, 1.2). */
  readonly jitter?: number;
  /** Uniform source in [0, 1). */
  readonly random?: () => number;
}

/**
 * Exponential delay `baseMs * 2^exponent`, optionally scaled by a jitter
 * multiplier in `[1 - jitter, 1 + jitter)`.
 */
export const computeBackoffMs = (options: BackoffOptions): number => {
  const delay = options.baseMs * 2 ** options.exponent;
  const jitter = options.jitter ?? 0;
  if (jitter <= 0) {
    return delay;
  }
  const random = options.random ?? Math.random;
  return delay * (1 - jitter + 2 * jitter * random());
};
