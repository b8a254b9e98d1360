/**
 * Decoded Alpha Vantage response body. Only its top-level shape is checked by
 * the fetcher; the normalizer reads the nested time-series block.
 */
export type AlphaVantagePayload = Readonly<Record<string, unknown>>;

/**
 * Generic contract for fetching one symbol's daily series.
 * Resolves to null when the symbol yields no usable payload this run.
 */
export interface IDailySeriesSource {
  readonly id: string;
  fetchDaily(symbol: string): Promise<AlphaVantagePayload | null>;
}
