export type { AlphaVantagePayload, IDailySeriesSource } from "./IDataSource.js";
export {
  AlphaVantageFetcher,
  PermanentFetchError,
  TransientFetchError,
  createAlphaVantageFetcher,
  type AlphaVantageFetcherOptions,
} from "./AlphaVantageFetcher.js";
export { normalizeDailySeries, toPriceBar } from "./dailySeriesNormalizer.js";
export {
  createHttpClient,
  HttpTimeoutError,
  type HttpClient,
  type HttpClientOptions,
  type HttpRequestOptions,
  type HttpResponse,
} from "./httpClient.js";
export { computeBackoffMs, defaultSleep, type BackoffOptions, type Sleep } from "./backoff.js";
