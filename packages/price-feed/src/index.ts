/**
 * @tessera/price-feed — USD price sources.
 *
 * CoinGecko and CoinMarketCap behind one `PriceFeed` interface, over
 * native fetch with timeout and retry.
 */

export type {
  ApiSpec,
  HttpOptions,
  PriceFeed,
  PriceFeedErrorCode,
} from "./types.js";
export { PriceFeedError } from "./types.js";

export type { RetryConfig, RetryOptions, Sleep } from "./retry.js";
export {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  withRetry,
  backoffDelay,
  abortableSleep,
  isRetryablePriceFeedError,
} from "./retry.js";

export { DEFAULT_TIMEOUT_MS, buildUrl, extractPath, fetchJson, fetchPrice } from "./http.js";
export { CoinGeckoFeed, COINGECKO_IDS, COINGECKO_PRICE_URL } from "./coingecko.js";
export type { CoinGeckoFeedOptions } from "./coingecko.js";
export {
  CoinMarketCapFeed,
  COINMARKETCAP_KEY_HEADER,
  COINMARKETCAP_PRICE_URL,
} from "./coinmarketcap.js";
export type { CoinMarketCapFeedOptions } from "./coinmarketcap.js";
export { fetchPrices } from "./prices.js";
