/**
 * @tessera/price-feed — CoinMarketCap latest quotes.
 *
 * GET {url}?symbol=<SYMBOL>&convert=USD
 *   → { "data": { "<SYMBOL>": { "quote": { "USD": { "price": 1.0 } } } } }
 */

import { fetchPrice } from "./http.js";
import type { ApiSpec, HttpOptions, PriceFeed } from "./types.js";

export const COINMARKETCAP_PRICE_URL =
  "https://pro-api.coinmarketcap.com/v1/cryptocurrency/quotes/latest";

export const COINMARKETCAP_KEY_HEADER = "X-CMC_PRO_API_KEY";

export interface CoinMarketCapFeedOptions {
  readonly url?: string;
  readonly apiKey?: string;
  readonly http?: HttpOptions;
}

export class CoinMarketCapFeed implements PriceFeed {
  readonly source = "coinmarketcap";
  private readonly url: string;
  private readonly apiKey: string | undefined;
  private readonly http: HttpOptions;

  constructor(options: CoinMarketCapFeedOptions = {}) {
    this.url = options.url ?? COINMARKETCAP_PRICE_URL;
    this.apiKey = options.apiKey;
    this.http = options.http ?? {};
  }

  spec(symbol: string): ApiSpec {
    return {
      url: this.url,
      headers: this.apiKey !== undefined ? { [COINMARKETCAP_KEY_HEADER]: this.apiKey } : {},
      parameters: { symbol, convert: "USD" },
      responsePath: ["data", symbol, "quote", "USD", "price"],
    };
  }

  async getPrice(symbol: string, signal?: AbortSignal): Promise<number> {
    return fetchPrice(this.spec(symbol), this.http, signal);
  }
}
