/**
 * @tessera/price-feed — CoinGecko simple price.
 *
 * GET {url}?ids=<coin id>&vs_currencies=usd → { "<coin id>": { "usd": 1.0 } }
 */

import { fetchPrice } from "./http.js";
import { PriceFeedError } from "./types.js";
import type { ApiSpec, HttpOptions, PriceFeed } from "./types.js";

export const COINGECKO_PRICE_URL = "https://api.coingecko.com/api/v3/simple/price";

/** Symbol → CoinGecko coin id */
export const COINGECKO_IDS: Readonly<Record<string, string>> = {
  ETH: "ethereum",
  USDC: "usd-coin",
};

export interface CoinGeckoFeedOptions {
  readonly url?: string;
  readonly apiKey?: string;

  /** Extra or overriding symbol → coin id entries */
  readonly ids?: Readonly<Record<string, string>>;

  readonly http?: HttpOptions;
}

export class CoinGeckoFeed implements PriceFeed {
  readonly source = "coingecko";
  private readonly url: string;
  private readonly apiKey: string | undefined;
  private readonly ids: Readonly<Record<string, string>>;
  private readonly http: HttpOptions;

  constructor(options: CoinGeckoFeedOptions = {}) {
    this.url = options.url ?? COINGECKO_PRICE_URL;
    this.apiKey = options.apiKey;
    this.ids = { ...COINGECKO_IDS, ...options.ids };
    this.http = options.http ?? {};
  }

  /**
   * @throws PriceFeedError UNSUPPORTED_SYMBOL for a symbol without a coin id
   */
  spec(symbol: string): ApiSpec {
    const id = this.ids[symbol];
    if (id === undefined) {
      throw new PriceFeedError("UNSUPPORTED_SYMBOL", `CoinGecko has no coin id for "${symbol}"`);
    }
    return {
      url: this.url,
      headers: this.apiKey !== undefined ? { "x-cg-demo-api-key": this.apiKey } : {},
      parameters: { ids: id, vs_currencies: "usd" },
      responsePath: [id, "usd"],
    };
  }

  async getPrice(symbol: string, signal?: AbortSignal): Promise<number> {
    return fetchPrice(this.spec(symbol), this.http, signal);
  }
}
