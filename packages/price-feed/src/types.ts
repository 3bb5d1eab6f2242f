/**
 * @tessera/price-feed — Types and errors.
 */

import type { PriceApi } from "@tessera/types";
import type { RetryConfig, Sleep } from "./retry.js";

// =============================================================================
// API specs
// =============================================================================

/**
 * Everything needed to fetch one price: where, with which headers and
 * query parameters, and where the number sits in the response.
 */
export interface ApiSpec {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly parameters: Readonly<Record<string, string>>;

  /** Property names leading from the response root to the price */
  readonly responsePath: readonly string[];
}

export interface HttpOptions {
  /** Per-request timeout. Default: 10000 */
  readonly timeoutMs?: number;

  readonly retry?: RetryConfig;

  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch;

  /** Wait between retries (for testing) */
  readonly sleepFn?: Sleep;
}

/**
 * A source of USD prices.
 */
export interface PriceFeed {
  readonly source: PriceApi;

  /**
   * @throws PriceFeedError when the symbol is unsupported or no usable
   *   price comes back
   * @throws RetryExhaustedError when every attempt failed transiently
   */
  getPrice(symbol: string, signal?: AbortSignal): Promise<number>;
}

// =============================================================================
// Errors
// =============================================================================

export type PriceFeedErrorCode =
  | "HTTP_ERROR"
  | "UNSUPPORTED_SYMBOL"
  | "INVALID_RESPONSE"
  | "TIMEOUT";

export class PriceFeedError extends Error {
  constructor(
    public readonly code: PriceFeedErrorCode,
    message: string,
    /** HTTP status, 0 when no response was received */
    public readonly statusCode: number = 0,
  ) {
    super(message);
    this.name = "PriceFeedError";
  }
}
