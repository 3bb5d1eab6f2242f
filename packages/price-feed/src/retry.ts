/**
 * @tessera/price-feed — Retry policy.
 *
 * Retry n waits min(baseDelayMs × 2^n + random(0, jitterMs), maxDelayMs).
 * A caller signal stops the loop: no further attempt starts once it has
 * aborted, and a pending wait rejects with the abort reason.
 */

import { PriceFeedError } from "./types.js";

export interface RetryConfig {
  /** Attempts in total, the first one included. Default: 3 */
  readonly maxAttempts: number;
  /** Wait before the first retry. Default: 250 */
  readonly baseDelayMs: number;
  /** Upper bound for any wait. Default: 5000 */
  readonly maxDelayMs: number;
  /** Random spread added to each wait. Default: 100 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  jitterMs: 100,
};

/** Waits `ms`, or rejects early when `signal` aborts */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  readonly config?: RetryConfig;
  readonly shouldRetry?: (err: unknown) => boolean;
  readonly sleep?: Sleep;
  readonly signal?: AbortSignal;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempts: ${reason}`);
    this.name = "RetryExhaustedError";
  }
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted === true) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Wait before retry number `retry` (0 for the first retry).
 */
export function backoffDelay(
  retry: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const exponential = config.baseDelayMs * 2 ** retry;
  return Math.min(exponential + random() * config.jitterMs, config.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, a failure is not retryable, the attempts run
 * out or `signal` aborts.
 *
 * @throws The abort reason once `signal` has aborted
 * @throws The failure itself when `shouldRetry` rejects it
 * @throws RetryExhaustedError when every attempt failed
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const config = options.config ?? DEFAULT_RETRY_CONFIG;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? abortableSleep;
  const { signal } = options;

  let lastError: unknown;
  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    if (attempt > 0) {
      await sleep(backoffDelay(attempt - 1, config), signal);
    }
    signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (err: unknown) {
      signal?.throwIfAborted();
      if (!shouldRetry(err)) throw err;
      lastError = err;
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

/**
 * Server errors, rate limiting, timeouts and network failures may pass;
 * client errors and malformed responses will not.
 */
export function isRetryablePriceFeedError(err: unknown): boolean {
  if (!(err instanceof PriceFeedError)) return true;

  switch (err.code) {
    case "TIMEOUT":
      return true;
    case "HTTP_ERROR":
      return err.statusCode >= 500 || err.statusCode === 429;
    case "UNSUPPORTED_SYMBOL":
    case "INVALID_RESPONSE":
      return false;
  }
}
