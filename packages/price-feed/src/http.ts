/**
 * @tessera/price-feed — JSON over HTTP.
 *
 * Wraps native fetch() with:
 * - Query parameter encoding
 * - Timeout handling (and caller cancellation)
 * - Retry with backoff on 5xx, 429, timeouts and network errors
 * - Extraction of a value by property path
 */

import { isRetryablePriceFeedError, withRetry } from "./retry.js";
import { PriceFeedError } from "./types.js";
import type { ApiSpec, HttpOptions } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Full request URL with the API's query parameters appended.
 */
export function buildUrl(spec: ApiSpec): string {
  const url = new URL(spec.url);
  for (const [name, value] of Object.entries(spec.parameters)) {
    url.searchParams.set(name, value);
  }
  return url.toString();
}

/**
 * Walk `path` from `body`. Undefined when any step is missing.
 */
export function extractPath(body: unknown, path: readonly string[]): unknown {
  let current: unknown = body;
  for (const key of path) {
    if (current === null || typeof current !== "object" || !Object.hasOwn(current, key)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

async function fetchOnce(
  url: string,
  spec: ApiSpec,
  timeoutMs: number,
  fetchFn: typeof fetch,
  signal: AbortSignal | undefined,
): Promise<unknown> {
  signal?.throwIfAborted();
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: { Accept: "application/json", ...spec.headers },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new PriceFeedError(
        "HTTP_ERROR",
        `GET ${spec.url} returned HTTP ${response.status}`,
        response.status,
      );
    }

    const text = await response.text();
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      throw new PriceFeedError(
        "INVALID_RESPONSE",
        `GET ${spec.url} returned a body that is not JSON`,
        response.status,
      );
    }
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      if (signal?.aborted === true) throw error;
      throw new PriceFeedError("TIMEOUT", `GET ${spec.url} timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Fetch the spec's URL and return the parsed JSON body.
 *
 * @throws PriceFeedError for client errors and non-JSON bodies
 * @throws RetryExhaustedError once every attempt failed transiently
 */
export async function fetchJson(
  spec: ApiSpec,
  options: HttpOptions = {},
  signal?: AbortSignal,
): Promise<unknown> {
  const url = buildUrl(spec);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchFn = options.fetchFn ?? globalThis.fetch;

  return withRetry(() => fetchOnce(url, spec, timeoutMs, fetchFn, signal), {
    ...(options.retry !== undefined ? { config: options.retry } : {}),
    ...(options.sleepFn !== undefined ? { sleep: options.sleepFn } : {}),
    ...(signal !== undefined ? { signal } : {}),
    shouldRetry: isRetryablePriceFeedError,
  });
}

/**
 * Fetch the spec and read a positive finite number at its response path.
 */
export async function fetchPrice(
  spec: ApiSpec,
  options: HttpOptions = {},
  signal?: AbortSignal,
): Promise<number> {
  const body = await fetchJson(spec, options, signal);
  const price = extractPath(body, spec.responsePath);
  if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) {
    throw new PriceFeedError(
      "INVALID_RESPONSE",
      `No usable price at "${spec.responsePath.join(".")}"`,
    );
  }
  return price;
}
