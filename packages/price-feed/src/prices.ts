/**
 * @tessera/price-feed — Batch price lookup.
 *
 * Symbols are fetched one after another. A symbol whose price cannot be
 * obtained maps to null and is logged; it never fails the batch.
 * Cancellation through `signal` does propagate.
 */

import type { Logger } from "pino";
import type { PriceFeed } from "./types.js";

export async function fetchPrices(
  feed: PriceFeed,
  symbols: readonly string[],
  logger: Logger,
  signal?: AbortSignal,
): Promise<Readonly<Record<string, number | null>>> {
  const prices: Record<string, number | null> = {};

  for (const symbol of symbols) {
    signal?.throwIfAborted();
    try {
      prices[symbol] = await feed.getPrice(symbol, signal);
      logger.debug({ source: feed.source, symbol, price: prices[symbol] }, "Fetched price");
    } catch (err: unknown) {
      if (signal?.aborted === true) throw err;
      logger.error(
        { source: feed.source, symbol, err },
        "Failed to retrieve price",
      );
      prices[symbol] = null;
    }
  }

  return prices;
}
