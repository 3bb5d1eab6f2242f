/**
 * @tessera/portfolio — Portfolio valuation.
 *
 * token value = balance × price, total = Σ token values.
 * Tokens without a usable balance or price are skipped and left out of
 * the total. A total of zero is an empty portfolio, not an error.
 */

import type { AllocationOptions, PortfolioAllocation, SkippedToken, TokenBalances, TokenPrices } from "./types.js";

function usable(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function calculatePortfolioAllocation(
  balances: TokenBalances,
  prices: TokenPrices,
  options: AllocationOptions = {},
): PortfolioAllocation {
  const tokens = options.tokens ?? Object.keys(balances);
  const includeZero = options.includeZeroBalances ?? true;
  const logger = options.logger;

  const tokenValues: Record<string, number> = {};
  const skipped: SkippedToken[] = [];
  let totalValue = 0;

  for (const token of tokens) {
    const balance = balances[token];
    if (!usable(balance) || balance < 0) {
      logger?.error({ token }, "No balance available; token skipped");
      skipped.push({ token, reason: "missing_balance" });
      continue;
    }

    const price = prices[token];
    if (!usable(price) || price <= 0) {
      logger?.error({ token }, "No price available; token skipped");
      skipped.push({ token, reason: "missing_price" });
      continue;
    }

    if (balance === 0 && !includeZero) {
      skipped.push({ token, reason: "zero_balance" });
      continue;
    }

    const value = balance * price;
    tokenValues[token] = value;
    totalValue += value;
    logger?.debug({ token, balance, price, value }, "Token valued");
  }

  if (totalValue === 0) {
    logger?.error("Total portfolio value is zero; cannot calculate allocation");
    return { kind: "empty", skipped };
  }

  return { kind: "valued", tokenValues, totalValue, skipped };
}

/**
 * Share of the total held by each token, in percent.
 */
export function allocationPercentages(
  tokenValues: Readonly<Record<string, number>>,
  totalValue: number,
): Readonly<Record<string, number>> {
  const result: Record<string, number> = {};
  for (const [token, value] of Object.entries(tokenValues)) {
    result[token] = (value / totalValue) * 100;
  }
  return result;
}
