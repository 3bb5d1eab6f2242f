/**
 * @tessera/portfolio — Rebalancing decision.
 *
 * For each tracked token:
 *
 *   target value  = target% / 100 × total
 *   deviation %   = (current value - target value) / target value × 100
 *   target amount = target value / price
 *
 * A token whose |deviation| exceeds the variation threshold gets its
 * target amount in the result. An empty result means nothing to do.
 */

import type { Logger } from "pino";
import type { AdjustmentBalances, RebalancingParams, TokenValues } from "@tessera/types";
import type { TokenPrices } from "./types.js";

/**
 * Relative deviation of `currentValue` from `targetValue`, in percent.
 *
 * A zero target gives Infinity for any holding and NaN for none; NaN
 * never exceeds a threshold.
 */
export function deviationPercent(currentValue: number, targetValue: number): number {
  return ((currentValue - targetValue) / targetValue) * 100;
}

/**
 * Nearest integer, with ties going to the even neighbour (banker's
 * rounding), so 6.5 becomes 6 and 7.5 becomes 8.
 */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

export function calculateRebalancingActions(
  tokenValues: TokenValues,
  totalValue: number,
  params: RebalancingParams,
  prices: TokenPrices,
  logger?: Logger,
): AdjustmentBalances {
  const actions: Record<string, number> = {};

  if (!(totalValue > 0)) {
    logger?.error({ totalValue }, "Total portfolio value is not positive; cannot rebalance");
    return actions;
  }

  params.tokensToRebalance.forEach((token, i) => {
    const targetPct = params.targetPercentages[i] ?? 0;
    const price = prices[token];
    if (typeof price !== "number" || !Number.isFinite(price) || price <= 0) {
      logger?.error({ token }, "Could not retrieve price; token not rebalanced");
      return;
    }

    const currentValue = tokenValues[token] ?? 0;
    const targetValue = (targetPct / 100) * totalValue;
    const targetAmount = targetValue / price;
    const deviation = deviationPercent(currentValue, targetValue);

    if (Math.abs(deviation) > params.variationThreshold) {
      actions[token] = targetAmount;
      logger?.info(
        {
          token,
          deviation,
          currentAmount: currentValue / price,
          targetAmount,
        },
        "Token outside threshold; rebalancing",
      );
    } else {
      logger?.debug({ token, deviation }, "Token within threshold");
    }
  });

  return actions;
}
