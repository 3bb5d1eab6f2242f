/**
 * @tessera/portfolio — Snapshot and report.
 */

import type { RebalancingParams, TokenValues } from "@tessera/types";
import { targetPercentageOf } from "./params.js";
import { deviationPercent } from "./rebalancing.js";
import type { RebalancingReport, TokenPrices, TokenSnapshot } from "./types.js";

/**
 * Per-token view of the valued portfolio against its targets.
 */
export function buildRebalancingSnapshot(
  tokenValues: TokenValues,
  totalValue: number,
  params: RebalancingParams,
  prices: TokenPrices,
): readonly TokenSnapshot[] {
  return Object.entries(tokenValues).map(([token, value]) => {
    const rawPrice = prices[token];
    const price = typeof rawPrice === "number" && rawPrice > 0 ? rawPrice : null;
    const targetPct = targetPercentageOf(params, token) ?? 0;
    const currentPct = (value / totalValue) * 100;

    return {
      token,
      price,
      amount: price === null ? null : value / price,
      value,
      currentPct,
      targetPct,
      deviationPct: deviationPercent(value, (targetPct / 100) * totalValue),
      pointsFromTarget: currentPct - targetPct,
    };
  });
}

/**
 * The report published after each valuation.
 */
export function buildRebalancingReport(
  tokenValues: TokenValues,
  totalValue: number,
  params: RebalancingParams,
  prices: TokenPrices,
  timestamp: Date = new Date(),
): RebalancingReport {
  const snapshot = buildRebalancingSnapshot(tokenValues, totalValue, params, prices);
  return {
    timestamp: timestamp.toISOString(),
    variation_threshold: params.variationThreshold,
    total_portfolio_value: totalValue,
    tokens: snapshot.map((line) => ({
      token: line.token,
      current_number_of_tokens: line.amount ?? 0,
      current_usd_value: line.value,
      current_percentage_in_portfolio: line.currentPct,
      target_percentage: line.targetPct,
      usd_deviation_from_target: line.pointsFromTarget,
    })),
  };
}
