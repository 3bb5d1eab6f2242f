/**
 * Portfolio Types
 *
 * Token-keyed maps that travel between rounds.
 *
 * Rules:
 * - Keys are token symbols as configured (e.g. "ETH", "USDC")
 * - Values are plain numbers (USD values or token amounts)
 */

/**
 * USD value held per token.
 */
export type TokenValues = Readonly<Record<string, number>>;

/**
 * Target token amount per token that needs rebalancing.
 */
export type AdjustmentBalances = Readonly<Record<string, number>>;

/**
 * Rebalancing parameters, validated once at startup.
 */
export interface RebalancingParams {
  /** Tokens tracked by the portfolio, in configuration order */
  readonly tokensToRebalance: readonly string[];

  /** Target share of each token in percent, same order as tokensToRebalance */
  readonly targetPercentages: readonly number[];

  /** Allowed deviation from target, in percent of the target value */
  readonly variationThreshold: number;
}
