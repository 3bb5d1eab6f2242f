/**
 * @tessera/portfolio — Types and errors.
 */

import type { Logger } from "pino";
import type { TokenValues } from "@tessera/types";

// =============================================================================
// Inputs
// =============================================================================

/**
 * Token → amount held. Null marks a balance that could not be read.
 */
export type TokenBalances = Readonly<Record<string, number | null | undefined>>;

/**
 * Token → USD price. Null marks a price that could not be fetched.
 */
export type TokenPrices = Readonly<Record<string, number | null | undefined>>;

// =============================================================================
// Allocation
// =============================================================================

export type SkipReason = "missing_balance" | "missing_price" | "zero_balance";

export interface SkippedToken {
  readonly token: string;
  readonly reason: SkipReason;
}

export type PortfolioAllocation =
  | {
      readonly kind: "valued";
      /** Token → USD value, in tracked-token order */
      readonly tokenValues: TokenValues;
      readonly totalValue: number;
      readonly skipped: readonly SkippedToken[];
    }
  | {
      readonly kind: "empty";
      readonly skipped: readonly SkippedToken[];
    };

export interface AllocationOptions {
  /** Tokens to value, in order. Defaults to the keys of the balances. */
  readonly tokens?: readonly string[];

  /** Keep tokens with a zero balance as value 0 (default true) */
  readonly includeZeroBalances?: boolean;

  readonly logger?: Logger;
}

// =============================================================================
// Snapshot and report
// =============================================================================

/**
 * Ephemeral per-token view used while deciding.
 */
export interface TokenSnapshot {
  readonly token: string;
  readonly price: number | null;

  /** value / price, null without a price */
  readonly amount: number | null;
  readonly value: number;
  readonly currentPct: number;
  readonly targetPct: number;

  /** (value - target value) / target value × 100 */
  readonly deviationPct: number;

  /** currentPct - targetPct */
  readonly pointsFromTarget: number;
}

export interface ReportTokenLine {
  readonly token: string;
  readonly current_number_of_tokens: number;
  readonly current_usd_value: number;
  readonly current_percentage_in_portfolio: number;
  readonly target_percentage: number;
  readonly usd_deviation_from_target: number;
}

/**
 * The published rebalancing report. Field names are the stored format.
 */
export interface RebalancingReport {
  readonly timestamp: string;
  readonly variation_threshold: number;
  readonly total_portfolio_value: number;
  readonly tokens: readonly ReportTokenLine[];
}

// =============================================================================
// Errors
// =============================================================================

export type ConfigErrorCode = "INVALID_PARAMS";

export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type TokenMapErrorCode = "INVALID_JSON" | "INVALID_TOKEN_MAP";

export class TokenMapError extends Error {
  constructor(
    public readonly code: TokenMapErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TokenMapError";
  }
}
