/**
 * @tessera/portfolio — Portfolio decision engine.
 *
 * Pure functions: valuation, deviation detection, rebalancing targets,
 * the published report, and the wire format for token maps.
 */

export type {
  TokenBalances,
  TokenPrices,
  SkipReason,
  SkippedToken,
  PortfolioAllocation,
  AllocationOptions,
  TokenSnapshot,
  ReportTokenLine,
  RebalancingReport,
  ConfigErrorCode,
  TokenMapErrorCode,
} from "./types.js";
export { ConfigError, TokenMapError } from "./types.js";

export {
  RebalancingParamsSchema,
  TARGET_SUM_TOLERANCE,
  validateRebalancingParams,
  targetPercentageOf,
} from "./params.js";

export { calculatePortfolioAllocation, allocationPercentages } from "./allocation.js";
export {
  calculateRebalancingActions,
  deviationPercent,
  roundHalfToEven,
} from "./rebalancing.js";
export { buildRebalancingSnapshot, buildRebalancingReport } from "./report.js";
export { serializeTokenMap, parseTokenMap } from "./serialization.js";
