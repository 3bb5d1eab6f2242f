/**
 * @tessera/types — Shared domain types for the Tessera stack.
 *
 * These types are used across all Tessera packages:
 * - Workflow events and agent identities
 * - Round payloads
 * - Portfolio maps and rebalancing parameters
 * - JSON values for replicated state
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Workflow types
export type {
  AgentAddress,
  WorkflowEvent,
  PriceApi,
  DecisionEvent,
} from "./workflow.js";
export { WORKFLOW_EVENTS, PRICE_APIS, DEFAULT_PRICE_API } from "./workflow.js";

// Payload types
export type {
  ApiSelectionPayload,
  DataPullPayload,
  DecisionMakingPayload,
  TxPreparationPayload,
  RoundPayload,
  PayloadKind,
  PayloadOfKind,
  PayloadValues,
} from "./payload.js";

// Portfolio types
export type {
  TokenValues,
  AdjustmentBalances,
  RebalancingParams,
} from "./portfolio.js";

// JSON types
export type { JsonPrimitive, JsonValue, JsonObject } from "./json.js";

// Runtime type guards
export {
  isWorkflowEvent,
  isPriceApi,
  isDecisionEvent,
  isJsonValue,
  isTokenMap,
  isRoundPayload,
} from "./guards.js";
