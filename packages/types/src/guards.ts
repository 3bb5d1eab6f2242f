/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tessera domain types.
 * These enable safe runtime validation at system boundaries
 * (payloads from other agents, deserialized state, external responses).
 */

import type { JsonValue } from "./json.js";
import type { RoundPayload } from "./payload.js";
import type { DecisionEvent, PriceApi, WorkflowEvent } from "./workflow.js";
import { PRICE_APIS, WORKFLOW_EVENTS } from "./workflow.js";

// =============================================================================
// Workflow guards
// =============================================================================

const EVENT_SET = new Set<string>(WORKFLOW_EVENTS);
const PRICE_API_SET = new Set<string>(PRICE_APIS);
const DECISION_EVENTS = new Set<string>(["done", "error", "transact"]);

export function isWorkflowEvent(value: unknown): value is WorkflowEvent {
  return typeof value === "string" && EVENT_SET.has(value);
}

export function isPriceApi(value: unknown): value is PriceApi {
  return typeof value === "string" && PRICE_API_SET.has(value);
}

export function isDecisionEvent(value: unknown): value is DecisionEvent {
  return typeof value === "string" && DECISION_EVENTS.has(value);
}

// =============================================================================
// JSON guards
// =============================================================================

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * A token → number map with finite values.
 */
export function isTokenMap(value: unknown): value is Readonly<Record<string, number>> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.entries(value).every(
    ([key, v]) => key.length > 0 && typeof v === "number" && Number.isFinite(v),
  );
}

// =============================================================================
// Payload guards
// =============================================================================

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

export function isRoundPayload(value: unknown): value is RoundPayload {
  if (value === null || typeof value !== "object") return false;
  const v: Readonly<Record<string, unknown>> = { ...value };
  if (typeof v.sender !== "string" || v.sender.length === 0) return false;

  switch (v.kind) {
    case "api_selection":
      return isPriceApi(v.apiSelection);
    case "data_pull":
      return (
        isNullableString(v.tokenValues) &&
        (v.totalPortfolioValue === null ||
          (typeof v.totalPortfolioValue === "number" && Number.isFinite(v.totalPortfolioValue)))
      );
    case "decision_making":
      return isDecisionEvent(v.event) && isNullableString(v.adjustmentBalances);
    case "tx_preparation":
      return typeof v.txSubmitter === "string" && isNullableString(v.txHash);
    default:
      return false;
  }
}
