/**
 * Payload Types
 *
 * One agent's proposed value for the active round. Payloads are
 * immutable; quorum is counted over every field except `sender`.
 *
 * Serialized maps (token values, adjustments) travel as canonical JSON
 * strings so that structurally equal maps compare equal byte for byte.
 */

import type { AgentAddress, DecisionEvent, PriceApi } from "./workflow.js";

export interface ApiSelectionPayload {
  readonly kind: "api_selection";
  readonly sender: AgentAddress;
  readonly apiSelection: PriceApi;
}

export interface DataPullPayload {
  readonly kind: "data_pull";
  readonly sender: AgentAddress;

  /** Canonical JSON of the token → USD value map, null when unavailable */
  readonly tokenValues: string | null;

  /** Sum of all token values, null when the portfolio could not be valued */
  readonly totalPortfolioValue: number | null;
}

export interface DecisionMakingPayload {
  readonly kind: "decision_making";
  readonly sender: AgentAddress;
  readonly event: DecisionEvent;

  /** Canonical JSON of the token → target amount map, null when nothing to do */
  readonly adjustmentBalances: string | null;
}

export interface TxPreparationPayload {
  readonly kind: "tx_preparation";
  readonly sender: AgentAddress;

  /** Identifier of the behaviour that produced the transaction */
  readonly txSubmitter: string;

  /** Hex settlement payload, null when preparation failed */
  readonly txHash: string | null;
}

/**
 * Any payload accepted by a round.
 */
export type RoundPayload =
  | ApiSelectionPayload
  | DataPullPayload
  | DecisionMakingPayload
  | TxPreparationPayload;

export type PayloadKind = RoundPayload["kind"];

/**
 * Narrow the payload union by kind.
 */
export type PayloadOfKind<K extends PayloadKind> = Extract<RoundPayload, { kind: K }>;

/**
 * The business fields of a payload, i.e. what quorum is counted over.
 */
export type PayloadValues<P extends RoundPayload> = Omit<P, "sender">;
