/**
 * Shared fixtures for workflow tests.
 */

import pino from "pino";
import type {
  AgentAddress,
  ApiSelectionPayload,
  DataPullPayload,
  DecisionEvent,
  DecisionMakingPayload,
  PriceApi,
  RoundPayload,
  TxPreparationPayload,
} from "@tessera/types";
import { SynchronizedData } from "../src/synchronized-data.js";
import type { Block } from "../src/engine.js";

export const AGENT_A = "0xagent-a";
export const AGENT_B = "0xagent-b";
export const AGENT_C = "0xagent-c";
export const AGENT_D = "0xagent-d";
export const AGENTS: readonly AgentAddress[] = [AGENT_A, AGENT_B, AGENT_C, AGENT_D];

export const SAFE_ADDRESS = "0x0000000000000000000000000000000000005afe";
export const TX_HASH = `0x${"ab".repeat(40)}`;

export const silentLogger = pino({ level: "silent" });

export function initialData(participants: readonly AgentAddress[] = AGENTS): SynchronizedData {
  return SynchronizedData.createInitial({ participants, safeContractAddress: SAFE_ADDRESS });
}

export function apiSelection(sender: AgentAddress, api: PriceApi): ApiSelectionPayload {
  return { kind: "api_selection", sender, apiSelection: api };
}

export function dataPull(
  sender: AgentAddress,
  tokenValues: string | null,
  totalPortfolioValue: number | null,
): DataPullPayload {
  return { kind: "data_pull", sender, tokenValues, totalPortfolioValue };
}

export function decision(
  sender: AgentAddress,
  event: DecisionEvent,
  adjustmentBalances: string | null = null,
): DecisionMakingPayload {
  return { kind: "decision_making", sender, event, adjustmentBalances };
}

export function txPreparation(
  sender: AgentAddress,
  txHash: string | null,
  txSubmitter = "tx_preparation",
): TxPreparationPayload {
  return { kind: "tx_preparation", sender, txSubmitter, txHash };
}

export function block(height: number, payloads: readonly RoundPayload[]): Block {
  return { height, payloads };
}

/**
 * The same payload from each of `senders`.
 */
export function fromEach<P extends RoundPayload>(
  senders: readonly AgentAddress[],
  make: (sender: AgentAddress) => P,
): P[] {
  return senders.map(make);
}

/**
 * Blocks that drive the rebalancing workflow through every stage to
 * finished_tx_preparation with agents A, B and C agreeing.
 */
export function happyPathBlocks(): Block[] {
  const quorum = [AGENT_A, AGENT_B, AGENT_C];
  return [
    block(1, fromEach(quorum, (s) => apiSelection(s, "coingecko"))),
    block(2, fromEach(quorum, (s) => dataPull(s, '{"ETH":20,"USDC":80}', 100))),
    block(3, fromEach(quorum, (s) => decision(s, "transact", '{"ETH":2}'))),
    block(4, fromEach(quorum, (s) => txPreparation(s, TX_HASH))),
  ];
}
