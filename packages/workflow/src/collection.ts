/**
 * @tessera/workflow — Threshold collection.
 *
 * Gathers one payload per participant for the active round and decides
 * whether a Byzantine-fault-tolerant quorum supports a single value.
 *
 * Quorum model:
 * - N participants tolerate f = floor((N - 1) / 3) faulty agents
 * - A value is agreed when strictly more than 2N/3 agents propose it
 * - Votes are grouped by the canonical JSON of every field but `sender`
 */

import { canonicalize } from "json-canonicalize";
import type {
  AgentAddress,
  JsonObject,
  PayloadKind,
  PayloadOfKind,
  PayloadValues,
  RoundPayload,
} from "@tessera/types";
import { WorkflowError } from "./errors.js";

// =============================================================================
// Quorum size
// =============================================================================

/**
 * Smallest number of agreeing agents that is strictly more than two
 * thirds of `nParticipants`.
 */
export function consensusThreshold(nParticipants: number): number {
  return Math.floor((2 * nParticipants) / 3) + 1;
}

/**
 * Canonical key of a payload's business fields.
 */
export function payloadKey(payload: RoundPayload): string {
  const { sender: _sender, ...values } = serializePayload(payload);
  return canonicalize(values);
}

/**
 * Plain JSON form of a payload, as stored under a collection key.
 */
export function serializePayload(payload: RoundPayload): JsonObject {
  switch (payload.kind) {
    case "api_selection":
      return { kind: payload.kind, sender: payload.sender, apiSelection: payload.apiSelection };
    case "data_pull":
      return {
        kind: payload.kind,
        sender: payload.sender,
        tokenValues: payload.tokenValues,
        totalPortfolioValue: payload.totalPortfolioValue,
      };
    case "decision_making":
      return {
        kind: payload.kind,
        sender: payload.sender,
        event: payload.event,
        adjustmentBalances: payload.adjustmentBalances,
      };
    case "tx_preparation":
      return {
        kind: payload.kind,
        sender: payload.sender,
        txSubmitter: payload.txSubmitter,
        txHash: payload.txHash,
      };
  }
}

function isPayloadOfKind<K extends PayloadKind>(
  payload: RoundPayload,
  kind: K,
): payload is PayloadOfKind<K> {
  return payload.kind === kind;
}

/**
 * One group of agents that proposed the same value.
 */
export interface VoteClass<P extends RoundPayload> {
  readonly key: string;
  readonly values: PayloadValues<P>;
  /** Senders in ascending order */
  readonly senders: readonly AgentAddress[];
}

// =============================================================================
// Threshold Collector
// =============================================================================

export class ThresholdCollector<K extends PayloadKind> {
  readonly payloadKind: K;
  private readonly participants: ReadonlySet<AgentAddress>;
  private readonly payloads = new Map<AgentAddress, PayloadOfKind<K>>();

  constructor(payloadKind: K, participants: Iterable<AgentAddress>) {
    this.payloadKind = payloadKind;
    this.participants = new Set(participants);
  }

  /**
   * Record the sender's payload, replacing any earlier one from the same
   * sender in this round.
   *
   * @throws WorkflowError INVALID_PAYLOAD for a payload of another round
   * @throws WorkflowError NOT_A_PARTICIPANT for an unknown sender
   */
  submit(payload: RoundPayload): void {
    if (!isPayloadOfKind(payload, this.payloadKind)) {
      throw new WorkflowError(
        "INVALID_PAYLOAD",
        `Expected a ${this.payloadKind} payload, got ${payload.kind} from ${payload.sender}`,
      );
    }
    if (!this.participants.has(payload.sender)) {
      throw new WorkflowError(
        "NOT_A_PARTICIPANT",
        `${payload.sender} is not a participant`,
      );
    }
    this.payloads.set(payload.sender, payload);
  }

  get nbParticipants(): number {
    return this.participants.size;
  }

  get threshold(): number {
    return consensusThreshold(this.participants.size);
  }

  /**
   * Payloads received so far, keyed by sender in ascending order.
   */
  get collection(): ReadonlyMap<AgentAddress, PayloadOfKind<K>> {
    return new Map(
      [...this.payloads.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
  }

  /**
   * Vote classes, largest first; ties broken by canonical key so every
   * agent ranks them the same way.
   */
  tally(): readonly VoteClass<PayloadOfKind<K>>[] {
    const classes = new Map<string, { values: PayloadValues<PayloadOfKind<K>>; senders: AgentAddress[] }>();

    for (const [sender, payload] of this.collection) {
      const key = payloadKey(payload);
      const existing = classes.get(key);
      if (existing !== undefined) {
        existing.senders.push(sender);
      } else {
        const { sender: _sender, ...values } = payload;
        classes.set(key, { values, senders: [sender] });
      }
    }

    return [...classes.entries()]
      .map(([key, c]) => ({ key, values: c.values, senders: c.senders }))
      .sort((a, b) =>
        b.senders.length - a.senders.length || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
      );
  }

  get thresholdReached(): boolean {
    const top = this.tally()[0];
    return top !== undefined && top.senders.length >= this.threshold;
  }

  /**
   * The agreed value.
   *
   * @throws WorkflowError NO_MAJORITY_VALUE unless thresholdReached
   */
  get mostVotedPayload(): PayloadValues<PayloadOfKind<K>> {
    return this.winningClass().values;
  }

  /**
   * Full payloads of the agents that formed the quorum, by sender.
   */
  get mostVotedPayloads(): readonly PayloadOfKind<K>[] {
    const winner = this.winningClass();
    const result: PayloadOfKind<K>[] = [];
    for (const sender of winner.senders) {
      const payload = this.payloads.get(sender);
      if (payload !== undefined) {
        result.push(payload);
      }
    }
    return result;
  }

  /**
   * Senders of the agreed value, ascending.
   */
  get mostVotedSenders(): readonly AgentAddress[] {
    return this.winningClass().senders;
  }

  /**
   * Whether some value can still reach the threshold, assuming every
   * agent that has not voted yet joins the largest class.
   */
  isMajorityPossible(nParticipants: number = this.participants.size): boolean {
    const largest = this.tally()[0]?.senders.length ?? 0;
    const undecided = nParticipants - this.payloads.size;
    return largest + undecided >= consensusThreshold(nParticipants);
  }

  private winningClass(): VoteClass<PayloadOfKind<K>> {
    const top = this.tally()[0];
    if (top === undefined || top.senders.length < this.threshold) {
      throw new WorkflowError(
        "NO_MAJORITY_VALUE",
        `No value has reached ${this.threshold} of ${this.participants.size} votes`,
      );
    }
    return top;
  }
}
