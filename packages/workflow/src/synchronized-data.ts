/**
 * @tessera/workflow — Synchronized data.
 *
 * The replicated key/value state every agent holds identically.
 *
 * Each update appends one record to a hash chain:
 *
 *   record[0].hash = sha256(canonicalize(record[0]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Two agents that applied the same updates in the same order end up with
 * the same head hash, which is what replay determinism is checked against.
 *
 * Instances are immutable: `update()` returns a new version and leaves
 * the receiver untouched.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import {
  DEFAULT_PRICE_API,
  isJsonValue,
  isPriceApi,
  isRoundPayload,
} from "@tessera/types";
import type {
  AgentAddress,
  JsonObject,
  JsonValue,
  PriceApi,
  RoundPayload,
} from "@tessera/types";
import { SyncDataError } from "./errors.js";

// =============================================================================
// Keys
// =============================================================================

/**
 * Keys written during setup, before the first round runs.
 */
export const SETUP_KEYS = {
  participants: "all_participants",
  safeContractAddress: "safe_contract_address",
  periodCount: "period_count",
} as const;

/**
 * Keys written by the rebalancing rounds.
 */
export const SYNC_KEYS = {
  apiSelection: "api_selection",
  tokenValues: "token_values",
  totalPortfolioValue: "total_portfolio_value",
  adjustmentBalances: "adjustment_balances",
  txSubmitter: "tx_submitter",
  mostVotedTxHash: "most_voted_tx_hash",
  participantToDataRound: "participant_to_data_round",
  participantToDecisionMakingRound: "participant_to_decision_making_round",
  participantToTxRound: "participant_to_tx_round",
} as const;

export const GENESIS_HASH = "genesis";

// =============================================================================
// Types
// =============================================================================

/**
 * One committed update.
 */
export interface SyncRecord {
  /** 0 for the setup record, then +1 per update */
  readonly version: number;

  /** Keys set by this update */
  readonly values: JsonObject;

  readonly previousHash: string;
  readonly hash: string;
}

export interface SetupParams {
  readonly participants: readonly AgentAddress[];
  readonly safeContractAddress: string;
}

/**
 * Agent → payload map as stored under a collection key.
 */
export type SerializedCollection = Readonly<Record<AgentAddress, RoundPayload>>;

// =============================================================================
// Hashing
// =============================================================================

function computeRecordHash(
  version: number,
  values: JsonObject,
  previousHash: string,
): string {
  const content = canonicalize({ version, values });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

function buildRecord(
  version: number,
  values: JsonObject,
  previousHash: string,
): SyncRecord {
  return {
    version,
    values,
    previousHash,
    hash: computeRecordHash(version, values, previousHash),
  };
}

// =============================================================================
// Synchronized Data
// =============================================================================

export class SynchronizedData {
  private readonly records: readonly SyncRecord[];

  private constructor(records: readonly SyncRecord[]) {
    this.records = records;
  }

  /**
   * Build the setup version for the first period.
   */
  static createInitial(setup: SetupParams): SynchronizedData {
    if (setup.participants.length === 0) {
      throw new SyncDataError(
        "INVALID_VALUE",
        "At least one participant is required",
        SETUP_KEYS.participants,
      );
    }
    const participants = [...new Set(setup.participants)].sort();
    const values: JsonObject = {
      [SETUP_KEYS.participants]: participants,
      [SETUP_KEYS.safeContractAddress]: setup.safeContractAddress,
      [SETUP_KEYS.periodCount]: 0,
    };
    return new SynchronizedData([buildRecord(0, values, GENESIS_HASH)]);
  }

  // ─── Versions ───────────────────────────────────────────────────────

  get version(): number {
    return this.head.version;
  }

  /** Hash of the latest record */
  get hash(): string {
    return this.head.hash;
  }

  get history(): readonly SyncRecord[] {
    return this.records;
  }

  /**
   * Return a new version with `values` applied on top of this one.
   *
   * @throws SyncDataError INVALID_VALUE if a value is not plain JSON
   */
  update(values: Readonly<Record<string, JsonValue>>): SynchronizedData {
    for (const [key, value] of Object.entries(values)) {
      if (!isJsonValue(value)) {
        throw new SyncDataError(
          "INVALID_VALUE",
          `Value for "${key}" is not JSON-serializable`,
          key,
        );
      }
    }
    const record = buildRecord(this.version + 1, values, this.hash);
    return new SynchronizedData([...this.records, record]);
  }

  /**
   * Start the next period. Only setup keys and `persistedKeys` survive.
   */
  nextPeriod(persistedKeys: ReadonlySet<string>): SynchronizedData {
    const carried: Record<string, JsonValue> = {};
    for (const key of [...persistedKeys].sort()) {
      const value = this.get(key);
      if (value !== undefined) {
        carried[key] = value;
      }
    }
    const values: JsonObject = {
      ...carried,
      [SETUP_KEYS.participants]: [...this.participants],
      [SETUP_KEYS.safeContractAddress]: this.safeContractAddress,
      [SETUP_KEYS.periodCount]: this.periodCount + 1,
    };
    return new SynchronizedData([buildRecord(0, values, this.hash)]);
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  get(key: string): JsonValue | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      const values = this.records[i]?.values;
      if (values !== undefined && Object.hasOwn(values, key)) {
        return values[key];
      }
    }
    return undefined;
  }

  /**
   * @throws SyncDataError KEY_NOT_FOUND if the key was never set
   */
  getStrict(key: string): JsonValue {
    const value = this.get(key);
    if (value === undefined) {
      throw new SyncDataError(
        "KEY_NOT_FOUND",
        `Key "${key}" is not set in synchronized data`,
        key,
      );
    }
    return value;
  }

  keys(): readonly string[] {
    const keys = new Set<string>();
    for (const record of this.records) {
      for (const key of Object.keys(record.values)) {
        keys.add(key);
      }
    }
    return [...keys].sort();
  }

  /**
   * Latest value of every key, with sorted keys.
   */
  toJSON(): JsonObject {
    const result: Record<string, JsonValue> = {};
    for (const key of this.keys()) {
      const value = this.get(key);
      if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }

  // ─── Setup accessors ────────────────────────────────────────────────

  get participants(): readonly AgentAddress[] {
    const value = this.getStrict(SETUP_KEYS.participants);
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
      throw new SyncDataError("INVALID_VALUE", "Participants must be a list of addresses", SETUP_KEYS.participants);
    }
    return value;
  }

  get nbParticipants(): number {
    return this.participants.length;
  }

  get safeContractAddress(): string {
    return this.getString(SETUP_KEYS.safeContractAddress) ?? "";
  }

  get periodCount(): number {
    return this.getNumber(SETUP_KEYS.periodCount) ?? 0;
  }

  // ─── Round accessors ────────────────────────────────────────────────

  get apiSelection(): PriceApi {
    const value = this.get(SYNC_KEYS.apiSelection);
    return isPriceApi(value) ? value : DEFAULT_PRICE_API;
  }

  get tokenValues(): string | null {
    return this.getString(SYNC_KEYS.tokenValues);
  }

  get totalPortfolioValue(): number | null {
    return this.getNumber(SYNC_KEYS.totalPortfolioValue);
  }

  get adjustmentBalances(): string | null {
    return this.getString(SYNC_KEYS.adjustmentBalances);
  }

  get mostVotedTxHash(): string | null {
    return this.getString(SYNC_KEYS.mostVotedTxHash);
  }

  get txSubmitter(): string {
    return String(this.getStrict(SYNC_KEYS.txSubmitter));
  }

  get participantToDataRound(): SerializedCollection {
    return this.getCollection(SYNC_KEYS.participantToDataRound);
  }

  get participantToDecisionMakingRound(): SerializedCollection {
    return this.getCollection(SYNC_KEYS.participantToDecisionMakingRound);
  }

  get participantToTxRound(): SerializedCollection {
    return this.getCollection(SYNC_KEYS.participantToTxRound);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private get head(): SyncRecord {
    const head = this.records[this.records.length - 1];
    if (head === undefined) {
      throw new SyncDataError("KEY_NOT_FOUND", "Synchronized data has no records");
    }
    return head;
  }

  private getString(key: string): string | null {
    const value = this.get(key);
    return typeof value === "string" ? value : null;
  }

  private getNumber(key: string): number | null {
    const value = this.get(key);
    return typeof value === "number" ? value : null;
  }

  private getCollection(key: string): SerializedCollection {
    const value = this.getStrict(key);
    if (value === null || typeof value !== "object" || Array.isArray(value)) {
      throw new SyncDataError("INVALID_VALUE", `Collection "${key}" is not an object`, key);
    }
    const collection: Record<AgentAddress, RoundPayload> = {};
    for (const [sender, payload] of Object.entries(value)) {
      if (!isRoundPayload(payload)) {
        throw new SyncDataError(
          "INVALID_VALUE",
          `Collection "${key}" holds an invalid payload from ${sender}`,
          key,
        );
      }
      collection[sender] = payload;
    }
    return collection;
  }
}
