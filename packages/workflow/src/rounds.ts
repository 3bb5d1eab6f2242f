/**
 * @tessera/workflow — Rounds.
 *
 * One definition per workflow stage. Collecting rounds accept a single
 * payload kind, wait for a quorum and then decide the next event from the
 * agreed value and the current synchronized data. Final rounds accept
 * nothing and end the workflow.
 *
 * `endBlock` is called once per finalized block and returns:
 * - null while no quorum exists and one is still possible
 * - the unchanged data and "no_majority" once quorum is impossible
 * - the extended data and the stage event once quorum is reached
 */

import type { Logger } from "pino";
import type {
  AgentAddress,
  JsonValue,
  PayloadKind,
  WorkflowEvent,
} from "@tessera/types";
import { serializePayload } from "./collection.js";
import type { ThresholdCollector } from "./collection.js";
import { WorkflowDefinitionError } from "./errors.js";
import { SYNC_KEYS } from "./synchronized-data.js";
import type { SynchronizedData } from "./synchronized-data.js";

// =============================================================================
// Round identities and their events
// =============================================================================

/**
 * Events each round may emit. Final rounds emit none.
 */
export interface RoundEventMap {
  readonly api_selection: "no_majority" | "round_timeout" | "coingecko" | "coinmarketcap";
  readonly data_pull: "done" | "no_majority" | "round_timeout";
  readonly alternative_data_pull: "done" | "no_majority" | "round_timeout";
  readonly decision_making: "done" | "error" | "transact" | "no_majority" | "round_timeout";
  readonly tx_preparation: "done" | "no_majority" | "round_timeout";
  readonly finished_decision_making: never;
  readonly finished_tx_preparation: never;
}

export type RoundId = keyof RoundEventMap;

export const ROUND_IDS: readonly RoundId[] = [
  "api_selection",
  "data_pull",
  "alternative_data_pull",
  "decision_making",
  "tx_preparation",
  "finished_decision_making",
  "finished_tx_preparation",
];

export type CollectingRoundId = {
  [R in RoundId]: RoundEventMap[R] extends never ? never : R;
}[RoundId];

export type FinalRoundId = Exclude<RoundId, CollectingRoundId>;

export type DataPullRoundId = "data_pull" | "alternative_data_pull";

// =============================================================================
// Definitions
// =============================================================================

export interface RoundState<K extends PayloadKind> {
  readonly synchronizedData: SynchronizedData;
  readonly collector: ThresholdCollector<K>;
  readonly logger: Logger;
}

export interface RoundOutcome<E extends WorkflowEvent = WorkflowEvent> {
  readonly synchronizedData: SynchronizedData;
  readonly event: E;
}

export interface CollectingRoundDefinition<R extends CollectingRoundId, K extends PayloadKind> {
  readonly variant: "collecting";
  readonly id: R;
  readonly payloadKind: K;

  /** Where the raw agent → payload map is stored on success, if anywhere */
  readonly collectionKey: string | null;

  /** Synchronized data keys filled from the agreed payload */
  readonly selectionKeys: readonly string[];

  readonly events: readonly RoundEventMap[R][];

  endBlock(state: RoundState<K>): RoundOutcome<RoundEventMap[R]> | null;
}

export interface FinalRoundDefinition<R extends FinalRoundId> {
  readonly variant: "final";
  readonly id: R;
  readonly events: readonly never[];
}

export type RoundDefinition<R extends RoundId = RoundId> = R extends CollectingRoundId
  ? CollectingRoundDefinition<R, PayloadKind>
  : R extends FinalRoundId
    ? FinalRoundDefinition<R>
    : never;

// =============================================================================
// Helpers
// =============================================================================

function serializeCollection<K extends PayloadKind>(
  collector: ThresholdCollector<K>,
): JsonValue {
  const result: Record<AgentAddress, JsonValue> = {};
  for (const [sender, payload] of collector.collection) {
    result[sender] = serializePayload(payload);
  }
  return result;
}

/**
 * Data after an agreement: the collection under the round's
 * `collectionKey`, and `selection` under its `selectionKeys`, position by
 * position. Without a selection only the collection is written.
 *
 * @throws WorkflowDefinitionError when `selection` does not match `selectionKeys`
 */
export function recordAgreement<K extends PayloadKind>(
  round: Pick<
    CollectingRoundDefinition<CollectingRoundId, PayloadKind>,
    "id" | "collectionKey" | "selectionKeys"
  >,
  state: Pick<RoundState<K>, "synchronizedData" | "collector">,
  selection?: readonly JsonValue[],
): SynchronizedData {
  const values: Record<string, JsonValue> = {};
  if (round.collectionKey !== null) {
    values[round.collectionKey] = serializeCollection(state.collector);
  }
  if (selection !== undefined) {
    if (selection.length !== round.selectionKeys.length) {
      throw new WorkflowDefinitionError([
        `Round "${round.id}" selects ${round.selectionKeys.length} keys but got ${selection.length} values`,
      ]);
    }
    round.selectionKeys.forEach((key, i) => {
      const value = selection[i];
      if (value !== undefined) values[key] = value;
    });
  }
  if (Object.keys(values).length === 0) {
    return state.synchronizedData;
  }
  return state.synchronizedData.update(values);
}

function noMajority<K extends PayloadKind>(
  state: RoundState<K>,
): RoundOutcome<"no_majority"> | null {
  if (!state.collector.isMajorityPossible(state.synchronizedData.nbParticipants)) {
    return { synchronizedData: state.synchronizedData, event: "no_majority" };
  }
  return null;
}

// =============================================================================
// API selection
// =============================================================================

/**
 * Agrees on the price API. Emits the event named after the agreed API and
 * records it only when it differs from the one already recorded.
 */
export const apiSelectionRound: CollectingRoundDefinition<"api_selection", "api_selection"> = {
  variant: "collecting",
  id: "api_selection",
  payloadKind: "api_selection",
  collectionKey: null,
  selectionKeys: [SYNC_KEYS.apiSelection],
  events: ["coingecko", "coinmarketcap", "no_majority", "round_timeout"],

  endBlock({ synchronizedData, collector, logger }) {
    if (collector.thresholdReached) {
      const { apiSelection } = collector.mostVotedPayload;
      if (synchronizedData.apiSelection !== apiSelection) {
        logger.info(
          { from: synchronizedData.apiSelection, to: apiSelection },
          "Price API selection changed",
        );
        return {
          synchronizedData: recordAgreement(apiSelectionRound, { synchronizedData, collector }, [
            apiSelection,
          ]),
          event: apiSelection,
        };
      }
      return { synchronizedData, event: apiSelection };
    }
    return noMajority({ synchronizedData, collector, logger });
  },
};

// =============================================================================
// Data pull
// =============================================================================

/**
 * Agrees on the portfolio valuation. Both price sources share this round;
 * only the behaviour feeding it differs.
 */
export function createDataPullRound(
  id: "data_pull",
): CollectingRoundDefinition<"data_pull", "data_pull">;
export function createDataPullRound(
  id: "alternative_data_pull",
): CollectingRoundDefinition<"alternative_data_pull", "data_pull">;
export function createDataPullRound(
  id: DataPullRoundId,
): CollectingRoundDefinition<DataPullRoundId, "data_pull"> {
  const round: CollectingRoundDefinition<DataPullRoundId, "data_pull"> = {
    variant: "collecting",
    id,
    payloadKind: "data_pull",
    collectionKey: SYNC_KEYS.participantToDataRound,
    selectionKeys: [SYNC_KEYS.tokenValues, SYNC_KEYS.totalPortfolioValue],
    events: ["done", "no_majority", "round_timeout"],

    endBlock({ synchronizedData, collector, logger }) {
      if (collector.thresholdReached) {
        const { tokenValues, totalPortfolioValue } = collector.mostVotedPayload;
        return {
          synchronizedData: recordAgreement(round, { synchronizedData, collector }, [
            tokenValues,
            totalPortfolioValue,
          ]),
          event: "done",
        };
      }
      return noMajority({ synchronizedData, collector, logger });
    },
  };
  return round;
}

export const dataPullRound = createDataPullRound("data_pull");
export const alternativeDataPullRound = createDataPullRound("alternative_data_pull");

// =============================================================================
// Decision making
// =============================================================================

/**
 * Agrees on whether to rebalance. The agreed event is looked up among the
 * payloads of the agents that formed the quorum, in sender order, and the
 * adjustments are taken from that payload.
 */
export const decisionMakingRound: CollectingRoundDefinition<"decision_making", "decision_making"> = {
  variant: "collecting",
  id: "decision_making",
  payloadKind: "decision_making",
  collectionKey: SYNC_KEYS.participantToDecisionMakingRound,
  selectionKeys: [SYNC_KEYS.adjustmentBalances],
  events: ["done", "error", "transact", "no_majority", "round_timeout"],

  endBlock({ synchronizedData, collector, logger }) {
    if (collector.thresholdReached) {
      const { event } = collector.mostVotedPayload;
      const chosen = collector.mostVotedPayloads.find((p) => p.event === event);

      if (chosen === undefined) {
        logger.error({ event }, "Most voted payload data not found");
        return { synchronizedData, event: "error" };
      }

      const state = { synchronizedData, collector };

      if (chosen.event === "error") {
        logger.error("Agents agreed the portfolio cannot be evaluated");
        return { synchronizedData: recordAgreement(decisionMakingRound, state), event: "error" };
      }

      if (chosen.adjustmentBalances === null) {
        logger.info("No adjustment balances agreed; nothing to rebalance");
        return { synchronizedData: recordAgreement(decisionMakingRound, state), event: "done" };
      }

      return {
        synchronizedData: recordAgreement(decisionMakingRound, state, [chosen.adjustmentBalances]),
        event: "transact",
      };
    }
    return noMajority({ synchronizedData, collector, logger });
  },
};

// =============================================================================
// Transaction preparation
// =============================================================================

/**
 * Agrees on the prepared transaction. A quorum on "no hash" is not an
 * outcome: the round stays open until it times out and restarts.
 */
export const txPreparationRound: CollectingRoundDefinition<"tx_preparation", "tx_preparation"> = {
  variant: "collecting",
  id: "tx_preparation",
  payloadKind: "tx_preparation",
  collectionKey: SYNC_KEYS.participantToTxRound,
  selectionKeys: [SYNC_KEYS.txSubmitter, SYNC_KEYS.mostVotedTxHash],
  events: ["done", "no_majority", "round_timeout"],

  endBlock({ synchronizedData, collector, logger }) {
    if (collector.thresholdReached) {
      const { txSubmitter, txHash } = collector.mostVotedPayload;
      if (txHash === null) {
        logger.warn("Agents agreed on an empty transaction; waiting for round timeout");
        return null;
      }
      return {
        synchronizedData: recordAgreement(txPreparationRound, { synchronizedData, collector }, [
          txSubmitter,
          txHash,
        ]),
        event: "done",
      };
    }
    return noMajority({ synchronizedData, collector, logger });
  },
};

// =============================================================================
// Final rounds
// =============================================================================

export const finishedDecisionMakingRound: FinalRoundDefinition<"finished_decision_making"> = {
  variant: "final",
  id: "finished_decision_making",
  events: [],
};

export const finishedTxPreparationRound: FinalRoundDefinition<"finished_tx_preparation"> = {
  variant: "final",
  id: "finished_tx_preparation",
  events: [],
};

/**
 * Every round of the rebalancing workflow, by id.
 */
export const ROUNDS: { readonly [R in RoundId]: RoundDefinition<R> } = {
  api_selection: apiSelectionRound,
  data_pull: dataPullRound,
  alternative_data_pull: alternativeDataPullRound,
  decision_making: decisionMakingRound,
  tx_preparation: txPreparationRound,
  finished_decision_making: finishedDecisionMakingRound,
  finished_tx_preparation: finishedTxPreparationRound,
};
