/**
 * @tessera/workflow — Round-based consensus workflow.
 *
 * - Synchronized data: hash-chained replicated state
 * - Threshold collection: BFT quorum over agent payloads
 * - Rounds and transition table for portfolio rebalancing
 * - Engine that applies finalized blocks, and deterministic replay
 */

// Errors
export { SyncDataError, WorkflowError, WorkflowDefinitionError } from "./errors.js";
export type { SyncDataErrorCode, WorkflowErrorCode } from "./errors.js";

// Synchronized data
export {
  SynchronizedData,
  SETUP_KEYS,
  SYNC_KEYS,
  GENESIS_HASH,
} from "./synchronized-data.js";
export type { SyncRecord, SetupParams, SerializedCollection } from "./synchronized-data.js";

// Collection
export {
  ThresholdCollector,
  consensusThreshold,
  payloadKey,
  serializePayload,
} from "./collection.js";
export type { VoteClass } from "./collection.js";

// Rounds
export {
  ROUNDS,
  ROUND_IDS,
  apiSelectionRound,
  createDataPullRound,
  dataPullRound,
  alternativeDataPullRound,
  decisionMakingRound,
  txPreparationRound,
  finishedDecisionMakingRound,
  finishedTxPreparationRound,
  recordAgreement,
} from "./rounds.js";
export type {
  RoundEventMap,
  RoundId,
  CollectingRoundId,
  FinalRoundId,
  DataPullRoundId,
  RoundState,
  RoundOutcome,
  CollectingRoundDefinition,
  FinalRoundDefinition,
  RoundDefinition,
} from "./rounds.js";

// Transitions
export {
  TRANSITION_FUNCTION,
  REBALANCING_WORKFLOW,
  nextRound,
  validateWorkflowDefinition,
  defineWorkflow,
} from "./transitions.js";
export type { TransitionFunction, WorkflowDefinition } from "./transitions.js";

// Engine
export { WorkflowEngine } from "./engine.js";
export type {
  Block,
  TransitionRecord,
  TransitionHandler,
  Subscription,
  WorkflowEngineOptions,
} from "./engine.js";

// Replay
export { replayWorkflow } from "./replay.js";
export type { ReplayResult, ReplayOptions } from "./replay.js";
