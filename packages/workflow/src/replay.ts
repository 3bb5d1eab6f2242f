/**
 * @tessera/workflow — Deterministic replay.
 *
 * Rebuilds an agent's workflow state from the finalized blocks alone.
 * Round timeouts are local and are not part of the block stream, so a
 * replay covers the committed path only. Two replays of the same blocks
 * from the same setup end with the same synchronized data hash.
 */

import pino from "pino";
import type { Logger } from "pino";
import { WorkflowEngine } from "./engine.js";
import type { Block, TransitionRecord } from "./engine.js";
import type { RoundId } from "./rounds.js";
import type { SynchronizedData } from "./synchronized-data.js";
import type { WorkflowDefinition } from "./transitions.js";

export interface ReplayResult {
  readonly currentRound: RoundId;
  readonly isFinished: boolean;
  readonly roundCount: number;
  readonly synchronizedData: SynchronizedData;
  readonly history: readonly TransitionRecord[];

  /** Blocks applied to the engine */
  readonly blocksApplied: number;
}

export interface ReplayOptions {
  readonly definition?: WorkflowDefinition;
  readonly logger?: Logger;

  /**
   * Start the next period when a block follows a final round, as a runtime
   * running several periods does. Default: false
   */
  readonly acrossPeriods?: boolean;
}

/**
 * Replay `blocks` in order from the initial round. Unless `acrossPeriods`
 * is set, blocks that arrive after a final round is reached are ignored.
 */
export function replayWorkflow(
  initial: SynchronizedData,
  blocks: Iterable<Block>,
  options: ReplayOptions = {},
): ReplayResult {
  const engine = new WorkflowEngine(initial, {
    // Timeouts never fire during replay
    roundTimeoutMs: Number.MAX_SAFE_INTEGER,
    clock: () => 0,
    logger: options.logger ?? pino({ level: "silent" }),
    ...(options.definition !== undefined ? { definition: options.definition } : {}),
  });

  let blocksApplied = 0;
  for (const block of blocks) {
    if (engine.isFinished) {
      if (options.acrossPeriods !== true) break;
      engine.startNextPeriod();
    }
    engine.deliverBlock(block);
    blocksApplied++;
  }

  return {
    currentRound: engine.currentRound,
    isFinished: engine.isFinished,
    roundCount: engine.roundCount,
    synchronizedData: engine.synchronizedData,
    history: engine.history,
    blocksApplied,
  };
}
