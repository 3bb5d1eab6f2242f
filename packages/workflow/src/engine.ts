/**
 * @tessera/workflow — Workflow engine.
 *
 * Drives the round sequence for one agent. Exactly one round is active at
 * a time. Finalized blocks of payloads are fed to the active round's
 * collector; after each block the round's `endBlock` runs once and, if it
 * returns an outcome, exactly one transition is applied.
 *
 * The engine is the only writer of synchronized data. Round timeouts are
 * local: they are checked against an injected clock and never affect
 * what other agents commit.
 */

import pino from "pino";
import type { Logger } from "pino";
import { isRoundPayload } from "@tessera/types";
import type { PayloadKind, RoundPayload, WorkflowEvent } from "@tessera/types";
import { ThresholdCollector } from "./collection.js";
import { WorkflowError } from "./errors.js";
import type { RoundDefinition, RoundId, RoundOutcome } from "./rounds.js";
import type { SynchronizedData } from "./synchronized-data.js";
import { nextRound, REBALANCING_WORKFLOW } from "./transitions.js";
import type { WorkflowDefinition } from "./transitions.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A finalized block: every payload the transport ordered for this height.
 */
export interface Block {
  readonly height: number;
  readonly payloads: readonly RoundPayload[];
}

/**
 * One applied transition.
 */
export interface TransitionRecord {
  readonly from: RoundId;
  readonly event: WorkflowEvent;
  readonly to: RoundId;

  /** Number of rounds entered so far, including `to` */
  readonly roundCount: number;

  /** Synchronized data version after the transition */
  readonly dataVersion: number;
}

export type TransitionHandler = (record: TransitionRecord) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface WorkflowEngineOptions {
  /** Wall-clock budget per round before ROUND_TIMEOUT fires */
  readonly roundTimeoutMs: number;

  /** Defaults to Date.now */
  readonly clock?: () => number;

  readonly logger?: Logger;

  /** Defaults to the rebalancing workflow */
  readonly definition?: WorkflowDefinition;
}

interface ActiveRound {
  readonly definition: RoundDefinition;
  readonly collector: ThresholdCollector<PayloadKind> | null;
  readonly startedAt: number;
}

// =============================================================================
// Engine
// =============================================================================

export class WorkflowEngine {
  private readonly definition: WorkflowDefinition;
  private readonly roundTimeoutMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly handlers = new Set<TransitionHandler>();
  private readonly transitions: TransitionRecord[] = [];

  private data: SynchronizedData;
  private active: ActiveRound;
  private rounds = 1;

  constructor(initial: SynchronizedData, options: WorkflowEngineOptions) {
    if (!(options.roundTimeoutMs > 0)) {
      throw new Error(`roundTimeoutMs must be > 0, got ${options.roundTimeoutMs}`);
    }
    this.definition = options.definition ?? REBALANCING_WORKFLOW;
    this.roundTimeoutMs = options.roundTimeoutMs;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.data = initial;
    this.active = this.open(this.definition.initialRound);
  }

  // ─── State ──────────────────────────────────────────────────────────

  get currentRound(): RoundId {
    return this.active.definition.id;
  }

  get synchronizedData(): SynchronizedData {
    return this.data;
  }

  get isFinished(): boolean {
    return this.definition.finalRounds.has(this.currentRound);
  }

  get roundCount(): number {
    return this.rounds;
  }

  get roundStartedAt(): number {
    return this.active.startedAt;
  }

  get history(): readonly TransitionRecord[] {
    return [...this.transitions];
  }

  /**
   * Payload kind the active round accepts, or null in a final round.
   */
  get expectedPayloadKind(): PayloadKind | null {
    return this.active.collector?.payloadKind ?? null;
  }

  // ─── Blocks ─────────────────────────────────────────────────────────

  /**
   * Apply a finalized block and run the active round's end-of-block check.
   *
   * Payloads that do not belong to the active round or come from unknown
   * senders are dropped with a warning; they cannot stall or crash the
   * round.
   *
   * @throws WorkflowError WORKFLOW_FINISHED once a final round is active
   */
  deliverBlock(block: Block): TransitionRecord | null {
    const collector = this.active.collector;
    if (collector === null || this.active.definition.variant === "final") {
      throw new WorkflowError(
        "WORKFLOW_FINISHED",
        `Workflow already finished in "${this.currentRound}"`,
      );
    }

    for (const payload of block.payloads) {
      if (!isRoundPayload(payload)) {
        this.logger.warn({ height: block.height }, "Dropping malformed payload");
        continue;
      }
      try {
        collector.submit(payload);
      } catch (err: unknown) {
        if (!(err instanceof WorkflowError)) throw err;
        this.logger.warn(
          { height: block.height, round: this.currentRound, code: err.code },
          err.message,
        );
      }
    }

    const outcome: RoundOutcome | null = this.active.definition.endBlock({
      synchronizedData: this.data,
      collector,
      logger: this.logger.child({ round: this.currentRound }),
    });

    if (outcome === null) {
      return null;
    }
    return this.transition(outcome.event, outcome.synchronizedData);
  }

  /**
   * Fire ROUND_TIMEOUT if the active round has been open too long.
   */
  checkTimeout(now: number = this.clock()): TransitionRecord | null {
    if (this.isFinished) return null;
    if (now - this.active.startedAt < this.roundTimeoutMs) return null;

    this.logger.warn(
      { round: this.currentRound, elapsedMs: now - this.active.startedAt },
      "Round timed out",
    );
    return this.transition("round_timeout", this.data);
  }

  // ─── Periods ────────────────────────────────────────────────────────

  /**
   * Leave the final round and start the next period in the initial round.
   * Setup keys and the definition's cross-period keys are carried over;
   * everything else starts empty.
   *
   * @throws WorkflowError PERIOD_NOT_FINISHED unless a final round is active
   */
  startNextPeriod(): SynchronizedData {
    if (!this.isFinished) {
      throw new WorkflowError(
        "PERIOD_NOT_FINISHED",
        `Cannot start a new period while "${this.currentRound}" is running`,
      );
    }
    const from = this.currentRound;
    this.data = this.data.nextPeriod(this.definition.crossPeriodPersistedKeys);
    this.active = this.open(this.definition.initialRound);
    this.rounds += 1;
    this.logger.info(
      { from, to: this.currentRound, period: this.data.periodCount },
      "Period started",
    );
    return this.data;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: TransitionHandler): Subscription {
    this.handlers.add(handler);
    return {
      unsubscribe: () => {
        this.handlers.delete(handler);
      },
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private open(id: RoundId): ActiveRound {
    const definition: RoundDefinition = this.definition.rounds[id];
    const collector =
      definition.variant === "collecting"
        ? new ThresholdCollector<PayloadKind>(definition.payloadKind, this.data.participants)
        : null;
    return { definition, collector, startedAt: this.clock() };
  }

  private transition(event: WorkflowEvent, data: SynchronizedData): TransitionRecord {
    const from = this.currentRound;
    const to = nextRound(this.definition.transitions, from, event);
    if (to === undefined) {
      // Unreachable for a definition built by defineWorkflow()
      throw new WorkflowError(
        "NO_TRANSITION",
        `No transition from "${from}" on "${event}"`,
      );
    }

    if (this.definition.finalRounds.has(to)) {
      for (const key of this.definition.postConditions[to] ?? []) {
        if (data.get(key) === undefined) {
          throw new WorkflowError(
            "POST_CONDITION_FAILED",
            `Entering "${to}" requires "${key}" in synchronized data`,
          );
        }
      }
    }

    this.data = data;
    this.active = this.open(to);
    this.rounds += 1;

    const record: TransitionRecord = {
      from,
      event,
      to,
      roundCount: this.rounds,
      dataVersion: data.version,
    };
    this.transitions.push(record);
    this.logger.info({ from, event, to, roundCount: this.rounds }, "Round transition");

    for (const handler of this.handlers) {
      handler(record);
    }
    return record;
  }
}
