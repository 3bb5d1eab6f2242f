/**
 * @tessera/agent — Agent runtime.
 *
 * Owns one workflow engine and drives it:
 * - on entering a collecting round, starts that round's behaviour and
 *   aborts whatever behaviour was still running
 * - submits the behaviour's payload through the transport, unless the
 *   round ended first
 * - feeds every finalized block to the engine
 * - checks the round timeout on each tick
 *
 * A behaviour never writes synchronized data; only blocks do.
 */

import type { Logger } from "pino";
import type { RoundPayload } from "@tessera/types";
import { WorkflowEngine } from "@tessera/workflow";
import type {
  Block,
  RoundId,
  Subscription,
  SynchronizedData,
  TransitionRecord,
} from "@tessera/workflow";
import { createBehaviours } from "./behaviours/index.js";
import type { Behaviour, BehaviourSet } from "./behaviours/index.js";
import type { AgentContext } from "./context.js";
import type { ReplicationTransport } from "./transport.js";

// =============================================================================
// Types
// =============================================================================

export interface AgentRuntimeOptions {
  readonly context: AgentContext;
  readonly transport: ReplicationTransport;
  readonly initialData: SynchronizedData;
  readonly roundTimeoutMs: number;

  /** Timeout polling interval for run(). Default: 500 */
  readonly tickIntervalMs?: number;

  /** Defaults to Date.now */
  readonly clock?: () => number;

  /** Defaults to the rebalancing behaviours */
  readonly behaviours?: BehaviourSet;

  /** Periods to run before run() resolves. Default: 1 */
  readonly periods?: number;
}

export interface RunResult {
  readonly finalRound: RoundId;
  readonly synchronizedData: SynchronizedData;
  readonly roundCount: number;
  readonly history: readonly TransitionRecord[];

  /** Periods that reached a final round */
  readonly periodsCompleted: number;
}

type Settle = (outcome: { ok: true; result: RunResult } | { ok: false; error: unknown }) => void;

function behaviourTable(set: BehaviourSet): ReadonlyMap<RoundId, Behaviour> {
  return new Map<RoundId, Behaviour>([
    ["api_selection", set.api_selection],
    ["data_pull", set.data_pull],
    ["alternative_data_pull", set.alternative_data_pull],
    ["decision_making", set.decision_making],
    ["tx_preparation", set.tx_preparation],
  ]);
}

// =============================================================================
// Runtime
// =============================================================================

export class AgentRuntime {
  readonly engine: WorkflowEngine;

  private readonly context: AgentContext;
  private readonly transport: ReplicationTransport;
  private readonly behaviours: ReadonlyMap<RoundId, Behaviour>;
  private readonly tickIntervalMs: number;
  private readonly periods: number;
  private readonly logger: Logger;

  private subscriptions: Subscription[] = [];
  private inFlight: AbortController | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private settle: Settle | null = null;
  private started = false;
  private periodsCompleted = 0;

  constructor(options: AgentRuntimeOptions) {
    this.context = options.context;
    this.transport = options.transport;
    this.behaviours = behaviourTable(options.behaviours ?? createBehaviours());
    this.tickIntervalMs = options.tickIntervalMs ?? 500;
    this.periods = options.periods ?? 1;
    if (!Number.isInteger(this.periods) || this.periods < 1) {
      throw new Error(`periods must be a positive integer, got ${this.periods}`);
    }
    this.logger = options.context.logger;
    this.engine = new WorkflowEngine(options.initialData, {
      roundTimeoutMs: options.roundTimeoutMs,
      clock: options.clock,
      logger: this.logger,
    });
  }

  get result(): RunResult {
    return {
      finalRound: this.engine.currentRound,
      synchronizedData: this.engine.synchronizedData,
      roundCount: this.engine.roundCount,
      history: this.engine.history,
      periodsCompleted: this.periodsCompleted,
    };
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Subscribe to blocks and start the behaviour of the current round.
   * Idempotent.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.subscriptions = [
      this.transport.onBlock((block) => this.handleBlock(block)),
      this.engine.subscribe((record) => this.handleTransition(record)),
    ];
    this.launch();
  }

  /**
   * Abort the running behaviour and detach from the transport.
   */
  stop(): void {
    this.inFlight?.abort();
    this.inFlight = null;
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.started = false;
  }

  /**
   * Check the round timeout. Called by run() on every tick.
   */
  tick(now?: number): void {
    if (this.engine.isFinished) return;
    try {
      this.engine.checkTimeout(now);
    } catch (err: unknown) {
      this.fail(err);
    }
  }

  /**
   * Run until the last configured period reaches a final round.
   *
   * Rejects with the abort reason when `signal` aborts, or with the error
   * that stopped the engine.
   */
  run(signal?: AbortSignal): Promise<RunResult> {
    return new Promise<RunResult>((resolve, reject) => {
      if (signal?.aborted === true) {
        reject(signal.reason);
        return;
      }

      const onAbort = (): void => {
        this.logger.info({ round: this.engine.currentRound }, "Agent stopped");
        this.settle = null;
        this.stop();
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.settle = (outcome) => {
        signal?.removeEventListener("abort", onAbort);
        this.settle = null;
        this.stop();
        if (outcome.ok) {
          resolve(outcome.result);
        } else {
          reject(outcome.error);
        }
      };

      this.start();
      if (this.settle === null) {
        // Settled while starting
        return;
      }
      if (this.engine.isFinished) {
        this.complete();
        return;
      }
      this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private handleBlock(block: Block): void {
    if (this.engine.isFinished) return;
    try {
      this.engine.deliverBlock(block);
    } catch (err: unknown) {
      this.fail(err);
    }
  }

  private handleTransition(record: TransitionRecord): void {
    if (this.engine.isFinished) {
      this.inFlight?.abort();
      this.inFlight = null;
      this.periodsCompleted += 1;
      if (this.periodsCompleted < this.periods) {
        this.engine.startNextPeriod();
        this.launch();
        return;
      }
      this.complete();
      return;
    }
    this.logger.debug({ round: record.to, event: record.event }, "Entering round");
    this.launch();
  }

  private launch(): void {
    this.inFlight?.abort();
    this.inFlight = null;

    const round = this.engine.currentRound;
    const behaviour = this.behaviours.get(round);
    if (behaviour === undefined) {
      return;
    }
    if (behaviour.payloadKind !== this.engine.expectedPayloadKind) {
      this.fail(
        new Error(
          `Behaviour for "${round}" produces "${behaviour.payloadKind}" payloads, round expects "${String(this.engine.expectedPayloadKind)}"`,
        ),
      );
      return;
    }

    const controller = new AbortController();
    this.inFlight = controller;
    void this.execute(round, behaviour, this.engine.synchronizedData, controller.signal);
  }

  private async execute(
    round: RoundId,
    behaviour: Behaviour,
    data: SynchronizedData,
    signal: AbortSignal,
  ): Promise<void> {
    let payload: RoundPayload;
    try {
      payload = await behaviour.act(this.context, data, signal);
    } catch (err: unknown) {
      if (signal.aborted) {
        this.logger.debug({ round }, "Behaviour aborted");
        return;
      }
      this.logger.error({ round, err }, "Behaviour failed; waiting for round timeout");
      return;
    }

    if (signal.aborted) {
      this.logger.debug({ round }, "Round ended before payload was ready");
      return;
    }
    this.logger.info({ round, payload }, "Submitting payload");
    this.transport.submitPayload(payload);
  }

  private complete(): void {
    this.logger.info(
      { round: this.engine.currentRound, roundCount: this.engine.roundCount },
      "Workflow finished",
    );
    this.settle?.({ ok: true, result: this.result });
  }

  private fail(error: unknown): void {
    this.logger.error({ err: error, round: this.engine.currentRound }, "Agent runtime failed");
    this.stop();
    this.settle?.({ ok: false, error });
  }
}
