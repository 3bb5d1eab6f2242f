/**
 * Tests for the workflow engine: block delivery, timeouts, notifications.
 */

import { describe, it, expect, vi } from "vitest";
import { WorkflowEngine } from "../src/engine.js";
import { WorkflowError } from "../src/errors.js";
import { SYNC_KEYS } from "../src/synchronized-data.js";
import { REBALANCING_WORKFLOW } from "../src/transitions.js";
import type { WorkflowDefinition } from "../src/transitions.js";
import {
  AGENT_A,
  AGENT_B,
  AGENT_C,
  AGENT_D,
  apiSelection,
  block,
  dataPull,
  decision,
  fromEach,
  happyPathBlocks,
  initialData,
  silentLogger,
} from "./helpers.js";

const QUORUM = [AGENT_A, AGENT_B, AGENT_C];

function createEngine(
  clock: () => number = () => 0,
  definition: WorkflowDefinition = REBALANCING_WORKFLOW,
): WorkflowEngine {
  return new WorkflowEngine(initialData(), {
    roundTimeoutMs: 1000,
    clock,
    logger: silentLogger,
    definition,
  });
}

describe("WorkflowEngine", () => {
  it("starts in the initial round", () => {
    const engine = createEngine();
    expect(engine.currentRound).toBe("api_selection");
    expect(engine.roundCount).toBe(1);
    expect(engine.isFinished).toBe(false);
    expect(engine.expectedPayloadKind).toBe("api_selection");
    expect(engine.history).toEqual([]);
  });

  it("rejects a non-positive round timeout", () => {
    expect(() => new WorkflowEngine(initialData(), { roundTimeoutMs: 0 })).toThrow(
      /roundTimeoutMs must be > 0/,
    );
  });

  it("runs the full rebalancing path to finished_tx_preparation", () => {
    const engine = createEngine();
    for (const b of happyPathBlocks()) {
      engine.deliverBlock(b);
    }

    expect(engine.currentRound).toBe("finished_tx_preparation");
    expect(engine.isFinished).toBe(true);
    expect(engine.expectedPayloadKind).toBeNull();
    expect(engine.roundCount).toBe(5);
    expect(engine.history.map((t) => [t.from, t.event, t.to, t.dataVersion])).toEqual([
      ["api_selection", "coingecko", "data_pull", 0],
      ["data_pull", "done", "decision_making", 1],
      ["decision_making", "transact", "tx_preparation", 3],
      ["tx_preparation", "done", "finished_tx_preparation", 4],
    ]);
    expect(engine.synchronizedData.adjustmentBalances).toBe('{"ETH":2}');
  });

  it("takes the alternative data pull after switching to coinmarketcap", () => {
    const engine = createEngine();
    const record = engine.deliverBlock(
      block(1, fromEach(QUORUM, (s) => apiSelection(s, "coinmarketcap"))),
    );
    expect(record?.to).toBe("alternative_data_pull");
    expect(engine.synchronizedData.apiSelection).toBe("coinmarketcap");
    expect(engine.expectedPayloadKind).toBe("data_pull");
  });

  it("finishes without a transaction when nothing needs rebalancing", () => {
    const engine = createEngine();
    engine.deliverBlock(block(1, fromEach(QUORUM, (s) => apiSelection(s, "coingecko"))));
    engine.deliverBlock(block(2, fromEach(QUORUM, (s) => dataPull(s, '{"ETH":50}', 50))));
    const record = engine.deliverBlock(block(3, fromEach(QUORUM, (s) => decision(s, "done"))));

    expect(record?.to).toBe("finished_decision_making");
    expect(engine.isFinished).toBe(true);
    expect(engine.synchronizedData.mostVotedTxHash).toBeNull();
  });

  it("applies at most one transition per block and drops late payloads", () => {
    const engine = createEngine();
    // Data pull payloads arrive while api_selection is still active
    const record = engine.deliverBlock(
      block(1, [
        ...fromEach(QUORUM, (s) => apiSelection(s, "coingecko")),
        ...fromEach(QUORUM, (s) => dataPull(s, '{"ETH":50}', 50)),
      ]),
    );
    expect(record?.to).toBe("data_pull");
    expect(engine.deliverBlock(block(2, []))).toBeNull();
    expect(engine.currentRound).toBe("data_pull");
  });

  it("ignores payloads from non-participants", () => {
    const engine = createEngine();
    const record = engine.deliverBlock(
      block(1, [
        apiSelection(AGENT_A, "coingecko"),
        apiSelection(AGENT_B, "coingecko"),
        apiSelection("0xoutsider", "coingecko"),
      ]),
    );
    expect(record).toBeNull();
    expect(engine.currentRound).toBe("api_selection");
  });

  it("loops on no_majority with a fresh collection", () => {
    const engine = createEngine();
    const record = engine.deliverBlock(
      block(1, [
        apiSelection(AGENT_A, "coingecko"),
        apiSelection(AGENT_B, "coinmarketcap"),
        apiSelection(AGENT_C, "coingecko"),
        apiSelection(AGENT_D, "coinmarketcap"),
      ]),
    );
    expect(record).toMatchObject({ from: "api_selection", event: "no_majority", to: "api_selection" });
    expect(engine.roundCount).toBe(2);

    // Only the new votes count in the re-entered round
    expect(engine.deliverBlock(block(2, [apiSelection(AGENT_A, "coingecko")]))).toBeNull();
  });

  it("throws WORKFLOW_FINISHED after a final round", () => {
    const engine = createEngine();
    for (const b of happyPathBlocks()) {
      engine.deliverBlock(b);
    }
    try {
      engine.deliverBlock(block(5, []));
      expect.unreachable("expected WorkflowError");
    } catch (err) {
      expect(err).toBeInstanceOf(WorkflowError);
      if (err instanceof WorkflowError) {
        expect(err.code).toBe("WORKFLOW_FINISHED");
      }
    }
  });

  it("enforces post-conditions on final rounds", () => {
    const engine = createEngine(() => 0, {
      ...REBALANCING_WORKFLOW,
      postConditions: { finished_decision_making: [SYNC_KEYS.adjustmentBalances] },
    });
    engine.deliverBlock(block(1, fromEach(QUORUM, (s) => apiSelection(s, "coingecko"))));
    engine.deliverBlock(block(2, fromEach(QUORUM, (s) => dataPull(s, '{"ETH":50}', 50))));

    expect(() =>
      engine.deliverBlock(block(3, fromEach(QUORUM, (s) => decision(s, "done")))),
    ).toThrow(/requires "adjustment_balances"/);
    expect(engine.currentRound).toBe("decision_making");
  });
});

// =============================================================================
// Timeouts
// =============================================================================

describe("WorkflowEngine.checkTimeout", () => {
  it("fires round_timeout once the round has been open long enough", () => {
    let now = 5000;
    const engine = createEngine(() => now);

    expect(engine.checkTimeout(5999)).toBeNull();

    now = 6000;
    const record = engine.checkTimeout();
    expect(record).toMatchObject({
      from: "api_selection",
      event: "round_timeout",
      to: "api_selection",
    });
    expect(engine.roundStartedAt).toBe(6000);
  });

  it("discards partial votes when the round restarts", () => {
    const engine = createEngine();
    engine.deliverBlock(block(1, [apiSelection(AGENT_A, "coingecko"), apiSelection(AGENT_B, "coingecko")]));
    engine.checkTimeout(1000);
    expect(engine.deliverBlock(block(2, [apiSelection(AGENT_C, "coingecko")]))).toBeNull();
    expect(engine.currentRound).toBe("api_selection");
  });

  it("does nothing in a final round", () => {
    const engine = createEngine();
    for (const b of happyPathBlocks()) {
      engine.deliverBlock(b);
    }
    expect(engine.checkTimeout(Number.MAX_SAFE_INTEGER)).toBeNull();
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("WorkflowEngine.subscribe", () => {
  it("notifies handlers of every transition until unsubscribed", () => {
    const engine = createEngine();
    const handler = vi.fn();
    const subscription = engine.subscribe(handler);
    const [first, second] = happyPathBlocks();

    if (first === undefined || second === undefined) throw new Error("missing blocks");
    engine.deliverBlock(first);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({ from: "api_selection", to: "data_pull", roundCount: 2 }),
    );

    subscription.unsubscribe();
    engine.deliverBlock(second);
    expect(handler).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// Periods
// =============================================================================

describe("WorkflowEngine.startNextPeriod", () => {
  function finishedEngine(definition: WorkflowDefinition = REBALANCING_WORKFLOW): WorkflowEngine {
    const engine = createEngine(() => 0, definition);
    for (const b of happyPathBlocks()) {
      engine.deliverBlock(b);
    }
    return engine;
  }

  it("refuses to start a period while one is running", () => {
    const engine = createEngine();
    expect(() => engine.startNextPeriod()).toThrow(WorkflowError);
    expect(() => engine.startNextPeriod()).toThrow(
      'Cannot start a new period while "api_selection" is running',
    );
  });

  it("returns to the initial round with only setup keys", () => {
    const engine = finishedEngine();
    const before = engine.synchronizedData;

    const data = engine.startNextPeriod();

    expect(engine.currentRound).toBe("api_selection");
    expect(engine.isFinished).toBe(false);
    expect(engine.roundCount).toBe(6);
    expect(data).toBe(engine.synchronizedData);
    expect(data.periodCount).toBe(1);
    expect(data.version).toBe(0);
    expect(data.participants).toEqual(before.participants);
    expect(data.tokenValues).toBeNull();
    expect(data.mostVotedTxHash).toBeNull();
  });

  it("carries the definition's cross-period keys", () => {
    const engine = finishedEngine({
      ...REBALANCING_WORKFLOW,
      crossPeriodPersistedKeys: new Set([SYNC_KEYS.tokenValues]),
    });

    const data = engine.startNextPeriod();

    expect(data.tokenValues).toBe('{"ETH":20,"USDC":80}');
    expect(data.totalPortfolioValue).toBeNull();
  });

  it("runs a second period to a final round", () => {
    const engine = finishedEngine();
    engine.startNextPeriod();

    for (const b of happyPathBlocks()) {
      engine.deliverBlock(b);
    }

    expect(engine.currentRound).toBe("finished_tx_preparation");
    expect(engine.roundCount).toBe(10);
    expect(engine.synchronizedData.periodCount).toBe(1);
    expect(engine.history).toHaveLength(8);
  });
});
