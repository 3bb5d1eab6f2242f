/**
 * Tests for deterministic replay of finalized blocks.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { RoundPayload } from "@tessera/types";
import { WorkflowEngine } from "../src/engine.js";
import { replayWorkflow } from "../src/replay.js";
import {
  AGENTS,
  TX_HASH,
  apiSelection,
  block,
  dataPull,
  decision,
  happyPathBlocks,
  initialData,
  silentLogger,
  txPreparation,
} from "./helpers.js";

describe("replayWorkflow", () => {
  it("reaches the same state as a live engine", () => {
    const live = new WorkflowEngine(initialData(), { roundTimeoutMs: 1000, logger: silentLogger });
    for (const b of happyPathBlocks()) {
      live.deliverBlock(b);
    }

    const replayed = replayWorkflow(initialData(), happyPathBlocks());

    expect(replayed.currentRound).toBe("finished_tx_preparation");
    expect(replayed.isFinished).toBe(true);
    expect(replayed.blocksApplied).toBe(4);
    expect(replayed.synchronizedData.hash).toBe(live.synchronizedData.hash);
    expect(replayed.history).toEqual(live.history);
  });

  it("ignores blocks after a final round", () => {
    const blocks = [...happyPathBlocks(), block(5, [apiSelection(AGENTS[0] ?? "", "coingecko")])];
    const result = replayWorkflow(initialData(), blocks);
    expect(result.blocksApplied).toBe(4);
    expect(result.roundCount).toBe(5);
  });

  it("continues into the next period when asked", () => {
    const live = new WorkflowEngine(initialData(), { roundTimeoutMs: 1000, logger: silentLogger });
    for (const b of happyPathBlocks()) {
      live.deliverBlock(b);
    }
    live.startNextPeriod();
    for (const b of happyPathBlocks()) {
      live.deliverBlock(b);
    }

    const blocks = [...happyPathBlocks(), ...happyPathBlocks()];
    const replayed = replayWorkflow(initialData(), blocks, { acrossPeriods: true });

    expect(replayed.blocksApplied).toBe(8);
    expect(replayed.isFinished).toBe(true);
    expect(replayed.synchronizedData.periodCount).toBe(1);
    expect(replayed.synchronizedData.hash).toBe(live.synchronizedData.hash);
  });

  it("stops mid-workflow when the blocks run out", () => {
    const result = replayWorkflow(initialData(), happyPathBlocks().slice(0, 2));
    expect(result.currentRound).toBe("decision_making");
    expect(result.isFinished).toBe(false);
  });

  it("is deterministic for arbitrary block streams", () => {
    const pool: RoundPayload[] = AGENTS.flatMap((s) => [
      apiSelection(s, "coingecko"),
      apiSelection(s, "coinmarketcap"),
      dataPull(s, '{"ETH":20}', 20),
      dataPull(s, null, null),
      decision(s, "transact", '{"ETH":1}'),
      decision(s, "done"),
      decision(s, "error"),
      txPreparation(s, TX_HASH),
      txPreparation(s, null),
    ]);
    const arbBlocks = fc.array(fc.array(fc.constantFrom(...pool), { maxLength: 8 }), {
      maxLength: 12,
    });

    fc.assert(
      fc.property(arbBlocks, (payloadLists) => {
        const blocks = payloadLists.map((payloads, i) => block(i + 1, payloads));
        const first = replayWorkflow(initialData(), blocks);
        const second = replayWorkflow(initialData(), blocks);

        expect(second.synchronizedData.hash).toBe(first.synchronizedData.hash);
        expect(second.history).toEqual(first.history);
        expect(second.currentRound).toBe(first.currentRound);
      }),
    );
  });
});
