/**
 * Tests for the rebalancing decision.
 */

import { describe, it, expect } from "vitest";
import type { RebalancingParams } from "@tessera/types";
import {
  calculateRebalancingActions,
  deviationPercent,
  roundHalfToEven,
} from "../src/rebalancing.js";

const HALF_HALF: RebalancingParams = {
  tokensToRebalance: ["A", "B"],
  targetPercentages: [50, 50],
  variationThreshold: 5,
};

describe("deviationPercent", () => {
  it("is relative to the target value", () => {
    expect(deviationPercent(60, 50)).toBe(20);
    expect(deviationPercent(40, 50)).toBe(-20);
  });

  it("is infinite for a holding against a zero target", () => {
    expect(deviationPercent(10, 0)).toBe(Infinity);
    expect(deviationPercent(0, 0)).toBeNaN();
  });
});

describe("roundHalfToEven", () => {
  it("rounds ties to the even neighbour", () => {
    expect(roundHalfToEven(0.5)).toBe(0);
    expect(roundHalfToEven(2.5)).toBe(2);
    expect(roundHalfToEven(6.5)).toBe(6);
    expect(roundHalfToEven(7.5)).toBe(8);
    expect(roundHalfToEven(-1.5)).toBe(-2);
    expect(roundHalfToEven(-0.5)).toBe(0);
  });

  it("rounds everything else to the nearest integer", () => {
    expect(roundHalfToEven(2.4)).toBe(2);
    expect(roundHalfToEven(2.6)).toBe(3);
    expect(roundHalfToEven(-2.6)).toBe(-3);
    expect(roundHalfToEven(1500)).toBe(1500);
  });
});

describe("calculateRebalancingActions", () => {
  it("targets every token outside the threshold", () => {
    const actions = calculateRebalancingActions({ A: 60, B: 40 }, 100, HALF_HALF, { A: 2, B: 10 });
    expect(actions).toEqual({ A: 25, B: 5 });
  });

  it("returns nothing when every token is within the threshold", () => {
    const actions = calculateRebalancingActions(
      { A: 60, B: 40 },
      100,
      { ...HALF_HALF, variationThreshold: 25 },
      { A: 2, B: 10 },
    );
    expect(actions).toEqual({});
  });

  it("does not act on a deviation equal to the threshold", () => {
    const actions = calculateRebalancingActions(
      { A: 60, B: 40 },
      100,
      { ...HALF_HALF, variationThreshold: 20 },
      { A: 1, B: 1 },
    );
    expect(actions).toEqual({});
  });

  it("skips tokens without a price", () => {
    const actions = calculateRebalancingActions({ A: 60, B: 40 }, 100, HALF_HALF, { A: 2, B: null });
    expect(actions).toEqual({ A: 25 });
  });

  it("treats a tracked token missing from the values as holding nothing", () => {
    const actions = calculateRebalancingActions({ A: 100 }, 100, HALF_HALF, { A: 1, B: 4 });
    expect(actions).toEqual({ A: 50, B: 12.5 });
  });

  it("returns nothing for a non-positive total", () => {
    expect(calculateRebalancingActions({ A: 0 }, 0, HALF_HALF, { A: 1, B: 1 })).toEqual({});
  });
});
