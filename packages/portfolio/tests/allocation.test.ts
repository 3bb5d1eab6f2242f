/**
 * Tests for portfolio valuation.
 */

import { describe, it, expect } from "vitest";
import { allocationPercentages, calculatePortfolioAllocation } from "../src/allocation.js";

describe("calculatePortfolioAllocation", () => {
  it("values each token and sums the total", () => {
    const result = calculatePortfolioAllocation({ ETH: 2, USDC: 500 }, { ETH: 2500, USDC: 1 });
    expect(result).toEqual({
      kind: "valued",
      tokenValues: { ETH: 5000, USDC: 500 },
      totalValue: 5500,
      skipped: [],
    });
  });

  it("keeps a zero balance with a price as value 0 by default", () => {
    const result = calculatePortfolioAllocation({ A: 10, B: 0 }, { A: 2, B: 5 });
    expect(result).toEqual({
      kind: "valued",
      tokenValues: { A: 20, B: 0 },
      totalValue: 20,
      skipped: [],
    });
  });

  it("drops a zero balance when asked to", () => {
    const result = calculatePortfolioAllocation(
      { A: 10, B: 0 },
      { A: 2, B: 5 },
      { includeZeroBalances: false },
    );
    expect(result).toEqual({
      kind: "valued",
      tokenValues: { A: 20 },
      totalValue: 20,
      skipped: [{ token: "B", reason: "zero_balance" }],
    });
  });

  it("skips tokens without a balance or a price", () => {
    const result = calculatePortfolioAllocation(
      { A: 1, B: null, C: 3 },
      { A: 4, B: 1, C: null },
    );
    expect(result).toEqual({
      kind: "valued",
      tokenValues: { A: 4 },
      totalValue: 4,
      skipped: [
        { token: "B", reason: "missing_balance" },
        { token: "C", reason: "missing_price" },
      ],
    });
  });

  it("values only the requested tokens, in their order", () => {
    const result = calculatePortfolioAllocation(
      { A: 1, B: 2, C: 3 },
      { A: 1, B: 1, C: 1 },
      { tokens: ["C", "A", "D"] },
    );
    expect(result.kind).toBe("valued");
    if (result.kind === "valued") {
      expect(Object.keys(result.tokenValues)).toEqual(["C", "A"]);
      expect(result.totalValue).toBe(4);
      expect(result.skipped).toEqual([{ token: "D", reason: "missing_balance" }]);
    }
  });

  it("reports an empty portfolio when nothing has value", () => {
    expect(calculatePortfolioAllocation({ A: 0 }, { A: 5 })).toEqual({ kind: "empty", skipped: [] });
    expect(calculatePortfolioAllocation({ A: 1 }, {})).toEqual({
      kind: "empty",
      skipped: [{ token: "A", reason: "missing_price" }],
    });
  });
});

describe("allocationPercentages", () => {
  it("expresses each value as a share of the total", () => {
    expect(allocationPercentages({ A: 60, B: 40 }, 100)).toEqual({ A: 60, B: 40 });
  });
});
