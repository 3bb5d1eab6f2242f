/**
 * @tessera/portfolio — Rebalancing parameters.
 *
 * Invariants, checked once before any round runs:
 * - one target percentage per tracked token
 * - target percentages sum to 100
 * - variation threshold in [0, 100]
 */

import { z } from "zod";
import type { RebalancingParams } from "@tessera/types";
import { ConfigError } from "./types.js";

/** Allowed distance of the target sum from 100 */
export const TARGET_SUM_TOLERANCE = 1e-9;

export const RebalancingParamsSchema = z
  .object({
    tokensToRebalance: z.array(z.string().min(1)).min(1),
    targetPercentages: z.array(z.number().finite().min(0).max(100)),
    variationThreshold: z.number().finite().min(0).max(100),
  })
  .superRefine((params, ctx) => {
    if (params.tokensToRebalance.length !== params.targetPercentages.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["targetPercentages"],
        message: `Expected ${params.tokensToRebalance.length} target percentages, got ${params.targetPercentages.length}`,
      });
    }
    const sum = params.targetPercentages.reduce((acc, pct) => acc + pct, 0);
    if (Math.abs(sum - 100) > TARGET_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["targetPercentages"],
        message: `Target percentages must sum to 100, got ${sum}`,
      });
    }
    if (new Set(params.tokensToRebalance).size !== params.tokensToRebalance.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tokensToRebalance"],
        message: "Tracked tokens must be unique",
      });
    }
  });

/**
 * @throws ConfigError INVALID_PARAMS listing every violated invariant
 */
export function validateRebalancingParams(input: unknown): RebalancingParams {
  const result = RebalancingParamsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "params"}: ${issue.message}`,
    );
    throw new ConfigError(
      "INVALID_PARAMS",
      `Invalid rebalancing parameters: ${issues.join("; ")}`,
      issues,
    );
  }
  return result.data;
}

/**
 * Target percentage of a tracked token, undefined for untracked ones.
 */
export function targetPercentageOf(params: RebalancingParams, token: string): number | undefined {
  const index = params.tokensToRebalance.indexOf(token);
  return index === -1 ? undefined : params.targetPercentages[index];
}
