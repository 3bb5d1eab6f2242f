/**
 * @tessera/workflow — Transition table.
 *
 * Maps (round, event) to the next round. The table is typed so that every
 * event a round declares must have a target; `defineWorkflow()` checks the
 * same thing again at load time, together with reachability and the final
 * rounds, and refuses to build a definition with gaps.
 */

import type { WorkflowEvent } from "@tessera/types";
import { WorkflowDefinitionError } from "./errors.js";
import { ROUND_IDS, ROUNDS } from "./rounds.js";
import type { FinalRoundId, RoundDefinition, RoundEventMap, RoundId } from "./rounds.js";
import { SYNC_KEYS } from "./synchronized-data.js";

// =============================================================================
// Types
// =============================================================================

export type TransitionFunction = {
  readonly [R in RoundId]: { readonly [E in RoundEventMap[R]]: RoundId };
};

export interface WorkflowDefinition {
  readonly initialRound: RoundId;
  readonly finalRounds: ReadonlySet<RoundId>;
  readonly rounds: { readonly [R in RoundId]: RoundDefinition<R> };
  readonly transitions: TransitionFunction;

  /** Keys carried into the next period */
  readonly crossPeriodPersistedKeys: ReadonlySet<string>;

  /** Keys that must be set when a final round is entered */
  readonly postConditions: Readonly<Partial<Record<RoundId, readonly string[]>>>;
}

// =============================================================================
// Rebalancing workflow table
// =============================================================================

export const TRANSITION_FUNCTION: TransitionFunction = {
  api_selection: {
    no_majority: "api_selection",
    round_timeout: "api_selection",
    coingecko: "data_pull",
    coinmarketcap: "alternative_data_pull",
  },
  data_pull: {
    done: "decision_making",
    no_majority: "data_pull",
    round_timeout: "data_pull",
  },
  alternative_data_pull: {
    done: "decision_making",
    no_majority: "alternative_data_pull",
    round_timeout: "alternative_data_pull",
  },
  decision_making: {
    done: "finished_decision_making",
    error: "finished_decision_making",
    transact: "tx_preparation",
    no_majority: "decision_making",
    round_timeout: "decision_making",
  },
  tx_preparation: {
    done: "finished_tx_preparation",
    no_majority: "tx_preparation",
    round_timeout: "tx_preparation",
  },
  finished_decision_making: {},
  finished_tx_preparation: {},
};

/**
 * Look up the next round. Returns undefined when the table has no entry.
 */
export function nextRound(
  transitions: TransitionFunction,
  from: RoundId,
  event: WorkflowEvent,
): RoundId | undefined {
  const row: Readonly<Partial<Record<WorkflowEvent, RoundId>>> = transitions[from];
  return row[event];
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Collect every problem with a definition. Empty when valid.
 */
export function validateWorkflowDefinition(definition: WorkflowDefinition): readonly string[] {
  const problems: string[] = [];
  const roundIds = ROUND_IDS;
  const known = new Set<string>(roundIds);

  if (!known.has(definition.initialRound)) {
    problems.push(`initial round "${definition.initialRound}" is not defined`);
  }

  for (const id of roundIds) {
    const round = definition.rounds[id];
    const row: Readonly<Partial<Record<string, RoundId>>> = definition.transitions[id];
    const isFinal = definition.finalRounds.has(id);

    if (round.variant === "final" && !isFinal) {
      problems.push(`round "${id}" accepts no payloads but is not listed as final`);
    }
    if (isFinal && Object.keys(row).length > 0) {
      problems.push(`final round "${id}" has outgoing transitions`);
    }

    const declared = new Set<string>(round.events);
    for (const event of declared) {
      const target = row[event];
      if (target === undefined) {
        problems.push(`round "${id}" declares "${event}" but has no transition for it`);
      } else if (!known.has(target)) {
        problems.push(`"${id}" --${event}--> unknown round "${target}"`);
      }
    }
    for (const event of Object.keys(row)) {
      if (!declared.has(event)) {
        problems.push(`round "${id}" has a transition for undeclared event "${event}"`);
      }
    }
  }

  // Every round must be reachable from the initial one
  const reached = new Set<RoundId>([definition.initialRound]);
  const queue: RoundId[] = [definition.initialRound];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || !known.has(current)) continue;
    const row: Readonly<Partial<Record<string, RoundId>>> = definition.transitions[current];
    for (const target of Object.values(row)) {
      if (target !== undefined && !reached.has(target)) {
        reached.add(target);
        queue.push(target);
      }
    }
  }
  for (const id of roundIds) {
    if (!reached.has(id)) {
      problems.push(`round "${id}" is unreachable from "${definition.initialRound}"`);
    }
  }

  return problems;
}

/**
 * Build a definition, failing fast on any gap in the table.
 *
 * @throws WorkflowDefinitionError
 */
export function defineWorkflow(definition: WorkflowDefinition): WorkflowDefinition {
  const problems = validateWorkflowDefinition(definition);
  if (problems.length > 0) {
    throw new WorkflowDefinitionError(problems);
  }
  return Object.freeze(definition);
}

const FINAL_ROUNDS: readonly FinalRoundId[] = [
  "finished_decision_making",
  "finished_tx_preparation",
];

/**
 * The portfolio rebalancing workflow.
 */
export const REBALANCING_WORKFLOW: WorkflowDefinition = defineWorkflow({
  initialRound: "api_selection",
  finalRounds: new Set<RoundId>(FINAL_ROUNDS),
  rounds: ROUNDS,
  transitions: TRANSITION_FUNCTION,
  crossPeriodPersistedKeys: new Set<string>(),
  postConditions: {
    finished_decision_making: [],
    finished_tx_preparation: [SYNC_KEYS.mostVotedTxHash],
  },
});
