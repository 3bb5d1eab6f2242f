/**
 * Workflow Types
 *
 * Symbolic round outcomes and agent identities shared by the
 * workflow engine and the agent behaviours.
 *
 * Rules:
 * - Events carry no data; they only select the next round
 * - Event values are the strings agents put on the wire
 */

/**
 * Address identifying one participant agent.
 */
export type AgentAddress = string;

/**
 * Every event a round may emit, in wire form.
 */
export const WORKFLOW_EVENTS = [
  "done",
  "error",
  "transact",
  "no_majority",
  "round_timeout",
  "coingecko",
  "coinmarketcap",
] as const;

/**
 * Symbolic outcome of a round.
 */
export type WorkflowEvent = (typeof WORKFLOW_EVENTS)[number];

/**
 * Price API identifiers agents can agree on.
 */
export const PRICE_APIS = ["coingecko", "coinmarketcap"] as const;

export type PriceApi = (typeof PRICE_APIS)[number];

/**
 * The price API used when nothing else has been agreed.
 */
export const DEFAULT_PRICE_API: PriceApi = "coingecko";

/**
 * Decision values an agent may vote for in the decision-making round.
 */
export type DecisionEvent = Extract<WorkflowEvent, "done" | "error" | "transact">;
