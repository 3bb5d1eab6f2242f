/**
 * @tessera/agent — Behaviour contract.
 *
 * A behaviour computes this agent's payload for one round. It may call
 * collaborators and must stop as soon as `signal` aborts; the runtime
 * aborts it when the round ends without it.
 */

import type { PayloadKind, PayloadOfKind } from "@tessera/types";
import type { CollectingRoundId, SynchronizedData } from "@tessera/workflow";
import type { AgentContext } from "../context.js";

export interface Behaviour<K extends PayloadKind = PayloadKind> {
  /** Identifier recorded as the submitter of prepared transactions */
  readonly id: string;
  readonly payloadKind: K;

  act(context: AgentContext, data: SynchronizedData, signal: AbortSignal): Promise<PayloadOfKind<K>>;
}

/**
 * One behaviour per collecting round.
 */
export type BehaviourSet = { readonly [R in CollectingRoundId]: Behaviour };

/**
 * Rethrow `err` if the behaviour was cancelled, so that cancellation is
 * never mistaken for a collaborator failure.
 */
export function rethrowIfAborted(err: unknown, signal: AbortSignal): void {
  if (signal.aborted) {
    throw err;
  }
}
