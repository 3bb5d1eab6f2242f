/**
 * @tessera/agent — Decision making behaviour.
 *
 * Re-prices the agreed token values with the agreed price source and votes:
 * - "transact" with the adjustment map when some token is off target
 * - "done" when every token is within the threshold
 * - "error" when the portfolio has no usable value
 */

import type { DecisionEvent, DecisionMakingPayload, TokenValues } from "@tessera/types";
import {
  buildRebalancingSnapshot,
  calculateRebalancingActions,
  parseTokenMap,
  serializeTokenMap,
  TokenMapError,
} from "@tessera/portfolio";
import { fetchPrices } from "@tessera/price-feed";
import type { SynchronizedData } from "@tessera/workflow";
import type { AgentContext } from "../context.js";
import type { Behaviour } from "./behaviour.js";

export class DecisionMakingBehaviour implements Behaviour<"decision_making"> {
  readonly id = "decision_making";
  readonly payloadKind = "decision_making";

  async act(
    context: AgentContext,
    data: SynchronizedData,
    signal: AbortSignal,
  ): Promise<DecisionMakingPayload> {
    const { logger, params } = context;
    const vote = (event: DecisionEvent, adjustmentBalances: string | null = null): DecisionMakingPayload => ({
      kind: "decision_making",
      sender: context.agentAddress,
      event,
      adjustmentBalances,
    });

    const total = data.totalPortfolioValue;
    const serialized = data.tokenValues;
    if (total === null || !(total > 0) || serialized === null) {
      logger.error({ total }, "Total portfolio value is missing or zero; cannot rebalance");
      return vote("error");
    }

    let tokenValues: TokenValues;
    try {
      tokenValues = parseTokenMap(serialized);
    } catch (err: unknown) {
      if (!(err instanceof TokenMapError)) throw err;
      logger.error({ err }, "Agreed token values cannot be parsed");
      return vote("error");
    }

    const source = data.apiSelection;
    const prices = await fetchPrices(
      context.priceFeeds[source],
      params.tokensToRebalance,
      logger,
      signal,
    );

    logger.debug(
      { snapshot: buildRebalancingSnapshot(tokenValues, total, params, prices) },
      "Rebalancing snapshot",
    );

    const actions = calculateRebalancingActions(tokenValues, total, params, prices, logger);
    if (Object.keys(actions).length === 0) {
      logger.info("Portfolio within threshold; no adjustment needed");
      return vote("done");
    }

    logger.info({ actions }, "Portfolio needs rebalancing");
    return vote("transact", serializeTokenMap(actions));
  }
}
