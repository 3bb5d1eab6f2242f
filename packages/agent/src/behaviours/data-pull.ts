/**
 * @tessera/agent — Data pull behaviour.
 *
 * Values the portfolio: reads each tracked token's balance, prices it with
 * the feed this round is bound to, and proposes the token value map and
 * total. Also publishes the rebalancing report; a failed publication is
 * logged and never changes the payload.
 *
 * Both data-pull rounds use this behaviour, each with its own price source.
 */

import type { DataPullPayload, PriceApi, TokenValues } from "@tessera/types";
import {
  allocationPercentages,
  buildRebalancingReport,
  calculatePortfolioAllocation,
  serializeTokenMap,
} from "@tessera/portfolio";
import type { TokenBalances, TokenPrices } from "@tessera/portfolio";
import { fetchPrices } from "@tessera/price-feed";
import { gatewayLink } from "../content-store.js";
import type { AgentContext } from "../context.js";
import { rethrowIfAborted } from "./behaviour.js";
import type { Behaviour } from "./behaviour.js";

export const REPORT_FILE_NAME = "PortfolioRebalancer_Report.json";

export class DataPullBehaviour implements Behaviour<"data_pull"> {
  readonly id: string;
  readonly payloadKind = "data_pull";

  constructor(readonly source: PriceApi) {
    this.id = `data_pull:${source}`;
  }

  async act(context: AgentContext, _data: unknown, signal: AbortSignal): Promise<DataPullPayload> {
    const { logger, params } = context;
    const tokens = params.tokensToRebalance;

    const balances = await readBalances(context, tokens, signal);
    const prices = await fetchPrices(context.priceFeeds[this.source], tokens, logger, signal);

    const allocation = calculatePortfolioAllocation(balances, prices, { tokens, logger });
    if (allocation.kind === "empty") {
      logger.error(
        { skipped: allocation.skipped },
        "Total portfolio value is zero; cannot calculate allocation",
      );
      return {
        kind: "data_pull",
        sender: context.agentAddress,
        tokenValues: null,
        totalPortfolioValue: null,
      };
    }

    logger.info(
      {
        source: this.source,
        tokenValues: allocation.tokenValues,
        percentages: allocationPercentages(allocation.tokenValues, allocation.totalValue),
        totalPortfolioValue: allocation.totalValue,
      },
      "Portfolio allocation",
    );

    await publishReport(context, allocation.tokenValues, allocation.totalValue, prices, signal);

    return {
      kind: "data_pull",
      sender: context.agentAddress,
      tokenValues: serializeTokenMap(allocation.tokenValues),
      totalPortfolioValue: allocation.totalValue,
    };
  }
}

/**
 * Balance of every token held by the portfolio account. Null for a
 * balance that could not be read.
 */
async function readBalances(
  context: AgentContext,
  tokens: readonly string[],
  signal: AbortSignal,
): Promise<TokenBalances> {
  const balances: Record<string, number | null> = {};

  for (const token of tokens) {
    signal.throwIfAborted();
    try {
      const raw = await context.portfolio.readBalance(context.portfolioAddress, token);
      balances[token] = Number(raw);
      context.logger.debug({ token, balance: balances[token] }, "Read balance");
    } catch (err: unknown) {
      rethrowIfAborted(err, signal);
      context.logger.error({ token, err }, "Failed to read balance");
      balances[token] = null;
    }
  }

  return balances;
}

async function publishReport(
  context: AgentContext,
  tokenValues: TokenValues,
  totalValue: number,
  prices: TokenPrices,
  signal: AbortSignal,
): Promise<void> {
  const report = buildRebalancingReport(
    tokenValues,
    totalValue,
    context.params,
    prices,
    context.now(),
  );

  try {
    const contentId = await context.contentStore.store(REPORT_FILE_NAME, report, signal);
    context.logger.info(
      { contentId, link: gatewayLink(context.gatewayUrl, contentId) },
      "Rebalancing report stored",
    );
  } catch (err: unknown) {
    rethrowIfAborted(err, signal);
    context.logger.error({ err }, "Failed to store rebalancing report");
  }
}
