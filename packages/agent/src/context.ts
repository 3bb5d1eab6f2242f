/**
 * @tessera/agent — Workflow context.
 *
 * Everything a behaviour may touch is passed in here: configuration,
 * collaborator handles, the logger and the clock. Behaviours hold no other
 * state and never write synchronized data.
 */

import type { Logger } from "pino";
import type { Address } from "viem";
import type { AgentAddress, PriceApi, RebalancingParams } from "@tessera/types";
import {
  CoinGeckoFeed,
  CoinMarketCapFeed,
  DEFAULT_RETRY_CONFIG,
} from "@tessera/price-feed";
import type { HttpOptions, PriceFeed } from "@tessera/price-feed";
import {
  createChainClient,
  PortfolioContract,
  SafeContract,
} from "@tessera/chain";
import type { AgentConfig } from "./config.js";
import { InMemoryContentStore, IpfsContentStore } from "./content-store.js";
import type { ContentStore } from "./content-store.js";

// =============================================================================
// Collaborator seams
// =============================================================================

export type PortfolioGateway = Pick<
  PortfolioContract,
  "address" | "readBalance" | "buildAdjustBalanceCall"
>;

export type SafeGateway = Pick<SafeContract, "address" | "getTransactionHash">;

export interface Collaborators {
  readonly priceFeeds: Readonly<Record<PriceApi, PriceFeed>>;
  readonly portfolio: PortfolioGateway;

  /** Safe at the address recorded in synchronized data */
  readonly safeAt: (address: Address) => SafeGateway;

  readonly contentStore: ContentStore;
}

export interface AgentContext extends Collaborators {
  readonly agentAddress: AgentAddress;
  readonly params: RebalancingParams;

  /** Configured price API, as given */
  readonly apiSelection: string;

  /** Account whose balances are rebalanced */
  readonly portfolioAddress: Address;

  readonly multisendAddress: Address;
  readonly gatewayUrl: string;
  readonly logger: Logger;
  readonly now: () => Date;
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Real collaborators for `config`. One set is shared by every agent in the
 * process.
 */
export function createCollaborators(config: AgentConfig): Collaborators {
  const http: HttpOptions = {
    timeoutMs: config.HTTP_TIMEOUT_MS,
    retry: { ...DEFAULT_RETRY_CONFIG, maxAttempts: config.HTTP_RETRIES + 1 },
  };
  const client = createChainClient({
    rpcUrl: config.RPC_URL,
    chain: config.CHAIN,
    timeoutMs: config.HTTP_TIMEOUT_MS,
  });

  return {
    priceFeeds: {
      coingecko: new CoinGeckoFeed({
        url: config.COINGECKO_PRICE_URL,
        apiKey: config.COINGECKO_API_KEY,
        http,
      }),
      coinmarketcap: new CoinMarketCapFeed({
        url: config.COINMARKETCAP_PRICE_URL,
        apiKey: config.COINMARKETCAP_API_KEY,
        http,
      }),
    },
    portfolio: new PortfolioContract(client, config.MOCK_CONTRACT_ADDRESS),
    safeAt: (address) => new SafeContract(client, address),
    contentStore:
      config.IPFS_API_URL !== undefined
        ? new IpfsContentStore({ apiUrl: config.IPFS_API_URL, timeoutMs: config.HTTP_TIMEOUT_MS })
        : new InMemoryContentStore(),
  };
}

export function createAgentContext(
  config: AgentConfig,
  collaborators: Collaborators,
  agentAddress: AgentAddress,
  logger: Logger,
  now: () => Date = () => new Date(),
): AgentContext {
  return {
    ...collaborators,
    agentAddress,
    params: config.rebalancing,
    apiSelection: config.API_SELECTION,
    portfolioAddress: config.PORTFOLIO_ADDRESS,
    multisendAddress: config.MULTISEND_ADDRESS,
    gatewayUrl: config.IPFS_GATEWAY_URL,
    logger: logger.child({ agent: agentAddress }),
    now,
  };
}
