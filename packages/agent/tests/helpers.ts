/**
 * Shared fixtures for agent tests: fake collaborators and a context
 * builder. Nothing here touches the network or a chain.
 */

import pino from "pino";
import { vi } from "vitest";
import type { Mock } from "vitest";
import { encodeFunctionData } from "viem";
import type { Address, Hex } from "viem";
import type { PriceApi, RebalancingParams } from "@tessera/types";
import { PriceFeedError } from "@tessera/price-feed";
import type { PriceFeed } from "@tessera/price-feed";
import { ChainError, MOCK_DEX_ABI, SAFE_OPERATION } from "@tessera/chain";
import type { MultiSendCall, SafeTransaction } from "@tessera/chain";
import { SynchronizedData } from "@tessera/workflow";
import { InMemoryContentStore } from "../src/content-store.js";
import type { AgentContext, PortfolioGateway, SafeGateway } from "../src/context.js";

export const AGENT_A: Address = "0x00000000000000000000000000000000000000a1";
export const AGENT_B: Address = "0x00000000000000000000000000000000000000b2";
export const AGENT_C: Address = "0x00000000000000000000000000000000000000c3";
export const AGENT_D: Address = "0x00000000000000000000000000000000000000d4";
export const AGENTS: readonly Address[] = [AGENT_A, AGENT_B, AGENT_C, AGENT_D];

export const PORTFOLIO_ADDRESS: Address = "0x1000000000000000000000000000000000000001";
export const MOCK_CONTRACT_ADDRESS: Address = "0x2000000000000000000000000000000000000002";
export const SAFE_ADDRESS: Address = "0x3000000000000000000000000000000000000003";
export const MULTISEND_ADDRESS: Address = "0x4000000000000000000000000000000000000004";

export const SAFE_TX_HASH: Hex = `0x${"cd".repeat(32)}`;
export const FIXED_NOW = new Date("2026-01-01T00:00:00.000Z");

export const silentLogger = pino({ level: "silent" });

export const PARAMS: RebalancingParams = {
  tokensToRebalance: ["ETH", "USDC"],
  targetPercentages: [50, 50],
  variationThreshold: 5,
};

/** Environment accepted by loadConfig */
export const BASE_ENV: Readonly<Record<string, string>> = {
  ALL_PARTICIPANTS: AGENTS.join(","),
  PORTFOLIO_ADDRESS,
  MOCK_CONTRACT_ADDRESS,
  SAFE_CONTRACT_ADDRESS: SAFE_ADDRESS,
};

export function initialData(participants: readonly Address[] = AGENTS): SynchronizedData {
  return SynchronizedData.createInitial({ participants, safeContractAddress: SAFE_ADDRESS });
}

// =============================================================================
// Fakes
// =============================================================================

/**
 * Price feed answering from a fixed table. Unknown symbols fail the way a
 * real feed does.
 */
export class FakePriceFeed implements PriceFeed {
  readonly requested: string[] = [];

  constructor(
    readonly source: PriceApi,
    private readonly prices: Readonly<Record<string, number>>,
  ) {}

  async getPrice(symbol: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    this.requested.push(symbol);
    const price = this.prices[symbol];
    if (price === undefined) {
      throw new PriceFeedError("UNSUPPORTED_SYMBOL", `No price for "${symbol}"`);
    }
    return price;
  }
}

export function adjustBalanceCall(user: Address, token: string, newBalance: bigint): MultiSendCall {
  return {
    operation: SAFE_OPERATION.call,
    to: MOCK_CONTRACT_ADDRESS,
    value: 0n,
    data: encodeFunctionData({
      abi: MOCK_DEX_ABI,
      functionName: "adjustBalance",
      args: [user, token, newBalance],
    }),
  };
}

export interface FakePortfolio extends PortfolioGateway {
  readonly readBalance: Mock<PortfolioGateway["readBalance"]>;
}

/**
 * Portfolio contract holding `balances`. Tokens missing from the table
 * fail like a reverted call.
 */
export function fakePortfolio(balances: Readonly<Record<string, bigint>>): FakePortfolio {
  return {
    address: MOCK_CONTRACT_ADDRESS,
    readBalance: vi.fn<PortfolioGateway["readBalance"]>(async (_user, token) => {
      const balance = balances[token];
      if (balance === undefined) {
        throw new ChainError("CALL_FAILED", `getBalance reverted for ${token}`);
      }
      return balance;
    }),
    buildAdjustBalanceCall: adjustBalanceCall,
  };
}

export interface FakeSafe extends SafeGateway {
  readonly getTransactionHash: Mock<(tx: SafeTransaction) => Promise<Hex>>;
}

export function fakeSafe(result: Hex | Error = SAFE_TX_HASH): FakeSafe {
  return {
    address: SAFE_ADDRESS,
    getTransactionHash: vi.fn(async (_tx: SafeTransaction): Promise<Hex> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

// =============================================================================
// Context
// =============================================================================

export interface TestContextOptions {
  readonly agentAddress?: Address;
  readonly apiSelection?: string;
  readonly balances?: Readonly<Record<string, bigint>>;
  readonly prices?: Readonly<Record<string, number>>;
  readonly cmcPrices?: Readonly<Record<string, number>>;
  readonly safe?: FakeSafe;
  readonly contentStore?: AgentContext["contentStore"];
}

export interface TestContext extends AgentContext {
  readonly portfolio: FakePortfolio;
  readonly coingecko: FakePriceFeed;
  readonly coinmarketcap: FakePriceFeed;
  readonly safe: FakeSafe;
  readonly safeAt: Mock<(address: Address) => SafeGateway>;
}

export const DEFAULT_BALANCES: Readonly<Record<string, bigint>> = { ETH: 10n, USDC: 1000n };
export const DEFAULT_PRICES: Readonly<Record<string, number>> = { ETH: 200, USDC: 1 };

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const coingecko = new FakePriceFeed("coingecko", options.prices ?? DEFAULT_PRICES);
  const coinmarketcap = new FakePriceFeed("coinmarketcap", options.cmcPrices ?? DEFAULT_PRICES);
  const safe = options.safe ?? fakeSafe();

  return {
    agentAddress: options.agentAddress ?? AGENT_A,
    params: PARAMS,
    apiSelection: options.apiSelection ?? "coingecko",
    portfolioAddress: PORTFOLIO_ADDRESS,
    multisendAddress: MULTISEND_ADDRESS,
    gatewayUrl: "https://gateway.example.com",
    logger: silentLogger,
    now: () => FIXED_NOW,
    priceFeeds: { coingecko, coinmarketcap },
    coingecko,
    coinmarketcap,
    portfolio: fakePortfolio(options.balances ?? DEFAULT_BALANCES),
    safe,
    safeAt: vi.fn((_address: Address): SafeGateway => safe),
    contentStore: options.contentStore ?? new InMemoryContentStore(),
  };
}

/**
 * Let every pending promise chain settle.
 */
export async function flush(): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, 0));
}
