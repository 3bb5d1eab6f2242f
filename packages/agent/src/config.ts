/**
 * @tessera/agent — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Rebalancing parameters are checked here, once, so that a bad target
 * allocation stops the process before any round runs.
 */

import { z } from "zod";
import { isAddress } from "viem";
import type { Address } from "viem";
import type { PriceApi, RebalancingParams } from "@tessera/types";
import { validateRebalancingParams } from "@tessera/portfolio";
import { COINGECKO_PRICE_URL, COINMARKETCAP_PRICE_URL } from "@tessera/price-feed";

// =============================================================================
// Field parsers
// =============================================================================

/** Safe MultiSend 1.3.0 deployment */
export const DEFAULT_MULTISEND_ADDRESS: Address = "0xA238CBeb142c10Ef7Ad8442C6D1f9E89e07e7761";

export const DEFAULT_IPFS_GATEWAY_URL = "https://ipfs.io";

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

const AddressSchema = z.string().transform((value, ctx): Address => {
  const trimmed = value.trim();
  if (!isAddress(trimmed, { strict: false })) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid address "${value}"` });
    return z.NEVER;
  }
  return trimmed;
});

const AddressListSchema = z.string().transform((value, ctx): Address[] => {
  const addresses: Address[] = [];
  for (const entry of splitList(value)) {
    if (!isAddress(entry, { strict: false })) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid address "${entry}"` });
      return z.NEVER;
    }
    addresses.push(entry);
  }
  if (addresses.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "At least one participant is required" });
    return z.NEVER;
  }
  return addresses;
});

const TokenListSchema = z.string().transform(splitList);

const NumberListSchema = z.string().transform((value, ctx): number[] => {
  const numbers: number[] = [];
  for (const entry of splitList(value)) {
    const parsed = Number(entry);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${entry}" is not a number` });
      return z.NEVER;
    }
    numbers.push(parsed);
  }
  return numbers;
});

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Participants
    AGENT_ADDRESS: AddressSchema.optional(),
    ALL_PARTICIPANTS: AddressListSchema,

    // Price feeds. Any value other than a known API falls back to coingecko.
    API_SELECTION: z.string().default("coingecko"),
    COINGECKO_PRICE_URL: z.string().url().default(COINGECKO_PRICE_URL),
    COINGECKO_API_KEY: z.string().optional(),
    COINMARKETCAP_PRICE_URL: z.string().url().default(COINMARKETCAP_PRICE_URL),
    COINMARKETCAP_API_KEY: z.string().optional(),

    // Rebalancing
    TOKENS_TO_REBALANCE: z.string().default("ETH,USDC").pipe(TokenListSchema),
    TARGET_PERCENTAGES: z.string().default("50,50").pipe(NumberListSchema),
    VARIATION_THRESHOLD: z.coerce.number().default(5),

    // Chain
    RPC_URL: z.string().url().default("http://localhost:8545"),
    CHAIN: z.enum(["gnosis", "mainnet", "sepolia"]).default("gnosis"),
    PORTFOLIO_ADDRESS: AddressSchema,
    MOCK_CONTRACT_ADDRESS: AddressSchema,
    SAFE_CONTRACT_ADDRESS: AddressSchema,
    MULTISEND_ADDRESS: z.string().default(DEFAULT_MULTISEND_ADDRESS).pipe(AddressSchema),

    // Timing
    ROUND_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
    TICK_INTERVAL_MS: z.coerce.number().int().min(1).default(500),
    PERIODS: z.coerce.number().int().min(1).default(1),
    HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
    HTTP_RETRIES: z.coerce.number().int().min(0).max(10).default(2),

    // Report storage
    IPFS_API_URL: z.string().url().optional(),
    IPFS_GATEWAY_URL: z.string().url().default(DEFAULT_IPFS_GATEWAY_URL),
  })
  .superRefine((config, ctx) => {
    if (
      config.AGENT_ADDRESS !== undefined &&
      !config.ALL_PARTICIPANTS.includes(config.AGENT_ADDRESS)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AGENT_ADDRESS"],
        message: `AGENT_ADDRESS ${config.AGENT_ADDRESS} is not in ALL_PARTICIPANTS`,
      });
    }
  });

export type EnvConfig = z.infer<typeof ConfigSchema>;

export interface AgentConfig extends EnvConfig {
  readonly rebalancing: RebalancingParams;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * The configured price API, or coingecko for anything unrecognised.
 */
export function resolveApiSelection(raw: string): PriceApi {
  return raw === "coinmarketcap" ? "coinmarketcap" : "coingecko";
}

/**
 * Participants this process runs: only `AGENT_ADDRESS` when it is set,
 * otherwise every participant over the in-process transport.
 */
export function localAgents(
  config: Pick<EnvConfig, "AGENT_ADDRESS" | "ALL_PARTICIPANTS">,
): EnvConfig["ALL_PARTICIPANTS"] {
  return config.AGENT_ADDRESS !== undefined ? [config.AGENT_ADDRESS] : config.ALL_PARTICIPANTS;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 * @throws ConfigError if the rebalancing parameters break an invariant
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AgentConfig {
  const parsed = ConfigSchema.parse(env);
  const rebalancing = validateRebalancingParams({
    tokensToRebalance: parsed.TOKENS_TO_REBALANCE,
    targetPercentages: parsed.TARGET_PERCENTAGES,
    variationThreshold: parsed.VARIATION_THRESHOLD,
  });
  return { ...parsed, rebalancing };
}
