/**
 * @tessera/chain — Read-only RPC client.
 *
 * Uses viem for all chain interactions. Nothing here signs or submits.
 */

import { createPublicClient, http, isAddress } from "viem";
import type { Address, Chain, PublicClient } from "viem";
import { gnosis, mainnet, sepolia } from "viem/chains";
import { ChainError } from "./errors.js";

export const SUPPORTED_CHAINS = {
  gnosis,
  mainnet,
  sepolia,
} as const satisfies Record<string, Chain>;

export type ChainName = keyof typeof SUPPORTED_CHAINS;

export interface ChainClientConfig {
  readonly rpcUrl: string;
  readonly chain: ChainName;

  /** Optional request timeout in milliseconds */
  readonly timeoutMs?: number;
}

export function createChainClient(config: ChainClientConfig): PublicClient {
  return createPublicClient({
    chain: SUPPORTED_CHAINS[config.chain],
    transport: http(config.rpcUrl, {
      timeout: config.timeoutMs ?? 30_000,
    }),
  });
}

/**
 * @throws ChainError INVALID_ADDRESS unless `value` is a 20-byte hex address
 */
export function toAddress(value: string, label = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ChainError("INVALID_ADDRESS", `Invalid ${label}: "${value}"`);
  }
  return value;
}
