/**
 * Shared fixtures for chain tests.
 */

import type { Address, Hex } from "viem";

export const RPC_URL = "https://mock-rpc.example.com";
export const PORTFOLIO_CONTRACT: Address = "0x1111111111111111111111111111111111111111";
export const SAFE_ADDRESS: Address = "0x2222222222222222222222222222222222222222";
export const MULTISEND_ADDRESS: Address = "0x3333333333333333333333333333333333333333";
export const USER: Address = "0x4444444444444444444444444444444444444444";

export const SAFE_TX_HASH: Hex = `0x${"ab".repeat(32)}`;

export function zeros(bytes: number): string {
  return "00".repeat(bytes);
}
