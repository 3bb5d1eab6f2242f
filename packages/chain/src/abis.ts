/**
 * Contract ABI fragments used by the agent.
 */

import { parseAbi } from "viem";

/** Portfolio contract (mock DEX) holding per-user token balances */
export const MOCK_DEX_ABI = parseAbi([
  "function getBalance(address user, string token) view returns (uint256)",
  "function adjustBalance(address user, string token, uint256 newBalance)",
]);

export const MULTISEND_ABI = parseAbi(["function multiSend(bytes transactions) payable"]);

export const SAFE_ABI = parseAbi([
  "function nonce() view returns (uint256)",
  "function getTransactionHash(address to, uint256 value, bytes data, uint8 operation, uint256 safeTxGas, uint256 baseGas, uint256 gasPrice, address gasToken, address refundReceiver, uint256 _nonce) view returns (bytes32)",
]);
