/**
 * @tessera/chain — MultiSend batching.
 *
 * Each call is packed as
 *
 *   uint8 operation | address to | uint256 value | uint256 length | bytes data
 *
 * and the concatenation becomes the single argument of `multiSend(bytes)`.
 */

import { concat, encodeFunctionData, encodePacked, size } from "viem";
import type { Address, Hex } from "viem";
import { MULTISEND_ABI } from "./abis.js";

export const SAFE_OPERATION = {
  call: 0,
  delegateCall: 1,
} as const;

export type SafeOperation = (typeof SAFE_OPERATION)[keyof typeof SAFE_OPERATION];

/**
 * One contract call inside a batch.
 */
export interface MultiSendCall {
  readonly operation: SafeOperation;
  readonly to: Address;
  readonly value: bigint;
  readonly data: Hex;
}

export function encodeMultiSendCall(call: MultiSendCall): Hex {
  return encodePacked(
    ["uint8", "address", "uint256", "uint256", "bytes"],
    [call.operation, call.to, call.value, BigInt(size(call.data)), call.data],
  );
}

/**
 * Call data for `multiSend(bytes)` running `calls` in order.
 */
export function packMultiSend(calls: readonly MultiSendCall[]): Hex {
  const transactions = calls.length === 0 ? "0x" : concat(calls.map(encodeMultiSendCall));
  return encodeFunctionData({
    abi: MULTISEND_ABI,
    functionName: "multiSend",
    args: [transactions],
  });
}
