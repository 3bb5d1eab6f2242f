/**
 * @tessera/chain — Safe multisig helpers.
 *
 * The agent never signs. It only computes the Safe transaction hash for a
 * prepared call and packs the settlement fields into the hex string that
 * the tx_preparation round agrees on.
 */

import { isHex, toHex, zeroAddress } from "viem";
import type { Address, Hex, PublicClient } from "viem";
import { SAFE_ABI } from "./abis.js";
import { ChainError } from "./errors.js";
import { SAFE_OPERATION } from "./multisend.js";
import type { SafeOperation } from "./multisend.js";

/** `0x` plus 32 bytes */
export const SAFE_TX_HASH_LENGTH = 66;

export interface SafeTransaction {
  readonly to: Address;
  readonly value: bigint;
  readonly data: Hex;
  readonly operation: SafeOperation;
  readonly safeTxGas?: bigint;
  readonly baseGas?: bigint;
  readonly gasPrice?: bigint;
  readonly gasToken?: Address;
  readonly refundReceiver?: Address;
}

export class SafeContract {
  constructor(
    private readonly client: PublicClient,
    readonly address: Address,
  ) {}

  /**
   * @throws ChainError CALL_FAILED when an RPC call fails
   */
  async nonce(): Promise<bigint> {
    try {
      return await this.client.readContract({
        address: this.address,
        abi: SAFE_ABI,
        functionName: "nonce",
      });
    } catch (err: unknown) {
      throw new ChainError("CALL_FAILED", `nonce() failed on ${this.address}`, { cause: err });
    }
  }

  /**
   * Hash of `tx` at the Safe's current nonce.
   *
   * @throws ChainError CALL_FAILED when an RPC call fails
   * @throws ChainError INVALID_HASH when the contract returns a malformed hash
   */
  async getTransactionHash(tx: SafeTransaction): Promise<Hex> {
    const nonce = await this.nonce();

    let hash: Hex;
    try {
      hash = await this.client.readContract({
        address: this.address,
        abi: SAFE_ABI,
        functionName: "getTransactionHash",
        args: [
          tx.to,
          tx.value,
          tx.data,
          tx.operation,
          tx.safeTxGas ?? 0n,
          tx.baseGas ?? 0n,
          tx.gasPrice ?? 0n,
          tx.gasToken ?? zeroAddress,
          tx.refundReceiver ?? zeroAddress,
          nonce,
        ],
      });
    } catch (err: unknown) {
      throw new ChainError(
        "CALL_FAILED",
        `getTransactionHash() failed on ${this.address}`,
        { cause: err },
      );
    }

    if (!isHex(hash) || hash.length !== SAFE_TX_HASH_LENGTH) {
      throw new ChainError("INVALID_HASH", `Safe returned malformed hash "${String(hash)}"`);
    }
    return hash;
  }
}

// =============================================================================
// Settlement payload
// =============================================================================

export interface SettlementPayloadInput {
  /** Safe transaction hash, with or without `0x` */
  readonly safeTxHash: string;
  readonly value: bigint;
  readonly safeTxGas: bigint;
  readonly to: Address;
  readonly data: Hex;
  readonly operation?: SafeOperation;
  readonly baseGas?: bigint;
  readonly gasPrice?: bigint;
  readonly gasToken?: Address;
  readonly refundReceiver?: Address;
  readonly useFlashbots?: boolean;
  readonly gasLimit?: bigint;
  readonly raiseOnFailedSimulation?: boolean;
}

function word(value: bigint | number): string {
  return toHex(value, { size: 32 }).slice(2);
}

/**
 * Pack a Safe transaction into the settlement hex string.
 *
 * Layout, in order: safe hash (32 bytes), value, safe gas, `to`,
 * operation (1 byte), base gas, gas price, gas token, refund receiver,
 * flashbots flag, gas limit, simulation flag, data. Addresses keep their
 * `0x` prefix; every other field is bare hex.
 *
 * @throws ChainError INVALID_HASH unless the safe hash is 32 bytes of hex
 */
export function hashPayloadToHex(input: SettlementPayloadInput): string {
  const safeTxHash = input.safeTxHash.startsWith("0x")
    ? input.safeTxHash.slice(2)
    : input.safeTxHash;
  if (!/^[0-9a-fA-F]{64}$/.test(safeTxHash)) {
    throw new ChainError("INVALID_HASH", `Safe tx hash must be 32 bytes of hex, got "${input.safeTxHash}"`);
  }

  return [
    safeTxHash,
    word(input.value),
    word(input.safeTxGas),
    input.to,
    toHex(input.operation ?? SAFE_OPERATION.call, { size: 1 }).slice(2),
    word(input.baseGas ?? 0n),
    word(input.gasPrice ?? 0n),
    input.gasToken ?? zeroAddress,
    input.refundReceiver ?? zeroAddress,
    word(input.useFlashbots === true ? 1 : 0),
    word(input.gasLimit ?? 0n),
    word(input.raiseOnFailedSimulation === true ? 1 : 0),
    input.data.slice(2),
  ].join("");
}
