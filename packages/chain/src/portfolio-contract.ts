/**
 * @tessera/chain — Portfolio contract.
 *
 * Reads token balances held for a user and builds the calls that set
 * them. The contract keys balances by token symbol.
 */

import { encodeFunctionData } from "viem";
import type { Address, PublicClient } from "viem";
import { MOCK_DEX_ABI } from "./abis.js";
import { ChainError } from "./errors.js";
import { SAFE_OPERATION } from "./multisend.js";
import type { MultiSendCall } from "./multisend.js";

export class PortfolioContract {
  constructor(
    private readonly client: PublicClient,
    readonly address: Address,
  ) {}

  /**
   * @throws ChainError CALL_FAILED when the RPC call fails
   */
  async readBalance(user: Address, token: string): Promise<bigint> {
    try {
      return await this.client.readContract({
        address: this.address,
        abi: MOCK_DEX_ABI,
        functionName: "getBalance",
        args: [user, token],
      });
    } catch (err: unknown) {
      throw new ChainError(
        "CALL_FAILED",
        `getBalance(${user}, ${token}) failed on ${this.address}`,
        { cause: err },
      );
    }
  }

  /**
   * The call that sets `user`'s balance of `token` to `newBalance`.
   */
  buildAdjustBalanceCall(user: Address, token: string, newBalance: bigint): MultiSendCall {
    if (newBalance < 0n) {
      throw new ChainError("CALL_FAILED", `Balance for ${token} cannot be negative`);
    }
    return {
      operation: SAFE_OPERATION.call,
      to: this.address,
      value: 0n,
      data: encodeFunctionData({
        abi: MOCK_DEX_ABI,
        functionName: "adjustBalance",
        args: [user, token, newBalance],
      }),
    };
  }
}
