/**
 * @tessera/agent — Transaction preparation behaviour.
 *
 * Turns the agreed adjustment map into one Safe transaction: an
 * `adjustBalance` call per token (target amount rounded to an integer),
 * batched through MultiSend as a delegate call, hashed by the Safe and
 * packed into the settlement payload. Nothing is signed or sent.
 *
 * Any failure yields a payload without a hash.
 */

import type { AdjustmentBalances, TxPreparationPayload } from "@tessera/types";
import { parseTokenMap, roundHalfToEven, TokenMapError } from "@tessera/portfolio";
import { hashPayloadToHex, packMultiSend, SAFE_OPERATION, toAddress } from "@tessera/chain";
import type { MultiSendCall } from "@tessera/chain";
import type { SynchronizedData } from "@tessera/workflow";
import type { AgentContext } from "../context.js";
import { rethrowIfAborted } from "./behaviour.js";
import type { Behaviour } from "./behaviour.js";

export class TxPreparationBehaviour implements Behaviour<"tx_preparation"> {
  readonly id = "tx_preparation";
  readonly payloadKind = "tx_preparation";

  async act(
    context: AgentContext,
    data: SynchronizedData,
    signal: AbortSignal,
  ): Promise<TxPreparationPayload> {
    const txHash = await this.prepare(context, data, signal);
    return {
      kind: "tx_preparation",
      sender: context.agentAddress,
      txSubmitter: this.id,
      txHash,
    };
  }

  private async prepare(
    context: AgentContext,
    data: SynchronizedData,
    signal: AbortSignal,
  ): Promise<string | null> {
    const { logger } = context;

    const serialized = data.adjustmentBalances;
    if (serialized === null) {
      logger.error("No adjustment balances agreed");
      return null;
    }

    let adjustments: AdjustmentBalances;
    try {
      adjustments = parseTokenMap(serialized);
    } catch (err: unknown) {
      if (!(err instanceof TokenMapError)) throw err;
      logger.error({ err }, "Agreed adjustment balances cannot be parsed");
      return null;
    }

    const calls: MultiSendCall[] = [];
    for (const [token, target] of Object.entries(adjustments)) {
      try {
        calls.push(
          context.portfolio.buildAdjustBalanceCall(
            context.portfolioAddress,
            token,
            BigInt(roundHalfToEven(target)),
          ),
        );
      } catch (err: unknown) {
        logger.error({ token, target, err }, "Failed to prepare balance adjustment");
      }
    }
    if (calls.length === 0) {
      logger.error("No balance adjustment could be prepared");
      return null;
    }

    const multisendData = packMultiSend(calls);
    try {
      const safe = context.safeAt(toAddress(data.safeContractAddress, "safe contract address"));
      signal.throwIfAborted();
      const safeTxHash = await safe.getTransactionHash({
        to: context.multisendAddress,
        value: 0n,
        data: multisendData,
        operation: SAFE_OPERATION.delegateCall,
      });

      const txHash = hashPayloadToHex({
        safeTxHash,
        value: 0n,
        safeTxGas: 0n,
        to: context.multisendAddress,
        data: multisendData,
        operation: SAFE_OPERATION.delegateCall,
      });
      logger.info({ safeTxHash, calls: calls.length }, "Safe transaction prepared");
      return txHash;
    } catch (err: unknown) {
      rethrowIfAborted(err, signal);
      logger.error({ err }, "Failed to prepare Safe transaction hash");
      return null;
    }
  }
}
