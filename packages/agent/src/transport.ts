/**
 * @tessera/agent — Replication transport.
 *
 * Orders payloads into finalized blocks. Every subscriber receives every
 * block, in the same order, with the same payloads; that is the only
 * guarantee the workflow engine relies on.
 *
 * `LocalTransport` is the in-process implementation used to run several
 * agents in one process and in tests. It does no agreement of its own.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { RoundPayload } from "@tessera/types";
import type { Block, Subscription } from "@tessera/workflow";

export type BlockHandler = (block: Block) => void;

export interface ReplicationTransport {
  /** Queue a payload for the next block */
  submitPayload(payload: RoundPayload): void;

  onBlock(handler: BlockHandler): Subscription;
}

export interface LocalTransportOptions {
  readonly logger?: Logger;
}

export class LocalTransport implements ReplicationTransport {
  private readonly logger: Logger;
  private readonly handlers = new Set<BlockHandler>();
  private readonly finalized: Block[] = [];
  private pending: RoundPayload[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: LocalTransportOptions = {}) {
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  submitPayload(payload: RoundPayload): void {
    this.pending.push(payload);
  }

  onBlock(handler: BlockHandler): Subscription {
    this.handlers.add(handler);
    return {
      unsubscribe: () => {
        this.handlers.delete(handler);
      },
    };
  }

  /** Height of the last finalized block, 0 before the first */
  get height(): number {
    return this.finalized.length;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Every block finalized so far, oldest first */
  get blocks(): readonly Block[] {
    return [...this.finalized];
  }

  /**
   * Seal the pending payloads into a block and deliver it.
   *
   * Payloads submitted while handlers run go into the next block.
   * Returns null when nothing is pending.
   */
  finalizeBlock(): Block | null {
    if (this.pending.length === 0) {
      return null;
    }

    const block: Block = { height: this.finalized.length + 1, payloads: this.pending };
    this.pending = [];
    this.finalized.push(block);
    this.logger.debug({ height: block.height, payloads: block.payloads.length }, "Block finalized");

    for (const handler of [...this.handlers]) {
      handler(block);
    }
    return block;
  }

  /** Finalize a block every `intervalMs` until stopped */
  start(intervalMs: number): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      this.finalizeBlock();
    }, intervalMs);
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
