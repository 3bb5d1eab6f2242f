/**
 * @tessera/chain — Error types.
 */

export type ChainErrorCode = "CALL_FAILED" | "INVALID_HASH" | "INVALID_ADDRESS";

export class ChainError extends Error {
  constructor(
    public readonly code: ChainErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ChainError";
  }
}
