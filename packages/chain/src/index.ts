/**
 * @tessera/chain
 *
 * Read-only contract access for the portfolio agent: balance reads,
 * MultiSend batching and Safe transaction hashing.
 */

export { ChainError } from "./errors.js";
export type { ChainErrorCode } from "./errors.js";

export { MOCK_DEX_ABI, MULTISEND_ABI, SAFE_ABI } from "./abis.js";

export { createChainClient, toAddress, SUPPORTED_CHAINS } from "./client.js";
export type { ChainClientConfig, ChainName } from "./client.js";

export {
  SAFE_OPERATION,
  encodeMultiSendCall,
  packMultiSend,
} from "./multisend.js";
export type { MultiSendCall, SafeOperation } from "./multisend.js";

export { PortfolioContract } from "./portfolio-contract.js";

export {
  SafeContract,
  SAFE_TX_HASH_LENGTH,
  hashPayloadToHex,
} from "./safe.js";
export type { SafeTransaction, SettlementPayloadInput } from "./safe.js";
