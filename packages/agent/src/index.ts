/**
 * @tessera/agent — Portfolio rebalancing agent.
 *
 * Behaviours for each round, the runtime that drives the workflow engine,
 * the replication transport, the report content store and configuration.
 */

export {
  ConfigSchema,
  loadConfig,
  resolveApiSelection,
  localAgents,
  DEFAULT_MULTISEND_ADDRESS,
  DEFAULT_IPFS_GATEWAY_URL,
} from "./config.js";
export type { AgentConfig, EnvConfig } from "./config.js";

export { createAgentContext, createCollaborators } from "./context.js";
export type {
  AgentContext,
  Collaborators,
  PortfolioGateway,
  SafeGateway,
} from "./context.js";

export {
  ContentStoreError,
  InMemoryContentStore,
  IpfsContentStore,
  gatewayLink,
} from "./content-store.js";
export type {
  ContentStore,
  ContentStoreErrorCode,
  IpfsContentStoreOptions,
  StoredContent,
} from "./content-store.js";

export { LocalTransport } from "./transport.js";
export type { BlockHandler, LocalTransportOptions, ReplicationTransport } from "./transport.js";

export {
  ApiSelectionBehaviour,
  DataPullBehaviour,
  DecisionMakingBehaviour,
  TxPreparationBehaviour,
  REPORT_FILE_NAME,
  createBehaviours,
} from "./behaviours/index.js";
export type { Behaviour, BehaviourSet } from "./behaviours/index.js";

export { AgentRuntime } from "./runtime.js";
export type { AgentRuntimeOptions, RunResult } from "./runtime.js";
