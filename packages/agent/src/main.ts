/**
 * @tessera/agent — Entry point.
 *
 * Runs the local service over one in-process transport until every local
 * agent reaches a final round. With AGENT_ADDRESS set only that agent runs;
 * otherwise every configured participant does.
 * Handles graceful shutdown on SIGINT and SIGTERM.
 */

import pino from "pino";
import { SynchronizedData } from "@tessera/workflow";
import { loadConfig, localAgents } from "./config.js";
import { createAgentContext, createCollaborators } from "./context.js";
import { AgentRuntime } from "./runtime.js";
import { LocalTransport } from "./transport.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const collaborators = createCollaborators(config);
  const transport = new LocalTransport({ logger: logger.child({ component: "transport" }) });
  const initialData = SynchronizedData.createInitial({
    participants: config.ALL_PARTICIPANTS,
    safeContractAddress: config.SAFE_CONTRACT_ADDRESS,
  });

  const agents = localAgents(config);
  if (agents.length < config.ALL_PARTICIPANTS.length) {
    logger.warn(
      { agent: config.AGENT_ADDRESS, participants: config.ALL_PARTICIPANTS.length },
      "Running a single participant; rounds need payloads from the other agents to reach quorum",
    );
  }

  const runtimes = agents.map(
    (address) =>
      new AgentRuntime({
        context: createAgentContext(config, collaborators, address, logger),
        transport,
        initialData,
        roundTimeoutMs: config.ROUND_TIMEOUT_MS,
        tickIntervalMs: config.TICK_INTERVAL_MS,
        periods: config.PERIODS,
      }),
  );

  logger.info(
    {
      participants: config.ALL_PARTICIPANTS.length,
      localAgents: agents.length,
      periods: config.PERIODS,
      chain: config.CHAIN,
      tokens: config.rebalancing.tokensToRebalance,
      contentStore: config.IPFS_API_URL ?? "in-memory",
    },
    "Tessera agents starting",
  );

  // Graceful shutdown
  const controller = new AbortController();
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    controller.abort();
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  transport.start(config.TICK_INTERVAL_MS);
  try {
    const results = await Promise.all(runtimes.map((runtime) => runtime.run(controller.signal)));
    const [first] = results;
    if (first !== undefined) {
      logger.info(
        {
          finalRound: first.finalRound,
          roundCount: first.roundCount,
          txHash: first.synchronizedData.mostVotedTxHash,
          stateHash: first.synchronizedData.hash,
        },
        "Rebalancing workflow finished",
      );
    }
  } catch (err: unknown) {
    if (!controller.signal.aborted) throw err;
    logger.info("Shutdown complete");
  } finally {
    transport.stop();
    for (const runtime of runtimes) {
      runtime.stop();
    }
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal error:", err);
  process.exit(1);
});
