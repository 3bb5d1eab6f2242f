/**
 * @tessera/agent — API selection behaviour.
 */

import type { ApiSelectionPayload } from "@tessera/types";
import { resolveApiSelection } from "../config.js";
import type { AgentContext } from "../context.js";
import type { Behaviour } from "./behaviour.js";

export class ApiSelectionBehaviour implements Behaviour<"api_selection"> {
  readonly id = "api_selection";
  readonly payloadKind = "api_selection";

  async act(context: AgentContext): Promise<ApiSelectionPayload> {
    const apiSelection = resolveApiSelection(context.apiSelection);
    if (apiSelection !== context.apiSelection) {
      context.logger.warn(
        { configured: context.apiSelection, apiSelection },
        "Unknown price API configured; using default",
      );
    }
    context.logger.info({ apiSelection }, "Proposing price API");
    return { kind: "api_selection", sender: context.agentAddress, apiSelection };
  }
}
