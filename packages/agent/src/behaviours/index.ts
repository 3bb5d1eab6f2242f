import { ApiSelectionBehaviour } from "./api-selection.js";
import { DataPullBehaviour } from "./data-pull.js";
import { DecisionMakingBehaviour } from "./decision-making.js";
import { TxPreparationBehaviour } from "./tx-preparation.js";
import type { BehaviourSet } from "./behaviour.js";

export type { Behaviour, BehaviourSet } from "./behaviour.js";
export { ApiSelectionBehaviour, DataPullBehaviour, DecisionMakingBehaviour, TxPreparationBehaviour };
export { REPORT_FILE_NAME } from "./data-pull.js";

/**
 * The rebalancing behaviours. Each data-pull round is bound to the price
 * source it is named for.
 */
export function createBehaviours(): BehaviourSet {
  return {
    api_selection: new ApiSelectionBehaviour(),
    data_pull: new DataPullBehaviour("coingecko"),
    alternative_data_pull: new DataPullBehaviour("coinmarketcap"),
    decision_making: new DecisionMakingBehaviour(),
    tx_preparation: new TxPreparationBehaviour(),
  };
}
