import { uncoveredStages } from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";

const log = createLogger("Selector_Etapa");

/**
 * Stage Selection Node (Selector_Etapa): picks the first stage in plan order
 * that is not yet covered.
 */
export function createSelectStage() {
  return defineNode({
    name: "Selector_Etapa",
    reads: ["stages"],
    writes: ["stageBeingProcessed", "allStagesCovered"],
    run: async ({ stages }) => {
      const [next] = uncoveredStages({ stages });
      if (next === undefined) {
        log.info("All stages covered");
        return { stageBeingProcessed: null, allStagesCovered: true };
      }
      log.info(`Processing stage: ${next.name}`);
      return { stageBeingProcessed: next.name, allStagesCovered: false };
    },
  });
}
