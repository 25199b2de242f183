import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";
import { reachedLimits } from "../forced-output/index.js";
import { renderRoadmapDocument } from "./document.js";

const log = createLogger("Formateador_Salida");

/**
 * Output Formatting Node (Formateador_Salida): renders the validated plan.
 * A plan that passed only because a ceiling ended a cycle names that ceiling.
 */
export function createFormatOutput() {
  return defineNode({
    name: "Formateador_Salida",
    reads: [
      "topic",
      "userLevel",
      "stages",
      "booksByStage",
      "lastValidationScore",
      "validationIterations",
      "planRefinementIterations",
      "bookSearchIterations",
      "forcedExitReason",
    ],
    writes: ["finalOutput", "limitedOutput"],
    run: async (input) => {
      const limits = reachedLimits({
        validationIterations: input.validationIterations,
        planRefinementIterations: input.planRefinementIterations,
        bookSearchIterations: input.bookSearchIterations,
        forcedExitReason: input.forcedExitReason,
      });
      const finalOutput = renderRoadmapDocument({
        topic: input.topic,
        userLevel: input.userLevel,
        stages: input.stages,
        booksByStage: input.booksByStage,
        lastValidationScore: input.lastValidationScore,
        limits,
      });
      if (limits.length > 0) {
        log.warn(`Roadmap rendered after reaching: ${limits.join("; ")}`);
      }
      log.info(`Roadmap rendered (${finalOutput.length} chars)`);
      return { finalOutput, limitedOutput: false };
    },
  });
}
