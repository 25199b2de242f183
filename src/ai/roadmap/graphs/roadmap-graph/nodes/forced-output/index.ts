/**
 * Forced Output Node (Salida_Forzada)
 *
 * Renders the best-effort plan when the run stops early, with a disclaimer
 * naming the limits that were reached.
 */

import {
  MAX_BOOK_SEARCHES_PER_STAGE,
  MAX_PLAN_REFINEMENTS,
  MAX_VALIDATION_CYCLES,
  RoadmapStateType,
} from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";
import { RULE_WIDTH, renderRoadmapDocument } from "../format-output/document.js";

const log = createLogger("Salida_Forzada");

export function reachedLimits(
  state: Pick<
    RoadmapStateType,
    "validationIterations" | "planRefinementIterations" | "bookSearchIterations" | "forcedExitReason"
  >
): string[] {
  const limits: string[] = [];
  if (state.forcedExitReason !== null) {
    limits.push(state.forcedExitReason);
  }
  if (state.validationIterations >= MAX_VALIDATION_CYCLES) {
    limits.push(`Validation ran ${state.validationIterations} of ${MAX_VALIDATION_CYCLES} allowed cycles`);
  }
  if (state.planRefinementIterations >= MAX_PLAN_REFINEMENTS) {
    limits.push(`The plan was revised ${state.planRefinementIterations} of ${MAX_PLAN_REFINEMENTS} allowed times`);
  }
  const exhausted = Object.entries(state.bookSearchIterations)
    .filter(([, count]) => count >= MAX_BOOK_SEARCHES_PER_STAGE)
    .map(([name]) => name);
  if (exhausted.length > 0) {
    limits.push(`Book search budget spent for: ${exhausted.join(", ")}`);
  }
  return limits;
}

export function createForcedOutput() {
  return defineNode({
    name: "Salida_Forzada",
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
      const rule = "!".repeat(RULE_WIDTH);
      const disclaimer = [
        rule,
        "LIMITED ROADMAP: the run stopped before the plan passed validation.",
        "Limits reached:",
        ...(limits.length > 0 ? limits : ["Iteration limit reached"]).map((limit) => `  - ${limit}`),
        rule,
        "",
      ].join("\n");

      const document = renderRoadmapDocument({
        topic: input.topic,
        userLevel: input.userLevel,
        stages: input.stages,
        booksByStage: input.booksByStage,
        lastValidationScore: input.lastValidationScore,
      });
      log.warn(`Forced output after: ${limits.join("; ") || "iteration limit"}`);
      return { finalOutput: `${disclaimer}\n${document}`, limitedOutput: true };
    },
  });
}
