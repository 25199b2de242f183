/**
 * Level Assessment Node (Evaluador_Nivel)
 *
 * Chooses which knowledge areas the roadmap focuses on. Beginners get every
 * area; intermediate learners skip introductory material; advanced learners
 * get the advanced tier, widening to core areas when none are advanced.
 */

import type { KnowledgeArea, UserLevel } from "#roadmap/ai/roadmap/schemas.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";

const log = createLogger("Evaluador_Nivel");

export function selectFocusAreas(areas: KnowledgeArea[], level: UserLevel): KnowledgeArea[] {
  if (level === "beginner") {
    return areas;
  }

  const nonIntroductory = areas.filter((area) => area.tier !== "introductory");
  if (level === "intermediate") {
    return nonIntroductory.length > 0 ? nonIntroductory : areas;
  }

  const advanced = areas.filter((area) => area.tier === "advanced");
  if (advanced.length > 0) return advanced;
  return nonIntroductory.length > 0 ? nonIntroductory : areas;
}

export function createAssessLevel() {
  return defineNode({
    name: "Evaluador_Nivel",
    reads: ["userLevel", "knowledgeAreas"],
    writes: ["focusAreas"],
    run: async ({ userLevel, knowledgeAreas }) => {
      const focusAreas = selectFocusAreas(knowledgeAreas, userLevel);
      log.info(`Level ${userLevel}: focusing on ${focusAreas.length} of ${knowledgeAreas.length} areas`);
      return { focusAreas };
    },
  });
}
