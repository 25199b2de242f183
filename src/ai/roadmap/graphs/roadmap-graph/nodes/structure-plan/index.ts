/**
 * Plan Structuring Node (Estructurador_Plan)
 *
 * Produces the ordered stage list, both on the first pass and after a
 * replan. Book lists and search counters survive only for stages whose name
 * is still present.
 */

import { PromptTemplate } from "@langchain/core/prompts";
import type { TextGenerator } from "#roadmap/ai/text-generator.js";
import type { StageInfo } from "#roadmap/ai/roadmap/schemas.js";
import { parseStages } from "#roadmap/ai/roadmap/extraction/stage-parser.js";
import { MAX_STAGES, MIN_STAGES } from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";
import { defaultStages } from "./default-stages.js";
import { REPLAN_SECTION, STRUCTURE_PLAN_PROMPT } from "./prompts.js";

const log = createLogger("Estructurador_Plan");

function pickByStage<T>(record: Record<string, T>, names: Set<string>): Record<string, T> {
  return Object.fromEntries(Object.entries(record).filter(([name]) => names.has(name)));
}

export function createStructurePlan(generator: TextGenerator) {
  const template = PromptTemplate.fromTemplate(STRUCTURE_PLAN_PROMPT);
  const replanTemplate = PromptTemplate.fromTemplate(REPLAN_SECTION);

  return defineNode({
    name: "Estructurador_Plan",
    reads: [
      "topic",
      "userLevel",
      "focusAreas",
      "stages",
      "booksByStage",
      "bookSearchIterations",
      "replanGuidance",
    ],
    writes: ["stages", "booksByStage", "bookSearchIterations"],
    run: async ({
      topic,
      userLevel,
      focusAreas,
      stages,
      booksByStage,
      bookSearchIterations,
      replanGuidance,
    }) => {
      const isReplan = stages.length > 0;

      let parsed: StageInfo[] = [];
      try {
        const replanSection = isReplan
          ? await replanTemplate.format({
              currentStages: stages.map((stage, i) => `Stage ${i + 1}: ${stage.name}`).join("\n"),
              guidance: replanGuidance ?? "Strengthen the weakest stages.",
            })
          : "";
        const prompt = await template.format({
          topic,
          userLevel,
          focusAreas: focusAreas.map((area) => `- ${area.name} (${area.tier})`).join("\n"),
          replanSection,
        });
        const text = await generator.generate(prompt, { purpose: "structuring" });
        parsed = parseStages(text).slice(0, MAX_STAGES);
      } catch (error) {
        log.warn("Plan generation failed:", error instanceof Error ? error.message : error);
      }

      let nextStages: StageInfo[];
      if (parsed.length >= MIN_STAGES) {
        // Stages that keep their name keep their coverage
        nextStages = parsed.map((stage) => ({
          ...stage,
          covered: stages.find((previous) => previous.name === stage.name)?.covered ?? false,
        }));
      } else if (isReplan) {
        log.warn(`Revised plan had ${parsed.length} stages, keeping the current plan`);
        nextStages = stages;
      } else {
        log.warn(`Plan had ${parsed.length} stages, using the ${userLevel} template`);
        nextStages = defaultStages(topic, userLevel);
      }

      const names = new Set(nextStages.map((stage) => stage.name));
      log.info(`Structured ${nextStages.length} stages`);
      return {
        stages: nextStages,
        booksByStage: pickByStage(booksByStage, names),
        bookSearchIterations: pickByStage(bookSearchIterations, names),
      };
    },
  });
}
