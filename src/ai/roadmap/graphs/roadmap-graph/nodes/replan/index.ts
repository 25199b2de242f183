/**
 * Replanning Node (Replanificador)
 *
 * Turns validation feedback into guidance for the next structuring pass.
 * Stages with too few books, or named in the feedback, are reopened with a
 * fresh search budget; everything else keeps its books and coverage. The
 * consumed feedback is cleared and only the reopened stages keep their gaps.
 */

import { PromptTemplate } from "@langchain/core/prompts";
import type { TextGenerator } from "#roadmap/ai/text-generator.js";
import type { BookInfo, StageInfo } from "#roadmap/ai/roadmap/schemas.js";
import {
  MIN_BOOKS_PER_STAGE,
  acceptedBooks,
  gapsRelatedToStage,
} from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";
import { REPLAN_PROMPT } from "./prompts.js";

const log = createLogger("Replanificador");

export function affectedStages(
  stages: StageInfo[],
  booksByStage: Record<string, BookInfo[]>,
  feedback: string[]
): string[] {
  return stages
    .filter(
      (stage) =>
        acceptedBooks({ booksByStage }, stage.name).length < MIN_BOOKS_PER_STAGE ||
        feedback.some((line) => line.includes(stage.name))
    )
    .map((stage) => stage.name);
}

export function createReplan(generator: TextGenerator) {
  const template = PromptTemplate.fromTemplate(REPLAN_PROMPT);

  return defineNode({
    name: "Replanificador",
    clearsHistory: true,
    reads: [
      "topic",
      "stages",
      "booksByStage",
      "validationFeedback",
      "planRefinementIterations",
      "bookSearchIterations",
      "knowledgeGaps",
    ],
    writes: [
      "planRefinementIterations",
      "validationFeedback",
      "knowledgeGaps",
      "stages",
      "bookSearchIterations",
      "replanGuidance",
      "allStagesCovered",
    ],
    run: async ({
      topic,
      stages,
      booksByStage,
      validationFeedback,
      planRefinementIterations,
      bookSearchIterations,
      knowledgeGaps,
    }) => {
      const refinement = planRefinementIterations + 1;
      const affected = affectedStages(stages, booksByStage, validationFeedback);
      const reopened = new Set(affected);
      log.info(`Refinement ${refinement}: reopening ${affected.length} stages`);

      let guidance = validationFeedback.join("\n");
      try {
        const prompt = await template.format({
          topic,
          stages: stages.map((stage, i) => `${i + 1}. ${stage.name}`).join("\n"),
          bookCounts: stages
            .map((stage) => `${stage.name}: ${acceptedBooks({ booksByStage }, stage.name).length} books`)
            .join("\n"),
          feedback: validationFeedback.map((line) => `- ${line}`).join("\n") || "- none",
          affected: affected.join(", ") || "none",
        });
        const text = (await generator.generate(prompt, { purpose: "replanning" })).trim();
        if (text) guidance = text;
      } catch (error) {
        log.warn("Replanning advice failed, using feedback:", error instanceof Error ? error.message : error);
      }

      const counters = {
        ...bookSearchIterations,
        ...Object.fromEntries(affected.map((name) => [name, 0])),
      };

      return {
        planRefinementIterations: refinement,
        validationFeedback: [],
        knowledgeGaps: affected.flatMap((name) => gapsRelatedToStage({ knowledgeGaps, stages }, name)),
        stages: stages.map((stage) => (reopened.has(stage.name) ? { ...stage, covered: false } : stage)),
        bookSearchIterations: counters,
        replanGuidance: guidance,
        allStagesCovered: false,
      };
    },
  });
}
