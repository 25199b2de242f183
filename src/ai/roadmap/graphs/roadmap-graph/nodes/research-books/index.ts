/**
 * Book Research Node (Investigador_Libros)
 *
 * Runs a grounded search for the selected stage and appends the parsed
 * candidates to the pending pool. When gaps were recorded for the stage the
 * query names them.
 */

import { PromptTemplate } from "@langchain/core/prompts";
import type { TextGenerator } from "#roadmap/ai/text-generator.js";
import { parseBookCandidates } from "#roadmap/ai/roadmap/extraction/book-parser.js";
import { acceptedBooks, findStage, gapsRelatedToStage } from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";
import { GAP_FOCUS_SECTION, RESEARCH_BOOKS_PROMPT } from "./prompts.js";

const log = createLogger("Investigador_Libros");

export function createResearchBooks(generator: TextGenerator) {
  const template = PromptTemplate.fromTemplate(RESEARCH_BOOKS_PROMPT);
  const focusTemplate = PromptTemplate.fromTemplate(GAP_FOCUS_SECTION);

  return defineNode({
    name: "Investigador_Libros",
    reads: [
      "topic",
      "userLevel",
      "stages",
      "stageBeingProcessed",
      "knowledgeGaps",
      "pendingCandidates",
      "booksByStage",
    ],
    writes: ["pendingCandidates"],
    run: async ({
      topic,
      userLevel,
      stages,
      stageBeingProcessed,
      knowledgeGaps,
      pendingCandidates,
      booksByStage,
    }) => {
      if (stageBeingProcessed === null) {
        return {};
      }

      const stage = findStage({ stages }, stageBeingProcessed);
      const gaps = gapsRelatedToStage({ knowledgeGaps, stages }, stageBeingProcessed);
      const known = [...acceptedBooks({ booksByStage }, stageBeingProcessed), ...pendingCandidates];

      try {
        const focus =
          gaps.length > 0
            ? await focusTemplate.format({ gaps: gaps.map((gap) => `- ${gap}`).join("\n") })
            : "";
        const prompt = await template.format({
          topic,
          userLevel,
          stage: stageBeingProcessed,
          description: stage?.description || "(none)",
          objectives: stage?.objectives.map((objective) => `- ${objective}`).join("\n") || "- (none)",
          focus,
          exclude: known.map((book) => `- ${book.title}`).join("\n") || "- (none)",
        });

        log.info(
          `Searching books for "${stageBeingProcessed}"${gaps.length > 0 ? ` (${gaps.length} gaps)` : ""}`
        );
        const text = await generator.generate(prompt, { purpose: "research", grounded: true });
        const { books, dropped } = parseBookCandidates(text);
        if (dropped > 0) {
          log.debug(`Dropped ${dropped} unparseable candidates`);
        }
        log.info(`Found ${books.length} candidates`);
        return { pendingCandidates: [...pendingCandidates, ...books] };
      } catch (error) {
        log.warn("Book search failed:", error instanceof Error ? error.message : error);
        return { pendingCandidates };
      }
    },
  });
}
