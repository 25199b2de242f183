/**
 * Global Validation Node (Validador_Global)
 *
 * Scores the whole plan and, when the score is below the acceptable
 * threshold, appends the feedback that drives a replan.
 */

import { PromptTemplate } from "@langchain/core/prompts";
import type { TextGenerator } from "#roadmap/ai/text-generator.js";
import type { BookInfo, StageInfo } from "#roadmap/ai/roadmap/schemas.js";
import { extractValidationScore } from "#roadmap/ai/roadmap/extraction/validation-score.js";
import {
  ACCEPTABLE_VALIDATION_SCORE,
  MIN_BOOKS_PER_STAGE,
  NEUTRAL_VALIDATION_SCORE,
  acceptedBooks,
} from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";
import { VALIDATE_PLAN_PROMPT } from "./prompts.js";

const log = createLogger("Validador_Global");

const MAX_REPORTED_ISSUES = 3;
const ISSUE_LINE = /^\s*[-•*]\s+(.+)$/;

function summarizeStage(stage: StageInfo, books: BookInfo[], index: number): string {
  const average =
    books.length > 0 ? books.reduce((sum, book) => sum + book.rating, 0) / books.length : 0;
  return `${index + 1}. ${stage.name} (${stage.duration}): ${books.length} books, average rating ${average.toFixed(1)}`;
}

export function extractIssues(text: string): string[] {
  const issues: string[] = [];
  for (const line of text.split("\n")) {
    const match = ISSUE_LINE.exec(line);
    if (match) issues.push(match[1].trim());
    if (issues.length === MAX_REPORTED_ISSUES) break;
  }
  return issues;
}

export function createValidatePlan(generator: TextGenerator) {
  const template = PromptTemplate.fromTemplate(VALIDATE_PLAN_PROMPT);

  return defineNode({
    name: "Validador_Global",
    reads: [
      "topic",
      "userLevel",
      "stages",
      "booksByStage",
      "knowledgeGaps",
      "validationIterations",
      "validationFeedback",
    ],
    writes: ["validationIterations", "validationFeedback", "lastValidationScore"],
    run: async ({
      topic,
      userLevel,
      stages,
      booksByStage,
      knowledgeGaps,
      validationIterations,
      validationFeedback,
    }) => {
      const iteration = validationIterations + 1;

      let text = "";
      try {
        const prompt = await template.format({
          topic,
          userLevel,
          stageSummary: stages
            .map((stage, i) => summarizeStage(stage, acceptedBooks({ booksByStage }, stage.name), i))
            .join("\n"),
          gaps: knowledgeGaps.map((gap) => `- ${gap}`).join("\n") || "- none",
        });
        text = await generator.generate(prompt, { purpose: "validation" });
      } catch (error) {
        log.warn("Validation failed:", error instanceof Error ? error.message : error);
      }

      const parsed = extractValidationScore(text);
      if (parsed === undefined) {
        log.warn(`No score found, assuming ${NEUTRAL_VALIDATION_SCORE}/10`);
      }
      const score = parsed ?? NEUTRAL_VALIDATION_SCORE;
      log.info(`Validation ${iteration}: ${score}/10`);

      if (score >= ACCEPTABLE_VALIDATION_SCORE) {
        return { validationIterations: iteration, lastValidationScore: score };
      }

      const feedback = [
        `Validation ${iteration}: score ${score}/10 is below ${ACCEPTABLE_VALIDATION_SCORE}`,
        ...stages
          .filter((stage) => acceptedBooks({ booksByStage }, stage.name).length < MIN_BOOKS_PER_STAGE)
          .map(
            (stage) =>
              `Stage "${stage.name}" has ${acceptedBooks({ booksByStage }, stage.name).length} of ${MIN_BOOKS_PER_STAGE} recommended books`
          ),
        ...extractIssues(text),
      ];
      return {
        validationIterations: iteration,
        validationFeedback: [...validationFeedback, ...feedback],
        lastValidationScore: score,
      };
    },
  });
}
