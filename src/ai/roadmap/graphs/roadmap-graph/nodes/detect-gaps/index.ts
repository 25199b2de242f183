/**
 * Gap Detection Node (Detector_Gaps)
 *
 * Records what the accepted books leave uncovered for the stage, then marks
 * the stage covered and releases it.
 */

import type { BookInfo } from "#roadmap/ai/roadmap/schemas.js";
import {
  MIN_BOOKS_PER_STAGE,
  acceptedBooks,
  findStage,
  formatGap,
} from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";

const log = createLogger("Detector_Gaps");

const MIN_KEYWORD_LENGTH = 4;
/** Books with fewer reviews than this have an unreliable rating. */
export const MIN_RELIABLE_REVIEWS = 50;
const STOP_WORDS = new Set([
  "about",
  "after",
  "apply",
  "basic",
  "between",
  "build",
  "from",
  "into",
  "learn",
  "master",
  "their",
  "these",
  "understand",
  "using",
  "what",
  "with",
  "work",
]);

function keywords(text: string): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return words.filter((word) => word.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(word));
}

/**
 * An objective counts as evidenced when one of its keywords appears in a
 * book's title or rationale. Objectives without keywords count as evidenced.
 */
export function isObjectiveEvidenced(objective: string, books: BookInfo[]): boolean {
  const terms = keywords(objective);
  if (terms.length === 0) return true;
  const evidence = new Set(books.flatMap((book) => keywords(`${book.title} ${book.rationale}`)));
  return terms.some((term) => evidence.has(term));
}

export function findStageGaps(stageName: string, objectives: string[], books: BookInfo[]): string[] {
  const gaps: string[] = [];
  if (books.length < MIN_BOOKS_PER_STAGE) {
    gaps.push(
      formatGap(stageName, `only ${books.length} of ${MIN_BOOKS_PER_STAGE} recommended books found`)
    );
  }
  const thinlyReviewed = books.filter((book) => book.reviewCount < MIN_RELIABLE_REVIEWS).length;
  if (thinlyReviewed > Math.floor(books.length / 2)) {
    gaps.push(
      formatGap(
        stageName,
        `${thinlyReviewed} of ${books.length} books have fewer than ${MIN_RELIABLE_REVIEWS} reviews`
      )
    );
  }
  for (const objective of objectives) {
    if (!isObjectiveEvidenced(objective, books)) {
      gaps.push(formatGap(stageName, `no book addresses "${objective}"`));
    }
  }
  return gaps;
}

export function createDetectGaps() {
  return defineNode({
    name: "Detector_Gaps",
    reads: ["stages", "stageBeingProcessed", "booksByStage", "knowledgeGaps"],
    writes: ["knowledgeGaps", "stages", "stageBeingProcessed", "allStagesCovered"],
    run: async ({ stages, stageBeingProcessed, booksByStage, knowledgeGaps }) => {
      if (stageBeingProcessed === null) {
        return { allStagesCovered: stages.every((stage) => stage.covered) };
      }

      const stage = findStage({ stages }, stageBeingProcessed);
      const books = acceptedBooks({ booksByStage }, stageBeingProcessed);
      const found = findStageGaps(stageBeingProcessed, stage?.objectives ?? [], books);
      const fresh = found.filter((gap) => !knowledgeGaps.includes(gap));
      if (fresh.length > 0) {
        log.info(`"${stageBeingProcessed}": ${fresh.length} new gaps`);
      }

      const nextStages = stages.map((candidate) =>
        candidate.name === stageBeingProcessed ? { ...candidate, covered: true } : candidate
      );
      return {
        knowledgeGaps: [...knowledgeGaps, ...fresh],
        stages: nextStages,
        stageBeingProcessed: null,
        allStagesCovered: nextStages.every((candidate) => candidate.covered),
      };
    },
  });
}
