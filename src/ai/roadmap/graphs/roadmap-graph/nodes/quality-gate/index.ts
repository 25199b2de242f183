/**
 * Quality Gate Node (Validador_Calidad)
 *
 * Admits pending candidates rated above the quality threshold into the
 * stage's book list, keeping the best-scored few, then empties the pool and
 * counts one search attempt for the stage.
 */

import type { BookInfo } from "#roadmap/ai/roadmap/schemas.js";
import {
  MAX_BOOKS_PER_STAGE,
  acceptedBooks,
  QUALITY_THRESHOLD,
  normalizeTitle,
  searchIterationsFor,
} from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";

const log = createLogger("Validador_Calidad");

export function admitBooks(current: BookInfo[], candidates: BookInfo[]): BookInfo[] {
  const seen = new Set(current.map((book) => normalizeTitle(book.title)));
  const admitted: BookInfo[] = [];
  for (const candidate of candidates) {
    const key = normalizeTitle(candidate.title);
    if (candidate.rating <= QUALITY_THRESHOLD || seen.has(key)) continue;
    seen.add(key);
    admitted.push(candidate);
  }
  // Array.prototype.sort is stable, so ties keep arrival order
  return [...current, ...admitted]
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_BOOKS_PER_STAGE);
}

export function createQualityGate() {
  return defineNode({
    name: "Validador_Calidad",
    reads: ["stageBeingProcessed", "pendingCandidates", "booksByStage", "bookSearchIterations"],
    writes: ["pendingCandidates", "booksByStage", "bookSearchIterations"],
    run: async ({ stageBeingProcessed, pendingCandidates, booksByStage, bookSearchIterations }) => {
      if (stageBeingProcessed === null) {
        return { pendingCandidates: [] };
      }

      const current = acceptedBooks({ booksByStage }, stageBeingProcessed);
      const books = admitBooks(current, pendingCandidates);
      const attempts = searchIterationsFor({ bookSearchIterations }, stageBeingProcessed) + 1;

      log.info(
        `"${stageBeingProcessed}": ${books.length} books accepted after attempt ${attempts} ` +
          `(${pendingCandidates.length} candidates reviewed)`
      );
      return {
        pendingCandidates: [],
        booksByStage: { ...booksByStage, [stageBeingProcessed]: books },
        bookSearchIterations: { ...bookSearchIterations, [stageBeingProcessed]: attempts },
      };
    },
  });
}
