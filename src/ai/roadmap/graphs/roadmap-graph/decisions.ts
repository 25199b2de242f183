/**
 * Routing decisions for the roadmap graph.
 *
 * Each decision is a pure function of the state it declares in its
 * signature. Within a cycle the ceiling check always comes first, so a cycle
 * ends once its counter reaches the limit whatever the content looks like.
 */

import {
  MAX_BOOK_SEARCHES_PER_STAGE,
  MAX_PLAN_REFINEMENTS,
  MAX_VALIDATION_CYCLES,
  MIN_BOOKS_PER_STAGE,
  RoadmapStateType,
  acceptedBooks,
  gapsRelatedToStage,
  hasCriticalFeedback,
  searchIterationsFor,
  uncoveredStages,
} from "#roadmap/ai/roadmap/roadmap-state.js";
import type {
  BookSearchLabel,
  ContinueLabel,
  CoverageLabel,
  ValidationLabel,
} from "./topology.js";

/**
 * Decision_Busqueda_Libros, evaluated after the quality gate.
 */
export function decideBookSearch(
  state: Pick<
    RoadmapStateType,
    "stageBeingProcessed" | "stages" | "bookSearchIterations" | "booksByStage" | "knowledgeGaps"
  >
): BookSearchLabel {
  const stage = state.stageBeingProcessed;
  if (stage === null) {
    // Nothing selected, nothing to search for
    return "libros_suficientes";
  }

  if (searchIterationsFor(state, stage) >= MAX_BOOK_SEARCHES_PER_STAGE) {
    return "aceptar_libros_actuales";
  }
  if (acceptedBooks(state, stage).length >= MIN_BOOKS_PER_STAGE) {
    return "libros_suficientes";
  }
  if (gapsRelatedToStage(state, stage).length > 0) {
    return "busqueda_especifica";
  }
  return "reintentar_busqueda";
}

/**
 * Decision_Cobertura_Etapas, evaluated after gap detection.
 */
export function decideStageCoverage(state: Pick<RoadmapStateType, "stages">): CoverageLabel {
  return uncoveredStages(state).length > 0 ? "siguiente_etapa" : "validacion_global";
}

/**
 * Decision_Validacion, evaluated after global validation. Once refinements
 * are spent the best-effort plan is formatted rather than replanned again.
 */
export function decideValidation(
  state: Pick<
    RoadmapStateType,
    "validationIterations" | "planRefinementIterations" | "validationFeedback"
  >
): ValidationLabel {
  if (state.validationIterations >= MAX_VALIDATION_CYCLES) {
    return "forzar_salida";
  }
  if (hasCriticalFeedback(state) && state.planRefinementIterations < MAX_PLAN_REFINEMENTS) {
    return "replantear";
  }
  return "formatear";
}

/**
 * Should_Continue_Or_End. Not attached to any edge.
 */
export function shouldContinueOrEnd(state: Pick<RoadmapStateType, "finalOutput">): ContinueLabel {
  return state.finalOutput !== null ? "end" : "continue";
}
