import { Annotation } from "@langchain/langgraph";
import type { BookInfo, KnowledgeArea, StageInfo, UserLevel } from "./schemas.js";

export type { BookInfo, KnowledgeArea, StageInfo, UserLevel };

// Iteration ceilings, one per cycle
export const MAX_BOOK_SEARCHES_PER_STAGE = 3;
export const MAX_VALIDATION_CYCLES = 5;
export const MAX_PLAN_REFINEMENTS = 2;

export const MIN_BOOKS_PER_STAGE = 2;
export const MAX_BOOKS_PER_STAGE = 5;
export const QUALITY_THRESHOLD = 4.0;
export const MIN_STAGES = 3;
export const MAX_STAGES = 7;

/** Validation scores below this flag the plan as critically flawed. */
export const ACCEPTABLE_VALIDATION_SCORE = 6;
/** Used when the validation rubric cannot be obtained. */
export const NEUTRAL_VALIDATION_SCORE = 7;

/**
 * Shared state for one roadmap run. Every channel is last-write-wins: nodes
 * return the full new value of each field they own. Optional values are
 * cleared with null.
 */
export const RoadmapState = Annotation.Root({
  topic: Annotation<string>({
    reducer: (_, y) => y,
    default: () => "",
  }),
  userLevel: Annotation<UserLevel>({
    reducer: (_, y) => y,
    default: () => "beginner",
  }),

  // Analysis
  knowledgeAreas: Annotation<KnowledgeArea[]>({
    reducer: (_, y) => y,
    default: () => [],
  }),
  focusAreas: Annotation<KnowledgeArea[]>({
    reducer: (_, y) => y,
    default: () => [],
  }),

  // Plan
  stages: Annotation<StageInfo[]>({
    reducer: (_, y) => y,
    default: () => [],
  }),
  booksByStage: Annotation<Record<string, BookInfo[]>>({
    reducer: (_, y) => y,
    default: () => ({}),
  }),
  pendingCandidates: Annotation<BookInfo[]>({
    reducer: (_, y) => y,
    default: () => [],
  }),
  knowledgeGaps: Annotation<string[]>({
    reducer: (_, y) => y,
    default: () => [],
  }),
  validationFeedback: Annotation<string[]>({
    reducer: (_, y) => y,
    default: () => [],
  }),
  lastValidationScore: Annotation<number | null>({
    reducer: (_, y) => y,
    default: () => null,
  }),
  replanGuidance: Annotation<string | null>({
    reducer: (_, y) => y,
    default: () => null,
  }),
  stageBeingProcessed: Annotation<string | null>({
    reducer: (_, y) => y,
    default: () => null,
  }),

  // Iteration guards
  bookSearchIterations: Annotation<Record<string, number>>({
    reducer: (_, y) => y,
    default: () => ({}),
  }),
  validationIterations: Annotation<number>({
    reducer: (_, y) => y,
    default: () => 0,
  }),
  planRefinementIterations: Annotation<number>({
    reducer: (_, y) => y,
    default: () => 0,
  }),
  allStagesCovered: Annotation<boolean>({
    reducer: (_, y) => y,
    default: () => false,
  }),

  // Output
  finalOutput: Annotation<string | null>({
    reducer: (_, y) => y,
    default: () => null,
  }),
  limitedOutput: Annotation<boolean>({
    reducer: (_, y) => y,
    default: () => false,
  }),
  forcedExitReason: Annotation<string | null>({
    reducer: (_, y) => y,
    default: () => null,
  }),
});

export type RoadmapStateType = typeof RoadmapState.State;
export type StateKey = keyof RoadmapStateType;
export type RoadmapUpdate = Partial<RoadmapStateType>;

export function createInitialState(topic: string, userLevel: UserLevel): RoadmapStateType {
  return {
    topic,
    userLevel,
    knowledgeAreas: [],
    focusAreas: [],
    stages: [],
    booksByStage: {},
    pendingCandidates: [],
    knowledgeGaps: [],
    validationFeedback: [],
    lastValidationScore: null,
    replanGuidance: null,
    stageBeingProcessed: null,
    bookSearchIterations: {},
    validationIterations: 0,
    planRefinementIterations: 0,
    allStagesCovered: false,
    finalOutput: null,
    limitedOutput: false,
    forcedExitReason: null,
  };
}

/**
 * Merges a node update the same way the graph channels do.
 */
export function applyUpdate(state: RoadmapStateType, update: RoadmapUpdate): RoadmapStateType {
  return { ...state, ...update };
}

// ----------------------
// Read-only accessors
// ----------------------

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, " ");
}

export function stageNames(state: Pick<RoadmapStateType, "stages">): string[] {
  return state.stages.map((stage) => stage.name);
}

export function findStage(
  state: Pick<RoadmapStateType, "stages">,
  stageName: string
): StageInfo | undefined {
  return state.stages.find((stage) => stage.name === stageName);
}

export function uncoveredStages(state: Pick<RoadmapStateType, "stages">): StageInfo[] {
  return state.stages.filter((stage) => !stage.covered);
}

export function acceptedBooks(
  state: Pick<RoadmapStateType, "booksByStage">,
  stageName: string
): BookInfo[] {
  return Object.hasOwn(state.booksByStage, stageName) ? state.booksByStage[stageName] : [];
}

export function searchIterationsFor(
  state: Pick<RoadmapStateType, "bookSearchIterations">,
  stageName: string
): number {
  return Object.hasOwn(state.bookSearchIterations, stageName)
    ? state.bookSearchIterations[stageName]
    : 0;
}

/**
 * Gaps are recorded as "<stage>: <detail>". Stage names may themselves contain
 * ": ", so a gap belongs to the longest stage name that prefixes it.
 */
export function stageOfGap(gap: string, names: readonly string[]): string | undefined {
  let owner: string | undefined;
  for (const name of names) {
    if (gap.startsWith(`${name}: `) && (owner === undefined || name.length > owner.length)) {
      owner = name;
    }
  }
  return owner;
}

export function gapsRelatedToStage(
  state: Pick<RoadmapStateType, "knowledgeGaps" | "stages">,
  stageName: string
): string[] {
  const names = stageNames(state);
  return state.knowledgeGaps.filter((gap) => stageOfGap(gap, names) === stageName);
}

export function formatGap(stageName: string, detail: string): string {
  return `${stageName}: ${detail}`;
}

/**
 * A stage may be marked covered once it has enough accepted books or its
 * search budget is spent.
 */
export function isStageSatisfied(
  state: Pick<RoadmapStateType, "booksByStage" | "bookSearchIterations">,
  stageName: string
): boolean {
  return (
    acceptedBooks(state, stageName).length >= MIN_BOOKS_PER_STAGE ||
    searchIterationsFor(state, stageName) >= MAX_BOOK_SEARCHES_PER_STAGE
  );
}

export function hasCriticalFeedback(state: Pick<RoadmapStateType, "validationFeedback">): boolean {
  return state.validationFeedback.length > 0;
}

// ----------------------
// Invariants
// ----------------------

/**
 * Returns every violated state invariant; an empty list means the state is
 * valid.
 */
export function checkStateInvariants(state: RoadmapStateType): string[] {
  const violations: string[] = [];
  const names = stageNames(state);
  const nameSet = new Set(names);

  if (names.length > 0 && (names.length < MIN_STAGES || names.length > MAX_STAGES)) {
    violations.push(`stage count ${names.length} outside ${MIN_STAGES}-${MAX_STAGES}`);
  }
  if (nameSet.size !== names.length) {
    violations.push("stage names are not unique");
  }

  for (const [stageName, books] of Object.entries(state.booksByStage)) {
    if (!nameSet.has(stageName)) {
      violations.push(`books recorded for unknown stage "${stageName}"`);
    }
    const titles = new Set(books.map((book) => normalizeTitle(book.title)));
    if (titles.size !== books.length) {
      violations.push(`duplicate book titles in "${stageName}"`);
    }
    if (books.some((book) => book.rating <= QUALITY_THRESHOLD)) {
      violations.push(`book rated at or below ${QUALITY_THRESHOLD} accepted for "${stageName}"`);
    }
    if (books.length > MAX_BOOKS_PER_STAGE) {
      violations.push(`more than ${MAX_BOOKS_PER_STAGE} books accepted for "${stageName}"`);
    }
  }

  for (const [stageName, count] of Object.entries(state.bookSearchIterations)) {
    if (!nameSet.has(stageName)) {
      violations.push(`search counter recorded for unknown stage "${stageName}"`);
    }
    if (count < 0 || count > MAX_BOOK_SEARCHES_PER_STAGE) {
      violations.push(`search counter for "${stageName}" is ${count}`);
    }
  }

  if (state.validationIterations < 0 || state.validationIterations > MAX_VALIDATION_CYCLES) {
    violations.push(`validationIterations is ${state.validationIterations}`);
  }
  if (
    state.planRefinementIterations < 0 ||
    state.planRefinementIterations > MAX_PLAN_REFINEMENTS
  ) {
    violations.push(`planRefinementIterations is ${state.planRefinementIterations}`);
  }

  if (state.stageBeingProcessed !== null && !nameSet.has(state.stageBeingProcessed)) {
    violations.push(`stageBeingProcessed "${state.stageBeingProcessed}" is not a stage`);
  }

  for (const stage of state.stages) {
    if (stage.covered && !isStageSatisfied(state, stage.name)) {
      violations.push(`stage "${stage.name}" marked covered without books or exhausted budget`);
    }
  }
  if (state.allStagesCovered && state.stages.some((stage) => !stage.covered)) {
    violations.push("allStagesCovered set while stages remain uncovered");
  }

  return violations;
}

function isPrefix(previous: string[], next: string[]): boolean {
  return previous.length <= next.length && previous.every((entry, i) => next[i] === entry);
}

/**
 * Invariants that relate a state to the one it was derived from.
 * @param clearsHistory - The writer may reset gaps and feedback
 */
export function checkTransitionInvariants(
  previous: RoadmapStateType,
  next: RoadmapStateType,
  clearsHistory: boolean
): string[] {
  const violations: string[] = [];

  if (next.topic !== previous.topic || next.userLevel !== previous.userLevel) {
    violations.push("topic and userLevel are immutable");
  }
  if (next.validationIterations < previous.validationIterations) {
    violations.push("validationIterations decreased");
  }
  if (next.planRefinementIterations < previous.planRefinementIterations) {
    violations.push("planRefinementIterations decreased");
  }
  if (previous.finalOutput !== null && next.finalOutput !== previous.finalOutput) {
    violations.push("finalOutput written twice");
  }
  if (!clearsHistory) {
    if (!isPrefix(previous.knowledgeGaps, next.knowledgeGaps)) {
      violations.push("knowledgeGaps is append-only");
    }
    if (!isPrefix(previous.validationFeedback, next.validationFeedback)) {
      violations.push("validationFeedback is append-only");
    }
  }

  return violations;
}
