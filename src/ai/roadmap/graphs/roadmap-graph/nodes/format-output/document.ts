import type { BookInfo, StageInfo, UserLevel } from "#roadmap/ai/roadmap/schemas.js";
import { totalWeeks } from "#roadmap/ai/roadmap/extraction/duration.js";
import { acceptedBooks } from "#roadmap/ai/roadmap/roadmap-state.js";

export const RULE_WIDTH = 80;
export const MAX_LISTED_OBJECTIVES = 5;

export interface RoadmapDocumentInput {
  topic: string;
  userLevel: UserLevel;
  stages: StageInfo[];
  booksByStage: Record<string, BookInfo[]>;
  lastValidationScore: number | null;
  /** Ceilings the run hit on its way to this plan; listed under the summary. */
  limits?: string[];
}

const STUDY_TIPS = [
  "Follow the stages in order; each builds on the previous one.",
  "Take notes while reading and summarise each chapter in your own words.",
  "Practise with exercises or small projects after every stage.",
  "Revisit earlier stages when a later one feels too hard.",
];

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function renderBook(book: BookInfo, index: number): string[] {
  const year = book.year ? ` (${book.year})` : "";
  return [
    `  ${index + 1}. ${book.title}${year}`,
    `     Author: ${book.author}`,
    `     Rating: ${book.rating.toFixed(1)}/5 (${book.reviewCount} reviews)`,
    `     Why: ${book.rationale}`,
  ];
}

function renderStage(stage: StageInfo, books: BookInfo[], index: number): string[] {
  const lines = ["", "-".repeat(RULE_WIDTH), `STAGE ${index + 1}: ${stage.name}`, "-".repeat(RULE_WIDTH)];
  if (stage.description) lines.push(stage.description);
  lines.push(`Duration: ${stage.duration}`);
  if (stage.prerequisites.length > 0) {
    lines.push(`Prerequisites: ${stage.prerequisites.join(", ")}`);
  }

  const objectives = stage.objectives.slice(0, MAX_LISTED_OBJECTIVES);
  if (objectives.length > 0) {
    lines.push("", "Objectives:", ...objectives.map((objective) => `  - ${objective}`));
  }

  lines.push("", "Recommended books:");
  if (books.length === 0) {
    lines.push("  No books met the quality threshold for this stage.");
  } else {
    books.forEach((book, i) => lines.push(...renderBook(book, i)));
  }
  return lines;
}

/**
 * Renders the plain-text roadmap document.
 */
export function renderRoadmapDocument(input: RoadmapDocumentInput): string {
  const { topic, userLevel, stages, booksByStage, lastValidationScore, limits = [] } = input;
  const rule = "=".repeat(RULE_WIDTH);
  const weeks = totalWeeks(stages.map((stage) => stage.duration));

  const lines = [
    rule,
    `LEARNING ROADMAP: ${topic.toUpperCase()}`,
    rule,
    `Level: ${capitalize(userLevel)}`,
    `Stages: ${stages.length}`,
    `Estimated duration: ${weeks} weeks (${Math.round(weeks / 4)} months)`,
    `Validation score: ${lastValidationScore === null ? "not validated" : `${lastValidationScore}/10`}`,
  ];
  if (limits.length > 0) {
    lines.push("", "LIMITS REACHED", ...limits.map((limit) => `  - ${limit}`));
  }

  if (stages.length === 0) {
    lines.push("", "No stages were produced before the run stopped.");
    return lines.join("\n") + "\n";
  }

  lines.push("", "ROADMAP", ...stages.map((stage, i) => `  ${i + 1}. ${stage.name} (${stage.duration})`));
  stages.forEach((stage, i) => lines.push(...renderStage(stage, acceptedBooks({ booksByStage }, stage.name), i)));
  lines.push("", rule, "STUDY TIPS", rule, ...STUDY_TIPS.map((tip) => `- ${tip}`));
  return lines.join("\n") + "\n";
}
