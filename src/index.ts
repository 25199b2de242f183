export { runRoadmapWorkflow } from '#roadmap/ai/roadmap/roadmap-workflow.js';
export type {
  RoadmapRunOptions,
  RoadmapRunResult,
  TraceEntry,
} from '#roadmap/ai/roadmap/roadmap-workflow.js';
export { createRoadmapGraph, createRoadmapNodes } from '#roadmap/ai/roadmap/graphs/roadmap-graph/index.js';
export {
  ROADMAP_TOPOLOGY,
  computeStepCeiling,
} from '#roadmap/ai/roadmap/graphs/roadmap-graph/topology.js';
export {
  decideBookSearch,
  decideStageCoverage,
  decideValidation,
  shouldContinueOrEnd,
} from '#roadmap/ai/roadmap/graphs/roadmap-graph/decisions.js';
export {
  RoadmapState,
  createInitialState,
  checkStateInvariants,
} from '#roadmap/ai/roadmap/roadmap-state.js';
export type { RoadmapStateType } from '#roadmap/ai/roadmap/roadmap-state.js';
export type { BookInfo, KnowledgeArea, StageInfo, UserLevel } from '#roadmap/ai/roadmap/schemas.js';
export { ModelTextGenerator, createModelTextGenerator } from '#roadmap/ai/text-generator.js';
export type { TextGenerator, GenerateOptions } from '#roadmap/ai/text-generator.js';
export { saveRoadmap, roadmapFileName } from '#roadmap/ai/roadmap/file-storage.js';
export * from '#roadmap/ai/error.js';
