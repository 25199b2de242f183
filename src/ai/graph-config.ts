/**
 * Graph-level run configuration.
 *
 * LangGraph creates default tracers when callbacks are not passed at the graph
 * level, so the roadmap graph gets its own tracer project here rather than
 * relying on model-level callbacks alone.
 */

import { LangChainTracer } from "@langchain/core/tracers/tracer_langchain";
import { createTracerCallbacks } from "#roadmap/ai/model-config.js";
import { getConfig } from "#roadmap/config.js";

export interface RoadmapGraphConfig {
  runName: string;
  recursionLimit: number;
  callbacks: LangChainTracer[];
}

export function createRoadmapGraphConfig(
  topic: string,
  recursionLimit: number
): RoadmapGraphConfig {
  return {
    runName: `roadmap:${topic}`,
    recursionLimit,
    callbacks: createTracerCallbacks(getConfig("tracer-project") || undefined),
  };
}
