import "dotenv/config";

import { ConfigurationError, RunBudgetExceededError } from "#roadmap/ai/error.js";
import { createRoadmapGraphConfig } from "#roadmap/ai/graph-config.js";
import { TextGenerator, createModelTextGenerator } from "#roadmap/ai/text-generator.js";
import { createLogger, logApplicationEvent } from "#roadmap/util/logging.js";
import { createRoadmapGraph } from "./graphs/roadmap-graph/index.js";
import { runNode } from "./graphs/roadmap-graph/node-shared.js";
import { createForcedOutput } from "./graphs/roadmap-graph/nodes/forced-output/index.js";
import {
  DecisionId,
  ExecutorId,
  computeStepCeiling,
} from "./graphs/roadmap-graph/topology.js";
import {
  RoadmapStateType,
  applyUpdate,
  createInitialState,
} from "./roadmap-state.js";
import type { UserLevel } from "./schemas.js";

const log = createLogger("roadmap");

export type TraceEntry =
  | { kind: "node"; name: ExecutorId }
  | { kind: "decision"; name: DecisionId; label: string };

export interface RoadmapRunOptions {
  /** Defaults to the configured chat models. */
  generator?: TextGenerator;
  /** Wall-clock budget for the whole run; no new node starts once it is spent. */
  timeBudgetMs?: number;
}

export interface RoadmapRunResult {
  state: RoadmapStateType;
  terminal: ExecutorId;
  limited: boolean;
  trace: TraceEntry[];
}

/**
 * Runs the roadmap graph once for a topic and level.
 * @throws ConfigurationError when the topic is empty or no model is configured
 */
export async function runRoadmapWorkflow(
  topic: string,
  userLevel: UserLevel,
  options: RoadmapRunOptions = {}
): Promise<RoadmapRunResult> {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new ConfigurationError("Topic must not be empty");
  }

  const generator = options.generator ?? (await createModelTextGenerator());
  const initial = createInitialState(trimmed, userLevel);
  const trace: TraceEntry[] = [];
  let latest = initial;

  const graph = createRoadmapGraph({
    generator,
    hooks: {
      deadline: options.timeBudgetMs !== undefined ? Date.now() + options.timeBudgetMs : undefined,
      budgetMs: options.timeBudgetMs,
      onNodeComplete: (name, state) => {
        trace.push({ kind: "node", name });
        latest = state;
      },
      onDecision: (name, label) => {
        trace.push({ kind: "decision", name, label });
      },
    },
  });

  const started = Date.now();
  logApplicationEvent("roadmap", "run_started", { level: userLevel });

  let state: RoadmapStateType;
  try {
    state = await graph.invoke(
      initial,
      createRoadmapGraphConfig(trimmed, computeStepCeiling() + 1)
    );
  } catch (error) {
    if (!(error instanceof RunBudgetExceededError)) {
      throw error;
    }
    log.warn(`${error.message}; producing the best-effort roadmap`);
    const stopped = applyUpdate(latest, {
      forcedExitReason: `Time budget of ${error.budgetMs}ms exhausted before ${error.nextNode}`,
    });
    state = applyUpdate(stopped, await runNode(createForcedOutput(), stopped));
    trace.push({ kind: "node", name: "Salida_Forzada" });
  }

  const terminal: ExecutorId = state.limitedOutput ? "Salida_Forzada" : "Formateador_Salida";
  const steps = trace.filter((entry) => entry.kind === "node").length;
  logApplicationEvent("roadmap", "run_finished", {
    terminal,
    steps,
    durationMs: Date.now() - started,
  });

  return { state, terminal, limited: state.limitedOutput, trace };
}
