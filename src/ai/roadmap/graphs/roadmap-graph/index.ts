/**
 * Roadmap Graph
 *
 * Builds a learning roadmap for a topic:
 * 1. Analizador_Tema / Evaluador_Nivel - knowledge areas for the learner
 * 2. Estructurador_Plan - ordered stages
 * 3. Selector_Etapa → Investigador_Libros → Validador_Calidad - books per stage
 * 4. Detector_Gaps - coverage bookkeeping
 * 5. Validador_Global → Replanificador - plan review and revision
 * 6. Formateador_Salida / Salida_Forzada - final document
 *
 * Nodes are registered here; every edge is read from ROADMAP_TOPOLOGY. The
 * cycle ceilings live in the decision functions.
 */

import { END, START, StateGraph } from "@langchain/langgraph";
import type { TextGenerator } from "#roadmap/ai/text-generator.js";
import { RoadmapState, RoadmapStateType } from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import {
  decideBookSearch,
  decideStageCoverage,
  decideValidation,
  shouldContinueOrEnd,
} from "./decisions.js";
import { AnyRoadmapNode, RunHooks, toGraphNode, toGraphRoute } from "./node-shared.js";
import {
  DecisionId,
  ENTRY_NODE,
  EXECUTOR_IDS,
  ExecutorId,
  ROADMAP_TOPOLOGY,
  isDecisionId,
  isExecutorId,
} from "./topology.js";
import { createAnalyzeTopic } from "./nodes/analyze-topic/index.js";
import { createAssessLevel } from "./nodes/assess-level/index.js";
import { createStructurePlan } from "./nodes/structure-plan/index.js";
import { createSelectStage } from "./nodes/select-stage/index.js";
import { createResearchBooks } from "./nodes/research-books/index.js";
import { createQualityGate } from "./nodes/quality-gate/index.js";
import { createDetectGaps } from "./nodes/detect-gaps/index.js";
import { createValidatePlan } from "./nodes/validate-plan/index.js";
import { createReplan } from "./nodes/replan/index.js";
import { createFormatOutput } from "./nodes/format-output/index.js";
import { createForcedOutput } from "./nodes/forced-output/index.js";

const log = createLogger("RoadmapGraph");

export function createRoadmapNodes(generator: TextGenerator): Record<ExecutorId, AnyRoadmapNode> {
  return {
    Analizador_Tema: createAnalyzeTopic(generator),
    Evaluador_Nivel: createAssessLevel(),
    Estructurador_Plan: createStructurePlan(generator),
    Selector_Etapa: createSelectStage(),
    Investigador_Libros: createResearchBooks(generator),
    Validador_Calidad: createQualityGate(),
    Detector_Gaps: createDetectGaps(),
    Validador_Global: createValidatePlan(generator),
    Replanificador: createReplan(generator),
    Formateador_Salida: createFormatOutput(),
    Salida_Forzada: createForcedOutput(),
  };
}

function decisionRoute(id: DecisionId, hooks: RunHooks): (state: RoadmapStateType) => string {
  switch (id) {
    case "Decision_Busqueda_Libros":
      return toGraphRoute(id, decideBookSearch, hooks);
    case "Decision_Cobertura_Etapas":
      return toGraphRoute(id, decideStageCoverage, hooks);
    case "Decision_Validacion":
      return toGraphRoute(id, decideValidation, hooks);
    case "Should_Continue_Or_End":
      return toGraphRoute(id, shouldContinueOrEnd, hooks);
  }
}

export interface RoadmapGraphOptions {
  generator: TextGenerator;
  hooks?: RunHooks;
}

/**
 * Creates and compiles the roadmap graph. No checkpointer is attached: a run
 * lives for one invocation.
 */
export function createRoadmapGraph({ generator, hooks = {} }: RoadmapGraphOptions) {
  const nodes = createRoadmapNodes(generator);
  const node = (id: ExecutorId) => toGraphNode(nodes[id], hooks);

  const workflow = new StateGraph(RoadmapState)
    .addNode("Analizador_Tema", node("Analizador_Tema"))
    .addNode("Evaluador_Nivel", node("Evaluador_Nivel"))
    .addNode("Estructurador_Plan", node("Estructurador_Plan"))
    .addNode("Selector_Etapa", node("Selector_Etapa"))
    .addNode("Investigador_Libros", node("Investigador_Libros"))
    .addNode("Validador_Calidad", node("Validador_Calidad"))
    .addNode("Detector_Gaps", node("Detector_Gaps"))
    .addNode("Validador_Global", node("Validador_Global"))
    .addNode("Replanificador", node("Replanificador"))
    .addNode("Formateador_Salida", node("Formateador_Salida"))
    .addNode("Salida_Forzada", node("Salida_Forzada"))
    .addEdge(START, ENTRY_NODE);

  for (const id of EXECUTOR_IDS) {
    const entry = ROADMAP_TOPOLOGY[id];
    if (entry.kind === "terminal") {
      workflow.addEdge(id, END);
    } else if (entry.kind === "executor" && isDecisionId(entry.next)) {
      const decision = ROADMAP_TOPOLOGY[entry.next];
      if (decision.kind !== "decision") {
        throw new Error(`${entry.next} is not a decision`);
      }
      workflow.addConditionalEdges(id, decisionRoute(entry.next, hooks), { ...decision.routes });
    } else if (entry.kind === "executor" && isExecutorId(entry.next)) {
      workflow.addEdge(id, entry.next);
    }
  }

  log.debug("Graph compiled");
  return workflow.compile();
}
