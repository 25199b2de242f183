/**
 * Roadmap Graph Topology
 *
 * The fixed transition table of the roadmap workflow. Executors name their
 * static successor, decisions name the executor that precedes them and map
 * each label to the executor it selects. The graph builder compiles this
 * table; the helpers below inspect it without running anything.
 */

import {
  MAX_BOOK_SEARCHES_PER_STAGE,
  MAX_PLAN_REFINEMENTS,
  MAX_STAGES,
  MAX_VALIDATION_CYCLES,
  StateKey,
} from "#roadmap/ai/roadmap/roadmap-state.js";

export const EXECUTOR_IDS = [
  "Analizador_Tema",
  "Evaluador_Nivel",
  "Estructurador_Plan",
  "Selector_Etapa",
  "Investigador_Libros",
  "Validador_Calidad",
  "Detector_Gaps",
  "Validador_Global",
  "Replanificador",
  "Formateador_Salida",
  "Salida_Forzada",
] as const;

export type ExecutorId = (typeof EXECUTOR_IDS)[number];

export const DECISION_IDS = [
  "Decision_Busqueda_Libros",
  "Decision_Cobertura_Etapas",
  "Decision_Validacion",
  "Should_Continue_Or_End",
] as const;

export type DecisionId = (typeof DECISION_IDS)[number];

export type TopologyNodeId = ExecutorId | DecisionId;

export type BookSearchLabel =
  | "reintentar_busqueda"
  | "busqueda_especifica"
  | "aceptar_libros_actuales"
  | "libros_suficientes";

export type CoverageLabel = "siguiente_etapa" | "validacion_global";

export type ValidationLabel = "forzar_salida" | "replantear" | "formatear";

export type ContinueLabel = "continue" | "end";

export const BOOK_SEARCH_ROUTES = {
  reintentar_busqueda: "Investigador_Libros",
  busqueda_especifica: "Investigador_Libros",
  aceptar_libros_actuales: "Detector_Gaps",
  libros_suficientes: "Detector_Gaps",
} as const satisfies Record<BookSearchLabel, ExecutorId>;

export const COVERAGE_ROUTES = {
  siguiente_etapa: "Selector_Etapa",
  validacion_global: "Validador_Global",
} as const satisfies Record<CoverageLabel, ExecutorId>;

export const VALIDATION_ROUTES = {
  forzar_salida: "Salida_Forzada",
  replantear: "Replanificador",
  formatear: "Formateador_Salida",
} as const satisfies Record<ValidationLabel, ExecutorId>;

export type TopologyEntry =
  | { kind: "executor"; next: TopologyNodeId }
  | { kind: "terminal" }
  | {
      kind: "decision";
      /** Executor whose output the decision reads; null when unattached. */
      after: ExecutorId | null;
      routes: Readonly<Record<string, ExecutorId>>;
    };

export const ENTRY_NODE: ExecutorId = "Analizador_Tema";

export const TERMINAL_NODES: readonly ExecutorId[] = ["Formateador_Salida", "Salida_Forzada"];

export const ROADMAP_TOPOLOGY: Readonly<Record<TopologyNodeId, TopologyEntry>> = {
  Analizador_Tema: { kind: "executor", next: "Evaluador_Nivel" },
  Evaluador_Nivel: { kind: "executor", next: "Estructurador_Plan" },
  Estructurador_Plan: { kind: "executor", next: "Selector_Etapa" },
  Selector_Etapa: { kind: "executor", next: "Investigador_Libros" },
  Investigador_Libros: { kind: "executor", next: "Validador_Calidad" },
  Validador_Calidad: { kind: "executor", next: "Decision_Busqueda_Libros" },
  Detector_Gaps: { kind: "executor", next: "Decision_Cobertura_Etapas" },
  Validador_Global: { kind: "executor", next: "Decision_Validacion" },
  Replanificador: { kind: "executor", next: "Estructurador_Plan" },
  Formateador_Salida: { kind: "terminal" },
  Salida_Forzada: { kind: "terminal" },
  Decision_Busqueda_Libros: {
    kind: "decision",
    after: "Validador_Calidad",
    routes: BOOK_SEARCH_ROUTES,
  },
  Decision_Cobertura_Etapas: {
    kind: "decision",
    after: "Detector_Gaps",
    routes: COVERAGE_ROUTES,
  },
  Decision_Validacion: {
    kind: "decision",
    after: "Validador_Global",
    routes: VALIDATION_ROUTES,
  },
  // Kept for extension; no edge leads here
  Should_Continue_Or_End: { kind: "decision", after: null, routes: {} },
};

/**
 * Counter and ceiling that bound each cycle. The stage cycle is bounded by
 * the number of stages because every pass marks one stage covered.
 */
export const CYCLE_GUARDS: Readonly<
  Partial<Record<DecisionId, { counter: StateKey; ceiling: number }>>
> = {
  Decision_Busqueda_Libros: {
    counter: "bookSearchIterations",
    ceiling: MAX_BOOK_SEARCHES_PER_STAGE,
  },
  Decision_Cobertura_Etapas: { counter: "stages", ceiling: MAX_STAGES },
  Decision_Validacion: { counter: "validationIterations", ceiling: MAX_VALIDATION_CYCLES },
};

function isTopologyNodeId(id: string): id is TopologyNodeId {
  return Object.prototype.hasOwnProperty.call(ROADMAP_TOPOLOGY, id);
}

export function isDecisionId(id: string): id is DecisionId {
  return DECISION_IDS.some((decision) => decision === id);
}

export function isExecutorId(id: string): id is ExecutorId {
  return EXECUTOR_IDS.some((executor) => executor === id);
}

export function successorsOf(id: TopologyNodeId): TopologyNodeId[] {
  const entry = ROADMAP_TOPOLOGY[id];
  switch (entry.kind) {
    case "executor":
      return [entry.next];
    case "terminal":
      return [];
    case "decision":
      return [...new Set(Object.values(entry.routes))];
  }
}

export function reachableFrom(start: TopologyNodeId): Set<TopologyNodeId> {
  const seen = new Set<TopologyNodeId>([start]);
  const queue: TopologyNodeId[] = [start];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of successorsOf(current)) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
}

/**
 * True when every cycle passes through a guarded decision: removing the
 * guarded decisions must leave an acyclic graph.
 */
export function cyclesAreGuarded(): boolean {
  const guarded = new Set<string>(Object.keys(CYCLE_GUARDS));
  const visiting = new Set<TopologyNodeId>();
  const done = new Set<TopologyNodeId>();

  const hasCycle = (id: TopologyNodeId): boolean => {
    if (done.has(id)) return false;
    if (visiting.has(id)) return true;
    visiting.add(id);
    for (const next of successorsOf(id)) {
      if (!guarded.has(next) && hasCycle(next)) return true;
    }
    visiting.delete(id);
    done.add(id);
    return false;
  };

  return Object.keys(ROADMAP_TOPOLOGY)
    .filter(isTopologyNodeId)
    .filter((id) => !guarded.has(id))
    .every((id) => !hasCycle(id));
}

/**
 * Upper bound on executor steps in one run, derived from the ceilings.
 * Each structuring pass runs: the structurer, per stage one selection plus
 * up to MAX_BOOK_SEARCHES_PER_STAGE search/gate pairs plus gap detection,
 * one idle scan when no stage is left, validation and replanning.
 */
export function computeStepCeiling(): number {
  const passes = Math.min(MAX_VALIDATION_CYCLES, MAX_PLAN_REFINEMENTS + 1);
  const perStage = 1 + 2 * MAX_BOOK_SEARCHES_PER_STAGE + 1;
  const idleScan = 4;
  const perPass = 1 + MAX_STAGES * perStage + idleScan + 2;
  // two entry nodes before the first pass, one terminal after the last
  return 2 + passes * perPass + 1;
}
