/**
 * Shared node plumbing for the roadmap graph.
 *
 * Every executor declares the state fields it reads and writes. The graph
 * wrapper hands the executor a view limited to its reads, rejects updates
 * outside its writes, and checks the merged state before LangGraph applies
 * the update.
 */

import {
  InvariantViolationError,
  ManifestViolationError,
  RunBudgetExceededError,
} from "#roadmap/ai/error.js";
import {
  RoadmapStateType,
  RoadmapUpdate,
  StateKey,
  applyUpdate,
  checkStateInvariants,
  checkTransitionInvariants,
} from "#roadmap/ai/roadmap/roadmap-state.js";
import { createLogger } from "#roadmap/util/logging.js";
import type { DecisionId, ExecutorId } from "./topology.js";

const log = createLogger("RoadmapGraph");

export interface RoadmapNode<R extends StateKey = StateKey, W extends StateKey = StateKey> {
  name: ExecutorId;
  reads: readonly R[];
  writes: readonly W[];
  /** The node may reset knowledgeGaps and validationFeedback. */
  clearsHistory?: boolean;
  run: (input: Pick<RoadmapStateType, R>) => Promise<Partial<Pick<RoadmapStateType, W>>>;
}

export type AnyRoadmapNode = RoadmapNode<StateKey, StateKey>;

export function defineNode<R extends StateKey, W extends StateKey>(
  node: RoadmapNode<R, W>
): RoadmapNode<R, W> {
  return node;
}

/**
 * Observers and limits for one run.
 */
export interface RunHooks {
  /** Epoch milliseconds after which no further node may start. */
  deadline?: number;
  budgetMs?: number;
  onNodeComplete?: (name: ExecutorId, state: RoadmapStateType) => void;
  onDecision?: (name: DecisionId, label: string) => void;
}

function readOnlyView(node: AnyRoadmapNode, state: RoadmapStateType): RoadmapStateType {
  const readable = new Set<string>(node.reads);
  return new Proxy(state, {
    get(target, property, receiver) {
      if (typeof property === "string" && !readable.has(property)) {
        throw new ManifestViolationError(node.name, [property], "read");
      }
      return Reflect.get(target, property, receiver);
    },
    set(_target, property) {
      throw new ManifestViolationError(node.name, [String(property)], "write");
    },
  });
}

/**
 * Runs one executor against a full state and returns its checked update.
 * @throws ManifestViolationError when the node touches undeclared fields
 */
export async function runNode(
  node: AnyRoadmapNode,
  state: RoadmapStateType
): Promise<RoadmapUpdate> {
  const update = await node.run(readOnlyView(node, state));
  const writable = new Set<string>(node.writes);
  const undeclared = Object.keys(update).filter((key) => !writable.has(key));
  if (undeclared.length > 0) {
    throw new ManifestViolationError(node.name, undeclared, "write");
  }
  return update;
}

/**
 * Adapts an executor to a LangGraph node function.
 */
export function toGraphNode(node: AnyRoadmapNode, hooks: RunHooks = {}) {
  return async (state: RoadmapStateType): Promise<RoadmapUpdate> => {
    if (hooks.deadline !== undefined && Date.now() > hooks.deadline) {
      throw new RunBudgetExceededError(hooks.budgetMs ?? 0, node.name);
    }

    const started = Date.now();
    const update = await runNode(node, state);
    const merged = applyUpdate(state, update);

    const violations = [
      ...checkStateInvariants(merged),
      ...checkTransitionInvariants(state, merged, node.clearsHistory === true),
    ];
    if (violations.length > 0) {
      throw new InvariantViolationError(node.name, violations);
    }

    log.debug(`${node.name} finished in ${Date.now() - started}ms`, Object.keys(update));
    hooks.onNodeComplete?.(node.name, merged);
    return update;
  };
}

/**
 * Adapts a decision to a LangGraph path function that reports its label.
 */
export function toGraphRoute<L extends string>(
  name: DecisionId,
  decide: (state: RoadmapStateType) => L,
  hooks: RunHooks = {}
) {
  return (state: RoadmapStateType): L => {
    const label = decide(state);
    log.debug(`${name} → ${label}`);
    hooks.onDecision?.(name, label);
    return label;
  };
}
