/**
 * Dependency graph.
 *
 * Built once per execution from the registered steps. Validates names and
 * references, rejects cycles, and precomputes the dependency counts and
 * reverse adjacency the scheduler uses to fan out completion events.
 */

import { StepDefinition } from '../domain/step';
import {
  TypedError,
  dependencyCycleError,
  duplicateStepError,
  unknownDependencyError,
} from '../domain/errors';

/** A step plus its resolved edges. */
export interface GraphNode<TAgent = unknown> {
  name: string;
  /** Insertion order within the flow. */
  index: number;
  step: StepDefinition<TAgent>;
  /** Distinct dependency names, in declaration order. */
  dependencies: string[];
  /** Steps that require this one, in insertion order. */
  dependents: string[];
  dependencyCount: number;
}

export interface DependencyGraph<TAgent = unknown> {
  nodes: Map<string, GraphNode<TAgent>>;
  /** Steps with no dependencies, in insertion order. */
  roots: string[];
  /** Deterministic topological order (readiness order, insertion tie-break). */
  order: string[];
}

/** Graph build result. */
export interface GraphBuildResult<TAgent = unknown> {
  success: boolean;
  graph?: DependencyGraph<TAgent>;
  errors: TypedError[];
}

/** Build and validate the dependency graph for a list of steps. */
export function buildDependencyGraph<TAgent>(
  steps: readonly StepDefinition<TAgent>[],
): GraphBuildResult<TAgent> {
  const errors: TypedError[] = [];
  const nodes = new Map<string, GraphNode<TAgent>>();

  // Phase 1: names
  for (const step of steps) {
    if (nodes.has(step.name)) {
      errors.push(duplicateStepError(step.name));
      continue;
    }
    nodes.set(step.name, {
      name: step.name,
      index: nodes.size,
      step,
      dependencies: [...new Set(step.requires ?? [])],
      dependents: [],
      dependencyCount: 0,
    });
  }

  // Phase 2: references
  const known = [...nodes.keys()];
  for (const node of nodes.values()) {
    for (const dep of node.dependencies) {
      if (!nodes.has(dep)) {
        errors.push(unknownDependencyError(node.name, dep, known));
      }
    }
  }

  // Phase 3: cycles (unknown references are ignored here; they are already reported)
  for (const cycle of detectCycles(nodes)) {
    errors.push(dependencyCycleError(cycle));
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }

  // Phase 4: counts and reverse adjacency
  for (const node of nodes.values()) {
    node.dependencyCount = node.dependencies.length;
    for (const dep of node.dependencies) {
      nodes.get(dep)?.dependents.push(node.name);
    }
  }

  const roots = [...nodes.values()]
    .filter((n) => n.dependencyCount === 0)
    .map((n) => n.name);

  return {
    success: true,
    graph: { nodes, roots, order: topologicalOrder(nodes, roots) },
    errors: [],
  };
}

/**
 * Depth-first cycle detection with recursion-stack marking.
 *
 * Steps are visited in insertion order and edges followed in declaration
 * order. Each back-edge yields the steps on the stack from the edge target
 * to the current step, in the order they were entered.
 */
function detectCycles<TAgent>(nodes: Map<string, GraphNode<TAgent>>): string[][] {
  const cycles: string[][] = [];
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const visit = (name: string): void => {
    visited.add(name);
    stack.push(name);
    onStack.add(name);

    for (const dep of nodes.get(name)?.dependencies ?? []) {
      if (!nodes.has(dep)) continue;
      if (onStack.has(dep)) {
        cycles.push(stack.slice(stack.indexOf(dep)));
      } else if (!visited.has(dep)) {
        visit(dep);
      }
    }

    stack.pop();
    onStack.delete(name);
  };

  for (const name of nodes.keys()) {
    if (!visited.has(name)) visit(name);
  }
  return cycles;
}

/** Kahn's algorithm; newly ready steps of one release are queued in insertion order. */
function topologicalOrder<TAgent>(nodes: Map<string, GraphNode<TAgent>>, roots: string[]): string[] {
  const remaining = new Map<string, number>();
  for (const node of nodes.values()) remaining.set(node.name, node.dependencyCount);

  const queue = [...roots];
  const order: string[] = [];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    order.push(current);

    for (const dependent of nodes.get(current)?.dependents ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) queue.push(dependent);
    }
  }
  return order;
}

/**
 * All transitive dependents of a step, breadth-first over reverse adjacency.
 * The step itself is not included.
 */
export function collectTransitiveDependents<TAgent>(
  graph: DependencyGraph<TAgent>,
  name: string,
): string[] {
  const seen = new Set<string>([name]);
  const result: string[] = [];
  const queue = [...(graph.nodes.get(name)?.dependents ?? [])];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    result.push(current);
    queue.push(...(graph.nodes.get(current)?.dependents ?? []));
  }
  return result;
}
