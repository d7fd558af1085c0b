/**
 * Read-only graph export.
 *
 * Produces a JSON description of a flow's steps and edges and a Mermaid
 * rendering of it, optionally annotated with the statuses of one execution.
 * Nothing here runs or validates a flow: an unknown dependency is exported
 * as an edge from a name that has no node.
 */

import { FlowResult, StepStatus } from '../domain/flow-result';

/** The parts of a step definition the export reads. */
export interface ExportableStep {
  name: string;
  requires?: readonly string[];
  description?: string;
}

export interface ExportedNode {
  name: string;
  requires: string[];
  dependents: string[];
  description?: string;
}

export interface ExportedEdge {
  /** The dependency. */
  from: string;
  /** The step that requires it. */
  to: string;
}

export interface ExportedGraph {
  name: string;
  nodes: ExportedNode[];
  edges: ExportedEdge[];
}

/** Export a flow's steps (insertion order) and dependency edges. */
export function exportFlowGraph(
  name: string,
  steps: readonly ExportableStep[],
): ExportedGraph {
  const dependents = new Map<string, string[]>();
  const edges: ExportedEdge[] = [];

  for (const step of steps) {
    for (const dep of new Set(step.requires ?? [])) {
      edges.push({ from: dep, to: step.name });
      const list = dependents.get(dep) ?? [];
      list.push(step.name);
      dependents.set(dep, list);
    }
  }

  const nodes = steps.map((step) => ({
    name: step.name,
    requires: [...new Set(step.requires ?? [])],
    dependents: dependents.get(step.name) ?? [],
    ...(step.description ? { description: step.description } : {}),
  }));

  return { name, nodes, edges };
}

const STATUS_CLASSES: Record<StepStatus, string> = {
  [StepStatus.Pending]: 'pending',
  [StepStatus.Ready]: 'pending',
  [StepStatus.Running]: 'running',
  [StepStatus.Completed]: 'completed',
  [StepStatus.Failed]: 'failed',
  [StepStatus.Recovered]: 'recovered',
  [StepStatus.Skipped]: 'skipped',
};

const CLASS_DEFS: Record<string, string> = {
  completed: 'fill:#d4edda,stroke:#28a745',
  failed: 'fill:#f8d7da,stroke:#dc3545',
  recovered: 'fill:#fff3cd,stroke:#ffc107',
  skipped: 'fill:#e2e3e5,stroke:#6c757d',
};

/**
 * Render a graph as Mermaid `graph TD` source.
 *
 * Node ids are `n0`, `n1`, ... in node order (names that only appear in
 * edges come last); labels carry the step name, and the status when a
 * result is given.
 */
export function toMermaid(graph: ExportedGraph, result?: FlowResult): string {
  const ids = new Map<string, string>();
  const lines = ['graph TD'];
  const idFor = (name: string, label: string = name): string => {
    let id = ids.get(name);
    if (!id) {
      id = `n${ids.size}`;
      ids.set(name, id);
      lines.push(`  ${id}["${escapeLabel(label)}"]`);
    }
    return id;
  };

  for (const node of graph.nodes) {
    const status = result?.statuses[node.name];
    idFor(node.name, status ? `${node.name} (${status})` : node.name);
  }
  for (const edge of graph.edges) {
    const from = idFor(edge.from);
    const to = idFor(edge.to);
    lines.push(`  ${from} --> ${to}`);
  }

  if (result) {
    const used = new Set<string>();
    for (const node of graph.nodes) {
      const status = result.statuses[node.name];
      if (!status) continue;
      const cls = STATUS_CLASSES[status];
      if (!CLASS_DEFS[cls]) continue;
      used.add(cls);
      lines.push(`  class ${idFor(node.name)} ${cls}`);
    }
    for (const cls of used) {
      lines.push(`  classDef ${cls} ${CLASS_DEFS[cls]}`);
    }
  }

  return lines.join('\n');
}

function escapeLabel(label: string): string {
  return label.replace(/"/g, '#quot;');
}
