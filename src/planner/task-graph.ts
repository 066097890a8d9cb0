import { GraphError } from "../errors.js";
import type { TaskGraph, TaskSpec } from "./types.js";

/** Create a task graph, trimming dependency names, and validate it. */
export function createTaskGraph(tasks: TaskSpec[]): TaskGraph {
  const graph: TaskGraph = {
    nodes: tasks.map((t) => ({
      name: t.name,
      dependsOn: t.dependsOn.map((d) => d.trim()).filter((d) => d.length > 0),
    })),
  };
  validate(graph);
  return graph;
}

/** Validate a task graph: check for unknown deps, self-deps and cycles. */
export function validate(graph: TaskGraph): void {
  const names = new Set(graph.nodes.map((n) => n.name));

  for (const node of graph.nodes) {
    for (const dep of node.dependsOn) {
      if (dep === node.name) {
        throw new GraphError("SELF_DEPENDENCY", `Task "${node.name}" depends on itself`);
      }
      if (!names.has(dep)) {
        throw new GraphError("UNKNOWN_DEPENDENCY", `Task "${node.name}" depends on unknown task "${dep}"`);
      }
    }
  }

  const cycle = findCycle(graph);
  if (cycle) {
    throw new GraphError("DEPENDENCY_CYCLE", `Task dependencies contain a cycle: ${cycle.join(" -> ")}`);
  }
}

/** Detect a cycle using DFS with coloring; returns the path that closes it. */
function findCycle(graph: TaskGraph): string[] | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const node of graph.nodes) color.set(node.name, WHITE);

  const nodeMap = new Map(graph.nodes.map((n) => [n.name, n]));
  const path: string[] = [];

  function dfs(name: string): string[] | undefined {
    color.set(name, GRAY);
    path.push(name);
    for (const dep of nodeMap.get(name)?.dependsOn ?? []) {
      const c = color.get(dep);
      if (c === GRAY) return [...path.slice(path.indexOf(dep)), dep];
      if (c === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    path.pop();
    color.set(name, BLACK);
    return undefined;
  }

  for (const node of graph.nodes) {
    if (color.get(node.name) === WHITE) {
      const found = dfs(node.name);
      if (found) return found;
    }
  }
  return undefined;
}

/**
 * Return task names in topological order (dependencies first). Independent
 * tasks keep their discovery order.
 */
export function topologicalSort(graph: TaskGraph): string[] {
  const nodeMap = new Map(graph.nodes.map((n) => [n.name, n]));
  const visited = new Set<string>();
  const visiting = new Set<string>();
  const sorted: string[] = [];

  function visit(name: string): void {
    if (visited.has(name)) return;
    if (visiting.has(name)) {
      throw new GraphError("DEPENDENCY_CYCLE", `Task dependencies contain a cycle through "${name}"`);
    }
    const node = nodeMap.get(name);
    if (!node) {
      throw new GraphError("UNKNOWN_DEPENDENCY", `Unknown task "${name}"`);
    }
    visiting.add(name);
    for (const dep of node.dependsOn) {
      visit(dep);
    }
    visiting.delete(name);
    visited.add(name);
    sorted.push(name);
  }

  for (const node of graph.nodes) {
    visit(node.name);
  }

  return sorted;
}

/** Build, validate and order a set of tasks in one step. */
export function resolveOrder(tasks: TaskSpec[]): string[] {
  return topologicalSort(createTaskGraph(tasks));
}
