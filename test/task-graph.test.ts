import { describe, expect, it } from "vitest";
import { GraphError } from "../src/errors.js";
import { createTaskGraph, resolveOrder, topologicalSort, validate } from "../src/planner/task-graph.js";
import type { TaskGraph } from "../src/planner/types.js";

describe("createTaskGraph", () => {
  it("trims dependency names and drops empty ones", () => {
    const graph = createTaskGraph([
      { name: "a", dependsOn: [] },
      { name: "b", dependsOn: [" a ", ""] },
    ]);

    expect(graph.nodes).toEqual([
      { name: "a", dependsOn: [] },
      { name: "b", dependsOn: ["a"] },
    ]);
  });
});

describe("validate", () => {
  it("throws on unknown dependency", () => {
    const graph: TaskGraph = { nodes: [{ name: "a", dependsOn: ["nonexistent"] }] };
    expect(() => validate(graph)).toThrow('depends on unknown task "nonexistent"');
  });

  it("throws on self-dependency", () => {
    const graph: TaskGraph = { nodes: [{ name: "a", dependsOn: ["a"] }] };
    expect(() => validate(graph)).toThrow("depends on itself");
  });

  it("throws on cycle and names the path", () => {
    const graph: TaskGraph = {
      nodes: [
        { name: "a", dependsOn: ["b"] },
        { name: "b", dependsOn: ["a"] },
      ],
    };
    expect(() => validate(graph)).toThrow("Task dependencies contain a cycle: a -> b -> a");
  });

  it("reports errors with a code", () => {
    const graph: TaskGraph = {
      nodes: [
        { name: "a", dependsOn: ["c"] },
        { name: "b", dependsOn: ["a"] },
        { name: "c", dependsOn: ["b"] },
      ],
    };
    let caught: unknown;
    try {
      validate(graph);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GraphError);
    expect(caught).toMatchObject({
      code: "DEPENDENCY_CYCLE",
      message: "Task dependencies contain a cycle: a -> c -> b -> a",
    });
  });

  it("accepts a valid DAG", () => {
    const graph: TaskGraph = {
      nodes: [
        { name: "a", dependsOn: [] },
        { name: "b", dependsOn: ["a"] },
        { name: "c", dependsOn: ["a"] },
        { name: "d", dependsOn: ["b", "c"] },
      ],
    };
    expect(() => validate(graph)).not.toThrow();
  });
});

describe("topologicalSort", () => {
  it("returns tasks in dependency order", () => {
    const graph: TaskGraph = {
      nodes: [
        { name: "c", dependsOn: ["a", "b"] },
        { name: "a", dependsOn: [] },
        { name: "b", dependsOn: ["a"] },
      ],
    };

    const sorted = topologicalSort(graph);

    expect(sorted.indexOf("a")).toBeLessThan(sorted.indexOf("b"));
    expect(sorted.indexOf("a")).toBeLessThan(sorted.indexOf("c"));
    expect(sorted.indexOf("b")).toBeLessThan(sorted.indexOf("c"));
  });

  it("keeps discovery order for independent tasks", () => {
    const graph: TaskGraph = {
      nodes: [
        { name: "x", dependsOn: [] },
        { name: "m", dependsOn: [] },
        { name: "a", dependsOn: [] },
      ],
    };
    expect(topologicalSort(graph)).toEqual(["x", "m", "a"]);
  });

  it("fails closed on a cycle even without validation", () => {
    const graph: TaskGraph = {
      nodes: [
        { name: "a", dependsOn: ["b"] },
        { name: "b", dependsOn: ["a"] },
      ],
    };
    expect(() => topologicalSort(graph)).toThrow(GraphError);
  });
});

describe("resolveOrder", () => {
  it("puts a dependency before its dependent", () => {
    expect(
      resolveOrder([
        { name: "b", dependsOn: [] },
        { name: "a", dependsOn: ["b"] },
      ]),
    ).toEqual(["b", "a"]);
  });

  it("places every task exactly once after all of its dependencies", () => {
    const tasks = [
      { name: "deploy", dependsOn: ["build", "migrate"] },
      { name: "build", dependsOn: ["fetch"] },
      { name: "fetch", dependsOn: [] },
      { name: "migrate", dependsOn: ["fetch"] },
      { name: "report", dependsOn: [] },
    ];

    const order = resolveOrder(tasks);

    expect([...order].sort()).toEqual(["build", "deploy", "fetch", "migrate", "report"]);
    for (const task of tasks) {
      for (const dep of task.dependsOn) {
        expect(order.indexOf(dep)).toBeLessThan(order.indexOf(task.name));
      }
    }
  });

  it("rejects a cyclic set without producing an order", () => {
    expect(() =>
      resolveOrder([
        { name: "a", dependsOn: ["c"] },
        { name: "b", dependsOn: ["a"] },
        { name: "c", dependsOn: ["b"] },
      ]),
    ).toThrow("cycle");
  });
});
