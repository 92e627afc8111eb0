import debug from "debug";
import graphlib, { type Graph as DependencyGraph } from "graphlib";
import type { TaskDefinition } from "../types";
import {
  CyclicDependencyError,
  DuplicateTaskError,
  UnknownDependencyError,
  UnknownTaskError,
} from "./errors";

const { Graph } = graphlib;

const log = debug("readyrun:graph");

type VisitMark = "visiting" | "done";

/**
 * Immutable dependency graph of task definitions.
 *
 * Edges go from a dependent to its dependency, so graph successors are a
 * task's dependencies and predecessors are its dependents.
 */
export class TaskGraph {
  private readonly graph: DependencyGraph;
  private readonly order: readonly string[];

  private constructor(graph: DependencyGraph, order: readonly string[]) {
    this.graph = graph;
    this.order = order;
  }

  /**
   * Validate definitions and build the graph. Throws a `GraphError` on a
   * duplicate name, an unknown dependency or a cycle, checked in that order.
   */
  static build(definitions: readonly TaskDefinition[]): TaskGraph {
    log("=== Starting graph build ===");
    const graph = new Graph({ directed: true });
    const order: string[] = [];

    for (const definition of definitions) {
      if (graph.hasNode(definition.name)) {
        throw new DuplicateTaskError(definition.name);
      }
      graph.setNode(definition.name, Object.freeze({
        ...definition,
        dependsOn: Object.freeze([...new Set(definition.dependsOn)]),
      }));
      order.push(definition.name);
    }

    for (const definition of definitions) {
      for (const dep of definition.dependsOn) {
        if (!graph.hasNode(dep)) {
          throw new UnknownDependencyError(definition.name, dep);
        }
        log(`Adding edge from ${definition.name} to ${dep}`);
        graph.setEdge(definition.name, dep);
      }
    }

    const cycle = findCycle(graph, order);
    if (cycle) {
      throw new CyclicDependencyError(cycle);
    }

    log("Nodes:", order);
    log("Edges:", graph.edges());
    log("=== End graph build ===");
    return new TaskGraph(graph, Object.freeze(order));
  }

  names(): string[] {
    return [...this.order];
  }

  has(name: string): boolean {
    return this.graph.hasNode(name);
  }

  get(name: string): TaskDefinition {
    const definition: unknown = this.graph.node(name);
    if (!isDefinition(definition)) {
      throw new UnknownTaskError(name);
    }
    return definition;
  }

  dependenciesOf(name: string): string[] {
    return this.get(name).dependsOn.slice();
  }

  dependentsOf(name: string): string[] {
    this.get(name);
    const predecessors = this.graph.predecessors(name);
    const dependents = new Set(Array.isArray(predecessors) ? predecessors : []);
    return this.order.filter((candidate) => dependents.has(candidate));
  }
}

function isDefinition(value: unknown): value is TaskDefinition {
  return typeof value === "object" && value !== null && "command" in value;
}

/**
 * Depth-first search with a "visiting" mark. Returns the first cycle found as
 * a path whose first task is repeated at the end.
 */
function findCycle(
  graph: DependencyGraph,
  order: readonly string[]
): string[] | undefined {
  const marks = new Map<string, VisitMark>();
  const path: string[] = [];

  const visit = (name: string): string[] | undefined => {
    const mark = marks.get(name);
    if (mark === "done") {
      return undefined;
    }
    if (mark === "visiting") {
      return [...path.slice(path.indexOf(name)), name];
    }

    marks.set(name, "visiting");
    path.push(name);
    const definition: unknown = graph.node(name);
    const deps = isDefinition(definition) ? definition.dependsOn : [];
    for (const dep of deps) {
      const cycle = visit(dep);
      if (cycle) {
        return cycle;
      }
    }
    path.pop();
    marks.set(name, "done");
    return undefined;
  };

  for (const name of order) {
    const cycle = visit(name);
    if (cycle) {
      log("Cycle found:", cycle);
      return cycle;
    }
  }
  return undefined;
}
