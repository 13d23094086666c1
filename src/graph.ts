import { GraphError } from "./errors";
import type { ServiceConfig } from "./types";

export interface ServiceGraph {
  readonly services: ReadonlyMap<string, ServiceConfig>;
  /** Dependency-first order; ties keep declaration order but callers must not rely on it. */
  readonly order: readonly string[];
  readonly dependents: ReadonlyMap<string, readonly string[]>;
}

const topologicalOrder = (
  specs: readonly ServiceConfig[],
  dependents: ReadonlyMap<string, readonly string[]>,
): string[] => {
  const inDegree = new Map<string, number>();
  for (const spec of specs) {
    inDegree.set(spec.name, new Set(spec.depends_on).size);
  }

  const queue = specs.filter((spec) => inDegree.get(spec.name) === 0).map((spec) => spec.name);
  const order: string[] = [];

  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined) break;
    order.push(name);
    for (const dependent of dependents.get(name) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) queue.push(dependent);
    }
  }

  if (order.length < specs.length) {
    const visited = new Set(order);
    const leftover = specs.map((spec) => spec.name).filter((name) => !visited.has(name));
    throw new GraphError(
      "CycleDetected",
      `Dependency cycle between services: ${leftover.join(", ")}`,
      leftover,
    );
  }
  return order;
};

export const buildGraph = (specs: readonly ServiceConfig[]): ServiceGraph => {
  const services = new Map<string, ServiceConfig>();
  for (const spec of specs) {
    if (services.has(spec.name)) {
      throw new GraphError("DuplicateName", `Duplicate service name: ${spec.name}`, [spec.name]);
    }
    services.set(spec.name, spec);
  }

  const dependents = new Map<string, string[]>(specs.map((spec) => [spec.name, []]));
  for (const spec of specs) {
    for (const dependency of new Set(spec.depends_on)) {
      const edges = dependents.get(dependency);
      if (!edges) {
        throw new GraphError(
          "UnknownDependency",
          `Service ${spec.name} depends on unknown service ${dependency}`,
          [spec.name, dependency],
        );
      }
      edges.push(spec.name);
    }
  }

  return {
    services,
    order: topologicalOrder(specs, dependents),
    dependents,
  };
};

/** Narrows a graph to the named services plus everything they transitively depend on. */
export const selectServices = (graph: ServiceGraph, names: readonly string[]): ServiceGraph => {
  if (names.length === 0) return graph;

  const selected = new Set<string>();
  const visit = (name: string) => {
    if (selected.has(name)) return;
    const spec = graph.services.get(name);
    if (!spec) {
      throw new GraphError("UnknownService", `No such service: ${name}`, [name]);
    }
    selected.add(name);
    spec.depends_on.forEach(visit);
  };
  names.forEach(visit);

  const specs = [...graph.services.values()].filter((spec) => selected.has(spec.name));
  return buildGraph(specs);
};

export const serviceList = (graph: ServiceGraph): ServiceConfig[] => [...graph.services.values()];
