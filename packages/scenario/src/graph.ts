/**
 * @brickplan/scenario — Dependency graph and execution order.
 *
 * An instrument depends on the instruments its links name, when they are
 * part of the execution set. Order is Kahn's algorithm with sorted seeds
 * and sorted dependents, so identical input always gives the same order.
 */

import type { Instrument } from "@brickplan/types";
import type { Logger } from "pino";

function linkTargets(instrument: Instrument): string[] {
  const targets: string[] = [];
  const principal = instrument.links?.principal;
  if (principal?.fromProperty !== undefined) targets.push(principal.fromProperty);
  if (principal?.remainingOf !== undefined) targets.push(principal.remainingOf);
  if (instrument.links?.start !== undefined) targets.push(instrument.links.start.onEndOf);
  return targets;
}

/**
 * id → sorted ids it depends on, restricted to the execution set.
 */
export function buildDependencyGraph(instruments: readonly Instrument[]): Map<string, readonly string[]> {
  const members = new Set(instruments.map((i) => i.id));
  const graph = new Map<string, readonly string[]>();
  for (const instrument of instruments) {
    const deps = new Set(
      linkTargets(instrument).filter((target) => target !== instrument.id && members.has(target)),
    );
    graph.set(instrument.id, [...deps].sort());
  }
  return graph;
}

export interface TopologicalOrder {
  readonly order: readonly string[];
  /** True when a cycle forced the plain id-sort fallback. */
  readonly cyclic: boolean;
}

export function topologicalOrder(
  graph: ReadonlyMap<string, readonly string[]>,
  logger?: Logger,
): TopologicalOrder {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const [id, deps] of graph) {
    inDegree.set(id, deps.length);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(id);
      dependents.set(dep, list);
    }
  }

  const queue = [...graph.keys()].filter((id) => inDegree.get(id) === 0).sort();
  const order: string[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    order.push(id);
    for (const dependent of [...(dependents.get(id) ?? [])].sort()) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) queue.push(dependent);
    }
  }

  if (order.length < graph.size) {
    const fallback = [...graph.keys()].sort();
    logger?.warn(
      { unresolved: fallback.filter((id) => !order.includes(id)) },
      "Cyclic instrument dependencies; falling back to id order",
    );
    return { order: fallback, cyclic: true };
  }

  return { order, cyclic: false };
}
