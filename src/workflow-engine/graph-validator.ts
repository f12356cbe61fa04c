// Workflow Engine - Graph Validator
// Structural checks run once per graph before any execution

import {
  CycleError,
  EntryNodeError,
  FieldOwnershipConflictError,
  GraphError,
  UnknownNodeError,
  UnreachableNodeError,
  UnreachableTerminalError,
} from './errors';
import { buildTopology, Topology } from './topology';
import type { GraphDefinition } from './types';

export interface ValidationOptions {
  /** Reject graphs where two nodes declare the same output field (default true) */
  checkFieldOwnership?: boolean;
}

export type ValidationResult = { ok: true } | { ok: false; error: GraphError };

const cache = new WeakMap<object, Map<boolean, ValidationResult>>();
const sealedGraphs = new WeakSet<object>();

/**
 * Mark a graph whose nodes and edges can no longer change, so its validation
 * result may be cached. Only `NodeRegistry.toGraph()` output qualifies.
 */
export function sealGraph<G extends object>(graph: G): G {
  sealedGraphs.add(graph);
  return graph;
}

/**
 * Validate a graph. Pure; the result for an unchanged graph is always the same.
 * Results are cached for sealed graphs only: a hand-built definition may still
 * have its node map mutated and is checked again on every call.
 */
export function validateGraph<S>(
  graph: GraphDefinition<S>,
  options: ValidationOptions = {}
): ValidationResult {
  const checkFieldOwnership = options.checkFieldOwnership ?? true;

  if (!sealedGraphs.has(graph)) {
    return toResult(findGraphError(graph, checkFieldOwnership));
  }

  let byOptions = cache.get(graph);
  if (!byOptions) {
    byOptions = new Map<boolean, ValidationResult>();
    cache.set(graph, byOptions);
  }

  const cached = byOptions.get(checkFieldOwnership);
  if (cached) return cached;

  const result = toResult(findGraphError(graph, checkFieldOwnership));
  byOptions.set(checkFieldOwnership, result);
  return result;
}

function toResult(error: GraphError | null): ValidationResult {
  return error ? { ok: false, error } : { ok: true };
}

export function assertValidGraph<S>(graph: GraphDefinition<S>, options?: ValidationOptions): void {
  const result = validateGraph(graph, options);
  if (!result.ok) {
    throw result.error;
  }
}

function findGraphError<S>(graph: GraphDefinition<S>, checkFieldOwnership: boolean): GraphError | null {
  for (const node of graph.nodes.values()) {
    for (const dependency of node.dependsOn) {
      if (!graph.nodes.has(dependency)) {
        return new UnknownNodeError(dependency, node.name);
      }
    }
  }

  if (graph.entry === null) {
    return new EntryNodeError('Entry node is not set');
  }
  if (!graph.nodes.has(graph.entry)) {
    return new UnknownNodeError(graph.entry);
  }

  const topology = buildTopology(graph);

  const cycle = findCycle(graph, topology);
  if (cycle) {
    return new CycleError(cycle);
  }

  const reachesTerminal = reachable(graph.terminal, topology.predecessors);
  for (const name of graph.nodes.keys()) {
    if (!reachesTerminal.has(name)) {
      return new UnreachableTerminalError(name, graph.terminal);
    }
  }

  const entryDependencies = topology.predecessors.get(graph.entry);
  if (entryDependencies && entryDependencies.size > 0) {
    return new EntryNodeError(
      `Entry node '${graph.entry}' must not depend on other nodes (depends on ${[...entryDependencies].join(', ')})`
    );
  }

  const fromEntry = reachable(graph.entry, topology.successors);
  for (const name of graph.nodes.keys()) {
    if (!fromEntry.has(name)) {
      return new UnreachableNodeError(name, graph.entry);
    }
  }

  if (checkFieldOwnership) {
    const owners = new Map<string, string[]>();
    for (const node of graph.nodes.values()) {
      for (const field of node.writes ?? []) {
        const list = owners.get(field) ?? [];
        list.push(node.name);
        owners.set(field, list);
      }
    }
    for (const [field, nodes] of owners) {
      if (nodes.length > 1) {
        return new FieldOwnershipConflictError(field, nodes);
      }
    }
  }

  return null;
}

/**
 * Depth-first search keeping the current path; a successor already on the path
 * closes a cycle. Returns the cycle in traversal order.
 */
function findCycle<S>(graph: GraphDefinition<S>, topology: Topology): string[] | null {
  const visited = new Set<string>();
  const path: string[] = [];
  const onPath = new Set<string>();

  const visit = (name: string): string[] | null => {
    visited.add(name);
    path.push(name);
    onPath.add(name);

    for (const next of topology.successors.get(name) ?? []) {
      if (next === graph.terminal) continue;
      if (onPath.has(next)) {
        return path.slice(path.indexOf(next));
      }
      if (!visited.has(next)) {
        const cycle = visit(next);
        if (cycle) return cycle;
      }
    }

    path.pop();
    onPath.delete(name);
    return null;
  };

  for (const name of graph.nodes.keys()) {
    if (!visited.has(name)) {
      const cycle = visit(name);
      if (cycle) return cycle;
    }
  }
  return null;
}

function reachable(start: string, neighbours: Map<string, Set<string>>): Set<string> {
  const seen = new Set<string>([start]);
  const queue = [start];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of neighbours.get(current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
}
