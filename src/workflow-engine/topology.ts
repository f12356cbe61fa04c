// Workflow Engine - Graph Topology
// Predecessor/successor maps derived from declared dependencies and edges

import type { GraphDefinition } from './types';

export interface Topology {
  /** node -> distinct nodes it waits for (the terminal marker included as a key) */
  predecessors: Map<string, Set<string>>;
  /** node -> distinct nodes waiting for it */
  successors: Map<string, Set<string>>;
}

export function buildTopology<S>(graph: GraphDefinition<S>): Topology {
  const predecessors = new Map<string, Set<string>>();
  const successors = new Map<string, Set<string>>();

  const ensure = (map: Map<string, Set<string>>, key: string): Set<string> => {
    let set = map.get(key);
    if (!set) {
      set = new Set<string>();
      map.set(key, set);
    }
    return set;
  };

  const link = (from: string, to: string): void => {
    ensure(successors, from).add(to);
    ensure(predecessors, to).add(from);
  };

  ensure(predecessors, graph.terminal);
  ensure(successors, graph.terminal);

  for (const node of graph.nodes.values()) {
    ensure(predecessors, node.name);
    ensure(successors, node.name);
    for (const dependency of node.dependsOn) {
      link(dependency, node.name);
    }
  }

  for (const edge of graph.edges) {
    link(edge.from, edge.to);
  }

  return { predecessors, successors };
}
