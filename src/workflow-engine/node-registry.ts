// Workflow Engine - Node Registry
// Mutable bookkeeping of nodes, edges and the entry node; produces frozen graphs

import { DuplicateNodeError, ReservedNodeNameError, UnknownNodeError } from './errors';
import { assertValidGraph, sealGraph, ValidationOptions } from './graph-validator';
import { CompiledWorkflow } from './executor';
import {
  END,
  Edge,
  GraphDefinition,
  NodeContract,
  NodeDefinition,
  NodeFunction,
  StateSchema,
} from './types';

export interface NodeRegistryOptions<S> {
  /** Name of the terminal marker (defaults to END) */
  terminal?: string;
  schema?: StateSchema<S>;
}

/**
 * Collects nodes and dependency edges for one workflow.
 * Not safe to mutate while a run is in progress; take a graph with
 * `toGraph()` or `compile()` first.
 */
export class NodeRegistry<S> {
  private readonly nodes = new Map<string, NodeDefinition<S>>();
  private readonly edges: Edge[] = [];
  private entry: string | null = null;
  private readonly terminal: string;
  private readonly schema: StateSchema<S> | null;

  constructor(options: NodeRegistryOptions<S> = {}) {
    this.terminal = options.terminal ?? END;
    this.schema = options.schema ?? null;
  }

  register(
    name: string,
    fn: NodeFunction<S>,
    dependsOn: Iterable<string> = [],
    contract: NodeContract<S> = {}
  ): this {
    if (name.length === 0 || name === this.terminal) {
      throw new ReservedNodeNameError(name);
    }
    if (this.nodes.has(name)) {
      throw new DuplicateNodeError(name);
    }

    this.nodes.set(name, {
      name,
      run: fn,
      dependsOn: new Set(dependsOn),
      reads: [...(contract.reads ?? [])],
      writes: contract.writes ? [...contract.writes] : null,
    });
    return this;
  }

  addEdge(from: string, to: string): this {
    if (!this.nodes.has(from)) {
      throw new UnknownNodeError(from);
    }
    if (to !== this.terminal && !this.nodes.has(to)) {
      throw new UnknownNodeError(to);
    }
    if (!this.edges.some(edge => edge.from === from && edge.to === to)) {
      this.edges.push({ from, to });
    }
    return this;
  }

  setEntry(name: string): this {
    if (!this.nodes.has(name)) {
      throw new UnknownNodeError(name);
    }
    this.entry = name;
    return this;
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  get terminalMarker(): string {
    return this.terminal;
  }

  /**
   * Immutable snapshot of the current bookkeeping. Later registry mutations do
   * not affect a graph already taken.
   */
  toGraph(): GraphDefinition<S> {
    const nodes = new Map<string, NodeDefinition<S>>();
    for (const [name, node] of this.nodes) {
      nodes.set(
        name,
        Object.freeze({
          ...node,
          dependsOn: new Set(node.dependsOn),
          reads: Object.freeze([...node.reads]),
          writes: node.writes ? Object.freeze([...node.writes]) : null,
        })
      );
    }

    return sealGraph(Object.freeze({
      nodes,
      edges: Object.freeze(this.edges.map(edge => Object.freeze({ ...edge }))),
      entry: this.entry,
      terminal: this.terminal,
      schema: this.schema,
    }));
  }

  /**
   * Validate the current graph and bind it to an executor.
   * Throws the first GraphError found.
   */
  compile(options: ValidationOptions = {}): CompiledWorkflow<S> {
    const graph = this.toGraph();
    assertValidGraph(graph, options);
    return new CompiledWorkflow(graph, options);
  }
}
