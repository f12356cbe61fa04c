// Workflow Engine - Core Types
// Nodes, edges, graphs and run results shared by the registry, validator and executor

/** Default name of the terminal marker. Edges into it end a branch. */
export const END = '__end__';

/** Point-in-time view of the shared state handed to a node at launch. */
export type StateSnapshot<S> = Readonly<Partial<S>>;

/** Fields produced by one node. Merged into the store on completion. */
export type StateDelta<S> = Partial<S>;

export type StateField<S> = keyof S & string;

/**
 * Validates seeds and deltas before they reach the store.
 * Implementations return the parsed fields or throw.
 */
export interface StateSchema<S> {
  parse(fields: unknown): StateDelta<S>;
}

export interface NodeContext {
  runId: string;
  nodeName: string;
  /** Aborted when the run is cancelled or times out */
  signal: AbortSignal;
}

export type NodeFunction<S> = (
  state: StateSnapshot<S>,
  context: NodeContext
) => StateDelta<S> | Promise<StateDelta<S>>;

/**
 * Optional input/output contract of a node.
 * `reads` must be present before launch; `writes` bounds the delta.
 */
export interface NodeContract<S> {
  reads?: ReadonlyArray<StateField<S>>;
  writes?: ReadonlyArray<StateField<S>>;
}

export interface NodeDefinition<S> {
  readonly name: string;
  readonly run: NodeFunction<S>;
  readonly dependsOn: ReadonlySet<string>;
  readonly reads: ReadonlyArray<StateField<S>>;
  /** null when the node did not declare its outputs */
  readonly writes: ReadonlyArray<StateField<S>> | null;
}

export interface Edge {
  readonly from: string;
  readonly to: string;
}

export interface GraphDefinition<S> {
  readonly nodes: ReadonlyMap<string, NodeDefinition<S>>;
  readonly edges: ReadonlyArray<Edge>;
  readonly entry: string | null;
  readonly terminal: string;
  readonly schema: StateSchema<S> | null;
}

export type NodeStatus = 'PENDING' | 'READY' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface NodeRunRecord {
  status: NodeStatus;
  startedAt: Date | null;
  finishedAt: Date | null;
  durationMs: number | null;
}

export interface RunOptions {
  /** Upper bound on nodes running at once. Unlimited when omitted. */
  maxConcurrency?: number;
  signal?: AbortSignal;
  /** Cancels the run after this many milliseconds; ignored unless positive */
  timeoutMs?: number;
  runId?: string;
}
