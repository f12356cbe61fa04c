// Workflow Engine - Scheduler/Executor
// Drives a validated graph to completion, running independent branches concurrently

import { v4 as uuidv4 } from 'uuid';
import logger from '../shared/logger';
import {
  MissingStateFieldError,
  NodeFailure,
  UndeclaredFieldWriteError,
  WorkflowCancelledError,
  WorkflowEngineError,
  WorkflowError,
  WorkflowRunError,
  describeError,
} from './errors';
import { assertValidGraph, ValidationOptions } from './graph-validator';
import { StateStore } from './state-store';
import { buildTopology, Topology } from './topology';
import type {
  GraphDefinition,
  NodeDefinition,
  NodeRunRecord,
  NodeStatus,
  RunOptions,
  StateDelta,
  StateSnapshot,
} from './types';

export interface RunSuccess<S> {
  ok: true;
  runId: string;
  state: StateSnapshot<S>;
  nodes: Record<string, NodeRunRecord>;
}

export interface RunFailure<S> {
  ok: false;
  runId: string;
  error: WorkflowRunError<S>;
  nodes: Record<string, NodeRunRecord>;
}

export type RunResult<S> = RunSuccess<S> | RunFailure<S>;

export type WorkflowRunOptions = RunOptions & ValidationOptions;

/**
 * Run a graph against a fresh state store seeded with `initialState`.
 *
 * Graph errors and an invalid seed are thrown before any node starts.
 * Node failures and cancellation are returned as a failed result carrying
 * the state merged so far.
 */
export async function runWorkflow<S>(
  graph: GraphDefinition<S>,
  initialState: StateDelta<S>,
  options: WorkflowRunOptions = {}
): Promise<RunResult<S>> {
  assertValidGraph(graph, options);
  const run = new WorkflowRun(graph, initialState, options);
  return run.execute();
}

/**
 * A validated graph bound to the executor.
 */
export class CompiledWorkflow<S> {
  constructor(
    public readonly graph: GraphDefinition<S>,
    private readonly validation: ValidationOptions = {}
  ) {}

  run(initialState: StateDelta<S>, options: RunOptions = {}): Promise<RunResult<S>> {
    return runWorkflow(this.graph, initialState, { ...options, ...this.validation });
  }

  /**
   * Like `run`, but resolves to the final state and rejects with the
   * WorkflowError / WorkflowCancelledError on failure.
   */
  async invoke(initialState: StateDelta<S>, options: RunOptions = {}): Promise<StateSnapshot<S>> {
    const result = await this.run(initialState, options);
    if (!result.ok) {
      throw result.error;
    }
    return result.state;
  }
}

class WorkflowRun<S> {
  private readonly runId: string;
  private readonly store: StateStore<S>;
  private readonly topology: Topology;
  private readonly pendingDependencies = new Map<string, number>();
  private readonly ancestors = new Map<string, Set<string>>();
  private readonly records: Record<string, NodeRunRecord> = {};
  private readonly ready: string[] = [];
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly failures: NodeFailure[] = [];
  private readonly controller = new AbortController();
  private readonly maxConcurrency: number;
  private cancelReason: string | null = null;
  /** Failures recorded before the run was cancelled */
  private failuresAtCancel = 0;

  constructor(
    private readonly graph: GraphDefinition<S>,
    initialState: StateDelta<S>,
    private readonly options: RunOptions
  ) {
    this.runId = options.runId ?? uuidv4();
    this.store = new StateStore<S>(initialState, graph.schema);
    this.topology = buildTopology(graph);
    this.maxConcurrency =
      options.maxConcurrency !== undefined && options.maxConcurrency > 0
        ? options.maxConcurrency
        : Number.POSITIVE_INFINITY;

    for (const name of graph.nodes.keys()) {
      this.pendingDependencies.set(name, this.topology.predecessors.get(name)?.size ?? 0);
      this.records[name] = { status: 'PENDING', startedAt: null, finishedAt: null, durationMs: null };
    }
  }

  async execute(): Promise<RunResult<S>> {
    const { signal, timeoutMs } = this.options;
    const onAbort = (): void => this.cancel(abortReason(signal));
    let timer: NodeJS.Timeout | null = null;

    if (signal?.aborted) {
      this.cancel(abortReason(signal));
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => this.cancel(`timed out after ${timeoutMs}ms`), timeoutMs);
    }

    logger.info(`[WorkflowExecutor] Run ${this.runId} started (${this.graph.nodes.size} nodes)`);
    const startedAt = Date.now();

    try {
      if (this.graph.entry !== null && this.cancelReason === null) {
        this.setStatus(this.graph.entry, 'READY');
        this.ready.push(this.graph.entry);
      }

      while (this.ready.length > 0 || this.inFlight.size > 0) {
        if (this.canLaunch()) {
          // Take the whole round first: a node failing synchronously must not hold back its siblings
          const batch = this.ready.splice(0, this.maxConcurrency - this.inFlight.size);
          for (const name of batch) {
            this.launch(name);
          }
        }
        if (this.inFlight.size === 0) break;
        await Promise.race(this.inFlight.values());
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (timer) clearTimeout(timer);
    }

    return this.finish(Date.now() - startedAt);
  }

  private canLaunch(): boolean {
    return (
      this.ready.length > 0 &&
      this.failures.length === 0 &&
      this.cancelReason === null &&
      this.inFlight.size < this.maxConcurrency
    );
  }

  private launch(name: string): void {
    const node = this.graph.nodes.get(name);
    if (!node) {
      throw new WorkflowEngineError(`Node '${name}' disappeared from the graph`);
    }

    this.setStatus(name, 'RUNNING');
    this.records[name].startedAt = new Date();
    logger.debug(`[WorkflowExecutor] Launching ${name}`);

    // Snapshot at launch: every dependency has already merged
    const task = this.runNode(node, this.store.snapshotOf(this.ancestorsOf(name))).finally(() => {
      this.inFlight.delete(name);
    });
    this.inFlight.set(name, task);
  }

  private async runNode(node: NodeDefinition<S>, snapshot: StateSnapshot<S>): Promise<void> {
    try {
      const missing = node.reads.find(field => snapshot[field] === undefined);
      if (missing !== undefined) {
        throw new MissingStateFieldError(missing, node.name);
      }

      const delta = await node.run(snapshot, {
        runId: this.runId,
        nodeName: node.name,
        signal: this.controller.signal,
      });

      this.checkWrites(node, delta);
      const version = this.store.merge(delta, node.name);

      this.complete(node.name, 'COMPLETED');
      logger.debug(`[WorkflowExecutor] ${node.name} completed (state v${version})`);
      this.release(node.name);
    } catch (error) {
      this.complete(node.name, 'FAILED');
      this.failures.push({ node: node.name, error });
      if (this.cancelReason !== null) {
        logger.warn(`[WorkflowExecutor] ${node.name} failed after cancellation: ${describeError(error)}`);
      } else {
        logger.error(`[WorkflowExecutor] ${node.name} failed: ${describeError(error)}`);
      }
    }
  }

  /** Transitive dependencies of a node, memoized per run */
  private ancestorsOf(name: string): Set<string> {
    const known = this.ancestors.get(name);
    if (known) return known;

    const result = new Set<string>();
    for (const parent of this.topology.predecessors.get(name) ?? []) {
      result.add(parent);
      for (const ancestor of this.ancestorsOf(parent)) {
        result.add(ancestor);
      }
    }
    this.ancestors.set(name, result);
    return result;
  }

  private checkWrites(node: NodeDefinition<S>, delta: StateDelta<S>): void {
    if (node.writes === null) return;
    const allowed = new Set<string>(node.writes);
    const undeclared = Object.keys(delta ?? {}).filter(field => !allowed.has(field));
    if (undeclared.length > 0) {
      throw new UndeclaredFieldWriteError(node.name, undeclared);
    }
  }

  /**
   * Unblock successors whose last pending dependency was `name`.
   * Once the run is failing or cancelled they stay PENDING.
   */
  private release(name: string): void {
    const halted = this.failures.length > 0 || this.cancelReason !== null;
    for (const next of this.topology.successors.get(name) ?? []) {
      if (next === this.graph.terminal) continue;

      const remaining = (this.pendingDependencies.get(next) ?? 0) - 1;
      this.pendingDependencies.set(next, remaining);
      if (remaining === 0 && !halted) {
        this.setStatus(next, 'READY');
        this.ready.push(next);
      }
    }
  }

  private cancel(reason: string): void {
    if (this.cancelReason !== null) return;
    this.cancelReason = reason;
    this.failuresAtCancel = this.failures.length;
    this.controller.abort(reason);
    logger.warn(`[WorkflowExecutor] Run ${this.runId} cancelling: ${reason}`);
  }

  private terminalReached(): boolean {
    const predecessors = this.topology.predecessors.get(this.graph.terminal) ?? new Set<string>();
    for (const name of predecessors) {
      if (this.records[name]?.status !== 'COMPLETED') return false;
    }
    return true;
  }

  private finish(elapsedMs: number): RunResult<S> {
    const state = this.store.snapshot();
    const nodes = this.records;

    // Failures that follow a cancellation are reported with it, not instead of it
    const cancelledFirst = this.cancelReason !== null && this.failuresAtCancel === 0;

    if (this.failures.length > 0 && !cancelledFirst) {
      const error = new WorkflowError<S>(this.runId, this.failures, state, nodes);
      logger.error(`[WorkflowExecutor] Run ${this.runId} failed after ${elapsedMs}ms: ${error.message}`);
      return { ok: false, runId: this.runId, error, nodes };
    }

    if (this.failures.length === 0 && this.terminalReached()) {
      logger.info(`[WorkflowExecutor] Run ${this.runId} completed in ${elapsedMs}ms`);
      return { ok: true, runId: this.runId, state, nodes };
    }

    if (this.cancelReason !== null) {
      const error = new WorkflowCancelledError<S>(this.runId, this.cancelReason, state, nodes, this.failures);
      return { ok: false, runId: this.runId, error, nodes };
    }

    throw new WorkflowEngineError(`Run ${this.runId} stopped before reaching '${this.graph.terminal}'`);
  }

  private setStatus(name: string, status: NodeStatus): void {
    this.records[name].status = status;
  }

  private complete(name: string, status: NodeStatus): void {
    const record = this.records[name];
    record.status = status;
    record.finishedAt = new Date();
    record.durationMs = record.startedAt ? record.finishedAt.getTime() - record.startedAt.getTime() : null;
  }
}

function abortReason(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (reason === undefined) return 'aborted';
  return describeError(reason);
}
