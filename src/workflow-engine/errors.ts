// Workflow Engine - Error Types
// Registry, validation, state and run-time failures raised by the engine

import type { NodeRunRecord, StateSnapshot } from './types';

export class WorkflowEngineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WorkflowEngineError';
  }
}

// =========================================================================
// REGISTRY
// =========================================================================

export class DuplicateNodeError extends WorkflowEngineError {
  public readonly node: string;
  constructor(node: string) {
    super(`Node '${node}' is already registered`);
    this.name = 'DuplicateNodeError';
    this.node = node;
  }
}

export class UnknownNodeError extends WorkflowEngineError {
  public readonly node: string;
  constructor(node: string, referencedBy?: string) {
    super(
      referencedBy
        ? `Node '${referencedBy}' references unknown node '${node}'`
        : `Node '${node}' is not registered`
    );
    this.name = 'UnknownNodeError';
    this.node = node;
  }
}

export class ReservedNodeNameError extends WorkflowEngineError {
  public readonly node: string;
  constructor(node: string) {
    super(`'${node}' cannot be used as a node name`);
    this.name = 'ReservedNodeNameError';
    this.node = node;
  }
}

// =========================================================================
// VALIDATION
// =========================================================================

export class EntryNodeError extends WorkflowEngineError {
  constructor(message: string) {
    super(message);
    this.name = 'EntryNodeError';
  }
}

export class CycleError extends WorkflowEngineError {
  public readonly involvedNodes: string[];
  constructor(involvedNodes: string[]) {
    super(`Cycle detected: ${[...involvedNodes, involvedNodes[0]].join(' -> ')}`);
    this.name = 'CycleError';
    this.involvedNodes = involvedNodes;
  }
}

export class UnreachableTerminalError extends WorkflowEngineError {
  public readonly node: string;
  constructor(node: string, terminal: string) {
    super(`Node '${node}' has no path to '${terminal}'`);
    this.name = 'UnreachableTerminalError';
    this.node = node;
  }
}

export class UnreachableNodeError extends WorkflowEngineError {
  public readonly node: string;
  constructor(node: string, entry: string) {
    super(`Node '${node}' is not reachable from entry node '${entry}'`);
    this.name = 'UnreachableNodeError';
    this.node = node;
  }
}

export class FieldOwnershipConflictError extends WorkflowEngineError {
  public readonly field: string;
  public readonly nodes: string[];
  constructor(field: string, nodes: string[]) {
    super(`Field '${field}' is declared as output of several nodes: ${nodes.join(', ')}`);
    this.name = 'FieldOwnershipConflictError';
    this.field = field;
    this.nodes = nodes;
  }
}

export type GraphError =
  | UnknownNodeError
  | EntryNodeError
  | CycleError
  | UnreachableTerminalError
  | UnreachableNodeError
  | FieldOwnershipConflictError;

// =========================================================================
// STATE
// =========================================================================

export class StateValidationError extends WorkflowEngineError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'StateValidationError';
  }
}

export class MissingStateFieldError extends WorkflowEngineError {
  public readonly field: string;
  constructor(field: string, node?: string) {
    super(
      node
        ? `Node '${node}' requires state field '${field}' which is not set`
        : `State field '${field}' is not set`
    );
    this.name = 'MissingStateFieldError';
    this.field = field;
  }
}

export class UndeclaredFieldWriteError extends WorkflowEngineError {
  public readonly node: string;
  public readonly fields: string[];
  constructor(node: string, fields: string[]) {
    super(`Node '${node}' wrote undeclared field(s): ${fields.join(', ')}`);
    this.name = 'UndeclaredFieldWriteError';
    this.node = node;
    this.fields = fields;
  }
}

// =========================================================================
// RUN
// =========================================================================

export interface NodeFailure {
  node: string;
  error: unknown;
}

export class WorkflowRunError<S> extends WorkflowEngineError {
  public readonly runId: string;
  public readonly partialState: StateSnapshot<S>;
  public readonly nodes: Record<string, NodeRunRecord>;

  constructor(
    message: string,
    runId: string,
    partialState: StateSnapshot<S>,
    nodes: Record<string, NodeRunRecord>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'WorkflowRunError';
    this.runId = runId;
    this.partialState = partialState;
    this.nodes = nodes;
  }
}

export class WorkflowError<S> extends WorkflowRunError<S> {
  public readonly failedNode: string;
  public readonly failures: NodeFailure[];

  constructor(
    runId: string,
    failures: NodeFailure[],
    partialState: StateSnapshot<S>,
    nodes: Record<string, NodeRunRecord>
  ) {
    const [first] = failures;
    super(
      `Node '${first.node}' failed: ${describeError(first.error)}`,
      runId,
      partialState,
      nodes,
      { cause: first.error }
    );
    this.name = 'WorkflowError';
    this.failedNode = first.node;
    this.failures = failures;
  }
}

/**
 * The run was aborted or timed out. `failures` lists the nodes that failed
 * while in-flight work was winding down; the first one is the `cause`.
 */
export class WorkflowCancelledError<S> extends WorkflowRunError<S> {
  public readonly reason: string;
  public readonly failures: NodeFailure[];

  constructor(
    runId: string,
    reason: string,
    partialState: StateSnapshot<S>,
    nodes: Record<string, NodeRunRecord>,
    failures: NodeFailure[] = []
  ) {
    super(
      `Run ${runId} cancelled: ${reason}`,
      runId,
      partialState,
      nodes,
      failures.length > 0 ? { cause: failures[0].error } : undefined
    );
    this.name = 'WorkflowCancelledError';
    this.reason = reason;
    this.failures = failures;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
