// Workflow engine module index

export * from './types';
export * from './errors';
export { StateStore, requireField } from './state-store';
export { NodeRegistry, NodeRegistryOptions } from './node-registry';
export { validateGraph, assertValidGraph, ValidationOptions, ValidationResult } from './graph-validator';
export {
  runWorkflow,
  CompiledWorkflow,
  RunResult,
  RunSuccess,
  RunFailure,
  WorkflowRunOptions,
} from './executor';
