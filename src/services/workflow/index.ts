/**
 * Workflow Service
 *
 * Holds the workflow graph, resolves node roles and serves the mutation
 * routes.
 */

// Types
export type {
  FieldUpdate,
  GraphSnapshot,
  InputValue,
  NodeMapping,
  NodeReference,
  RoleMap,
  WorkflowGraph,
  WorkflowNode,
} from './types.ts';

// Errors
export { WorkflowError, WorkflowErrorCode } from './errors.ts';

// Implementations
export { WorkflowStore } from './store.ts';
export { NodeMapper } from './node-mapper.ts';

// Adapter
export { WorkflowServiceAdapter } from './adapter.ts';
