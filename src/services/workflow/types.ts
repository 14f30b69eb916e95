/**
 * Workflow Service Types
 */

/**
 * Link to another node's output: `[sourceNodeId, outputIndex]`.
 */
export type NodeReference = [string, number];

/**
 * Value of a single node input.
 */
export type InputValue =
  | string
  | number
  | boolean
  | null
  | NodeReference
  | InputValue[]
  | { [key: string]: InputValue };

/**
 * One executable step of the graph, in the engine's API format.
 */
export interface WorkflowNode {
  class_type: string;
  inputs: Record<string, InputValue>;
  _meta?: { title?: string; [key: string]: unknown };
}

/**
 * Node id -> node.
 */
export type WorkflowGraph = Record<string, WorkflowNode>;

/**
 * Frozen copy of the graph taken for submission.
 */
export type GraphSnapshot = Readonly<Record<string, Readonly<WorkflowNode>>>;

/**
 * Role name -> node id.
 */
export type RoleMap = Record<string, string>;

/**
 * Configured node roles plus per-variant overrides.
 */
export interface NodeMapping {
  roles: RoleMap;
  variants: Record<string, RoleMap>;
}

/**
 * Outcome of a field update.
 */
export interface FieldUpdate {
  nodeId: string;
  field: string;
  previous: InputValue;
  value: InputValue;
}
