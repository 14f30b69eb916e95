/**
 * Workflow Store
 *
 * Holds the in-memory workflow graph and the primitives that mutate it.
 *
 * Every mutation is a single synchronous step, so a snapshot taken from
 * any other call site always sees either the whole update or none of it.
 * Snapshots are deep copies: the engine never receives the live graph.
 */

import { readFile } from 'node:fs/promises';
import { debugLog } from '../../debug.ts';
import { WorkflowError } from './errors.ts';
import { WorkflowGraphSchema, formatIssues } from './schema.ts';
import type {
  FieldUpdate,
  GraphSnapshot,
  InputValue,
  WorkflowGraph,
  WorkflowNode,
} from './types.ts';

export class WorkflowStore {
  private graph: WorkflowGraph | null = null;

  /**
   * Replace the held graph wholesale.
   * @throws WorkflowError LOAD_ERROR if the input is not a node mapping
   */
  load(graph: unknown, source = 'memory'): void {
    const result = WorkflowGraphSchema.safeParse(graph);
    if (!result.success) {
      throw WorkflowError.loadError(formatIssues(result.error));
    }

    // zod returns fresh objects, so the caller's value is never aliased
    this.graph = result.data;
    debugLog(`[WorkflowStore] Loaded ${this.nodeCount()} nodes from ${source}`);
  }

  /**
   * Read a JSON workflow file and load it.
   */
  async loadFromFile(path: string): Promise<void> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw WorkflowError.loadError(
        `cannot read ${path}`,
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw WorkflowError.loadError(
        `${path} contains invalid JSON`,
        error instanceof Error ? error : undefined
      );
    }

    this.load(parsed, path);
  }

  isLoaded(): boolean {
    return this.graph !== null;
  }

  nodeCount(): number {
    return this.graph ? Object.keys(this.graph).length : 0;
  }

  /**
   * Look up a node. Returns a frozen copy, or null if absent.
   */
  getNode(nodeId: string): Readonly<WorkflowNode> | null {
    const node = this.findNode(nodeId);
    return node ? deepFreeze(structuredClone(node)) : null;
  }

  hasNode(nodeId: string): boolean {
    return this.findNode(nodeId) !== null;
  }

  /**
   * Capability check: does the node's input schema contain `field`.
   */
  hasField(nodeId: string, field: string): boolean {
    const node = this.findNode(nodeId);
    return node !== null && Object.hasOwn(node.inputs, field);
  }

  /**
   * Set an existing input field.
   *
   * @returns The update, including the value it replaced
   * @throws WorkflowError NODE_NOT_FOUND or FIELD_NOT_ACCEPTED; the graph
   *   is left untouched in both cases
   */
  setField(nodeId: string, field: string, value: InputValue): FieldUpdate {
    const node = this.findNode(nodeId);
    if (!node) {
      throw WorkflowError.nodeNotFound(nodeId);
    }
    if (!Object.hasOwn(node.inputs, field)) {
      throw WorkflowError.fieldNotAccepted(nodeId, field, node.class_type);
    }

    const previous = node.inputs[field] ?? null;
    node.inputs[field] = structuredClone(value);
    debugLog(`[WorkflowStore] Node ${nodeId}.${field} updated`);

    return { nodeId, field, previous, value };
  }

  /**
   * Deep, frozen copy of the current graph for submission.
   * @throws WorkflowError LOAD_ERROR if no graph is loaded
   */
  snapshot(): GraphSnapshot {
    if (!this.graph) {
      throw WorkflowError.loadError('no workflow loaded');
    }
    return deepFreeze(structuredClone(this.graph));
  }

  private findNode(nodeId: string): WorkflowNode | null {
    if (!this.graph || !Object.hasOwn(this.graph, nodeId)) {
      return null;
    }
    return this.graph[nodeId] ?? null;
  }
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
