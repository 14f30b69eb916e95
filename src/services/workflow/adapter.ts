/**
 * Workflow Service Adapter
 *
 * Maps the graph mutation routes to WorkflowStore and NodeMapper
 * operations:
 *
 * - update/text  -> resolve, findTextField(), setField()
 * - update/image -> resolve, setField(id, 'image', filename)
 *
 * Mutations are accepted while a job is in flight; that job keeps running
 * on the snapshot it was submitted with.
 */

import { debugLog } from '../../debug.ts';
import {
  UpdateImageParamsSchema,
  UpdateTextParamsSchema,
  validateParams,
} from '../../protocol/schemas.ts';
import {
  invalidRequest,
  type HandlerResult,
  type HttpMethod,
  type RelayRequest,
  type RouteAdapter,
} from '../../protocol/types.ts';
import type { NodeMapper } from './node-mapper.ts';
import type { WorkflowStore } from './store.ts';

export class WorkflowServiceAdapter implements RouteAdapter {
  readonly routes: Readonly<Record<string, HttpMethod>> = {
    'update/text': 'POST',
    'update/image': 'POST',
  };

  constructor(
    private readonly store: WorkflowStore,
    private readonly mapper: NodeMapper
  ) {}

  async handleRequest(request: RelayRequest): Promise<HandlerResult> {
    debugLog(`[WorkflowServiceAdapter] Handling request: ${request.route}`);

    switch (request.route) {
      case 'update/text':
        return this.handleUpdateText(request.params);
      case 'update/image':
        return this.handleUpdateImage(request.params);
      default:
        throw new Error(`WorkflowServiceAdapter cannot serve ${request.route}`);
    }
  }

  private handleUpdateText(params: unknown): HandlerResult {
    const validation = validateParams(UpdateTextParamsSchema, params);
    if (!validation.success) {
      return invalidRequest(validation.message);
    }
    const p = validation.data;

    const nodeId = this.mapper.resolve(p.node_id);
    const field = this.mapper.findTextField(nodeId, p.field);
    this.store.setField(nodeId, field, p.text);

    if (p.field && p.field !== field) {
      debugLog(`[WorkflowServiceAdapter] Node ${nodeId} has no '${p.field}', used '${field}'`);
    }

    return {
      result: {
        STATUS: `Updated text in node ${nodeId} successfully`,
        node_id: nodeId,
        field,
      },
    };
  }

  private handleUpdateImage(params: unknown): HandlerResult {
    const validation = validateParams(UpdateImageParamsSchema, params);
    if (!validation.success) {
      return invalidRequest(validation.message);
    }
    const p = validation.data;

    const nodeId = this.mapper.resolve(p.node_id);
    this.store.setField(nodeId, 'image', p.filename);

    return {
      result: { STATUS: `Updated image in node ${nodeId} to ${p.filename} successfully` },
    };
  }
}
