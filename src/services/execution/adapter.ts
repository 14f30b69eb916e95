/**
 * Execution Service Adapter
 *
 * Maps the execution routes to ExecutionCoordinator operations:
 *
 * - health         -> liveness string
 * - status         -> getStatus() plus relay facts
 * - queue          -> submitAndWait(snapshot)
 * - generate/image -> compose prompt text, write it, then queue
 * - interrupt      -> requestInterrupt() in the background
 */

import { STATUS_MESSAGES } from '../../constants.ts';
import { debugLog, verboseLog } from '../../debug.ts';
import { GenerateImageParamsSchema, validateParams } from '../../protocol/schemas.ts';
import {
  invalidRequest,
  type HandlerResult,
  type HttpMethod,
  type RelayRequest,
  type RouteAdapter,
} from '../../protocol/types.ts';
import type { NodeMapper } from '../workflow/node-mapper.ts';
import type { WorkflowStore } from '../workflow/store.ts';
import type { ExecutionCoordinator } from './coordinator.ts';
import { ExecutionError } from './errors.ts';

/** Variant whose roles drive /generate/image */
export const TEXT_TO_IMAGE_VARIANT = 'text_to_image';

const PROMPT_ROLE = 'ollama_node';
const CUE_PARTS = ['description', 'visualCue', 'moodCue'] as const;
const CUE_ROLES: Record<(typeof CUE_PARTS)[number], string> = {
  description: 'description_node',
  visualCue: 'visual_cue_node',
  moodCue: 'mood_cue_node',
};

export interface ExecutionAdapterOptions {
  /** Budget for one blocking /queue call */
  timeoutMs: number;
  /** `host:port` of the engine, reported by /status */
  engineAddress: string;
  /** Whether the engine event socket is open, reported by /status */
  engineConnected: () => boolean;
  /** Live downstream client count, reported by /status */
  clientCount: () => number;
}

export interface ImageDescription {
  description: string;
  visualCue: string;
  moodCue: string;
}

/**
 * Join the description and its cues into one prompt, skipping empty parts.
 */
export function composePrompt({ description, visualCue, moodCue }: ImageDescription): string {
  const parts = [description.trim()];
  if (visualCue.trim()) parts.push(`Visual cue: ${visualCue.trim()}`);
  if (moodCue.trim()) parts.push(`Mood cue: ${moodCue.trim()}`);
  return parts.filter(Boolean).join('\n');
}

export class ExecutionServiceAdapter implements RouteAdapter {
  readonly routes: Readonly<Record<string, HttpMethod>> = {
    health: 'GET',
    status: 'GET',
    queue: 'GET',
    'generate/image': 'POST',
    interrupt: 'POST',
  };

  constructor(
    private readonly coordinator: ExecutionCoordinator,
    private readonly store: WorkflowStore,
    private readonly mapper: NodeMapper,
    private readonly options: ExecutionAdapterOptions
  ) {}

  async handleRequest(request: RelayRequest): Promise<HandlerResult> {
    debugLog(`[ExecutionServiceAdapter] Handling request: ${request.route}`);

    switch (request.route) {
      case 'health':
        return { result: { STATUS: STATUS_MESSAGES.HEALTHY } };
      case 'status':
        return this.handleStatus();
      case 'queue':
        return this.handleQueue();
      case 'generate/image':
        return this.handleGenerateImage(request.params);
      case 'interrupt':
        return this.handleInterrupt();
      default:
        throw new Error(`ExecutionServiceAdapter cannot serve ${request.route}`);
    }
  }

  private handleStatus(): HandlerResult {
    const status = this.coordinator.getStatus();
    return {
      result: {
        STATUS: 'Server running',
        execution_status: status.state,
        current_prompt_id: status.promptId,
        progress: status.progress,
        last_error: status.error,
        last_updated: status.lastUpdated,
        workflow_loaded: this.store.isLoaded(),
        connected_ws_clients: this.options.clientCount(),
        engine_server: this.options.engineAddress,
        engine_connected: this.options.engineConnected(),
        save_image_node_id: this.mapper.saveImageNodeId(),
      },
    };
  }

  private async handleQueue(): Promise<HandlerResult> {
    const snapshot = this.store.snapshot();
    const result = await this.coordinator.submitAndWait(snapshot, this.options.timeoutMs);
    return { result: { ...result } };
  }

  private async handleGenerateImage(params: unknown): Promise<HandlerResult> {
    const validation = validateParams(GenerateImageParamsSchema, params);
    if (!validation.success) {
      return invalidRequest(validation.message);
    }
    const cues = validation.data.image_description;

    // A rejected run must leave the graph as it was
    if (this.coordinator.isBusy()) {
      throw ExecutionError.alreadyRunning(this.coordinator.getState());
    }

    const perCueNodes = Object.values(CUE_ROLES).every((role) =>
      this.mapper.hasRole(role, TEXT_TO_IMAGE_VARIANT)
    );

    const writes: Array<{ nodeId: string; text: string }> = perCueNodes
      ? CUE_PARTS.map((part) => ({
          nodeId: this.mapper.resolve(CUE_ROLES[part], TEXT_TO_IMAGE_VARIANT),
          text: cues[part].trim(),
        }))
      : [{ nodeId: this.mapper.resolve(PROMPT_ROLE, TEXT_TO_IMAGE_VARIANT), text: composePrompt(cues) }];

    // All targets are resolved before the first write
    const targets = writes.map((write) => ({
      ...write,
      field: this.mapper.findTextField(write.nodeId),
    }));
    for (const { nodeId, field, text } of targets) {
      this.store.setField(nodeId, field, text);
    }

    verboseLog(`Image description written to node(s) ${targets.map((t) => t.nodeId).join(', ')}`);
    return this.handleQueue();
  }

  private handleInterrupt(): HandlerResult {
    this.coordinator.requestInterrupt().catch((error: unknown) => {
      debugLog(`[ExecutionServiceAdapter] Background interrupt failed: ${error}`);
    });
    return { result: { STATUS: STATUS_MESSAGES.INTERRUPT_RECEIVED } };
  }
}
