/**
 * Engine HTTP Client
 *
 * Control-channel calls to the generative engine: submission, interrupt,
 * queue maintenance and history lookup. Uses the global fetch().
 */

import { debugLog } from '../../debug.ts';
import { UpstreamError } from './errors.ts';
import { extractOutputImage } from './outputs.ts';
import { HistoryResponseSchema, PromptResponseSchema, QueueResponseSchema } from './schema.ts';
import type { EngineEndpoint, OutputImage } from './types.ts';

export class EngineClient {
  readonly baseUrl: string;

  constructor(private readonly endpoint: EngineEndpoint) {
    this.baseUrl = `http://${endpoint.host}:${endpoint.port}`;
  }

  /**
   * Check the engine answers at all (`GET /system_stats`).
   * @throws UpstreamError UPSTREAM_UNREACHABLE
   */
  async probe(): Promise<void> {
    const response = await this.fetch('/system_stats');
    if (!response.ok) {
      throw UpstreamError.unreachable(
        this.baseUrl,
        new Error(`system_stats returned HTTP ${response.status}`)
      );
    }
  }

  /**
   * Queue a workflow for execution.
   *
   * @returns The engine's prompt id
   * @throws UpstreamError SUBMISSION_REJECTED on a non-2xx status or node errors
   */
  async submitPrompt(prompt: unknown, clientId: string): Promise<string> {
    const response = await this.fetch('/prompt', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ prompt, client_id: clientId }),
    });

    const text = await response.text();
    if (!response.ok) {
      throw UpstreamError.submissionRejected(response.status, text);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw UpstreamError.submissionRejected(response.status, 'response is not JSON');
    }

    const result = PromptResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw UpstreamError.submissionRejected(response.status, 'unexpected response shape');
    }
    const body = result.data;

    if (body.node_errors && Object.keys(body.node_errors).length > 0) {
      throw UpstreamError.submissionRejected(response.status, JSON.stringify(body.node_errors));
    }
    if (typeof body.prompt_id !== 'string' || !body.prompt_id) {
      throw UpstreamError.submissionRejected(response.status, 'response has no prompt_id');
    }

    debugLog(`[EngineClient] Submitted prompt ${body.prompt_id} (client ${clientId})`);
    return body.prompt_id;
  }

  /**
   * Interrupt whatever the engine is executing.
   */
  async interrupt(): Promise<void> {
    const response = await this.fetch('/interrupt', { method: 'POST' });
    if (!response.ok) {
      throw UpstreamError.requestFailed('interrupt', response.status);
    }
  }

  /**
   * Delete every running and pending queue item.
   *
   * @returns Number of prompt ids deleted
   */
  async clearQueue(): Promise<number> {
    const response = await this.fetch('/queue');
    if (!response.ok) {
      throw UpstreamError.requestFailed('queue lookup', response.status);
    }

    const queue = QueueResponseSchema.safeParse(await response.json());
    if (!queue.success) {
      throw UpstreamError.requestFailed('queue lookup', response.status);
    }

    // Queue items are tuples with the prompt id at index 1
    const promptIds = [...queue.data.queue_running, ...queue.data.queue_pending]
      .map((item) => item[1])
      .filter((id): id is string => typeof id === 'string');

    if (promptIds.length === 0) {
      return 0;
    }

    const deleteResponse = await this.fetch('/queue', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ delete: promptIds }),
    });
    if (!deleteResponse.ok) {
      throw UpstreamError.requestFailed('queue clear', deleteResponse.status);
    }

    return promptIds.length;
  }

  /**
   * Output image recorded in /history for a prompt, or null if the entry
   * or its outputs are not there yet.
   */
  async getHistoryImage(promptId: string, preferredNodeId: string): Promise<OutputImage | null> {
    const response = await this.fetch(`/history/${encodeURIComponent(promptId)}`);
    if (!response.ok) {
      throw UpstreamError.requestFailed('history lookup', response.status);
    }

    const history = HistoryResponseSchema.safeParse(await response.json());
    if (!history.success) {
      throw UpstreamError.requestFailed('history lookup', response.status);
    }

    const entry = history.data[promptId];
    if (!entry?.outputs) {
      return null;
    }
    return extractOutputImage(entry.outputs, preferredNodeId);
  }

  /**
   * Whether the image is already served by /view (`HEAD`).
   */
  async isImageAvailable(image: OutputImage): Promise<boolean> {
    try {
      const response = await fetch(this.viewUrl(image), {
        method: 'HEAD',
        signal: AbortSignal.timeout(this.endpoint.requestTimeoutMs),
      });
      return response.ok;
    } catch (error) {
      debugLog(`[EngineClient] HEAD ${image.filename} failed: ${error}`);
      return false;
    }
  }

  /**
   * Public URL of an output image.
   */
  viewUrl(image: OutputImage): string {
    let url = `${this.baseUrl}/view?filename=${image.filename}`;
    if (image.subfolder) {
      url += `&subfolder=${image.subfolder}`;
    }
    return `${url}&type=${image.type}`;
  }

  private async fetch(path: string, init: RequestInit = {}): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(this.endpoint.requestTimeoutMs),
      });
    } catch (error) {
      throw UpstreamError.wrap(error, this.baseUrl);
    }
  }
}
