/**
 * Upstream Connector
 *
 * Owns the single persistent connection to the engine's event socket.
 *
 * Connection is single-shot: if the socket drops, the connector does not
 * reconnect, since a fresh session would not carry the events of a job
 * already in flight. Retrying is left to process startup.
 *
 * Every frame is classified, broadcast unmodified, and then handed to the
 * execution sink, in arrival order.
 */

import { randomUUID } from 'node:crypto';
import { WebSocket, type RawData } from 'ws';
import { HISTORY_ATTEMPTS } from '../../constants.ts';
import { debugLog, verboseLog } from '../../debug.ts';
import {
  EngineEventTypes,
  describeEvent,
  parseBinaryFrame,
  parseTextFrame,
  type FrameParseResult,
} from '../../protocol/events.ts';
import type { ExecutionBackend } from '../execution/types.ts';
import type { GraphSnapshot } from '../workflow/types.ts';
import type { EngineClient } from './engine-client.ts';
import { UpstreamError } from './errors.ts';
import type { EngineEndpoint, EventBroadcaster, ExecutionEventSink, OutputImage } from './types.ts';

export interface HistoryPolling {
  /** Lookups made before giving up */
  attempts: number;
  /** Wait before the given attempt (1-based) */
  delayMs: (attempt: number) => number;
}

export const DEFAULT_HISTORY_POLLING: HistoryPolling = {
  attempts: HISTORY_ATTEMPTS,
  delayMs: (attempt) => 1000 + attempt * 500,
};

export class UpstreamConnector implements ExecutionBackend {
  private socket: WebSocket | null = null;
  private clientId = randomUUID();
  private sessionId: string;
  private sink: ExecutionEventSink | null = null;
  private closed: Promise<void> = Promise.resolve();

  constructor(
    private readonly endpoint: EngineEndpoint,
    private readonly engine: EngineClient,
    private readonly hub: EventBroadcaster,
    private readonly historyPolling: HistoryPolling = DEFAULT_HISTORY_POLLING
  ) {
    this.sessionId = this.clientId;
  }

  get url(): string {
    return `ws://${this.endpoint.host}:${this.endpoint.port}/ws?clientId=${this.clientId}`;
  }

  isConnected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  /**
   * Open the event socket. A failed attempt leaves the connector ready to
   * try again.
   * @throws UpstreamError UPSTREAM_UNREACHABLE if not open within the timeout
   */
  async connect(): Promise<void> {
    if (this.socket) {
      throw new Error('UpstreamConnector.connect() called twice');
    }

    const { connectTimeoutMs } = this.endpoint;
    const target = `ws://${this.endpoint.host}:${this.endpoint.port}/ws`;
    verboseLog(`Connecting to engine socket at ${target}...`);

    const socket = new WebSocket(this.url, { handshakeTimeout: connectTimeoutMs });
    this.socket = socket;

    let resolveClosed: () => void = () => {};
    this.closed = new Promise<void>((resolve) => {
      resolveClosed = resolve;
    });

    socket.on('message', (data, isBinary) => this.handleFrame(data, isBinary));
    socket.on('close', (code, reason) => {
      resolveClosed();
      // A socket replaced by a later attempt no longer speaks for the connector
      if (this.socket !== socket) return;

      const detail = `code ${code}${reason.length ? `, ${reason.toString()}` : ''}`;
      verboseLog(`Engine socket closed (${detail})`, 'warn');
      this.sink?.handleDisconnect(`upstream connection closed (${detail})`);
    });

    try {
      await this.handshake(socket, target);
    } catch (error) {
      this.socket = null;
      this.closed = Promise.resolve();
      throw error;
    }

    verboseLog(`Connected to engine socket (client ${this.clientId})`);
  }

  /**
   * Feed events to `sink` for the lifetime of the connection.
   *
   * @returns Resolves once the socket has closed
   */
  readLoop(sink: ExecutionEventSink): Promise<void> {
    this.sink = sink;
    return this.closed;
  }

  /**
   * Submit a graph snapshot and subscribe to its events.
   *
   * @returns The engine's prompt id
   */
  async submit(snapshot: GraphSnapshot): Promise<string> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      throw UpstreamError.unreachable(this.engine.baseUrl, new Error('event socket is not connected'));
    }

    const promptId = await this.engine.submitPrompt(snapshot, this.sessionId);
    socket.send(JSON.stringify({ op: 'subscribe_to_prompt', data: { prompt_id: promptId } }));
    verboseLog(`Workflow submitted. Prompt ID: ${promptId}`);
    return promptId;
  }

  /**
   * Ask the engine to stop. Local state only changes once the engine
   * confirms through the event stream.
   */
  async interrupt(): Promise<void> {
    verboseLog('Interrupting workflow execution');
    await this.engine.interrupt();
  }

  async clearQueue(): Promise<number> {
    const cleared = await this.engine.clearQueue();
    verboseLog(cleared > 0 ? `Cleared ${cleared} items from queue` : 'No items in queue to clear');
    return cleared;
  }

  /**
   * Poll /history until the prompt's output image is present and served.
   */
  async fetchOutputImage(promptId: string, preferredNodeId: string): Promise<OutputImage | null> {
    const { attempts, delayMs } = this.historyPolling;

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        await sleep(delayMs(attempt));
      }

      try {
        const image = await this.engine.getHistoryImage(promptId, preferredNodeId);
        if (image && (await this.engine.isImageAvailable(image))) {
          return image;
        }
        debugLog(`[UpstreamConnector] History attempt ${attempt + 1}/${attempts}: no image yet`);
      } catch (error) {
        debugLog(`[UpstreamConnector] History attempt ${attempt + 1}/${attempts} failed: ${error}`);
      }
    }

    return null;
  }

  viewUrl(image: OutputImage): string {
    return this.engine.viewUrl(image);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) return;

    if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    } else if (socket.readyState === WebSocket.OPEN) {
      socket.close(1000, 'Relay shutting down');
    }
    await this.closed;
  }

  private handshake(socket: WebSocket, target: string): Promise<void> {
    const { connectTimeoutMs } = this.endpoint;

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.terminate();
        reject(UpstreamError.unreachable(target, new Error(`no handshake within ${connectTimeoutMs}ms`)));
      }, connectTimeoutMs);

      socket.once('open', () => {
        clearTimeout(timer);
        socket.on('error', (error) => verboseLog(`Engine socket error: ${error.message}`, 'error'));
        resolve();
      });
      socket.once('error', (error) => {
        clearTimeout(timer);
        reject(UpstreamError.unreachable(target, error));
      });
    });
  }

  private handleFrame(data: RawData, isBinary: boolean): void {
    const buffer = toBuffer(data);
    const result: FrameParseResult = isBinary
      ? parseBinaryFrame(buffer)
      : parseTextFrame(buffer.toString('utf-8'));

    if (!result.ok) {
      verboseLog(`Skipping engine frame: ${result.reason}`, 'warn');
      return;
    }

    const { event } = result;
    if (event.kind === 'text' && event.type === EngineEventTypes.STATUS) {
      this.adoptSessionId(event.data);
    }

    const delivered = this.hub.broadcast(event);
    debugLog(`[UpstreamConnector] Relayed ${describeEvent(event)} to ${delivered} client(s)`);

    try {
      this.sink?.handleEvent(event);
    } catch (error) {
      verboseLog(`Error handling ${describeEvent(event)}: ${error}`, 'error');
    }
  }

  private adoptSessionId(data: Readonly<Record<string, unknown>>): void {
    const sid = data.sid;
    if (typeof sid === 'string' && sid && sid !== this.sessionId) {
      this.sessionId = sid;
      verboseLog(`Got session ID: ${sid}`);
    }
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
