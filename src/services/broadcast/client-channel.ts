/**
 * Client Channel
 *
 * Per-client outbound FIFO. Frames are written one at a time, in the
 * order they were enqueued. A client that cannot keep up is disconnected
 * rather than skipped, so a live client has always seen every frame.
 */

import { debugLog } from '../../debug.ts';
import type { RelayEvent } from '../../protocol/events.ts';
import type { BroadcastOptions, ChannelFailureHandler, ClientTransport } from './types.ts';

export class ClientChannel {
  private readonly queue: RelayEvent[] = [];
  private writing = false;
  private closed = false;
  private writeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly transport: ClientTransport,
    private readonly options: BroadcastOptions,
    private readonly onFailure: ChannelFailureHandler
  ) {}

  get id(): string {
    return this.transport.id;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Frames waiting behind the one being written.
   */
  pending(): number {
    return this.queue.length;
  }

  /**
   * Queue a frame for delivery. Never waits on the socket.
   *
   * @returns false if the channel is closed or was just closed for overflow
   */
  enqueue(event: RelayEvent): boolean {
    if (this.closed) return false;

    if (this.queue.length >= this.options.maxQueuedMessages) {
      this.fail(`queue overflow (${this.queue.length} frames pending)`);
      return false;
    }

    this.queue.push(event);
    this.pump();
    return true;
  }

  /**
   * Close the connection cleanly and discard anything still queued.
   */
  close(code = 1000, reason = ''): void {
    if (this.closed) return;
    this.closed = true;
    this.clearWriteTimer();
    this.queue.length = 0;
    this.transport.close(code, reason);
  }

  /**
   * Stop all work for a connection that is already gone. The transport is
   * left alone.
   */
  dispose(): void {
    this.closed = true;
    this.clearWriteTimer();
    this.queue.length = 0;
  }

  private pump(): void {
    if (this.writing || this.closed) return;

    const event = this.queue.shift();
    if (!event) return;

    this.writing = true;
    this.writeTimer = setTimeout(() => {
      this.fail(`write timed out after ${this.options.writeTimeoutMs}ms`);
    }, this.options.writeTimeoutMs);

    const done = (error?: Error): void => {
      if (this.closed) return;
      this.clearWriteTimer();
      this.writing = false;

      if (error) {
        this.fail(`write failed: ${error.message}`);
        return;
      }
      this.pump();
    };

    try {
      this.transport.send(event.raw, event.kind === 'binary', done);
    } catch (error) {
      done(error instanceof Error ? error : new Error(String(error)));
    }
  }

  private fail(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.clearWriteTimer();
    this.queue.length = 0;
    debugLog(`[ClientChannel] Dropping client ${this.id}: ${reason}`);

    this.transport.terminate();
    this.onFailure(this.id, reason);
  }

  private clearWriteTimer(): void {
    if (this.writeTimer) {
      clearTimeout(this.writeTimer);
      this.writeTimer = null;
    }
  }
}
