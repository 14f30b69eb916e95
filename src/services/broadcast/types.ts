/**
 * Broadcast Types
 */

/**
 * Completion callback for a single frame write.
 */
export type WriteCallback = (error?: Error) => void;

/**
 * One downstream connection, as seen by the hub.
 *
 * The WebSocket relay surface adapts `ws` sockets to this shape; tests use
 * in-memory fakes.
 */
export interface ClientTransport {
  readonly id: string;
  readonly remoteAddress?: string;
  /** Write one frame. `done` fires once the frame is flushed or has failed. */
  send(data: string | Buffer, binary: boolean, done: WriteCallback): void;
  close(code: number, reason: string): void;
  /** Drop the connection without a close handshake */
  terminate(): void;
}

export interface BroadcastOptions {
  /** Per-frame write budget before the client is dropped */
  writeTimeoutMs: number;
  /** Frames a client may have waiting before it is dropped */
  maxQueuedMessages: number;
}

/**
 * Called once when a channel gives up on its client.
 */
export type ChannelFailureHandler = (clientId: string, reason: string) => void;
