/**
 * Upstream Types
 */

import type { RelayEvent } from '../../protocol/events.ts';

/**
 * Where and how to reach the engine.
 */
export interface EngineEndpoint {
  host: string;
  port: number;
  /** Socket handshake budget */
  connectTimeoutMs: number;
  /** Budget for each HTTP call */
  requestTimeoutMs: number;
}

/**
 * Image entry as reported in `executed` events and /history outputs.
 */
export interface OutputImage {
  filename: string;
  subfolder: string;
  type: string;
}

/**
 * Receiver of every relayed frame, in arrival order.
 */
export interface EventBroadcaster {
  broadcast(event: RelayEvent): number;
}

/**
 * Receiver of the events that drive execution state.
 */
export interface ExecutionEventSink {
  handleEvent(event: RelayEvent): void;
  handleDisconnect(reason: string): void;
}
