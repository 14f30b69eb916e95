/**
 * Execution Types
 */

import type { GraphSnapshot } from '../workflow/types.ts';
import type { OutputImage } from '../upstream/types.ts';

export type ExecutionState = 'idle' | 'queued' | 'running' | 'completed' | 'errored' | 'interrupted';

/**
 * States in which a job is owned by the engine.
 */
export const IN_FLIGHT_STATES: readonly ExecutionState[] = ['queued', 'running'];

/**
 * Body returned by a successful /queue call.
 */
export interface ExecutionResult {
  STATUS: string;
  image_filename: string;
  image_url: string;
}

export interface ExecutionProgress {
  value: number;
  max: number;
}

export interface ExecutionStatus {
  state: ExecutionState;
  promptId: string | null;
  progress: ExecutionProgress | null;
  error: string | null;
  /** ISO timestamp of the last transition */
  lastUpdated: string;
}

/**
 * What the coordinator needs from the engine side.
 * Implemented by UpstreamConnector.
 */
export interface ExecutionBackend {
  submit(snapshot: GraphSnapshot): Promise<string>;
  interrupt(): Promise<void>;
  clearQueue(): Promise<number>;
  fetchOutputImage(promptId: string, preferredNodeId: string): Promise<OutputImage | null>;
  viewUrl(image: OutputImage): string;
}

export interface ExecutionOptions {
  /** Node whose executed event reports the output image */
  saveImageNodeId: string;
  /** Unacknowledged interrupt budget before forcing `interrupted`; 0 disables */
  interruptGraceMs: number;
}

export type ExecutionEvents = {
  stateChange: { from: ExecutionState; to: ExecutionState; promptId: string | null };
};
