/**
 * Execution Service
 *
 * Tracks the single in-flight job and serves the execution routes.
 */

// Types
export type {
  ExecutionBackend,
  ExecutionEvents,
  ExecutionOptions,
  ExecutionProgress,
  ExecutionResult,
  ExecutionState,
  ExecutionStatus,
} from './types.ts';
export { IN_FLIGHT_STATES } from './types.ts';

// Errors
export { ExecutionError, ExecutionErrorCode } from './errors.ts';

// Implementation
export { ExecutionCoordinator } from './coordinator.ts';

// Adapter
export {
  ExecutionServiceAdapter,
  TEXT_TO_IMAGE_VARIANT,
  composePrompt,
  type ExecutionAdapterOptions,
  type ImageDescription,
} from './adapter.ts';
