/**
 * Execution Errors
 *
 * Errors surfaced to the caller blocked in submitAndWait.
 */

import type { ExecutionState } from './types.ts';

export enum ExecutionErrorCode {
  /** A job is already queued or running */
  ALREADY_RUNNING = 'ALREADY_RUNNING',
  /** Engine reported an execution error or the upstream socket dropped */
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  /** No terminal state within the allowed time */
  EXECUTION_TIMEOUT = 'EXECUTION_TIMEOUT',
  /** Job was interrupted before completing */
  EXECUTION_INTERRUPTED = 'EXECUTION_INTERRUPTED',
}

export class ExecutionError extends Error {
  override readonly name = 'ExecutionError';

  constructor(
    public readonly code: ExecutionErrorCode,
    message: string,
    /** Engine prompt id of the job, when known */
    public readonly promptId: string | null = null
  ) {
    super(message);
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }

  static alreadyRunning(state: ExecutionState): ExecutionError {
    return new ExecutionError(
      ExecutionErrorCode.ALREADY_RUNNING,
      `Workflow is already running (state: ${state})`
    );
  }

  static failed(reason: string, promptId: string | null): ExecutionError {
    return new ExecutionError(
      ExecutionErrorCode.EXECUTION_FAILED,
      `generation failed - ${reason}`,
      promptId
    );
  }

  static timeout(timeoutMs: number, promptId: string | null): ExecutionError {
    return new ExecutionError(
      ExecutionErrorCode.EXECUTION_TIMEOUT,
      `workflow timeout after ${timeoutMs}ms - check /status for completion`,
      promptId
    );
  }

  static interrupted(promptId: string | null): ExecutionError {
    return new ExecutionError(
      ExecutionErrorCode.EXECUTION_INTERRUPTED,
      'generation interrupted',
      promptId
    );
  }
}
