/**
 * HTTP Error Mapping
 *
 * Maps service error codes to HTTP status codes. User input errors are
 * 4xx and leave the workflow unchanged; engine-side failures are 5xx.
 */

import { RelayErrorCodes, type RelayError } from '../protocol/types.ts';
import { ExecutionError, ExecutionErrorCode } from '../services/execution/index.ts';
import { UpstreamError, UpstreamErrorCode } from '../services/upstream/index.ts';
import { WorkflowError, WorkflowErrorCode } from '../services/workflow/index.ts';

const WORKFLOW_STATUS: Record<WorkflowErrorCode, number> = {
  [WorkflowErrorCode.LOAD_ERROR]: 500,
  [WorkflowErrorCode.NODE_NOT_FOUND]: 404,
  [WorkflowErrorCode.FIELD_NOT_ACCEPTED]: 422,
  [WorkflowErrorCode.NO_TEXT_FIELD_FOUND]: 404,
};

const UPSTREAM_STATUS: Record<UpstreamErrorCode, number> = {
  [UpstreamErrorCode.UPSTREAM_UNREACHABLE]: 503,
  [UpstreamErrorCode.SUBMISSION_REJECTED]: 502,
  [UpstreamErrorCode.REQUEST_FAILED]: 502,
};

const EXECUTION_STATUS: Record<ExecutionErrorCode, number> = {
  [ExecutionErrorCode.ALREADY_RUNNING]: 409,
  [ExecutionErrorCode.EXECUTION_FAILED]: 500,
  [ExecutionErrorCode.EXECUTION_TIMEOUT]: 504,
  [ExecutionErrorCode.EXECUTION_INTERRUPTED]: 500,
};

/**
 * Convert anything thrown by a handler into a RelayError.
 */
export function toRelayError(error: unknown): RelayError {
  if (error instanceof WorkflowError) {
    return { status: WORKFLOW_STATUS[error.code], code: error.code, message: error.message };
  }
  if (error instanceof UpstreamError) {
    return { status: UPSTREAM_STATUS[error.code], code: error.code, message: error.message };
  }
  if (error instanceof ExecutionError) {
    return { status: EXECUTION_STATUS[error.code], code: error.code, message: error.message };
  }

  return {
    status: 500,
    code: RelayErrorCodes.INTERNAL_ERROR,
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}
