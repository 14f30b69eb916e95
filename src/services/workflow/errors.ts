/**
 * Workflow Service Errors
 *
 * Error types for graph loading and mutation.
 */

/**
 * Workflow error codes.
 */
export enum WorkflowErrorCode {
  /** Graph is missing or not a well-formed node mapping */
  LOAD_ERROR = 'LOAD_ERROR',
  /** Node id is not in the graph */
  NODE_NOT_FOUND = 'NODE_NOT_FOUND',
  /** Node has no such input field */
  FIELD_NOT_ACCEPTED = 'FIELD_NOT_ACCEPTED',
  /** Node has none of the recognized text fields */
  NO_TEXT_FIELD_FOUND = 'NO_TEXT_FIELD_FOUND',
}

/**
 * Workflow operation error.
 *
 * Thrown by the store and the node mapper. The graph is never modified
 * when one of these is thrown.
 */
export class WorkflowError extends Error {
  override readonly name = 'WorkflowError';

  constructor(
    /** Error code for programmatic handling */
    public readonly code: WorkflowErrorCode,
    /** Human-readable error message */
    message: string,
    /** Underlying error if any */
    public override readonly cause?: Error
  ) {
    super(message);
    Object.setPrototypeOf(this, WorkflowError.prototype);
  }

  static loadError(reason: string, cause?: Error): WorkflowError {
    return new WorkflowError(
      WorkflowErrorCode.LOAD_ERROR,
      `Invalid workflow: ${reason}`,
      cause
    );
  }

  static nodeNotFound(nodeId: string): WorkflowError {
    return new WorkflowError(
      WorkflowErrorCode.NODE_NOT_FOUND,
      `Node ID ${nodeId} not found in workflow`
    );
  }

  static fieldNotAccepted(nodeId: string, field: string, classType: string): WorkflowError {
    return new WorkflowError(
      WorkflowErrorCode.FIELD_NOT_ACCEPTED,
      `Node ID ${nodeId} (${classType}) has no '${field}' input`
    );
  }

  static noTextFieldFound(nodeId: string): WorkflowError {
    return new WorkflowError(
      WorkflowErrorCode.NO_TEXT_FIELD_FOUND,
      `Node ID ${nodeId} doesn't have any recognized text input field`
    );
  }
}
