/**
 * Upstream Errors
 *
 * Error types for talking to the generative engine.
 */

export enum UpstreamErrorCode {
  /** Engine socket or HTTP API could not be reached */
  UPSTREAM_UNREACHABLE = 'UPSTREAM_UNREACHABLE',
  /** Engine refused the submitted workflow */
  SUBMISSION_REJECTED = 'SUBMISSION_REJECTED',
  /** Any other non-success response from the engine */
  REQUEST_FAILED = 'REQUEST_FAILED',
}

/**
 * Upstream operation error.
 */
export class UpstreamError extends Error {
  override readonly name = 'UpstreamError';

  constructor(
    /** Error code for programmatic handling */
    public readonly code: UpstreamErrorCode,
    /** Human-readable error message */
    message: string,
    /** HTTP status returned by the engine, if any */
    public readonly upstreamStatus?: number,
    /** Underlying error if any */
    public override readonly cause?: Error
  ) {
    super(message);
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }

  static unreachable(target: string, cause?: Error): UpstreamError {
    const detail = cause ? `: ${cause.message}` : '';
    return new UpstreamError(
      UpstreamErrorCode.UPSTREAM_UNREACHABLE,
      `Engine unreachable at ${target}${detail}`,
      undefined,
      cause
    );
  }

  static submissionRejected(status: number, body: string): UpstreamError {
    return new UpstreamError(
      UpstreamErrorCode.SUBMISSION_REJECTED,
      `Engine rejected workflow (HTTP ${status})${body ? `: ${body}` : ''}`,
      status
    );
  }

  static requestFailed(operation: string, status: number): UpstreamError {
    return new UpstreamError(
      UpstreamErrorCode.REQUEST_FAILED,
      `Engine ${operation} failed: HTTP ${status}`,
      status
    );
  }

  /**
   * Wrap an unknown error as an UpstreamError.
   */
  static wrap(error: unknown, target: string): UpstreamError {
    if (error instanceof UpstreamError) {
      return error;
    }
    return UpstreamError.unreachable(target, error instanceof Error ? error : new Error(String(error)));
  }
}
