/**
 * Relay HTTP Protocol Types
 *
 * Shapes shared by the HTTP surface and the service adapters behind it.
 * Every response body carries a human-readable `STATUS`.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST';

/**
 * A routed request. `route` is the path without its leading slash,
 * e.g. `update/text`.
 */
export interface RelayRequest {
  method: HttpMethod;
  route: string;
  params: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

export interface StatusBody {
  STATUS: string;
  [key: string]: unknown;
}

export interface RelayResponse {
  status: number;
  body: StatusBody;
}

/**
 * Error reported by a handler without throwing.
 */
export interface RelayError {
  status: number;
  code: string;
  message: string;
}

/**
 * Handler result - either success with a body or an error.
 */
export type HandlerResult = { result: StatusBody } | { error: RelayError };

/**
 * A service adapter: the routes it serves and how it serves them.
 */
export interface RouteAdapter {
  /** Route -> accepted method */
  readonly routes: Readonly<Record<string, HttpMethod>>;
  handleRequest(request: RelayRequest): Promise<HandlerResult>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const RelayErrorCodes = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
  METHOD_NOT_ALLOWED: 'METHOD_NOT_ALLOWED',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export function invalidRequest(message: string): { error: RelayError } {
  return { error: { status: 400, code: RelayErrorCodes.INVALID_REQUEST, message } };
}

/**
 * Body sent for any error response.
 */
export function createErrorBody(error: RelayError): StatusBody {
  return { STATUS: `Error: ${error.message}`, error: error.code };
}
