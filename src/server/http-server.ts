/**
 * Relay HTTP Server
 *
 * JSON control surface. Each path maps to one route served by a service
 * adapter; the path is the route with a leading slash (`/update/text`).
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { debugLog as globalDebugLog, verboseLog } from '../debug.ts';
import {
  RelayErrorCodes,
  createErrorBody,
  type HttpMethod,
  type RelayError,
  type RelayRequest,
  type RelayResponse,
  type RouteAdapter,
} from '../protocol/types.ts';
import { toRelayError } from './http-errors.ts';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RelayHttpServerOptions {
  /** Port to listen on; 0 picks a free one */
  port: number;
  /** Default: '127.0.0.1' */
  hostname?: string;
  /** Largest accepted request body. Default: 1 MiB */
  maxBodyBytes?: number;
}

interface Route {
  method: HttpMethod;
  adapter: RouteAdapter;
}

type BodyResult = { ok: true; params: unknown } | { ok: false; error: RelayError };

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

function errorResponse(error: RelayError): RelayResponse {
  return { status: error.status, body: createErrorBody(error) };
}

function isHttpMethod(method: string | undefined): method is HttpMethod {
  return method === 'GET' || method === 'POST';
}

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Server
// ─────────────────────────────────────────────────────────────────────────────

export class RelayHttpServer {
  private server: Server | null = null;
  private readonly routes = new Map<string, Route>();
  private readonly maxBodyBytes: number;

  constructor(
    adapters: RouteAdapter[],
    private readonly options: RelayHttpServerOptions
  ) {
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

    for (const adapter of adapters) {
      for (const [route, method] of Object.entries(adapter.routes)) {
        if (this.routes.has(route)) {
          throw new Error(`Route /${route} is registered twice`);
        }
        this.routes.set(route, { method, adapter });
      }
    }
  }

  private debugLog(msg: string): void {
    globalDebugLog(`[RelayHttpServer] ${msg}`);
  }

  /**
   * Start listening.
   *
   * @returns The bound port
   */
  async start(): Promise<number> {
    const { port, hostname = '127.0.0.1' } = this.options;

    const server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.debugLog(`Unhandled error serving ${req.url}: ${error}`);
        if (!res.headersSent) {
          this.send(res, errorResponse(toRelayError(error)));
        } else {
          res.destroy();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, hostname, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const bound = this.port;
    this.debugLog(`Listening on http://${hostname}:${bound}`);
    return bound;
  }

  get port(): number {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : 0;
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.debugLog('HTTP server stopped');
  }

  /**
   * Route a request to its adapter. Never throws: every failure becomes an
   * error response.
   */
  async dispatch(method: string, path: string, params: unknown): Promise<RelayResponse> {
    const routeName = path.replace(/^\/+|\/+$/g, '');
    const route = this.routes.get(routeName);

    if (!route) {
      return errorResponse({
        status: 404,
        code: RelayErrorCodes.ROUTE_NOT_FOUND,
        message: `Unknown route ${path}`,
      });
    }
    if (!isHttpMethod(method) || method !== route.method) {
      return errorResponse({
        status: 405,
        code: RelayErrorCodes.METHOD_NOT_ALLOWED,
        message: `${method} not allowed on /${routeName}; use ${route.method}`,
      });
    }

    const request: RelayRequest = { method, route: routeName, params };
    try {
      const result = await route.adapter.handleRequest(request);
      if ('error' in result) {
        return errorResponse(result.error);
      }
      return { status: 200, body: result.result };
    } catch (error) {
      const relayError = toRelayError(error);
      this.debugLog(`Error handling /${routeName}: ${relayError.code} ${relayError.message}`);
      return errorResponse(relayError);
    }
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const { pathname } = new URL(req.url ?? '/', 'http://relay.local');

    let params: unknown = {};
    if (method === 'POST') {
      const body = await this.readBody(req);
      if (!body.ok) {
        this.send(res, errorResponse(body.error));
        return;
      }
      params = body.params;
    }

    const response = await this.dispatch(method, pathname, params);
    if (response.status >= 500) {
      verboseLog(`${method} ${pathname} -> ${response.status} ${response.body.STATUS}`, 'error');
    } else {
      this.debugLog(`${method} ${pathname} -> ${response.status}`);
    }
    this.send(res, response);
  }

  private async readBody(req: IncomingMessage): Promise<BodyResult> {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > this.maxBodyBytes) {
        tooLarge = true;
        continue;
      }
      chunks.push(buffer);
    }

    if (tooLarge) {
      return {
        ok: false,
        error: {
          status: 413,
          code: RelayErrorCodes.PAYLOAD_TOO_LARGE,
          message: `Request body exceeds ${this.maxBodyBytes} bytes`,
        },
      };
    }

    const text = Buffer.concat(chunks).toString('utf-8').trim();
    if (!text) {
      return { ok: true, params: {} };
    }

    try {
      return { ok: true, params: JSON.parse(text) };
    } catch {
      return {
        ok: false,
        error: { status: 400, code: RelayErrorCodes.INVALID_REQUEST, message: 'Request body is not valid JSON' },
      };
    }
  }

  private send(res: ServerResponse, response: RelayResponse): void {
    const payload = JSON.stringify(response.body);
    res.writeHead(response.status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload),
    });
    res.end(payload);
  }
}
