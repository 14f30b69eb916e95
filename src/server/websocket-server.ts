/**
 * Relay WebSocket Server
 *
 * Downstream endpoint. Clients connect to ws://host:port/ and receive every
 * engine frame, text and binary, exactly as the engine sent it. Nothing is
 * sent on connect and inbound messages are ignored.
 */

import type { IncomingMessage } from 'node:http';
import { WebSocket, WebSocketServer } from 'ws';
import { debugLog as globalDebugLog, verboseLog } from '../debug.ts';
import type { BroadcastHub, ClientTransport, WriteCallback } from '../services/broadcast/index.ts';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RelayWebSocketServerOptions {
  /** Port to listen on; 0 picks a free one */
  port: number;
  /**
   * Hostname to bind to.
   * Default: '127.0.0.1'. Use '0.0.0.0' to accept clients from the network.
   */
  hostname?: string;
  /**
   * Ping interval in milliseconds. A client that has not answered the
   * previous ping is terminated. 0 disables the heartbeat.
   */
  heartbeatInterval: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Adapts a `ws` socket to the hub's ClientTransport.
 */
export class WsClientTransport implements ClientTransport {
  constructor(
    readonly id: string,
    private readonly socket: WebSocket,
    readonly remoteAddress?: string
  ) {}

  send(data: string | Buffer, binary: boolean, done: WriteCallback): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      done(new Error('socket is not open'));
      return;
    }
    this.socket.send(data, { binary }, done);
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }

  terminate(): void {
    this.socket.terminate();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// WebSocket Server
// ─────────────────────────────────────────────────────────────────────────────

export class RelayWebSocketServer {
  private server: WebSocketServer | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private clientIdCounter = 0;
  /** Sockets that answered the last ping */
  private alive = new WeakSet<WebSocket>();
  private clientIds = new WeakMap<WebSocket, string>();

  constructor(
    private readonly hub: BroadcastHub,
    private readonly options: RelayWebSocketServerOptions
  ) {}

  private debugLog(msg: string): void {
    globalDebugLog(`[RelayWebSocketServer] ${msg}`);
  }

  /**
   * Start listening.
   *
   * @returns The bound port
   */
  async start(): Promise<number> {
    const { port, hostname = '127.0.0.1' } = this.options;

    if (hostname === '0.0.0.0') {
      verboseLog('Relay socket is bound to all interfaces; any host can receive engine events', 'warn');
    }

    const server = new WebSocketServer({ port, host: hostname });
    this.server = server;
    server.on('connection', (socket, request) => this.handleConnection(socket, request));

    await new Promise<void>((resolve, reject) => {
      server.once('listening', () => {
        server.on('error', (error) => verboseLog(`Relay socket error: ${error.message}`, 'error'));
        resolve();
      });
      server.once('error', reject);
    });

    this.startHeartbeat();

    const bound = this.port;
    this.debugLog(`Listening on ws://${hostname}:${bound}`);
    return bound;
  }

  get port(): number {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : 0;
  }

  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    this.hub.closeAll('Server shutting down');

    const server = this.server;
    this.server = null;
    if (server) {
      for (const socket of server.clients) {
        socket.terminate();
      }
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }

    this.debugLog('WebSocket server stopped');
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const clientId = `client-${++this.clientIdCounter}`;
    const remoteAddress = request.socket.remoteAddress;

    this.alive.add(socket);
    this.clientIds.set(socket, clientId);
    this.hub.register(new WsClientTransport(clientId, socket, remoteAddress));

    socket.on('pong', () => this.alive.add(socket));

    socket.on('message', (_data, isBinary) => {
      this.debugLog(`Ignoring inbound ${isBinary ? 'binary' : 'text'} message from ${clientId}`);
    });

    socket.on('close', () => {
      this.hub.unregister(clientId);
    });

    socket.on('error', (error) => {
      this.debugLog(`Client ${clientId} socket error: ${error.message}`);
    });
  }

  private startHeartbeat(): void {
    const interval = this.options.heartbeatInterval;
    if (interval <= 0 || !this.server) return;
    const server = this.server;

    this.heartbeatTimer = setInterval(() => {
      for (const socket of server.clients) {
        if (!this.alive.has(socket)) {
          this.debugLog(`Terminating unresponsive client ${this.clientIds.get(socket) ?? 'unknown'}`);
          socket.terminate();
          continue;
        }

        this.alive.delete(socket);
        socket.ping();
      }
    }, interval);
  }
}
