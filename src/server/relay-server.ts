/**
 * Relay Server
 *
 * Composition root: wires the workflow store, node mapper, broadcast hub,
 * upstream connector and execution coordinator together and exposes them
 * over HTTP and WebSocket.
 *
 * Startup order is fixed: the engine must answer and the workflow must load
 * before anything listens.
 */

import type { RelaySettings } from '../config/settings.ts';
import { debugLog, verboseLog } from '../debug.ts';
import type { RelayResponse } from '../protocol/types.ts';
import { BroadcastHub } from '../services/broadcast/hub.ts';
import { ExecutionServiceAdapter } from '../services/execution/adapter.ts';
import { ExecutionCoordinator } from '../services/execution/coordinator.ts';
import { UpstreamConnector, DEFAULT_HISTORY_POLLING, type HistoryPolling } from '../services/upstream/connector.ts';
import { EngineClient } from '../services/upstream/engine-client.ts';
import type { EngineEndpoint } from '../services/upstream/types.ts';
import { WorkflowServiceAdapter } from '../services/workflow/adapter.ts';
import { NodeMapper } from '../services/workflow/node-mapper.ts';
import { WorkflowStore } from '../services/workflow/store.ts';
import { RelayHttpServer } from './http-server.ts';
import { RelayWebSocketServer } from './websocket-server.ts';

export interface RelayServerOptions {
  /** Overrides the /history polling schedule */
  historyDelayMs?: HistoryPolling['delayMs'];
}

export interface RelayAddresses {
  httpPort: number;
  wsPort: number;
}

export class RelayServer {
  readonly store = new WorkflowStore();
  readonly mapper: NodeMapper;
  readonly hub: BroadcastHub;
  readonly engine: EngineClient;
  readonly connector: UpstreamConnector;
  readonly coordinator: ExecutionCoordinator;

  private readonly httpServer: RelayHttpServer;
  private readonly wsServer: RelayWebSocketServer;
  private readLoop: Promise<void> | null = null;
  private started = false;

  constructor(
    private readonly settings: RelaySettings,
    options: RelayServerOptions = {}
  ) {
    const endpoint: EngineEndpoint = {
      host: settings.engine.host,
      port: settings.engine.port,
      connectTimeoutMs: settings.engine.connectTimeoutMs,
      requestTimeoutMs: settings.engine.requestTimeoutMs,
    };

    this.mapper = new NodeMapper(this.store, settings.nodeMappings);
    this.hub = new BroadcastHub({
      writeTimeoutMs: settings.relay.writeTimeoutMs,
      maxQueuedMessages: settings.relay.maxQueuedMessages,
    });
    this.engine = new EngineClient(endpoint);
    this.connector = new UpstreamConnector(endpoint, this.engine, this.hub, {
      attempts: settings.execution.historyAttempts,
      delayMs: options.historyDelayMs ?? DEFAULT_HISTORY_POLLING.delayMs,
    });
    this.coordinator = new ExecutionCoordinator(this.connector, this.hub, {
      saveImageNodeId: this.mapper.saveImageNodeId(),
      interruptGraceMs: settings.execution.interruptGraceMs,
    });

    this.coordinator.on('stateChange', ({ from, to, promptId }) => {
      verboseLog(`Execution ${from} -> ${to}${promptId ? ` (${promptId})` : ''}`);
    });

    this.httpServer = new RelayHttpServer(
      [
        new ExecutionServiceAdapter(this.coordinator, this.store, this.mapper, {
          timeoutMs: settings.execution.timeoutMs,
          engineAddress: `${endpoint.host}:${endpoint.port}`,
          engineConnected: () => this.connector.isConnected(),
          clientCount: () => this.hub.size(),
        }),
        new WorkflowServiceAdapter(this.store, this.mapper),
      ],
      { port: settings.http.port, hostname: settings.http.host }
    );
    this.wsServer = new RelayWebSocketServer(this.hub, {
      port: settings.relay.wsPort,
      hostname: settings.relay.host,
      heartbeatInterval: settings.relay.heartbeatIntervalMs,
    });
  }

  /**
   * Bring the relay up. Any failure before listening is fatal and leaves
   * nothing running.
   *
   * @throws UpstreamError UPSTREAM_UNREACHABLE
   * @throws WorkflowError LOAD_ERROR
   */
  async start(): Promise<RelayAddresses> {
    if (this.started) {
      throw new Error('RelayServer is already started');
    }
    this.started = true;

    try {
      verboseLog(`Checking engine at ${this.engine.baseUrl}...`);
      await this.engine.probe();

      await this.store.loadFromFile(this.settings.workflow.path);
      verboseLog(`Loaded workflow ${this.settings.workflow.path} (${this.store.nodeCount()} nodes)`);

      await this.connector.connect();
      this.readLoop = this.connector.readLoop(this.coordinator).then(() => {
        verboseLog('Engine event stream ended; /queue will fail until restart', 'warn');
      });

      const httpPort = await this.httpServer.start();
      const wsPort = await this.wsServer.start();
      return { httpPort, wsPort };
    } catch (error) {
      await this.stop();
      throw error;
    }
  }

  /**
   * Route one HTTP-style request without going over the network.
   */
  request(method: string, path: string, params: unknown = {}): Promise<RelayResponse> {
    return this.httpServer.dispatch(method, path, params);
  }

  async stop(): Promise<void> {
    debugLog('[RelayServer] Stopping');
    this.coordinator.dispose();
    await this.wsServer.stop();
    await this.httpServer.stop();
    await this.connector.close();
    await this.readLoop;
    this.readLoop = null;
    this.started = false;
  }
}
