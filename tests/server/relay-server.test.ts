/**
 * RelayServer Tests
 *
 * End-to-end against an in-process fake engine, with the relay's HTTP and
 * WebSocket servers on ephemeral ports.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebSocket } from 'ws';
import { RelaySettingsSchema, type RelaySettings } from '../../src/config/settings.ts';
import { RelayServer } from '../../src/server/relay-server.ts';
import { UpstreamErrorCode } from '../../src/services/upstream/errors.ts';
import { WorkflowErrorCode } from '../../src/services/workflow/errors.ts';
import { FakeEngine, fixturePath, sampleMapping } from '../helpers/index.ts';

function relaySettings(enginePort: number, workflowPath = fixturePath('workflow_api.json')): RelaySettings {
  return RelaySettingsSchema.parse({
    engine: { host: '127.0.0.1', port: enginePort, connectTimeoutMs: 2000, requestTimeoutMs: 2000 },
    http: { host: '127.0.0.1', port: 0 },
    relay: { host: '127.0.0.1', wsPort: 0, heartbeatIntervalMs: 0 },
    workflow: { path: workflowPath },
    execution: { timeoutMs: 5000, interruptGraceMs: 0, historyAttempts: 2 },
    nodeMappings: sampleMapping(),
    logging: { verbose: false },
  });
}

interface Listener {
  socket: WebSocket;
  frames: string[];
}

async function listen(port: number): Promise<Listener> {
  const socket = new WebSocket(`ws://127.0.0.1:${port}`);
  const frames: string[] = [];
  socket.on('message', (data) => frames.push(String(data)));
  await new Promise<void>((resolve, reject) => {
    socket.once('open', () => resolve());
    socket.once('error', reject);
  });
  return { socket, frames };
}

describe('RelayServer', () => {
  let engine: FakeEngine;
  let relay: RelayServer;
  let httpUrl: string;
  let wsPort: number;
  const listeners: Listener[] = [];

  beforeEach(async () => {
    engine = new FakeEngine();
    relay = new RelayServer(relaySettings(await engine.start()), { historyDelayMs: () => 0 });
    const ports = await relay.start();
    httpUrl = `http://127.0.0.1:${ports.httpPort}`;
    wsPort = ports.wsPort;
  });

  afterEach(async () => {
    listeners.splice(0).forEach(({ socket }) => socket.terminate());
    await relay.stop();
    await engine.stop();
  });

  async function addListener(): Promise<Listener> {
    const listener = await listen(wsPort);
    listeners.push(listener);
    return listener;
  }

  async function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${httpUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('should answer health checks', async () => {
    const response = await fetch(`${httpUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ STATUS: 'Workflow relay is running' });
  });

  it('should report status', async () => {
    await addListener();
    await vi.waitFor(() => expect(relay.hub.size()).toBe(1));

    const response = await relay.request('GET', '/status');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      STATUS: 'Server running',
      execution_status: 'idle',
      workflow_loaded: true,
      connected_ws_clients: 1,
      engine_server: `127.0.0.1:${engine.port}`,
      engine_connected: true,
      save_image_node_id: '9',
    });
  });

  it('should relay engine events to every client in order', async () => {
    const first = await addListener();
    const second = await addListener();
    await vi.waitFor(() => expect(relay.hub.size()).toBe(2));

    const frames = [
      '{"type":"execution_start","data":{"prompt_id":"p-x"}}',
      '{"type":"progress","data":{"value":1,"max":2}}',
      '{"type":"progress","data":{"value":2,"max":2}}',
    ];
    frames.forEach((frame) => engine.sendRaw(frame));

    await vi.waitFor(() => expect(first.frames).toHaveLength(3));
    await vi.waitFor(() => expect(second.frames).toHaveLength(3));
    expect(first.frames).toEqual(frames);
    expect(second.frames).toEqual(frames);
  });

  it('should run an edited workflow end to end', async () => {
    const listener = await addListener();
    await vi.waitFor(() => expect(relay.hub.size()).toBe(1));

    const update = await post('/update/text', { node_id: '6', text: 'a harbor at dusk' });
    expect(await update.json()).toEqual({
      STATUS: 'Updated text in node 6 successfully',
      node_id: '6',
      field: 'text',
    });

    const pending = fetch(`${httpUrl}/queue`);
    await vi.waitFor(() => expect(engine.socketMessages).toHaveLength(1));

    engine.emit('execution_start', { prompt_id: 'prompt-1' });
    engine.emit('executed', {
      node: '9',
      prompt_id: 'prompt-1',
      output: { images: [{ filename: 'scene_00001.png', subfolder: '', type: 'output' }] },
    });
    engine.emit('execution_success', { prompt_id: 'prompt-1' });

    const response = await pending;
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      STATUS: 'Workflow completed successfully',
      image_filename: 'scene_00001.png',
      image_url: `http://127.0.0.1:${engine.port}/view?filename=scene_00001.png&type=output`,
    });

    const submitted = engine.requestsTo('POST', '/prompt')[0]?.body;
    expect(submitted).toMatchObject({
      client_id: 'engine-session-1',
      prompt: { '6': { inputs: { text: 'a harbor at dusk' } } },
    });

    await vi.waitFor(() => expect(listener.frames.at(-1)).toContain('"type":"image_generated"'));
    expect(relay.coordinator.getState()).toBe('completed');
  });

  it('should reject a second queue call while a job runs', async () => {
    const pending = fetch(`${httpUrl}/queue`);
    await vi.waitFor(() => expect(engine.socketMessages).toHaveLength(1));

    const second = await fetch(`${httpUrl}/queue`);

    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({
      STATUS: 'Error: Workflow is already running (state: queued)',
      error: 'ALREADY_RUNNING',
    });

    engine.emit('execution_interrupted', { prompt_id: 'prompt-1' });
    expect((await pending).status).toBe(500);
  });

  it('should fail the blocked caller when the engine connection drops', async () => {
    const pending = fetch(`${httpUrl}/queue`);
    await vi.waitFor(() => expect(engine.socketMessages).toHaveLength(1));

    engine.dropConnections();

    const response = await pending;
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      STATUS: 'Error: generation failed - upstream connection closed (code 1006)',
      error: 'EXECUTION_FAILED',
    });
  });

  it('should report an engine rejection as 502', async () => {
    engine.rejectPrompt = { status: 400, body: { error: 'invalid prompt' } };

    const response = await fetch(`${httpUrl}/queue`);

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      STATUS: 'Error: Engine rejected workflow (HTTP 400): {"error":"invalid prompt"}',
      error: 'SUBMISSION_REJECTED',
    });
    expect(relay.coordinator.getState()).toBe('errored');
  });

  it('should acknowledge an interrupt and forward it', async () => {
    const response = await post('/interrupt', {});

    expect(await response.json()).toEqual({ STATUS: 'Interrupt request received, processing...' });
    await vi.waitFor(() => expect(engine.requestsTo('POST', '/interrupt')).toHaveLength(1));
  });

  it('should leave the workflow unchanged on a rejected update', async () => {
    const response = await post('/update/image', { node_id: '6', filename: 'upload_01.png' });

    expect(response.status).toBe(422);
    expect(relay.store.hasField('6', 'image')).toBe(false);
  });
});

describe('RelayServer startup', () => {
  it('should fail when the engine is unreachable', async () => {
    const stopped = new FakeEngine();
    const port = await stopped.start();
    await stopped.stop();

    await expect(new RelayServer(relaySettings(port)).start()).rejects.toMatchObject({
      code: UpstreamErrorCode.UPSTREAM_UNREACHABLE,
    });
  });

  it('should fail when the workflow cannot be loaded', async () => {
    const engine = new FakeEngine();
    const port = await engine.start();
    try {
      const relay = new RelayServer(relaySettings(port, fixturePath('missing.json')));

      await expect(relay.start()).rejects.toMatchObject({ code: WorkflowErrorCode.LOAD_ERROR });
      expect(engine.socketClientIds).toHaveLength(0);
    } finally {
      await engine.stop();
    }
  });
});
