/**
 * UpstreamConnector Tests
 *
 * Runs against an in-process fake engine.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RelayEvent } from '../../../src/protocol/events.ts';
import { UpstreamConnector } from '../../../src/services/upstream/connector.ts';
import { EngineClient } from '../../../src/services/upstream/engine-client.ts';
import { UpstreamErrorCode } from '../../../src/services/upstream/errors.ts';
import type { EngineEndpoint, ExecutionEventSink } from '../../../src/services/upstream/types.ts';
import { WorkflowStore } from '../../../src/services/workflow/store.ts';
import { FakeEngine, RecordingBroadcaster, sampleWorkflow } from '../../helpers/index.ts';

class RecordingSink implements ExecutionEventSink {
  readonly events: RelayEvent[] = [];
  readonly disconnects: string[] = [];

  handleEvent(event: RelayEvent): void {
    this.events.push(event);
  }

  handleDisconnect(reason: string): void {
    this.disconnects.push(reason);
  }
}

function endpoint(port: number): EngineEndpoint {
  return { host: '127.0.0.1', port, connectTimeoutMs: 2000, requestTimeoutMs: 2000 };
}

describe('UpstreamConnector', () => {
  let engine: FakeEngine;
  let broadcaster: RecordingBroadcaster;
  let connector: UpstreamConnector;

  function createConnector(port: number): UpstreamConnector {
    const target = endpoint(port);
    return new UpstreamConnector(target, new EngineClient(target), broadcaster, {
      attempts: 3,
      delayMs: () => 0,
    });
  }

  beforeEach(async () => {
    engine = new FakeEngine();
    broadcaster = new RecordingBroadcaster();
    connector = createConnector(await engine.start());
  });

  afterEach(async () => {
    await connector.close();
    await engine.stop();
  });

  describe('connect', () => {
    it('should connect with its client id', async () => {
      await connector.connect();
      await engine.waitForConnection();

      expect(connector.isConnected()).toBe(true);
      expect(connector.url).toBe(`ws://127.0.0.1:${engine.port}/ws?clientId=${engine.socketClientIds[0]}`);
    });


    it('should fail with UPSTREAM_UNREACHABLE when nothing listens', async () => {
      const stopped = new FakeEngine();
      const port = await stopped.start();
      await stopped.stop();
      const unreachable = createConnector(port);

      await expect(unreachable.connect()).rejects.toMatchObject({
        code: UpstreamErrorCode.UPSTREAM_UNREACHABLE,
      });
      expect(unreachable.isConnected()).toBe(false);
    });

    it('should connect on a later attempt after a refused handshake', async () => {
      const sink = new RecordingSink();
      engine.refuseSockets = true;

      await expect(connector.connect()).rejects.toMatchObject({
        code: UpstreamErrorCode.UPSTREAM_UNREACHABLE,
      });
      expect(connector.isConnected()).toBe(false);

      engine.refuseSockets = false;
      await connector.connect();
      await engine.waitForConnection();
      void connector.readLoop(sink);

      expect(connector.isConnected()).toBe(true);
      expect(engine.socketClientIds).toHaveLength(1);
      expect(sink.disconnects).toEqual([]);
    });
  });

  describe('event relay', () => {
    it('should broadcast and dispatch frames in arrival order', async () => {
      const sink = new RecordingSink();
      await connector.connect();
      void connector.readLoop(sink);
      await vi.waitFor(() => expect(broadcaster.types()).toEqual(['status']));

      engine.emit('execution_start', { prompt_id: 'prompt-1' });
      engine.sendRaw(Buffer.from([1, 0, 0, 0, 0, 0, 0, 0, 0x89, 0x50]), true);
      engine.emit('progress', { value: 1, max: 4, prompt_id: 'prompt-1' });

      await vi.waitFor(() => expect(broadcaster.events).toHaveLength(4));
      expect(broadcaster.events.map((event) => (event.kind === 'text' ? event.type : 'binary'))).toEqual([
        'status',
        'execution_start',
        'binary',
        'progress',
      ]);
      // The status frame may arrive before or after the sink is attached
      const dispatched = sink.events.filter((event) => event.kind === 'binary' || event.type !== 'status');
      expect(dispatched.map((event) => (event.kind === 'text' ? event.type : 'binary'))).toEqual([
        'execution_start',
        'binary',
        'progress',
      ]);
    });

    it('should forward text frames byte for byte', async () => {
      await connector.connect();
      await vi.waitFor(() => expect(broadcaster.events).toHaveLength(1));

      const frame = '{"type":"progress",  "data":{"value":2,"max":4}}';
      engine.sendRaw(frame);

      await vi.waitFor(() => expect(broadcaster.events).toHaveLength(2));
      expect(broadcaster.events[1]?.raw).toBe(frame);
    });

    it('should skip malformed frames and keep reading', async () => {
      await connector.connect();
      await vi.waitFor(() => expect(broadcaster.events).toHaveLength(1));

      engine.sendRaw('not json');
      engine.sendRaw(Buffer.from([1, 2, 3]), true);
      engine.sendRaw('{"data":{}}');
      engine.emit('executing', { node: '6' });

      await vi.waitFor(() => expect(broadcaster.types()).toEqual(['status', 'executing']));
      expect(broadcaster.events).toHaveLength(2);
    });

    it('should report a dropped connection to the sink', async () => {
      const sink = new RecordingSink();
      await connector.connect();
      await engine.waitForConnection();
      const loop = connector.readLoop(sink);

      engine.dropConnections();
      await loop;

      expect(sink.disconnects).toEqual(['upstream connection closed (code 1006)']);
      expect(connector.isConnected()).toBe(false);
    });
  });

  describe('submit', () => {
    it('should submit under the engine session id and subscribe to the prompt', async () => {
      await connector.connect();
      await vi.waitFor(() => expect(broadcaster.types()).toEqual(['status']));
      const store = new WorkflowStore();
      store.load(sampleWorkflow());

      const promptId = await connector.submit(store.snapshot());

      expect(promptId).toBe('prompt-1');
      expect(engine.requestsTo('POST', '/prompt')[0]?.body).toMatchObject({
        client_id: 'engine-session-1',
      });
      await vi.waitFor(() =>
        expect(engine.socketMessages).toEqual([
          { op: 'subscribe_to_prompt', data: { prompt_id: 'prompt-1' } },
        ])
      );
    });

    it('should refuse to submit without a connection', async () => {
      await expect(connector.submit({})).rejects.toMatchObject({
        code: UpstreamErrorCode.UPSTREAM_UNREACHABLE,
      });
      expect(engine.requestsTo('POST', '/prompt')).toHaveLength(0);
    });
  });

  describe('fetchOutputImage', () => {
    it('should return the image once the history has it', async () => {
      engine.history['prompt-1'] = {
        outputs: { '9': { images: [{ filename: 'scene_00001.png', subfolder: '', type: 'output' }] } },
      };

      const image = await connector.fetchOutputImage('prompt-1', '9');

      expect(image).toEqual({ filename: 'scene_00001.png', subfolder: '', type: 'output' });
      expect(engine.requestsTo('HEAD', '/view?filename=scene_00001.png&type=output')).toHaveLength(1);
    });

    it('should give up after the configured attempts', async () => {
      expect(await connector.fetchOutputImage('prompt-1', '9')).toBeNull();
      expect(engine.requestsTo('GET', '/history/prompt-1')).toHaveLength(3);
    });
  });

  describe('clearQueue', () => {
    it('should return the number of deleted prompts', async () => {
      engine.queue = { queue_running: [[0, 'prompt-a', {}]], queue_pending: [] };
      expect(await connector.clearQueue()).toBe(1);
    });
  });

  it('should close the connection', async () => {
    await connector.connect();

    await connector.close();

    expect(connector.isConnected()).toBe(false);
  });
});
