/**
 * ClientChannel Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTextEvent, parseBinaryFrame, type RelayEvent } from '../../../src/protocol/events.ts';
import { ClientChannel } from '../../../src/services/broadcast/client-channel.ts';
import { FakeTransport } from '../../helpers/index.ts';

const OPTIONS = { writeTimeoutMs: 1000, maxQueuedMessages: 3 };

function progress(value: number): RelayEvent {
  return createTextEvent('progress', { value, max: 10 });
}

describe('ClientChannel', () => {
  let onFailure: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    onFailure = vi.fn();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should write frames in enqueue order', () => {
    const transport = new FakeTransport('client-1');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);

    channel.enqueue(progress(1));
    channel.enqueue(progress(2));
    channel.enqueue(progress(3));

    expect(transport.texts()).toEqual([
      '{"type":"progress","data":{"value":1,"max":10}}',
      '{"type":"progress","data":{"value":2,"max":10}}',
      '{"type":"progress","data":{"value":3,"max":10}}',
    ]);
    expect(onFailure).not.toHaveBeenCalled();
  });

  it('should write one frame at a time', () => {
    const transport = new FakeTransport('client-1', 'manual');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);

    channel.enqueue(progress(1));
    channel.enqueue(progress(2));

    expect(transport.sent).toHaveLength(1);
    expect(channel.pending()).toBe(1);

    transport.flushNext();

    expect(transport.sent).toHaveLength(2);
    expect(channel.pending()).toBe(0);
  });

  it('should forward binary frames untouched', () => {
    const transport = new FakeTransport('client-1');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);
    const raw = Buffer.from([1, 0, 0, 0, 0, 0, 0, 0, 0x89, 0x50, 0x4e, 0x47]);
    const parsed = parseBinaryFrame(raw);
    if (!parsed.ok) throw new Error(parsed.reason);

    channel.enqueue(parsed.event);

    expect(transport.sent).toEqual([{ data: raw, binary: true }]);
  });

  it('should drop a client whose queue overflows', () => {
    const transport = new FakeTransport('client-1', 'stall');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);

    // One frame in flight plus three queued
    expect(channel.enqueue(progress(1))).toBe(true);
    expect(channel.enqueue(progress(2))).toBe(true);
    expect(channel.enqueue(progress(3))).toBe(true);
    expect(channel.enqueue(progress(4))).toBe(true);
    expect(channel.enqueue(progress(5))).toBe(false);

    expect(transport.terminated).toBe(true);
    expect(channel.isClosed()).toBe(true);
    expect(onFailure).toHaveBeenCalledWith('client-1', 'queue overflow (3 frames pending)');
  });

  it('should drop a client whose write does not finish in time', () => {
    vi.useFakeTimers();
    const transport = new FakeTransport('client-1', 'stall');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);

    channel.enqueue(progress(1));
    vi.advanceTimersByTime(999);
    expect(transport.terminated).toBe(false);

    vi.advanceTimersByTime(1);

    expect(transport.terminated).toBe(true);
    expect(onFailure).toHaveBeenCalledWith('client-1', 'write timed out after 1000ms');
  });

  it('should drop a client whose write fails', () => {
    const transport = new FakeTransport('client-1', 'fail');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);

    channel.enqueue(progress(1));

    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure).toHaveBeenCalledWith('client-1', 'write failed: connection reset');
    expect(channel.enqueue(progress(2))).toBe(false);
    expect(transport.sent).toHaveLength(1);
  });

  it('should ignore a completion that arrives after the timeout', () => {
    vi.useFakeTimers();
    const transport = new FakeTransport('client-1', 'manual');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);

    channel.enqueue(progress(1));
    channel.enqueue(progress(2));
    vi.advanceTimersByTime(1000);
    transport.flushNext();

    expect(transport.sent).toHaveLength(1);
    expect(onFailure).toHaveBeenCalledTimes(1);
  });

  it('should close cleanly and discard queued frames', () => {
    const transport = new FakeTransport('client-1', 'manual');
    const channel = new ClientChannel(transport, OPTIONS, onFailure);

    channel.enqueue(progress(1));
    channel.enqueue(progress(2));
    channel.close(1001, 'Relay shutting down');

    expect(transport.closedWith).toEqual({ code: 1001, reason: 'Relay shutting down' });
    expect(channel.pending()).toBe(0);
    expect(transport.terminated).toBe(false);
    expect(onFailure).not.toHaveBeenCalled();

    transport.flushNext();
    expect(transport.sent).toHaveLength(1);
  });
});
