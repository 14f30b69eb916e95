/**
 * Relay Event Types
 *
 * Frames received from the engine's event socket. Events are immutable
 * once built and carry the exact bytes they arrived with, so the hub can
 * forward them without re-encoding.
 */

import { BINARY_HEADER_BYTES } from '../constants.ts';

/**
 * JSON frame `{type, data}`.
 */
export interface TextEvent {
  readonly kind: 'text';
  readonly type: string;
  readonly data: Readonly<Record<string, unknown>>;
  /** Frame exactly as received */
  readonly raw: string;
}

/**
 * Binary frame: 8-byte little-endian event-type code, then opaque image bytes.
 */
export interface BinaryEvent {
  readonly kind: 'binary';
  readonly eventTypeCode: bigint;
  readonly payload: Buffer;
  /** Frame exactly as received, header included */
  readonly raw: Buffer;
}

export type RelayEvent = TextEvent | BinaryEvent;

/**
 * Event types the execution state machine reacts to.
 */
export const EngineEventTypes = {
  STATUS: 'status',
  EXECUTION_START: 'execution_start',
  EXECUTION_CACHED: 'execution_cached',
  EXECUTING: 'executing',
  PROGRESS: 'progress',
  EXECUTED: 'executed',
  EXECUTION_SUCCESS: 'execution_success',
  EXECUTION_COMPLETE: 'execution_complete',
  EXECUTION_ERROR: 'execution_error',
  EXECUTION_INTERRUPTED: 'execution_interrupted',
} as const;

export type FrameParseResult =
  | { ok: true; event: RelayEvent }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build a TextEvent from a JSON frame.
 */
export function parseTextFrame(raw: string): FrameParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid JSON' };
  }

  if (!isRecord(parsed) || typeof parsed.type !== 'string') {
    return { ok: false, reason: 'missing event type' };
  }

  const data: Record<string, unknown> = isRecord(parsed.data) ? parsed.data : {};
  const event: TextEvent = { kind: 'text', type: parsed.type, data: Object.freeze(data), raw };
  return { ok: true, event: Object.freeze(event) };
}

/**
 * Build a BinaryEvent from a binary frame.
 */
export function parseBinaryFrame(raw: Buffer): FrameParseResult {
  if (raw.length < BINARY_HEADER_BYTES) {
    return { ok: false, reason: `short binary frame (${raw.length} bytes)` };
  }

  const event: BinaryEvent = {
    kind: 'binary',
    eventTypeCode: raw.readBigUInt64LE(0),
    payload: raw.subarray(BINARY_HEADER_BYTES),
    raw,
  };
  return { ok: true, event: Object.freeze(event) };
}

/**
 * Encode a locally produced event the same way the engine does.
 */
export function createTextEvent(type: string, data: Record<string, unknown>): TextEvent {
  const event: TextEvent = {
    kind: 'text',
    type,
    data: Object.freeze({ ...data }),
    raw: JSON.stringify({ type, data }),
  };
  return Object.freeze(event);
}

/**
 * Short label for log lines.
 */
export function describeEvent(event: RelayEvent): string {
  return event.kind === 'text'
    ? `'${event.type}'`
    : `binary (${event.payload.length} bytes, event type ${event.eventTypeCode})`;
}
