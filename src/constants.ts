/**
 * Application Constants
 *
 * Timeouts, ports, wire constants and response strings shared across
 * the relay.
 */

// ==================== Timeouts ====================

/**
 * Timeout values in milliseconds
 */
export const TIMEOUTS = {
  /** Upstream socket handshake */
  UPSTREAM_CONNECT: 10_000,

  /** Single HTTP call to the engine */
  UPSTREAM_REQUEST: 30_000,

  /** Blocking /queue call (5 minutes) */
  EXECUTION: 300_000,

  /** How long an interrupt may go unacknowledged before forcing `interrupted` */
  INTERRUPT_GRACE: 10_000,

  /** Per-frame write to a downstream client */
  CLIENT_WRITE: 5_000,

  /** Downstream ping interval */
  HEARTBEAT: 30_000,
} as const;

// ==================== Ports ====================

export const DEFAULT_PORTS = {
  ENGINE: 8188,
  HTTP: 8189,
  RELAY_WS: 8190,
} as const;

// ==================== Relay ====================

/** Frames a slow client may have queued before it is disconnected */
export const MAX_QUEUED_MESSAGES = 256;

/** Binary frames start with a little-endian u64 event-type code */
export const BINARY_HEADER_BYTES = 8;

/** Attempts made against /history when the executed event carried no image */
export const HISTORY_ATTEMPTS = 12;

/**
 * Input fields that take free text, in lookup order.
 * The first one present on a node wins.
 */
export const TEXT_FIELD_CANDIDATES = [
  'text',
  'prompt',
  'value',
  'text_positive',
  'text_negative',
  'system',
  'style',
  'style_name',
  'key',
  'url',
  'model',
] as const;

/** Role name of the node whose output image is reported */
export const SAVE_IMAGE_ROLE = 'save_image_node';
export const DEFAULT_SAVE_IMAGE_NODE_ID = '9';

// ==================== Responses ====================

export const STATUS_MESSAGES = {
  HEALTHY: 'Workflow relay is running',
  COMPLETED: 'Workflow completed successfully',
  INTERRUPT_RECEIVED: 'Interrupt request received, processing...',
} as const;
