/**
 * Relay Settings
 *
 * Typed configuration with defaults. Every section is optional in the
 * config file; anything left out takes the default below.
 */

import { z } from 'zod';
import { DEFAULT_PORTS, HISTORY_ATTEMPTS, MAX_QUEUED_MESSAGES, TIMEOUTS } from '../constants.ts';

const port = z.number().int().min(0).max(65535);
const duration = z.number().int().nonnegative();
const positiveDuration = z.number().int().positive();

const RoleMapSchema = z.record(z.string().min(1));

export const RelaySettingsSchema = z.object({
  engine: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: port.default(DEFAULT_PORTS.ENGINE),
      connectTimeoutMs: positiveDuration.default(TIMEOUTS.UPSTREAM_CONNECT),
      requestTimeoutMs: positiveDuration.default(TIMEOUTS.UPSTREAM_REQUEST),
    })
    .default({}),

  http: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: port.default(DEFAULT_PORTS.HTTP),
    })
    .default({}),

  relay: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      wsPort: port.default(DEFAULT_PORTS.RELAY_WS),
      writeTimeoutMs: positiveDuration.default(TIMEOUTS.CLIENT_WRITE),
      maxQueuedMessages: z.number().int().positive().default(MAX_QUEUED_MESSAGES),
      /** 0 disables the heartbeat */
      heartbeatIntervalMs: duration.default(TIMEOUTS.HEARTBEAT),
    })
    .default({}),

  workflow: z
    .object({
      path: z.string().min(1).default('workflows/workflow_api.json'),
    })
    .default({}),

  execution: z
    .object({
      timeoutMs: positiveDuration.default(TIMEOUTS.EXECUTION),
      /** 0 disables the local interrupt fallback */
      interruptGraceMs: duration.default(TIMEOUTS.INTERRUPT_GRACE),
      historyAttempts: z.number().int().positive().default(HISTORY_ATTEMPTS),
    })
    .default({}),

  nodeMappings: z
    .object({
      roles: RoleMapSchema.default({}),
      variants: z.record(RoleMapSchema).default({}),
    })
    .default({}),

  logging: z
    .object({
      debug: z.boolean().default(false),
      logFile: z.string().min(1).default('debug.log'),
      verbose: z.boolean().default(true),
    })
    .default({}),
});

export type RelaySettings = z.infer<typeof RelaySettingsSchema>;

/**
 * Settings as written in a config file, before defaults are applied.
 */
export type RelaySettingsInput = z.input<typeof RelaySettingsSchema>;

export function defaultSettings(): RelaySettings {
  return RelaySettingsSchema.parse({});
}
