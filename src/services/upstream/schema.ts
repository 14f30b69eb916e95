/**
 * Engine Response Schemas
 *
 * Only the fields the relay reads are declared; everything else the
 * engine sends passes through untouched.
 */

import { z } from 'zod';

export const PromptResponseSchema = z
  .object({
    prompt_id: z.string().optional(),
    number: z.number().optional(),
    node_errors: z.record(z.unknown()).optional(),
  })
  .passthrough();

/** Queue items are tuples with the prompt id at index 1 */
const QueueItemSchema = z.array(z.unknown());

export const QueueResponseSchema = z
  .object({
    queue_running: z.array(QueueItemSchema).default([]),
    queue_pending: z.array(QueueItemSchema).default([]),
  })
  .passthrough();

/**
 * `GET /history/{id}`: prompt id -> entry. Entries still being written
 * may lack `outputs`.
 */
export const HistoryResponseSchema = z.record(
  z.object({ outputs: z.unknown().optional() }).passthrough()
);

export type PromptResponse = z.infer<typeof PromptResponseSchema>;
export type QueueResponse = z.infer<typeof QueueResponseSchema>;
