/**
 * Workflow Graph Validation Schema
 *
 * Zod schemas for the engine's API-format workflow JSON.
 */

import { z } from 'zod';
import type { InputValue } from './types.ts';

/**
 * Any JSON value an input may hold. Node references (`["4", 0]`) are
 * plain two-element arrays.
 */
export const InputValueSchema: z.ZodType<InputValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(InputValueSchema),
    z.record(InputValueSchema),
  ])
);

export const WorkflowNodeSchema = z
  .object({
    class_type: z.string().min(1, 'class_type is required'),
    inputs: z.record(InputValueSchema),
    _meta: z.object({ title: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const WorkflowGraphSchema = z
  .record(WorkflowNodeSchema)
  .refine((graph) => Object.keys(graph).length > 0, 'workflow has no nodes');

/**
 * Flatten zod issues into one line.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
