/**
 * HTTP Request Validation Schemas
 *
 * Zod schemas for request bodies. Provides runtime type safety at the
 * API boundary.
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Common Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Node id or role name. Numbers are accepted for compatibility with clients
 * that send `"node_id": 59`.
 */
export const NodeIdSchema = z
  .union([z.string().trim().min(1, 'node_id is required'), z.number().int().nonnegative()])
  .transform((value) => String(value));

// ─────────────────────────────────────────────────────────────────────────────
// Workflow Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const UpdateTextParamsSchema = z.object({
  node_id: NodeIdSchema,
  text: z.string().min(1, 'text is required'),
  /** Preferred input field; falls back to the text field candidates */
  field: z.string().min(1).optional(),
});

export const UpdateImageParamsSchema = z.object({
  node_id: NodeIdSchema,
  filename: z.string().min(1, 'filename is required'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Execution Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const GenerateImageParamsSchema = z.object({
  image_description: z.object({
    description: z.string().min(1, 'description is required'),
    visualCue: z.string().optional().default(''),
    moodCue: z.string().optional().default(''),
  }),
});

export type UpdateTextParams = z.infer<typeof UpdateTextParamsSchema>;
export type UpdateImageParams = z.infer<typeof UpdateImageParamsSchema>;
export type GenerateImageParams = z.infer<typeof GenerateImageParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Validation Helper
// ─────────────────────────────────────────────────────────────────────────────

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; message: string };

/**
 * Validate a request body with a Zod schema.
 *
 * @returns Parsed data, or one message joining every issue
 */
export function validateParams<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: unknown
): ValidationResult<T> {
  const result = schema.safeParse(params);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  return { success: false, message: messages.join('; ') };
}
