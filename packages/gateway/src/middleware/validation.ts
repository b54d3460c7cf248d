/**
 * Request validation using Zod
 *
 * Schemas for the memory endpoints. Failures surface as ValidationError
 * and leave the API as 422.
 */

import { z } from 'zod';
import { ValidationError } from '@memvault/core';

const nonBlank = (field: string) =>
  z.string().refine((value) => value.trim().length > 0, { message: `${field} must not be blank` });

// ─── Memory Schemas ──────────────────────────────────────────────

export const saveMemorySchema = z.object({
  owner_id: nonBlank('owner_id'),
  key: z.string().nullish(),
  tags: z.array(z.string().min(1, 'tags must not contain empty strings')).nullish(),
  data: z.string(),
});

export type SaveMemoryBody = z.infer<typeof saveMemorySchema>;

export const queryMemorySchema = z.object({
  emotion: z.string().nullish(),
  keyword: z.string().nullish(),
  match: z.enum(['any', 'all']).nullish(),
});

export type QueryMemoryBody = z.infer<typeof queryMemorySchema>;

// ─── Helpers ─────────────────────────────────────────────────────

/**
 * Validate a parsed body. Throws ValidationError listing every issue.
 */
export function validateBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const errors = result.error.issues.map((i) => ({
      path: i.path.map(String),
      message: i.message,
    }));
    const issues = errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ');
    throw new ValidationError(`Validation failed: ${issues}`, { errors });
  }
  return result.data;
}
