import { z } from 'zod';

// ---------------------------------------------------------------------------
// Shared Zod schemas for request validation across all API routes
// ---------------------------------------------------------------------------

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export type IdParamInput = z.infer<typeof idParamSchema>;

/**
 * Builds the standard list response envelope.
 */
export function listResponse<T>(data: T[]): { data: T[]; total: number } {
  return { data, total: data.length };
}
