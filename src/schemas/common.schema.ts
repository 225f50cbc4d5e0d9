// ============================================
// VOTESHIELD - Common Schemas
// ============================================

import { z } from 'zod';

// Pagination schema
export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

// ID param schema
export const idParamSchema = z.object({
  id: z.string().min(1),
});

// Query-string booleans arrive as text
export const queryBooleanSchema = z.enum(['true', 'false']).transform(v => v === 'true');

// Type exports
export type PaginationInput = z.infer<typeof paginationSchema>;
