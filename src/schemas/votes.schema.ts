// ============================================
// VOTESHIELD - Vote Schemas
// ============================================

import { z } from 'zod';

// Cast vote schema
export const castVoteSchema = z.object({
  pollId: z.string().min(1),
  optionId: z.string().min(1),
  idempotencyKey: z.string().min(1).max(255).optional(),
});

// Type exports
export type CastVoteBody = z.infer<typeof castVoteSchema>;
