// ============================================
// VOTESHIELD - Fraud Administration Schemas
// ============================================

import { z } from 'zod';
import { paginationSchema, queryBooleanSchema } from './common.schema.js';

export const fingerprintParamSchema = z.object({
  fingerprint: z.string().trim().min(1).transform(v => v.toLowerCase()),
});

// Manual block schema
export const blockFingerprintSchema = z.object({
  fingerprint: z.string().trim().min(1).transform(v => v.toLowerCase()),
  reason: z.string().trim().min(1).max(500),
});

export const listBlocksQuerySchema = paginationSchema.extend({
  activeOnly: queryBooleanSchema.default('true'),
});

// On-demand analysis schema
export const analyzeSchema = z.object({
  pollId: z.string().min(1).optional(),
  windowHours: z.number().positive().max(24 * 30).default(24),
});

export const listAlertsQuerySchema = paginationSchema.extend({
  pollId: z.string().min(1).optional(),
});

// Type exports
export type BlockFingerprintInput = z.infer<typeof blockFingerprintSchema>;
export type AnalyzeInput = z.infer<typeof analyzeSchema>;
