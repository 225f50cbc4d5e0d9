// ============================================
// VOTESHIELD - Fingerprint Activity Cache
// ============================================

import { z } from 'zod';
import { CACHE_KEYS } from '../config/fraud.js';
import type { VolatileCache } from '../cache/volatile-cache.js';

export const deepAnalysisSchema = z.object({
  analyzedAt: z.string(),
  windowHours: z.number(),
  totalVotes: z.number(),
  distinctUsers: z.number(),
  distinctIps: z.number(),
  riskScore: z.number(),
  reasons: z.array(z.string()),
});

export type DeepAnalysis = z.infer<typeof deepAnalysisSchema>;

export interface ActivitySnapshot {
  fingerprint: string;
  pollId: string;
  count: number;
  users: string[];
  ips: string[];
  userCount: number;
  ipCount: number;
  analysis: DeepAnalysis | null;
}

/**
 * Short-lived per (fingerprint, poll) usage counters. Approximate by
 * nature: entries expire and may be lost, so nothing here may justify a
 * block without a durable lookup. Errors are thrown to the caller.
 */
export class FingerprintActivityCache {
  constructor(
    private cache: VolatileCache,
    private ttlSeconds: number = 3600
  ) {}

  keyFor(fingerprint: string, pollId: string): string {
    return `${CACHE_KEYS.FINGERPRINT_ACTIVITY_PREFIX}${fingerprint}:${pollId}`;
  }

  async record(fingerprint: string, pollId: string, userId: string | null, ip: string | null): Promise<void> {
    const key = this.keyFor(fingerprint, pollId);
    await Promise.all([
      this.cache.increment(`${key}:count`, this.ttlSeconds),
      this.cache.addToSet(`${key}:users`, userId ? [userId] : [], this.ttlSeconds),
      this.cache.addToSet(`${key}:ips`, ip ? [ip] : [], this.ttlSeconds),
    ]);
  }

  async read(fingerprint: string, pollId: string): Promise<ActivitySnapshot | null> {
    const key = this.keyFor(fingerprint, pollId);
    const [rawCount, users, ips, rawAnalysis] = await Promise.all([
      this.cache.get(`${key}:count`),
      this.cache.members(`${key}:users`),
      this.cache.members(`${key}:ips`),
      this.cache.get(`${key}:analysis`),
    ]);

    const count = typeof rawCount === 'number' ? rawCount : Number(rawCount ?? 0);
    const analysis = deepAnalysisSchema.safeParse(rawAnalysis);

    if (!count && users.length === 0 && ips.length === 0 && !analysis.success) {
      return null;
    }

    return {
      fingerprint,
      pollId,
      count: Number.isFinite(count) ? count : 0,
      users,
      ips,
      userCount: users.length,
      ipCount: ips.length,
      analysis: analysis.success ? analysis.data : null,
    };
  }

  async storeAnalysis(fingerprint: string, pollId: string, analysis: DeepAnalysis): Promise<void> {
    await this.cache.set(`${this.keyFor(fingerprint, pollId)}:analysis`, analysis, this.ttlSeconds);
  }
}
