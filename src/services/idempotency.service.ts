// ============================================
// VOTESHIELD - Idempotency Store
// ============================================

import { z } from 'zod';
import { CACHE_KEYS } from '../config/fraud.js';
import { sha256Hex } from '../utils/voter-identity.js';
import type { VolatileCache } from '../cache/volatile-cache.js';
import type { VoteRepository } from '../repositories/vote.repository.js';
import type { Logger } from '../utils/logger.js';

const KEY_PATTERN = /^[0-9a-f]{64}$/i;
const DEFAULT_TTL_SECONDS = 3600;

const cachedVoteResultSchema = z.object({
  voteId: z.string(),
  pollId: z.string(),
  optionId: z.string(),
  voterToken: z.string(),
  createdAt: z.string(),
});

export type CachedVoteResult = z.infer<typeof cachedVoteResultSchema>;

export interface CacheCheck {
  isDuplicate: boolean;
  cachedResult: CachedVoteResult | null;
}

export interface DurableCheck {
  isDuplicate: boolean;
  existingVoteId: string | null;
}

export function deriveIdempotencyKey(voterId: string, pollId: string, optionId: string): string {
  return sha256Hex(`${voterId}:${pollId}:${optionId}`);
}

export function isValidIdempotencyKey(key: string | null | undefined): key is string {
  return typeof key === 'string' && KEY_PATTERN.test(key);
}

/**
 * Turn whatever the client sent into the key stored on the vote. Well-formed
 * keys pass through; anything else is scoped to the voter so two voters can
 * never share a free-form key.
 */
export function resolveIdempotencyKey(
  clientKey: string | null | undefined,
  voterToken: string,
  pollId: string,
  optionId: string
): string {
  if (isValidIdempotencyKey(clientKey)) {
    return clientKey.toLowerCase();
  }
  if (clientKey) {
    return sha256Hex(`${voterToken}:${pollId}:${clientKey}`);
  }
  return deriveIdempotencyKey(voterToken, pollId, optionId);
}

export class IdempotencyStore {
  constructor(
    private cache: VolatileCache,
    private votes: VoteRepository,
    private logger: Logger,
    private ttlSeconds: number = DEFAULT_TTL_SECONDS
  ) {}

  deriveKey(voterId: string, pollId: string, optionId: string): string {
    return deriveIdempotencyKey(voterId, pollId, optionId);
  }

  validate(key: string | null | undefined): boolean {
    return isValidIdempotencyKey(key);
  }

  cacheKey(key: string): string {
    return `${CACHE_KEYS.IDEMPOTENCY_PREFIX}${key}`;
  }

  /**
   * Fast-path lookup. Cache trouble reads as "not a duplicate"; the
   * durable check decides.
   */
  async check(key: string): Promise<CacheCheck> {
    if (!this.validate(key)) {
      return { isDuplicate: false, cachedResult: null };
    }

    let raw: unknown;
    try {
      raw = await this.cache.get(this.cacheKey(key));
    } catch (err) {
      this.logger.warn({ err, key }, 'Idempotency cache lookup failed');
      return { isDuplicate: false, cachedResult: null };
    }

    if (raw === null || raw === undefined) {
      return { isDuplicate: false, cachedResult: null };
    }

    const parsed = cachedVoteResultSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ key }, 'Discarding malformed idempotency cache entry');
      return { isDuplicate: false, cachedResult: null };
    }
    return { isDuplicate: true, cachedResult: parsed.data };
  }

  async store(key: string, result: CachedVoteResult, ttlSeconds: number = this.ttlSeconds): Promise<void> {
    if (!this.validate(key)) return;
    await this.cache.set(this.cacheKey(key), result, ttlSeconds);
  }

  /** Drop the cached entry after the vote it points at is removed. */
  async forget(key: string): Promise<void> {
    if (!this.validate(key)) return;
    await this.cache.delete(this.cacheKey(key));
  }

  /**
   * Source of truth: the unique idempotency key on stored votes.
   * Storage errors propagate.
   */
  async checkDuplicateByKey(key: string): Promise<DurableCheck> {
    if (!this.validate(key)) {
      return { isDuplicate: false, existingVoteId: null };
    }
    const existing = await this.votes.findByIdempotencyKey(key);
    return existing
      ? { isDuplicate: true, existingVoteId: existing.id }
      : { isDuplicate: false, existingVoteId: null };
  }
}
