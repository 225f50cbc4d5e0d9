// ============================================
// VOTESHIELD - Test Helpers
// ============================================

import { openDatabase, type DatabaseHandle, type DrizzleDb } from '../src/db/drizzle.js';
import { votes } from '../src/db/schema/votes.js';
import { MemoryCache, type VolatileCache } from '../src/cache/volatile-cache.js';
import { createServices, type ServiceContainer } from '../src/services/container.js';
import { resolveFraudConfig, type FraudDetectionConfig } from '../src/config/fraud.js';
import { silentLogger } from '../src/utils/logger.js';
import { sha256Hex, voterTokenFor } from '../src/utils/voter-identity.js';
import { PollRepository, type CreatePollInput } from '../src/repositories/poll.repository.js';

export const FP_A = 'a'.repeat(64);
export const FP_B = 'b'.repeat(64);
export const FP_C = 'c'.repeat(64);

const MINUTE_MS = 60 * 1000;

export function minutesBefore(at: Date, minutes: number): Date {
  return new Date(at.getTime() - minutes * MINUTE_MS);
}

export interface Harness extends DatabaseHandle {
  cache: VolatileCache;
  services: ServiceContainer;
  /** Wait for every post-commit job scheduled so far. */
  flush: () => Promise<void>;
}

export interface HarnessOptions {
  config?: Partial<FraudDetectionConfig>;
  cache?: VolatileCache;
  deepAnalysis?: boolean;
  clock?: () => Date;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const handle = openDatabase(':memory:');
  const cache = options.cache ?? new MemoryCache();
  const pending: Array<Promise<void>> = [];

  const services = createServices({
    db: handle.db,
    cache,
    logger: silentLogger,
    config: resolveFraudConfig(options.config),
    deepAnalysis: options.deepAnalysis ?? false,
    clock: options.clock,
    schedule: (job) => {
      pending.push(job());
    },
  });

  return {
    ...handle,
    cache,
    services,
    flush: async () => {
      while (pending.length > 0) {
        await Promise.all(pending.splice(0));
      }
    },
  };
}

export async function createPoll(db: DrizzleDb, input: Partial<CreatePollInput> = {}) {
  return new PollRepository(db).createPoll({
    title: 'Favourite colour',
    options: ['Red', 'Blue'],
    ...input,
  });
}

export interface SeedVote {
  pollId: string;
  optionId: string;
  createdAt: Date;
  userId?: string | null;
  fingerprint?: string | null;
  ip?: string | null;
  userAgent?: string | null;
  isValid?: boolean;
}

let seedSequence = 0;

/**
 * Insert a vote row directly, bypassing the orchestrator and counters.
 */
export function insertVote(db: DrizzleDb, seed: SeedVote): string {
  seedSequence++;
  const id = `seed-vote-${seedSequence}`;
  const userId = seed.userId ?? null;
  const fingerprint = seed.fingerprint ?? null;
  const ip = seed.ip ?? null;
  const userAgent = seed.userAgent ?? null;

  db.insert(votes).values({
    id,
    pollId: seed.pollId,
    optionId: seed.optionId,
    userId,
    voterToken: voterTokenFor(userId, ip, userAgent, fingerprint),
    fingerprint,
    ipAddress: ip,
    userAgent,
    idempotencyKey: sha256Hex(id),
    isValid: seed.isValid ?? true,
    fraudReasons: [],
    riskScore: 0,
    createdAt: seed.createdAt,
  }).run();

  return id;
}

/**
 * A cache whose every call fails, as an unreachable backend would.
 */
export class UnavailableCache implements VolatileCache {
  private fail(): Promise<never> {
    return Promise.reject(new Error('cache unreachable'));
  }

  get(): Promise<unknown> {
    return this.fail();
  }

  set(): Promise<void> {
    return this.fail();
  }

  delete(): Promise<void> {
    return this.fail();
  }

  increment(): Promise<number> {
    return this.fail();
  }

  addToSet(): Promise<number> {
    return this.fail();
  }

  members(): Promise<string[]> {
    return this.fail();
  }
}
