// ============================================
// VOTESHIELD - Vote Repository
// ============================================

import { eq, and, asc, desc, gte, sql, ne } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { buildAttemptRow, type VoteAttemptInput } from './vote-attempt.repository.js';
import { votes, voteAttempts, type VoteRow } from '../db/schema/votes.js';
import { polls, pollOptions } from '../db/schema/polls.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface VoteRecord {
  id: string;
  pollId: string;
  optionId: string;
  userId: string | null;
  voterToken: string;
  fingerprint: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  idempotencyKey: string;
  isValid: boolean;
  fraudReasons: string[];
  riskScore: number;
  createdAt: Date;
}

export type NewVote = Omit<VoteRecord, 'id' | 'createdAt' | 'isValid'>;

export type CommitResult =
  | { kind: 'created'; vote: VoteRecord }
  | { kind: 'replay'; vote: VoteRecord }
  | { kind: 'duplicate' };

export interface FingerprintSighting {
  fingerprint: string;
  createdAt: Date;
}

export interface FlagState {
  isValid: boolean;
  riskScore: number;
  fraudReasons: string[];
}

export class VoteRepository extends BaseRepository<typeof votes> {
  constructor(db: DrizzleDb) {
    super(db, votes);
  }

  async findById(id: string): Promise<VoteRecord | null> {
    const results = await this.db
      .select()
      .from(votes)
      .where(eq(votes.id, id))
      .limit(1);

    return results.length > 0 ? this.rowToVote(results[0]) : null;
  }

  async findByIdempotencyKey(key: string): Promise<VoteRecord | null> {
    const results = await this.db
      .select()
      .from(votes)
      .where(eq(votes.idempotencyKey, key))
      .limit(1);

    return results.length > 0 ? this.rowToVote(results[0]) : null;
  }

  async findUserVote(userId: string, pollId: string): Promise<VoteRecord | null> {
    const results = await this.db
      .select()
      .from(votes)
      .where(and(eq(votes.userId, userId), eq(votes.pollId, pollId)))
      .limit(1);

    return results.length > 0 ? this.rowToVote(results[0]) : null;
  }

  async listForUser(userId: string): Promise<VoteRecord[]> {
    const results = await this.db
      .select()
      .from(votes)
      .where(eq(votes.userId, userId))
      .orderBy(desc(votes.createdAt));

    return results.map(row => this.rowToVote(row));
  }

  /**
   * Votes on a poll carrying this fingerprint since `since`, oldest first.
   * Served by the (poll_id, fingerprint) index.
   */
  async findRecentByFingerprint(pollId: string, fingerprint: string, since: Date): Promise<VoteRecord[]> {
    const results = await this.db
      .select()
      .from(votes)
      .where(
        and(
          eq(votes.pollId, pollId),
          eq(votes.fingerprint, fingerprint),
          gte(votes.createdAt, since)
        )
      )
      .orderBy(asc(votes.createdAt));

    return results.map(row => this.rowToVote(row));
  }

  /** Across all polls: a user holds at most one vote per poll. */
  async findFingerprintsForUser(userId: string, since: Date): Promise<FingerprintSighting[]> {
    return this.fingerprintSightings(and(
      eq(votes.userId, userId),
      gte(votes.createdAt, since)
    ));
  }

  async findFingerprintsForIp(pollId: string, ip: string, since: Date): Promise<FingerprintSighting[]> {
    return this.fingerprintSightings(and(
      eq(votes.pollId, pollId),
      eq(votes.ipAddress, ip),
      gte(votes.createdAt, since)
    ));
  }

  async findPollVotesSince(pollId: string, since: Date): Promise<VoteRecord[]> {
    const results = await this.db
      .select()
      .from(votes)
      .where(and(eq(votes.pollId, pollId), gte(votes.createdAt, since)))
      .orderBy(asc(votes.createdAt));

    return results.map(row => this.rowToVote(row));
  }

  async countForPoll(pollId: string): Promise<number> {
    return this.count(eq(votes.pollId, pollId));
  }

  /**
   * Insert a vote, bump the denormalized counters and write the success
   * audit row in one IMMEDIATE transaction. The idempotency key and
   * (user, poll) pair are re-checked under the write lock; the unique
   * constraints stay as the final arbiter.
   */
  async commitVote(input: NewVote, attempt: VoteAttemptInput): Promise<CommitResult> {
    const now = this.now();
    const vote: VoteRecord = { ...input, id: this.generateId(), isValid: true, createdAt: now };

    try {
      return this.db.transaction((tx): CommitResult => {
        const existing = tx
          .select()
          .from(votes)
          .where(eq(votes.idempotencyKey, input.idempotencyKey))
          .get();
        if (existing) {
          return { kind: 'replay', vote: this.rowToVote(existing) };
        }

        if (input.userId) {
          const prior = tx
            .select({ id: votes.id })
            .from(votes)
            .where(and(eq(votes.userId, input.userId), eq(votes.pollId, input.pollId)))
            .get();
          if (prior) {
            return { kind: 'duplicate' };
          }
        }

        const seenVoter = tx
          .select({ id: votes.id })
          .from(votes)
          .where(and(eq(votes.pollId, input.pollId), eq(votes.voterToken, input.voterToken)))
          .get();

        tx.insert(votes).values(vote).run();

        tx.update(pollOptions)
          .set({ cachedVoteCount: sql`${pollOptions.cachedVoteCount} + 1` })
          .where(eq(pollOptions.id, input.optionId))
          .run();

        tx.update(polls)
          .set({
            cachedTotalVotes: sql`${polls.cachedTotalVotes} + 1`,
            ...(!seenVoter && { cachedUniqueVoters: sql`${polls.cachedUniqueVoters} + 1` }),
          })
          .where(eq(polls.id, input.pollId))
          .run();

        tx.insert(voteAttempts).values(buildAttemptRow(this.generateId(), attempt, now)).run();

        return { kind: 'created', vote };
      }, { behavior: 'immediate' });
    } catch (error) {
      if (!this.isUniqueViolation(error)) throw error;

      // Lost a race against another connection: resolve against what won
      const winner = await this.findByIdempotencyKey(input.idempotencyKey);
      if (winner) return { kind: 'replay', vote: winner };
      if (input.userId && await this.findUserVote(input.userId, input.pollId)) {
        return { kind: 'duplicate' };
      }
      throw error;
    }
  }

  /**
   * Delete a vote and roll back its counter contributions atomically.
   */
  async deleteVote(vote: VoteRecord): Promise<boolean> {
    return this.db.transaction((tx) => {
      const deleted = tx.delete(votes).where(eq(votes.id, vote.id)).run();
      if (deleted.changes === 0) return false;

      const voterStillPresent = tx
        .select({ id: votes.id })
        .from(votes)
        .where(and(
          eq(votes.pollId, vote.pollId),
          eq(votes.voterToken, vote.voterToken),
          ne(votes.id, vote.id)
        ))
        .get();

      tx.update(pollOptions)
        .set({ cachedVoteCount: sql`MAX(${pollOptions.cachedVoteCount} - 1, 0)` })
        .where(eq(pollOptions.id, vote.optionId))
        .run();

      tx.update(polls)
        .set({
          cachedTotalVotes: sql`MAX(${polls.cachedTotalVotes} - 1, 0)`,
          ...(!voterStillPresent && { cachedUniqueVoters: sql`MAX(${polls.cachedUniqueVoters} - 1, 0)` }),
        })
        .where(eq(polls.id, vote.pollId))
        .run();

      return true;
    }, { behavior: 'immediate' });
  }

  /**
   * Optimistic update of the three mutable fraud fields: only applied when
   * the row still holds `expected`. Returns false when another writer got there first.
   */
  async compareAndFlag(voteId: string, expected: FlagState, next: FlagState): Promise<boolean> {
    const result = this.db
      .update(votes)
      .set({
        isValid: next.isValid,
        riskScore: next.riskScore,
        fraudReasons: next.fraudReasons,
      })
      .where(
        and(
          eq(votes.id, voteId),
          eq(votes.isValid, expected.isValid),
          eq(votes.riskScore, expected.riskScore),
          eq(votes.fraudReasons, expected.fraudReasons)
        )
      )
      .run();

    return result.changes === 1;
  }

  private async fingerprintSightings(where: ReturnType<typeof and>): Promise<FingerprintSighting[]> {
    const results = await this.db
      .select({ fingerprint: votes.fingerprint, createdAt: votes.createdAt })
      .from(votes)
      .where(where)
      .orderBy(asc(votes.createdAt));

    const sightings: FingerprintSighting[] = [];
    for (const row of results) {
      if (row.fingerprint) {
        sightings.push({ fingerprint: row.fingerprint, createdAt: row.createdAt });
      }
    }
    return sightings;
  }

  private rowToVote(row: VoteRow): VoteRecord {
    return {
      id: row.id,
      pollId: row.pollId,
      optionId: row.optionId,
      userId: row.userId,
      voterToken: row.voterToken,
      fingerprint: row.fingerprint,
      ipAddress: row.ipAddress,
      userAgent: row.userAgent,
      idempotencyKey: row.idempotencyKey,
      isValid: row.isValid,
      fraudReasons: row.fraudReasons,
      riskScore: row.riskScore,
      createdAt: row.createdAt,
    };
  }
}
