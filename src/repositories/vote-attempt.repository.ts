// ============================================
// VOTESHIELD - Vote Attempt Repository (Audit Trail)
// ============================================

import { eq, and, desc } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { voteAttempts, type VoteAttemptRow, type VoteAttemptInsert } from '../db/schema/votes.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface VoteAttemptInput {
  pollId: string;
  optionId: string | null;
  userId: string | null;
  voterToken: string | null;
  fingerprint: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  idempotencyKey: string | null;
  success: boolean;
  errorCode?: string | null;
  errorMessage?: string | null;
  riskScore?: number;
  fraudReasons?: string[];
}

export interface VoteAttempt extends Required<VoteAttemptInput> {
  id: string;
  createdAt: Date;
}

export function buildAttemptRow(id: string, input: VoteAttemptInput, createdAt: Date): VoteAttemptInsert {
  return {
    id,
    pollId: input.pollId,
    optionId: input.optionId,
    userId: input.userId,
    voterToken: input.voterToken,
    fingerprint: input.fingerprint,
    ipAddress: input.ipAddress,
    userAgent: input.userAgent,
    idempotencyKey: input.idempotencyKey,
    success: input.success,
    errorCode: input.errorCode ?? null,
    errorMessage: input.errorMessage ?? null,
    riskScore: input.riskScore ?? 0,
    fraudReasons: input.fraudReasons ?? [],
    createdAt,
  };
}

export class VoteAttemptRepository extends BaseRepository<typeof voteAttempts> {
  constructor(db: DrizzleDb) {
    super(db, voteAttempts);
  }

  async record(input: VoteAttemptInput): Promise<string> {
    const id = this.generateId();
    await this.db.insert(voteAttempts).values(buildAttemptRow(id, input, this.now()));
    return id;
  }

  async listForPoll(pollId: string, limit: number = 100): Promise<VoteAttempt[]> {
    const results = await this.db
      .select()
      .from(voteAttempts)
      .where(eq(voteAttempts.pollId, pollId))
      .orderBy(desc(voteAttempts.createdAt))
      .limit(limit);

    return results.map(row => this.rowToAttempt(row));
  }

  async countForPoll(pollId: string, success?: boolean): Promise<number> {
    return this.count(
      success === undefined
        ? eq(voteAttempts.pollId, pollId)
        : and(eq(voteAttempts.pollId, pollId), eq(voteAttempts.success, success))
    );
  }

  private rowToAttempt(row: VoteAttemptRow): VoteAttempt {
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
      success: row.success,
      errorCode: row.errorCode,
      errorMessage: row.errorMessage,
      riskScore: row.riskScore,
      fraudReasons: row.fraudReasons,
      createdAt: row.createdAt,
    };
  }
}
