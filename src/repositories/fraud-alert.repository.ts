// ============================================
// VOTESHIELD - Fraud Alert Repository
// ============================================

import { eq, desc } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { fraudAlerts, type FraudAlertRow, type PatternType } from '../db/schema/fraud.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface FraudAlert {
  id: string;
  pollId: string;
  voteId: string | null;
  userId: string | null;
  ipAddress: string | null;
  patternType: PatternType;
  signature: string;
  reasons: string[];
  riskScore: number;
  createdAt: Date;
}

export type NewFraudAlert = Omit<FraudAlert, 'id' | 'createdAt'>;

export class FraudAlertRepository extends BaseRepository<typeof fraudAlerts> {
  constructor(db: DrizzleDb) {
    super(db, fraudAlerts);
  }

  /**
   * Insert unless an alert with the same (poll, signature) exists.
   * Returns the new alert, or null for a repeat.
   */
  async insertIfAbsent(alert: NewFraudAlert): Promise<FraudAlert | null> {
    const results = await this.db
      .insert(fraudAlerts)
      .values({
        id: this.generateId(),
        pollId: alert.pollId,
        voteId: alert.voteId,
        userId: alert.userId,
        ipAddress: alert.ipAddress,
        patternType: alert.patternType,
        signature: alert.signature,
        reasons: alert.reasons.join(', '),
        riskScore: alert.riskScore,
        createdAt: this.now(),
      })
      .onConflictDoNothing({ target: [fraudAlerts.pollId, fraudAlerts.signature] })
      .returning();

    return results.length > 0 ? this.rowToAlert(results[0]) : null;
  }

  async listForPoll(pollId: string, limit: number = 50, offset: number = 0): Promise<FraudAlert[]> {
    const results = await this.db
      .select()
      .from(fraudAlerts)
      .where(eq(fraudAlerts.pollId, pollId))
      .orderBy(desc(fraudAlerts.createdAt))
      .limit(limit)
      .offset(offset);

    return results.map(row => this.rowToAlert(row));
  }

  async listRecent(limit: number = 50, offset: number = 0): Promise<FraudAlert[]> {
    const results = await this.db
      .select()
      .from(fraudAlerts)
      .orderBy(desc(fraudAlerts.createdAt))
      .limit(limit)
      .offset(offset);

    return results.map(row => this.rowToAlert(row));
  }

  async countForPoll(pollId: string): Promise<number> {
    return this.count(eq(fraudAlerts.pollId, pollId));
  }

  private rowToAlert(row: FraudAlertRow): FraudAlert {
    return {
      id: row.id,
      pollId: row.pollId,
      voteId: row.voteId,
      userId: row.userId,
      ipAddress: row.ipAddress,
      patternType: row.patternType,
      signature: row.signature,
      reasons: row.reasons.split(', ').filter(Boolean),
      riskScore: row.riskScore,
      createdAt: row.createdAt,
    };
  }
}
