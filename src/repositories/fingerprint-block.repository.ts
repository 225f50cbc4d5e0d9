// ============================================
// VOTESHIELD - Fingerprint Block Repository
// ============================================

import { eq, and, desc, asc, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import {
  fingerprintBlocks,
  fingerprintBlockEvents,
  type FingerprintBlockRow,
  type FingerprintBlockEventRow,
  type BlockEventAction,
} from '../db/schema/fraud.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface BlockInfo {
  id: string;
  fingerprint: string;
  reason: string;
  blockedAt: Date;
  blockedBy: string | null;
  isActive: boolean;
  unblockedAt: Date | null;
  unblockedBy: string | null;
  firstSeenUser: string | null;
  totalUsers: number;
  totalVotes: number;
}

export interface BlockEvent {
  id: string;
  fingerprint: string;
  action: BlockEventAction;
  actor: string | null;
  reason: string | null;
  totalUsers: number | null;
  totalVotes: number | null;
  createdAt: Date;
}

export interface BlockInput {
  fingerprint: string;
  reason: string;
  firstSeenUser: string | null;
  totalUsers: number;
  totalVotes: number;
  blockedBy: string | null;
}

export type BlockOutcome = 'created' | 'reactivated' | 'already_active';

export class FingerprintBlockRepository extends BaseRepository<typeof fingerprintBlocks> {
  constructor(db: DrizzleDb) {
    super(db, fingerprintBlocks);
  }

  /** Served by the (fingerprint, is_active) index. */
  async findActive(fingerprint: string): Promise<BlockInfo | null> {
    const results = await this.db
      .select()
      .from(fingerprintBlocks)
      .where(and(eq(fingerprintBlocks.fingerprint, fingerprint), eq(fingerprintBlocks.isActive, true)))
      .limit(1);

    return results.length > 0 ? this.rowToBlock(results[0]) : null;
  }

  async findByFingerprint(fingerprint: string): Promise<BlockInfo | null> {
    const results = await this.db
      .select()
      .from(fingerprintBlocks)
      .where(eq(fingerprintBlocks.fingerprint, fingerprint))
      .limit(1);

    return results.length > 0 ? this.rowToBlock(results[0]) : null;
  }

  /**
   * Create the fingerprint's row or reactivate it. The single row per
   * fingerprint is toggled; every transition lands in the event history.
   */
  async upsertBlock(input: BlockInput): Promise<{ block: BlockInfo; outcome: BlockOutcome }> {
    const now = this.now();

    return this.db.transaction((tx) => {
      const existing = tx
        .select()
        .from(fingerprintBlocks)
        .where(eq(fingerprintBlocks.fingerprint, input.fingerprint))
        .get();

      if (existing?.isActive) {
        return { block: this.rowToBlock(existing), outcome: 'already_active' as const };
      }

      const fields = {
        reason: input.reason,
        blockedAt: now,
        blockedBy: input.blockedBy,
        isActive: true,
        unblockedAt: null,
        unblockedBy: null,
        firstSeenUser: input.firstSeenUser,
        totalUsers: input.totalUsers,
        totalVotes: input.totalVotes,
      };

      let row: FingerprintBlockRow;
      let outcome: BlockOutcome;
      if (existing) {
        tx.update(fingerprintBlocks)
          .set(fields)
          .where(eq(fingerprintBlocks.id, existing.id))
          .run();
        row = { ...existing, ...fields };
        outcome = 'reactivated';
      } else {
        row = { id: this.generateId(), fingerprint: input.fingerprint, ...fields };
        tx.insert(fingerprintBlocks).values(row).run();
        outcome = 'created';
      }

      tx.insert(fingerprintBlockEvents).values({
        id: this.generateId(),
        fingerprint: input.fingerprint,
        action: 'blocked',
        actor: input.blockedBy,
        reason: input.reason,
        totalUsers: input.totalUsers,
        totalVotes: input.totalVotes,
        createdAt: now,
      }).run();

      return { block: this.rowToBlock(row), outcome };
    }, { behavior: 'immediate' });
  }

  /**
   * Deactivate an active block. Returns null when nothing was active.
   */
  async deactivate(fingerprint: string, unblockedBy: string): Promise<BlockInfo | null> {
    const now = this.now();

    return this.db.transaction((tx) => {
      const existing = tx
        .select()
        .from(fingerprintBlocks)
        .where(and(eq(fingerprintBlocks.fingerprint, fingerprint), eq(fingerprintBlocks.isActive, true)))
        .get();

      if (!existing) return null;

      const fields = { isActive: false, unblockedAt: now, unblockedBy };
      tx.update(fingerprintBlocks)
        .set(fields)
        .where(eq(fingerprintBlocks.id, existing.id))
        .run();

      tx.insert(fingerprintBlockEvents).values({
        id: this.generateId(),
        fingerprint,
        action: 'unblocked',
        actor: unblockedBy,
        reason: null,
        totalUsers: null,
        totalVotes: null,
        createdAt: now,
      }).run();

      return this.rowToBlock({ ...existing, ...fields });
    }, { behavior: 'immediate' });
  }

  async list(options: { activeOnly: boolean; limit: number; offset: number }): Promise<BlockInfo[]> {
    const results = await this.db
      .select()
      .from(fingerprintBlocks)
      .where(options.activeOnly ? eq(fingerprintBlocks.isActive, true) : undefined)
      .orderBy(desc(fingerprintBlocks.blockedAt))
      .limit(options.limit)
      .offset(options.offset);

    return results.map(row => this.rowToBlock(row));
  }

  async countActive(): Promise<number> {
    return this.count(eq(fingerprintBlocks.isActive, true));
  }

  async history(fingerprint: string): Promise<BlockEvent[]> {
    const results = await this.db
      .select()
      .from(fingerprintBlockEvents)
      .where(eq(fingerprintBlockEvents.fingerprint, fingerprint))
      .orderBy(asc(fingerprintBlockEvents.createdAt), sql`rowid`);

    return results.map(row => this.rowToEvent(row));
  }

  private rowToBlock(row: FingerprintBlockRow): BlockInfo {
    return {
      id: row.id,
      fingerprint: row.fingerprint,
      reason: row.reason,
      blockedAt: row.blockedAt,
      blockedBy: row.blockedBy,
      isActive: row.isActive,
      unblockedAt: row.unblockedAt,
      unblockedBy: row.unblockedBy,
      firstSeenUser: row.firstSeenUser,
      totalUsers: row.totalUsers,
      totalVotes: row.totalVotes,
    };
  }

  private rowToEvent(row: FingerprintBlockEventRow): BlockEvent {
    return {
      id: row.id,
      fingerprint: row.fingerprint,
      action: row.action,
      actor: row.actor,
      reason: row.reason,
      totalUsers: row.totalUsers,
      totalVotes: row.totalVotes,
      createdAt: row.createdAt,
    };
  }
}
