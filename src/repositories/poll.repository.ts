// ============================================
// VOTESHIELD - Poll Repository
// ============================================

import { eq, and, asc, lte, gt, isNull, or } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import {
  polls,
  pollOptions,
  type PollRow,
  type PollOptionRow,
  type PollSettings,
  type PollSecurityRules,
} from '../db/schema/polls.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface Poll {
  id: string;
  title: string;
  createdBy: string | null;
  isActive: boolean;
  isDraft: boolean;
  startsAt: Date;
  endsAt: Date | null;
  settings: PollSettings;
  securityRules: PollSecurityRules;
  totalVotes: number;
  uniqueVoters: number;
  createdAt: Date;
}

export interface PollOption {
  id: string;
  pollId: string;
  text: string;
  order: number;
  voteCount: number;
}

export interface CreatePollInput {
  title: string;
  options: string[];
  createdBy?: string | null;
  isActive?: boolean;
  isDraft?: boolean;
  startsAt?: Date;
  endsAt?: Date | null;
  settings?: Partial<PollSettings>;
  securityRules?: Partial<PollSecurityRules>;
}

export interface PollResults {
  pollId: string;
  totalVotes: number;
  uniqueVoters: number;
  options: Array<{ id: string; text: string; voteCount: number }>;
}

const DEFAULT_SETTINGS: PollSettings = { allowVoteRetraction: false };
const DEFAULT_SECURITY_RULES: PollSecurityRules = { requireAuthentication: false };

export class PollRepository extends BaseRepository<typeof polls> {
  constructor(db: DrizzleDb) {
    super(db, polls);
  }

  async createPoll(input: CreatePollInput): Promise<{ poll: Poll; options: PollOption[] }> {
    const id = this.generateId();
    const now = this.now();

    const row = {
      id,
      title: input.title,
      createdBy: input.createdBy ?? null,
      isActive: input.isActive ?? true,
      isDraft: input.isDraft ?? false,
      startsAt: input.startsAt ?? now,
      endsAt: input.endsAt ?? null,
      settings: { ...DEFAULT_SETTINGS, ...input.settings },
      securityRules: { ...DEFAULT_SECURITY_RULES, ...input.securityRules },
      cachedTotalVotes: 0,
      cachedUniqueVoters: 0,
      createdAt: now,
    };
    const optionRows = input.options.map((text, index) => ({
      id: this.generateId(),
      pollId: id,
      text,
      sortOrder: index,
      cachedVoteCount: 0,
      createdAt: now,
    }));

    this.db.transaction((tx) => {
      tx.insert(polls).values(row).run();
      if (optionRows.length > 0) {
        tx.insert(pollOptions).values(optionRows).run();
      }
    });

    return {
      poll: this.rowToPoll(row),
      options: optionRows.map(o => this.rowToOption(o)),
    };
  }

  async getPollById(id: string): Promise<Poll | null> {
    const results = await this.db
      .select()
      .from(polls)
      .where(eq(polls.id, id))
      .limit(1);

    return results.length > 0 ? this.rowToPoll(results[0]) : null;
  }

  async getOptionById(optionId: string): Promise<PollOption | null> {
    const results = await this.db
      .select()
      .from(pollOptions)
      .where(eq(pollOptions.id, optionId))
      .limit(1);

    return results.length > 0 ? this.rowToOption(results[0]) : null;
  }

  async getOptions(pollId: string): Promise<PollOption[]> {
    const results = await this.db
      .select()
      .from(pollOptions)
      .where(eq(pollOptions.pollId, pollId))
      .orderBy(asc(pollOptions.sortOrder));

    return results.map(row => this.rowToOption(row));
  }

  /**
   * Polls currently accepting votes: active, published, started and not ended.
   */
  async listOpenPollIds(at: Date = this.now()): Promise<string[]> {
    const results = await this.db
      .select({ id: polls.id })
      .from(polls)
      .where(
        and(
          eq(polls.isActive, true),
          eq(polls.isDraft, false),
          lte(polls.startsAt, at),
          or(isNull(polls.endsAt), gt(polls.endsAt, at))
        )
      );

    return results.map(r => r.id);
  }

  async getResults(pollId: string): Promise<PollResults | null> {
    const poll = await this.getPollById(pollId);
    if (!poll) return null;

    const options = await this.getOptions(pollId);
    return {
      pollId,
      totalVotes: poll.totalVotes,
      uniqueVoters: poll.uniqueVoters,
      options: options.map(o => ({ id: o.id, text: o.text, voteCount: o.voteCount })),
    };
  }

  async setActive(pollId: string, isActive: boolean): Promise<void> {
    await this.db
      .update(polls)
      .set({ isActive })
      .where(eq(polls.id, pollId));
  }

  private rowToPoll(row: PollRow): Poll {
    return {
      id: row.id,
      title: row.title,
      createdBy: row.createdBy,
      isActive: row.isActive,
      isDraft: row.isDraft,
      startsAt: row.startsAt,
      endsAt: row.endsAt,
      settings: row.settings,
      securityRules: row.securityRules,
      totalVotes: row.cachedTotalVotes,
      uniqueVoters: row.cachedUniqueVoters,
      createdAt: row.createdAt,
    };
  }

  private rowToOption(row: PollOptionRow): PollOption {
    return {
      id: row.id,
      pollId: row.pollId,
      text: row.text,
      order: row.sortOrder,
      voteCount: row.cachedVoteCount,
    };
  }
}
