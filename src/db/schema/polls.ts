// ============================================
// VOTESHIELD - Poll Schema
// ============================================

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export interface PollSettings {
  allowVoteRetraction: boolean;
}

export interface PollSecurityRules {
  requireAuthentication: boolean;
}

// Polls
export const polls = sqliteTable('polls', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  createdBy: text('created_by'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  isDraft: integer('is_draft', { mode: 'boolean' }).notNull().default(false),
  startsAt: integer('starts_at', { mode: 'timestamp_ms' }).notNull(),
  endsAt: integer('ends_at', { mode: 'timestamp_ms' }),
  settings: text('settings', { mode: 'json' }).$type<PollSettings>().notNull(),
  securityRules: text('security_rules', { mode: 'json' }).$type<PollSecurityRules>().notNull(),
  cachedTotalVotes: integer('cached_total_votes').notNull().default(0),
  cachedUniqueVoters: integer('cached_unique_voters').notNull().default(0),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  index('idx_polls_active').on(table.isActive, table.isDraft),
]);

// Poll Options
export const pollOptions = sqliteTable('poll_options', {
  id: text('id').primaryKey(),
  pollId: text('poll_id').notNull().references(() => polls.id),
  text: text('text').notNull(),
  sortOrder: integer('sort_order').notNull().default(0),
  cachedVoteCount: integer('cached_vote_count').notNull().default(0),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  index('idx_poll_options_poll').on(table.pollId),
]);

// Type exports
export type PollRow = typeof polls.$inferSelect;
export type PollInsert = typeof polls.$inferInsert;

export type PollOptionRow = typeof pollOptions.$inferSelect;
export type PollOptionInsert = typeof pollOptions.$inferInsert;
