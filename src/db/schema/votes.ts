// ============================================
// VOTESHIELD - Vote Schema
// ============================================

import { sqliteTable, text, integer, index, unique } from 'drizzle-orm/sqlite-core';
import { polls, pollOptions } from './polls.js';

// Accepted ballots
export const votes = sqliteTable('votes', {
  id: text('id').primaryKey(),
  pollId: text('poll_id').notNull().references(() => polls.id),
  optionId: text('option_id').notNull().references(() => pollOptions.id),
  userId: text('user_id'), // null for anonymous voters
  voterToken: text('voter_token').notNull(),
  fingerprint: text('fingerprint'),
  ipAddress: text('ip_address'),
  userAgent: text('user_agent'),
  idempotencyKey: text('idempotency_key').notNull().unique(),
  isValid: integer('is_valid', { mode: 'boolean' }).notNull().default(true),
  fraudReasons: text('fraud_reasons', { mode: 'json' }).$type<string[]>().notNull().default([]),
  riskScore: integer('risk_score').notNull().default(0),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  // NULL user ids never collide, so anonymous votes may repeat
  unique('unique_user_poll_vote').on(table.userId, table.pollId),
  index('idx_votes_poll_fingerprint').on(table.pollId, table.fingerprint),
  index('idx_votes_poll_created').on(table.pollId, table.createdAt),
  index('idx_votes_fingerprint_created').on(table.fingerprint, table.createdAt),
  index('idx_votes_ip_created').on(table.ipAddress, table.createdAt),
  index('idx_votes_poll_voter_token').on(table.pollId, table.voterToken),
]);

// Append-only audit trail of every cast attempt
export const voteAttempts = sqliteTable('vote_attempts', {
  id: text('id').primaryKey(),
  pollId: text('poll_id').notNull(),
  optionId: text('option_id'),
  userId: text('user_id'),
  voterToken: text('voter_token'),
  fingerprint: text('fingerprint'),
  ipAddress: text('ip_address'),
  userAgent: text('user_agent'),
  idempotencyKey: text('idempotency_key'),
  success: integer('success', { mode: 'boolean' }).notNull(),
  errorCode: text('error_code'),
  errorMessage: text('error_message'),
  riskScore: integer('risk_score').notNull().default(0),
  fraudReasons: text('fraud_reasons', { mode: 'json' }).$type<string[]>().notNull().default([]),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  index('idx_vote_attempts_poll_created').on(table.pollId, table.createdAt),
  index('idx_vote_attempts_fingerprint').on(table.fingerprint, table.createdAt),
]);

// Type exports
export type VoteRow = typeof votes.$inferSelect;
export type VoteInsert = typeof votes.$inferInsert;

export type VoteAttemptRow = typeof voteAttempts.$inferSelect;
export type VoteAttemptInsert = typeof voteAttempts.$inferInsert;
