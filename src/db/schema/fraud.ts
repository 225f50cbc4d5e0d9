// ============================================
// VOTESHIELD - Fraud Schema (Blocks & Alerts)
// ============================================

import { sqliteTable, text, integer, index, unique } from 'drizzle-orm/sqlite-core';
import { polls } from './polls.js';

export type BlockEventAction = 'blocked' | 'unblocked';

export type PatternType = 'vote_burst' | 'ip_cluster' | 'subnet_cluster' | 'fingerprint_reuse';

// One row per fingerprint, toggled active/inactive
export const fingerprintBlocks = sqliteTable('fingerprint_blocks', {
  id: text('id').primaryKey(),
  fingerprint: text('fingerprint').notNull().unique(),
  reason: text('reason').notNull(),
  blockedAt: integer('blocked_at', { mode: 'timestamp_ms' }).notNull(),
  blockedBy: text('blocked_by'), // null = automatic
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  unblockedAt: integer('unblocked_at', { mode: 'timestamp_ms' }),
  unblockedBy: text('unblocked_by'),
  firstSeenUser: text('first_seen_user'),
  totalUsers: integer('total_users').notNull().default(0),
  totalVotes: integer('total_votes').notNull().default(0),
}, (table) => [
  index('idx_fingerprint_blocks_lookup').on(table.fingerprint, table.isActive),
  index('idx_fingerprint_blocks_active').on(table.isActive, table.blockedAt),
]);

// Block/unblock history
export const fingerprintBlockEvents = sqliteTable('fingerprint_block_events', {
  id: text('id').primaryKey(),
  fingerprint: text('fingerprint').notNull(),
  action: text('action').notNull().$type<BlockEventAction>(),
  actor: text('actor'),
  reason: text('reason'),
  totalUsers: integer('total_users'),
  totalVotes: integer('total_votes'),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  index('idx_block_events_fingerprint').on(table.fingerprint, table.createdAt),
]);

// Pattern analysis alerts
export const fraudAlerts = sqliteTable('fraud_alerts', {
  id: text('id').primaryKey(),
  pollId: text('poll_id').notNull().references(() => polls.id),
  voteId: text('vote_id'),
  userId: text('user_id'),
  ipAddress: text('ip_address'),
  patternType: text('pattern_type').notNull().$type<PatternType>(),
  signature: text('signature').notNull(),
  reasons: text('reasons').notNull(), // comma-joined
  riskScore: integer('risk_score').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  unique('unique_alert_signature').on(table.pollId, table.signature),
  index('idx_fraud_alerts_poll_created').on(table.pollId, table.createdAt),
]);

// Type exports
export type FingerprintBlockRow = typeof fingerprintBlocks.$inferSelect;
export type FingerprintBlockInsert = typeof fingerprintBlocks.$inferInsert;

export type FingerprintBlockEventRow = typeof fingerprintBlockEvents.$inferSelect;

export type FraudAlertRow = typeof fraudAlerts.$inferSelect;
export type FraudAlertInsert = typeof fraudAlerts.$inferInsert;
