// ============================================
// VOTESHIELD - Table Definitions (DDL)
// ============================================

import type Database from 'better-sqlite3';

export const SCHEMA_SQL = `
  -- Polls
  CREATE TABLE IF NOT EXISTS polls (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    created_by TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    is_draft INTEGER NOT NULL DEFAULT 0,
    starts_at INTEGER NOT NULL,
    ends_at INTEGER,
    settings TEXT NOT NULL DEFAULT '{"allowVoteRetraction":false}',
    security_rules TEXT NOT NULL DEFAULT '{"requireAuthentication":false}',
    cached_total_votes INTEGER NOT NULL DEFAULT 0,
    cached_unique_voters INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_polls_active ON polls(is_active, is_draft);

  CREATE TABLE IF NOT EXISTS poll_options (
    id TEXT PRIMARY KEY,
    poll_id TEXT NOT NULL REFERENCES polls(id),
    text TEXT NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0,
    cached_vote_count INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_poll_options_poll ON poll_options(poll_id);

  -- Votes
  CREATE TABLE IF NOT EXISTS votes (
    id TEXT PRIMARY KEY,
    poll_id TEXT NOT NULL REFERENCES polls(id),
    option_id TEXT NOT NULL REFERENCES poll_options(id),
    user_id TEXT,
    voter_token TEXT NOT NULL,
    fingerprint TEXT,
    ip_address TEXT,
    user_agent TEXT,
    idempotency_key TEXT NOT NULL UNIQUE,
    is_valid INTEGER NOT NULL DEFAULT 1,
    fraud_reasons TEXT NOT NULL DEFAULT '[]',
    risk_score INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    CONSTRAINT unique_user_poll_vote UNIQUE (user_id, poll_id)
  );
  CREATE INDEX IF NOT EXISTS idx_votes_poll_fingerprint ON votes(poll_id, fingerprint);
  CREATE INDEX IF NOT EXISTS idx_votes_poll_created ON votes(poll_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_votes_fingerprint_created ON votes(fingerprint, created_at);
  CREATE INDEX IF NOT EXISTS idx_votes_ip_created ON votes(ip_address, created_at);
  CREATE INDEX IF NOT EXISTS idx_votes_poll_voter_token ON votes(poll_id, voter_token);

  CREATE TABLE IF NOT EXISTS vote_attempts (
    id TEXT PRIMARY KEY,
    poll_id TEXT NOT NULL,
    option_id TEXT,
    user_id TEXT,
    voter_token TEXT,
    fingerprint TEXT,
    ip_address TEXT,
    user_agent TEXT,
    idempotency_key TEXT,
    success INTEGER NOT NULL,
    error_code TEXT,
    error_message TEXT,
    risk_score INTEGER NOT NULL DEFAULT 0,
    fraud_reasons TEXT NOT NULL DEFAULT '[]',
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_vote_attempts_poll_created ON vote_attempts(poll_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_vote_attempts_fingerprint ON vote_attempts(fingerprint, created_at);

  -- Fingerprint blocks
  CREATE TABLE IF NOT EXISTS fingerprint_blocks (
    id TEXT PRIMARY KEY,
    fingerprint TEXT NOT NULL UNIQUE,
    reason TEXT NOT NULL,
    blocked_at INTEGER NOT NULL,
    blocked_by TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    unblocked_at INTEGER,
    unblocked_by TEXT,
    first_seen_user TEXT,
    total_users INTEGER NOT NULL DEFAULT 0,
    total_votes INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_fingerprint_blocks_lookup ON fingerprint_blocks(fingerprint, is_active);
  CREATE INDEX IF NOT EXISTS idx_fingerprint_blocks_active ON fingerprint_blocks(is_active, blocked_at);

  CREATE TABLE IF NOT EXISTS fingerprint_block_events (
    id TEXT PRIMARY KEY,
    fingerprint TEXT NOT NULL,
    action TEXT NOT NULL,
    actor TEXT,
    reason TEXT,
    total_users INTEGER,
    total_votes INTEGER,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_block_events_fingerprint ON fingerprint_block_events(fingerprint, created_at);

  -- Fraud alerts
  CREATE TABLE IF NOT EXISTS fraud_alerts (
    id TEXT PRIMARY KEY,
    poll_id TEXT NOT NULL REFERENCES polls(id),
    vote_id TEXT,
    user_id TEXT,
    ip_address TEXT,
    pattern_type TEXT NOT NULL,
    signature TEXT NOT NULL,
    reasons TEXT NOT NULL,
    risk_score INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    CONSTRAINT unique_alert_signature UNIQUE (poll_id, signature)
  );
  CREATE INDEX IF NOT EXISTS idx_fraud_alerts_poll_created ON fraud_alerts(poll_id, created_at);

  -- Notifications
  CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    type TEXT NOT NULL,
    title TEXT NOT NULL,
    message TEXT NOT NULL,
    poll_id TEXT,
    vote_id TEXT,
    metadata TEXT NOT NULL DEFAULT '{}',
    is_read INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_notifications_user_created ON notifications(user_id, created_at);

  CREATE TABLE IF NOT EXISTS notification_preferences (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    notification_type TEXT NOT NULL,
    channel TEXT NOT NULL,
    enabled INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    CONSTRAINT unique_notification_preference UNIQUE (user_id, notification_type, channel)
  );
`;

/**
 * Create every table and index (CREATE ... IF NOT EXISTS).
 */
export function applySchema(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL);
}
