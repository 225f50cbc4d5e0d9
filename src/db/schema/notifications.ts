// ============================================
// VOTESHIELD - Notification Schema
// ============================================

import { sqliteTable, text, integer, index, unique } from 'drizzle-orm/sqlite-core';

export const NOTIFICATION_TYPES = [
  'poll_results_available',
  'new_poll_from_followed',
  'poll_about_to_expire',
  'vote_flagged',
] as const;

export const DELIVERY_CHANNELS = ['email', 'in_app', 'push'] as const;

export type NotificationType = typeof NOTIFICATION_TYPES[number];
export type DeliveryChannel = typeof DELIVERY_CHANNELS[number];

// In-app notifications
export const notifications = sqliteTable('notifications', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull(),
  type: text('type').notNull().$type<NotificationType>(),
  title: text('title').notNull(),
  message: text('message').notNull(),
  pollId: text('poll_id'),
  voteId: text('vote_id'),
  metadata: text('metadata', { mode: 'json' }).$type<Record<string, unknown>>().notNull().default({}),
  isRead: integer('is_read', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  index('idx_notifications_user_created').on(table.userId, table.createdAt),
]);

// Per-user overrides of the default channel matrix
export const notificationPreferences = sqliteTable('notification_preferences', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull(),
  notificationType: text('notification_type').notNull().$type<NotificationType>(),
  channel: text('channel').notNull().$type<DeliveryChannel>(),
  enabled: integer('enabled', { mode: 'boolean' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  unique('unique_notification_preference').on(table.userId, table.notificationType, table.channel),
]);

// Type exports
export type NotificationRow = typeof notifications.$inferSelect;
export type NotificationInsert = typeof notifications.$inferInsert;

export type NotificationPreferenceRow = typeof notificationPreferences.$inferSelect;
