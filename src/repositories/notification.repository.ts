// ============================================
// VOTESHIELD - Notification Repository
// ============================================

import { eq, and, desc } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import {
  notifications,
  notificationPreferences,
  type NotificationRow,
  type NotificationType,
  type DeliveryChannel,
} from '../db/schema/notifications.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface Notification {
  id: string;
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  pollId: string | null;
  voteId: string | null;
  metadata: Record<string, unknown>;
  isRead: boolean;
  createdAt: Date;
}

export type NewNotification = Omit<Notification, 'id' | 'isRead' | 'createdAt'>;

export interface PreferenceOverride {
  channel: DeliveryChannel;
  enabled: boolean;
}

export class NotificationRepository extends BaseRepository<typeof notifications> {
  constructor(db: DrizzleDb) {
    super(db, notifications);
  }

  async create(input: NewNotification): Promise<Notification> {
    const row = {
      ...input,
      id: this.generateId(),
      isRead: false,
      createdAt: this.now(),
    };
    await this.db.insert(notifications).values(row);
    return row;
  }

  async listForUser(userId: string, limit: number = 50): Promise<Notification[]> {
    const results = await this.db
      .select()
      .from(notifications)
      .where(eq(notifications.userId, userId))
      .orderBy(desc(notifications.createdAt))
      .limit(limit);

    return results.map(row => this.rowToNotification(row));
  }

  async getOverrides(userId: string, type: NotificationType): Promise<PreferenceOverride[]> {
    return this.db
      .select({ channel: notificationPreferences.channel, enabled: notificationPreferences.enabled })
      .from(notificationPreferences)
      .where(and(
        eq(notificationPreferences.userId, userId),
        eq(notificationPreferences.notificationType, type)
      ));
  }

  async setPreference(
    userId: string,
    type: NotificationType,
    channel: DeliveryChannel,
    enabled: boolean
  ): Promise<void> {
    const now = this.now();
    await this.db
      .insert(notificationPreferences)
      .values({ id: this.generateId(), userId, notificationType: type, channel, enabled, updatedAt: now })
      .onConflictDoUpdate({
        target: [notificationPreferences.userId, notificationPreferences.notificationType, notificationPreferences.channel],
        set: { enabled, updatedAt: now },
      });
  }

  private rowToNotification(row: NotificationRow): Notification {
    return {
      id: row.id,
      userId: row.userId,
      type: row.type,
      title: row.title,
      message: row.message,
      pollId: row.pollId,
      voteId: row.voteId,
      metadata: row.metadata,
      isRead: row.isRead,
      createdAt: row.createdAt,
    };
  }
}
