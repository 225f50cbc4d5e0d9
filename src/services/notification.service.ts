// ============================================
// VOTESHIELD - Notification Service
// ============================================

import {
  DELIVERY_CHANNELS,
  type NotificationType,
  type DeliveryChannel,
} from '../db/schema/notifications.js';
import type {
  NotificationRepository,
  Notification,
  NewNotification,
} from '../repositories/notification.repository.js';
import type { VoteFlaggedEvent } from '../events/vote-events.js';
import type { Logger } from '../utils/logger.js';

export type ChannelPreferences = Record<DeliveryChannel, boolean>;

const STANDARD_CHANNELS: ChannelPreferences = { email: true, in_app: true, push: false };

export const DEFAULT_PREFERENCES: Record<NotificationType, ChannelPreferences> = {
  poll_results_available: { ...STANDARD_CHANNELS },
  new_poll_from_followed: { ...STANDARD_CHANNELS },
  poll_about_to_expire: { ...STANDARD_CHANNELS },
  vote_flagged: { ...STANDARD_CHANNELS },
};

export type ExternalChannel = Exclude<DeliveryChannel, 'in_app'>;

/**
 * Hand-off point for email and push delivery.
 */
export interface NotificationTransport {
  deliver(channel: ExternalChannel, notification: NewNotification): Promise<void>;
}

export class LoggingTransport implements NotificationTransport {
  constructor(private logger: Logger) {}

  async deliver(channel: ExternalChannel, notification: NewNotification): Promise<void> {
    this.logger.info({ channel, userId: notification.userId, type: notification.type }, 'Notification queued for delivery');
  }
}

export interface NotifyResult {
  notification: Notification | null;
  channels: DeliveryChannel[];
}

export class NotificationService {
  constructor(
    private repo: NotificationRepository,
    private transport: NotificationTransport,
    private logger: Logger
  ) {}

  async resolveChannels(userId: string, type: NotificationType): Promise<ChannelPreferences> {
    const resolved = { ...DEFAULT_PREFERENCES[type] };
    for (const override of await this.repo.getOverrides(userId, type)) {
      resolved[override.channel] = override.enabled;
    }
    return resolved;
  }

  async notify(input: NewNotification): Promise<NotifyResult> {
    const preferences = await this.resolveChannels(input.userId, input.type);
    const channels = DELIVERY_CHANNELS.filter(channel => preferences[channel]);

    let notification: Notification | null = null;
    for (const channel of channels) {
      if (channel === 'in_app') {
        notification = await this.repo.create(input);
      } else {
        try {
          await this.transport.deliver(channel, input);
        } catch (err) {
          this.logger.error({ err, channel, userId: input.userId }, 'Notification delivery failed');
        }
      }
    }

    return { notification, channels };
  }

  async onVoteFlagged(event: VoteFlaggedEvent): Promise<NotifyResult | null> {
    if (!event.userId) return null;

    return this.notify({
      userId: event.userId,
      type: 'vote_flagged',
      title: event.voteId ? 'Your vote was flagged' : 'Your vote was blocked',
      message: `Reasons: ${event.reasons.join('; ')}`,
      pollId: event.pollId,
      voteId: event.voteId,
      metadata: { reasons: event.reasons, riskScore: event.riskScore },
    });
  }

  async listForUser(userId: string, limit?: number): Promise<Notification[]> {
    return this.repo.listForUser(userId, limit);
  }

  async setPreference(userId: string, type: NotificationType, channel: DeliveryChannel, enabled: boolean): Promise<void> {
    await this.repo.setPreference(userId, type, channel, enabled);
  }
}
