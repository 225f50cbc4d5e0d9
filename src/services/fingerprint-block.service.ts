// ============================================
// VOTESHIELD - Fingerprint Block Registry
// ============================================

import {
  FingerprintBlockRepository,
  type BlockInfo,
  type BlockEvent,
} from '../repositories/fingerprint-block.repository.js';
import { NotFoundError, ValidationError } from '../plugins/error-handler.plugin.js';
import type { Logger } from '../utils/logger.js';

export interface BlockListOptions {
  activeOnly?: boolean;
  limit?: number;
  offset?: number;
}

/**
 * Durable, authoritative record of blocked fingerprints. Every method lets
 * storage errors through: a failed lookup must never read as "not blocked".
 */
export class FingerprintBlockRegistry {
  constructor(
    private repo: FingerprintBlockRepository,
    private logger: Logger
  ) {}

  async isBlocked(fingerprint: string): Promise<BlockInfo | null> {
    if (!fingerprint) return null;
    return this.repo.findActive(fingerprint);
  }

  /**
   * Create or reactivate the block. `blockedBy = null` marks an automatic block.
   */
  async block(
    fingerprint: string,
    reason: string,
    firstSeenUser: string | null,
    totalUsers: number,
    totalVotes: number,
    blockedBy: string | null = null
  ): Promise<BlockInfo> {
    if (!fingerprint) {
      throw new ValidationError('Fingerprint is required');
    }

    const { block, outcome } = await this.repo.upsertBlock({
      fingerprint,
      reason,
      firstSeenUser,
      totalUsers,
      totalVotes,
      blockedBy,
    });

    if (outcome !== 'already_active') {
      this.logger.warn({
        fingerprint,
        reason,
        totalUsers,
        totalVotes,
        blockedBy: blockedBy ?? 'auto',
        outcome,
      }, 'Fingerprint blocked');
    }

    return block;
  }

  async unblock(fingerprint: string, byUser: string): Promise<BlockInfo> {
    const block = await this.repo.deactivate(fingerprint, byUser);
    if (!block) {
      throw new NotFoundError('Active fingerprint block', fingerprint);
    }
    this.logger.info({ fingerprint, unblockedBy: byUser }, 'Fingerprint unblocked');
    return block;
  }

  async list(options: BlockListOptions = {}): Promise<BlockInfo[]> {
    return this.repo.list({
      activeOnly: options.activeOnly ?? true,
      limit: options.limit ?? 50,
      offset: options.offset ?? 0,
    });
  }

  async countActive(): Promise<number> {
    return this.repo.countActive();
  }

  async history(fingerprint: string): Promise<BlockEvent[]> {
    return this.repo.history(fingerprint);
  }
}
