// ============================================
// VOTESHIELD - Suspicion Engine
// ============================================

import type { FraudDetectionConfig } from '../config/fraud.js';
import type { VoteRepository, VoteRecord } from '../repositories/vote.repository.js';
import type { FingerprintBlockRegistry } from './fingerprint-block.service.js';
import type { FingerprintActivityCache, ActivitySnapshot } from './fingerprint-activity.service.js';
import type { VoteEventBus } from '../events/vote-events.js';
import type { Logger } from '../utils/logger.js';
import { AppError, ServiceUnavailableError } from '../plugins/error-handler.plugin.js';

const HOUR_MS = 60 * 60 * 1000;
const MIN_SPAN_HOURS = 1 / 60;

export interface Verdict {
  suspicious: boolean;
  blockVote: boolean;
  riskScore: number;
  reasons: string[];
}

export interface SuspicionEngineDeps {
  votes: VoteRepository;
  blocks: FingerprintBlockRegistry;
  activity: FingerprintActivityCache;
  events: VoteEventBus;
  logger: Logger;
  config: FraudDetectionConfig;
  clock?: () => Date;
}

export const CLEAN_VERDICT: Readonly<Verdict> = Object.freeze({
  suspicious: false,
  blockVote: false,
  riskScore: 0,
  reasons: [],
});

function clean(): Verdict {
  return { ...CLEAN_VERDICT, reasons: [] };
}

function distinct(values: Array<string | null>, current: string | null): Set<string> {
  const set = new Set<string>();
  for (const value of values) {
    if (value) set.add(value);
  }
  if (current) set.add(current);
  return set;
}

export function mergeVerdicts(base: Verdict, extra: Verdict): Verdict {
  const reasons = [...base.reasons];
  for (const reason of extra.reasons) {
    if (!reasons.includes(reason)) reasons.push(reason);
  }
  return {
    suspicious: base.suspicious || extra.suspicious,
    blockVote: base.blockVote || extra.blockVote,
    riskScore: Math.min(100, base.riskScore + extra.riskScore),
    reasons,
  };
}

/**
 * Scores a vote attempt from its fingerprint. The activity cache is a
 * best-effort hint; the block registry and the windowed vote query are
 * authoritative and their failures surface as ServiceUnavailableError.
 */
export class SuspicionEngine {
  private votes: VoteRepository;
  private blocks: FingerprintBlockRegistry;
  private activity: FingerprintActivityCache;
  private events: VoteEventBus;
  private logger: Logger;
  private config: FraudDetectionConfig;
  private clock: () => Date;

  constructor(deps: SuspicionEngineDeps) {
    this.votes = deps.votes;
    this.blocks = deps.blocks;
    this.activity = deps.activity;
    this.events = deps.events;
    this.logger = deps.logger;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Merge a follow-up verdict into `base`. The block threshold applies to
   * the combined score.
   */
  combine(base: Verdict, extra: Verdict): Verdict {
    const merged = mergeVerdicts(base, extra);
    if (merged.riskScore >= this.config.blockScore) {
      merged.blockVote = true;
    }
    return merged;
  }

  async evaluate(
    fingerprint: string | null,
    pollId: string,
    userId: string | null,
    ip: string | null
  ): Promise<Verdict> {
    if (!fingerprint) {
      return clean();
    }

    const block = await this.authoritative(() => this.blocks.isBlocked(fingerprint), 'block registry lookup');
    if (block) {
      return {
        suspicious: true,
        blockVote: true,
        riskScore: 100,
        reasons: [`Fingerprint permanently blocked: ${block.reason}`],
      };
    }

    const now = this.clock();
    const [snapshot, history] = await Promise.all([
      this.readActivity(fingerprint, pollId),
      this.recentHistory(pollId, fingerprint, now),
    ]);

    const users = distinct(history.map(v => v.userId), userId);
    const ips = distinct(history.map(v => v.ipAddress), ip);
    const { userThreshold, ipThreshold } = this.config;

    const reasons: string[] = [];
    let riskScore = 0;
    let sharedAcrossPrincipals = false;

    if (users.size >= userThreshold) {
      riskScore += this.config.userWeight;
      reasons.push(`Fingerprint used by ${users.size} different users`);
      sharedAcrossPrincipals = true;
    }

    if (ips.size >= ipThreshold) {
      riskScore += this.config.ipWeight;
      reasons.push(`Fingerprint used from ${ips.size} different IP addresses`);
      sharedAcrossPrincipals = true;
    }

    const velocity = this.velocity(history, now);
    if (velocity !== null && velocity > this.config.velocityPerHour) {
      riskScore += this.config.velocityWeight;
      reasons.push(`Rapid voting detected: ${velocity.toFixed(1)} votes/hour (high frequency)`);
    }

    // Cache-only signals are reported but never scored
    if (snapshot) {
      if (snapshot.userCount >= userThreshold && users.size < userThreshold) {
        reasons.push(`Unconfirmed: activity cache reports ${snapshot.userCount} different users`);
      }
      if (snapshot.ipCount >= ipThreshold && ips.size < ipThreshold) {
        reasons.push(`Unconfirmed: activity cache reports ${snapshot.ipCount} different IP addresses`);
      }
    }

    riskScore = Math.min(riskScore, 100);
    const blockVote = sharedAcrossPrincipals || riskScore >= this.config.blockScore;

    const verdict: Verdict = {
      suspicious: reasons.length > 0,
      blockVote,
      riskScore,
      reasons,
    };

    if (blockVote) {
      await this.autoBlock(fingerprint, pollId, userId, history, users.size, verdict);
    }

    return verdict;
  }

  /**
   * The distinct-IP rule on its own, with the same blocking behaviour.
   */
  async checkIpCombination(fingerprint: string | null, ip: string | null, pollId: string): Promise<Verdict> {
    if (!fingerprint || !ip) {
      return clean();
    }

    const history = await this.recentHistory(pollId, fingerprint, this.clock());
    const ips = distinct(history.map(v => v.ipAddress), ip);
    if (ips.size < this.config.ipThreshold) {
      return clean();
    }

    const verdict: Verdict = {
      suspicious: true,
      blockVote: true,
      riskScore: Math.min(this.config.ipWeight, 100),
      reasons: [`Fingerprint used from ${ips.size} different IP addresses`],
    };
    const users = distinct(history.map(v => v.userId), null);
    await this.autoBlock(fingerprint, pollId, null, history, users.size, verdict);
    return verdict;
  }

  /**
   * Flags (never blocks) a fingerprint that differs from what this user,
   * or this IP when anonymous, used earlier in the window.
   */
  async detectFingerprintChanges(
    fingerprint: string | null,
    userId: string | null,
    ip: string | null,
    pollId: string
  ): Promise<Verdict> {
    if (!fingerprint || (!userId && !ip)) {
      return clean();
    }

    const since = this.windowStart(this.clock());
    const sightings = await this.authoritative(
      () => userId
        ? this.votes.findFingerprintsForUser(userId, since)
        : this.votes.findFingerprintsForIp(pollId, ip ?? '', since),
      'fingerprint history query'
    );

    if (sightings.length === 0) {
      return clean();
    }

    const reasons: string[] = [];
    let riskScore = 0;

    if (sightings.some(s => s.fingerprint !== fingerprint)) {
      reasons.push('Fingerprint changed from previous vote');
      riskScore += this.config.fingerprintChangeWeight;
    }

    const fingerprints = new Set(sightings.map(s => s.fingerprint));
    fingerprints.add(fingerprint);
    if (fingerprints.size >= this.config.rapidFingerprintChangeCount) {
      reasons.push(`Rapid fingerprint changes: ${fingerprints.size} fingerprints within ${this.config.windowHours}h`);
      riskScore += this.config.fingerprintChangeWeight;
    }

    return {
      suspicious: reasons.length > 0,
      blockVote: false,
      riskScore: Math.min(riskScore, 100),
      reasons,
    };
  }

  private windowStart(now: Date): Date {
    return new Date(now.getTime() - this.config.windowHours * HOUR_MS);
  }

  /**
   * Votes per hour including the current attempt, over the span from the
   * oldest windowed vote to now. Null below the minimum sample size.
   */
  private velocity(history: VoteRecord[], now: Date): number | null {
    const total = history.length + 1;
    if (total < this.config.velocityMinVotes || history.length === 0) {
      return null;
    }
    const spanHours = Math.max((now.getTime() - history[0].createdAt.getTime()) / HOUR_MS, MIN_SPAN_HOURS);
    return total / spanHours;
  }

  private async recentHistory(pollId: string, fingerprint: string, now: Date): Promise<VoteRecord[]> {
    return this.authoritative(
      () => this.votes.findRecentByFingerprint(pollId, fingerprint, this.windowStart(now)),
      'recent vote query'
    );
  }

  private async readActivity(fingerprint: string, pollId: string): Promise<ActivitySnapshot | null> {
    try {
      return await this.activity.read(fingerprint, pollId);
    } catch (err) {
      this.logger.warn({ err, fingerprint, pollId }, 'Fingerprint activity cache unavailable');
      return null;
    }
  }

  private async authoritative<T>(operation: () => Promise<T>, label: string): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof AppError) throw err;
      this.logger.error({ err }, `Suspicion check failed: ${label}`);
      throw new ServiceUnavailableError('Vote verification is temporarily unavailable, please retry', err);
    }
  }

  private async autoBlock(
    fingerprint: string,
    pollId: string,
    userId: string | null,
    history: VoteRecord[],
    totalUsers: number,
    verdict: Verdict
  ): Promise<void> {
    const firstSeenUser = history.find(v => v.userId)?.userId ?? userId;

    try {
      await this.blocks.block(
        fingerprint,
        `Auto-blocked: ${verdict.reasons.join('; ')}`,
        firstSeenUser,
        totalUsers,
        history.length + 1,
        null
      );
    } catch (err) {
      // The attempt is rejected regardless; only the durable record is missing
      this.logger.error({ err, fingerprint, pollId }, 'Failed to persist automatic fingerprint block');
    }

    this.events.emit('vote_flagged', {
      voteId: null,
      userId,
      pollId,
      reasons: verdict.reasons,
      riskScore: verdict.riskScore,
    });
  }
}
