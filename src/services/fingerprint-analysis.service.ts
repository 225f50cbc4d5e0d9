// ============================================
// VOTESHIELD - Deep Fingerprint Analysis
// ============================================

import type { FraudDetectionConfig } from '../config/fraud.js';
import type { VoteRepository } from '../repositories/vote.repository.js';
import type { FingerprintActivityCache, DeepAnalysis } from './fingerprint-activity.service.js';
import type { Logger } from '../utils/logger.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Long-window review of one fingerprint within the poll it just voted on,
 * run after a vote commits. The result annotates the activity cache entry and is advisory only.
 */
export class FingerprintAnalysisService {
  constructor(
    private votes: VoteRepository,
    private activity: FingerprintActivityCache,
    private logger: Logger,
    private config: FraudDetectionConfig,
    private clock: () => Date = () => new Date()
  ) {}

  async analyze(fingerprint: string, pollId: string): Promise<DeepAnalysis> {
    const now = this.clock();
    const windowHours = this.config.deepAnalysisWindowHours;
    const history = await this.votes.findRecentByFingerprint(pollId, fingerprint, new Date(now.getTime() - windowHours * HOUR_MS));

    const users = new Set(history.flatMap(v => (v.userId ? [v.userId] : [])));
    const ips = new Set(history.flatMap(v => (v.ipAddress ? [v.ipAddress] : [])));

    const reasons: string[] = [];
    let riskScore = 0;

    if (users.size >= this.config.userThreshold) {
      riskScore += this.config.userWeight;
      reasons.push(`Fingerprint used by ${users.size} different users in ${windowHours}h`);
    }
    if (ips.size >= this.config.ipThreshold) {
      riskScore += this.config.ipWeight;
      reasons.push(`Fingerprint used from ${ips.size} different IP addresses in ${windowHours}h`);
    }
    if (history.length >= this.config.velocityMinVotes) {
      const spanHours = Math.max((now.getTime() - history[0].createdAt.getTime()) / HOUR_MS, 1 / 60);
      const velocity = history.length / spanHours;
      if (velocity > this.config.velocityPerHour) {
        riskScore += this.config.velocityWeight;
        reasons.push(`Sustained voting rate of ${velocity.toFixed(1)} votes/hour`);
      }
    }

    const analysis: DeepAnalysis = {
      analyzedAt: now.toISOString(),
      windowHours,
      totalVotes: history.length,
      distinctUsers: users.size,
      distinctIps: ips.size,
      riskScore: Math.min(riskScore, 100),
      reasons,
    };

    try {
      await this.activity.storeAnalysis(fingerprint, pollId, analysis);
    } catch (err) {
      this.logger.warn({ err, fingerprint, pollId }, 'Could not cache fingerprint analysis');
    }

    if (analysis.riskScore >= this.config.deepAnalysisWarnScore) {
      this.logger.warn({ fingerprint, pollId, riskScore: analysis.riskScore, reasons }, 'High-risk fingerprint detected');
    } else {
      this.logger.debug({ fingerprint, pollId, riskScore: analysis.riskScore }, 'Fingerprint analysis completed');
    }

    return analysis;
  }
}
