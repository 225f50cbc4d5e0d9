// ============================================
// VOTESHIELD - Pattern Analyzer
// ============================================

import type { FraudDetectionConfig } from '../config/fraud.js';
import type { PatternType } from '../db/schema/fraud.js';
import type { PollRepository } from '../repositories/poll.repository.js';
import type { VoteRepository, VoteRecord } from '../repositories/vote.repository.js';
import type { FraudAlertRepository, FraudAlert } from '../repositories/fraud-alert.repository.js';
import type { VoteEventBus } from '../events/vote-events.js';
import type { Logger } from '../utils/logger.js';
import { PollNotFoundError } from '../plugins/error-handler.plugin.js';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

export interface DetectedPattern {
  pollId: string;
  type: PatternType;
  /** Stable identity of the pattern within its poll; reruns produce the same value */
  signature: string;
  voteIds: string[];
  reason: string;
  riskScore: number;
  ipAddress: string | null;
}

export interface AnalysisResult {
  pollsAnalyzed: number;
  patternsDetected: DetectedPattern[];
  totalSuspiciousPatterns: number;
  highestRiskScore: number;
  /** Patterns at or above the alert threshold; `run` raises one alert each unless already on record */
  alertsGenerated: number;
}

export interface AnalysisRunSummary {
  pollsAnalyzed: number;
  patternsDetected: number;
  alertsGenerated: number;
  votesFlagged: number;
  failedPolls: string[];
  highestRiskScore: number;
}

export interface PatternAnalyzerDeps {
  polls: PollRepository;
  votes: VoteRepository;
  alerts: FraudAlertRepository;
  events: VoteEventBus;
  logger: Logger;
  config: FraudDetectionConfig;
  clock?: () => Date;
}

function groupBy<K>(items: VoteRecord[], keyOf: (vote: VoteRecord) => K | null): Map<K, VoteRecord[]> {
  const groups = new Map<K, VoteRecord[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function countDistinct(votes: VoteRecord[], valueOf: (vote: VoteRecord) => string | null): number {
  const values = new Set<string>();
  for (const vote of votes) {
    const value = valueOf(vote);
    if (value) values.add(value);
  }
  return values.size;
}

/** Vote-side reasons carry the pattern signature so a later run can replace them. */
function taggedReason(pattern: Pick<DetectedPattern, 'reason' | 'signature'>): string {
  return `${pattern.reason} [${pattern.signature}]`;
}

function reasonSignature(reason: string): string | null {
  const match = /\[([^\]]+)\]$/.exec(reason);
  return match ? match[1] : null;
}

/**
 * A reason from an earlier run of the same pattern is replaced in place;
 * reasons from new patterns are appended.
 */
function mergeReasons(existing: string[], incoming: Map<string, string>): string[] {
  const pending = new Map(incoming);
  const merged = existing.map(reason => {
    const signature = reasonSignature(reason);
    const replacement = signature === null ? undefined : pending.get(signature);
    if (signature === null || replacement === undefined) return reason;
    pending.delete(signature);
    return replacement;
  });
  return [...merged, ...pending.values()];
}

function ipv4Subnet(ip: string | null): string | null {
  if (!ip) return null;
  const octets = ip.split('.');
  if (octets.length !== 4 || !octets.every(o => /^\d{1,3}$/.test(o))) {
    return null;
  }
  return `${octets[0]}.${octets[1]}.${octets[2]}.0/24`;
}

/**
 * Scans a window of committed votes for coordinated activity, raises
 * deduplicated alerts and retroactively invalidates matching votes.
 * Safe to re-run over the same window.
 */
export class PatternAnalyzer {
  private polls: PollRepository;
  private votes: VoteRepository;
  private alerts: FraudAlertRepository;
  private events: VoteEventBus;
  private logger: Logger;
  private config: FraudDetectionConfig;
  private clock: () => Date;

  constructor(deps: PatternAnalyzerDeps) {
    this.polls = deps.polls;
    this.votes = deps.votes;
    this.alerts = deps.alerts;
    this.events = deps.events;
    this.logger = deps.logger;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
  }

  async analyze(pollId: string | null, windowHours: number = 24): Promise<AnalysisResult> {
    const pollIds = await this.resolvePolls(pollId);
    const patterns: DetectedPattern[] = [];

    for (const id of pollIds) {
      patterns.push(...await this.detectForPoll(id, windowHours));
    }

    return this.summarize(pollIds.length, patterns);
  }

  /**
   * One alert per pattern at or above the alert threshold. Repeats of a
   * (poll, signature) already on record are skipped.
   */
  async generateAlerts(pollId: string, patterns: DetectedPattern[]): Promise<FraudAlert[]> {
    const created: FraudAlert[] = [];
    const seen = new Set<string>();

    for (const pattern of patterns) {
      if (pattern.pollId !== pollId || pattern.riskScore < this.config.alertThreshold) continue;
      if (seen.has(pattern.signature)) continue;
      seen.add(pattern.signature);

      const alert = await this.alerts.insertIfAbsent({
        pollId,
        voteId: pattern.voteIds.length === 1 ? pattern.voteIds[0] : null,
        userId: null,
        ipAddress: pattern.ipAddress,
        patternType: pattern.type,
        signature: pattern.signature,
        reasons: [pattern.reason],
        riskScore: pattern.riskScore,
      });
      if (alert) created.push(alert);
    }

    if (created.length > 0) {
      this.logger.warn({ pollId, alerts: created.length }, 'Fraud alerts generated');
    }
    return created;
  }

  /**
   * Mark votes covered by high-risk patterns invalid. Returns how many of
   * those votes are now invalid, whether flagged by this call or earlier.
   */
  async flagSuspiciousVotes(pollId: string, patterns: DetectedPattern[]): Promise<number> {
    const targets = new Map<string, { reasons: Map<string, string>; riskScore: number }>();

    for (const pattern of patterns) {
      if (pattern.pollId !== pollId || pattern.riskScore < this.config.flagThreshold) continue;
      for (const voteId of pattern.voteIds) {
        const target = targets.get(voteId) ?? { reasons: new Map<string, string>(), riskScore: 0 };
        target.reasons.set(pattern.signature, taggedReason(pattern));
        target.riskScore = Math.max(target.riskScore, pattern.riskScore);
        targets.set(voteId, target);
      }
    }

    let flagged = 0;
    for (const [voteId, target] of targets) {
      const outcome = await this.flagVote(voteId, target.reasons, target.riskScore);
      if (outcome === 'skipped') continue;
      flagged++;
      if (outcome === 'flagged') {
        this.logger.info({ voteId, pollId }, 'Vote retroactively flagged');
      }
    }

    return flagged;
  }

  /**
   * analyze + generateAlerts + flagSuspiciousVotes per poll. A failing poll
   * is logged and skipped.
   */
  async run(pollId: string | null = null, windowHours: number = 24): Promise<AnalysisRunSummary> {
    const pollIds = await this.resolvePolls(pollId);
    const summary: AnalysisRunSummary = {
      pollsAnalyzed: 0,
      patternsDetected: 0,
      alertsGenerated: 0,
      votesFlagged: 0,
      failedPolls: [],
      highestRiskScore: 0,
    };

    for (const id of pollIds) {
      try {
        const patterns = await this.detectForPoll(id, windowHours);
        const alerts = await this.generateAlerts(id, patterns);
        const flagged = await this.flagSuspiciousVotes(id, patterns);

        summary.pollsAnalyzed++;
        summary.patternsDetected += patterns.length;
        summary.alertsGenerated += alerts.length;
        summary.votesFlagged += flagged;
        for (const pattern of patterns) {
          summary.highestRiskScore = Math.max(summary.highestRiskScore, pattern.riskScore);
        }
      } catch (err) {
        summary.failedPolls.push(id);
        this.logger.error({ err, pollId: id }, 'Pattern analysis failed for poll');
      }
    }

    this.logger.info({ ...summary, windowHours }, 'Pattern analysis completed');
    return summary;
  }

  /**
   * Pure detection over a vote snapshot.
   */
  detectPatterns(pollId: string, votes: VoteRecord[]): DetectedPattern[] {
    return [
      ...this.detectBursts(pollId, votes),
      ...this.detectIpClusters(pollId, votes),
      ...this.detectSubnetClusters(pollId, votes),
      ...this.detectFingerprintReuse(pollId, votes),
    ];
  }

  private async detectForPoll(pollId: string, windowHours: number): Promise<DetectedPattern[]> {
    const since = new Date(this.clock().getTime() - windowHours * HOUR_MS);
    const votes = await this.votes.findPollVotesSince(pollId, since);
    return this.detectPatterns(pollId, votes);
  }

  /**
   * Sliding window over the time-sorted votes. Overlapping windows that each
   * reach the minimum merge into one burst, keyed by the window bucket of
   * its first vote.
   */
  private detectBursts(pollId: string, votes: VoteRecord[]): DetectedPattern[] {
    const windowMs = this.config.burstWindowMinutes * MINUTE_MS;
    const sorted = [...votes].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    const bursts: Array<{ start: number; end: number; peak: number }> = [];
    let current: { start: number; end: number; peak: number } | null = null;
    let left = 0;

    for (let right = 0; right < sorted.length; right++) {
      const rightAt = sorted[right].createdAt.getTime();
      while (rightAt - sorted[left].createdAt.getTime() > windowMs) left++;

      const count = right - left + 1;
      if (count < this.config.burstMinVotes) continue;

      if (current && left <= current.end) {
        current.end = right;
        current.peak = Math.max(current.peak, count);
      } else {
        if (current) bursts.push(current);
        current = { start: left, end: right, peak: count };
      }
    }
    if (current) bursts.push(current);

    return bursts.map(burst => {
      const group = sorted.slice(burst.start, burst.end + 1);
      const bucketStart = Math.floor(group[0].createdAt.getTime() / windowMs) * windowMs;
      return {
        pollId,
        type: 'vote_burst' as const,
        signature: `vote_burst:${bucketStart}`,
        voteIds: group.map(v => v.id),
        reason: `Vote burst: ${burst.peak} votes within ${this.config.burstWindowMinutes} minutes`,
        riskScore: Math.min(100, Math.round((50 * burst.peak) / this.config.burstMinVotes)),
        ipAddress: null,
      };
    });
  }

  private detectIpClusters(pollId: string, votes: VoteRecord[]): DetectedPattern[] {
    const patterns: DetectedPattern[] = [];

    for (const [ip, group] of groupBy(votes, v => v.ipAddress)) {
      const voters = countDistinct(group, v => v.voterToken);
      if (voters < this.config.ipClusterMinVoters) continue;
      patterns.push({
        pollId,
        type: 'ip_cluster',
        signature: `ip_cluster:${ip}`,
        voteIds: group.map(v => v.id),
        reason: `IP cluster: ${voters} voters from ${ip}`,
        riskScore: Math.min(100, 20 * voters),
        ipAddress: ip,
      });
    }
    return patterns;
  }

  private detectSubnetClusters(pollId: string, votes: VoteRecord[]): DetectedPattern[] {
    const patterns: DetectedPattern[] = [];

    for (const [subnet, group] of groupBy(votes, v => ipv4Subnet(v.ipAddress))) {
      const addresses = countDistinct(group, v => v.ipAddress);
      if (addresses < this.config.subnetClusterMinIps) continue;
      patterns.push({
        pollId,
        type: 'subnet_cluster',
        signature: `subnet_cluster:${subnet}`,
        voteIds: group.map(v => v.id),
        reason: `Geographic anomaly: ${addresses} addresses from subnet ${subnet}`,
        riskScore: Math.min(100, 10 * addresses),
        ipAddress: null,
      });
    }
    return patterns;
  }

  private detectFingerprintReuse(pollId: string, votes: VoteRecord[]): DetectedPattern[] {
    const patterns: DetectedPattern[] = [];

    for (const [fingerprint, group] of groupBy(votes, v => v.fingerprint)) {
      const voters = countDistinct(group, v => v.voterToken);
      if (voters < this.config.fingerprintReuseMinVoters) continue;
      patterns.push({
        pollId,
        type: 'fingerprint_reuse',
        signature: `fingerprint_reuse:${fingerprint}`,
        voteIds: group.map(v => v.id),
        reason: `Fingerprint reuse: ${voters} voters share fingerprint ${fingerprint.slice(0, 12)}`,
        riskScore: Math.min(100, 50 + 25 * (voters - 1)),
        ipAddress: null,
      });
    }
    return patterns;
  }

  /**
   * Compare-and-set on the vote's fraud fields, retried when a concurrent
   * writer changes them between read and write.
   */
  private async flagVote(
    voteId: string,
    reasons: Map<string, string>,
    riskScore: number
  ): Promise<'flagged' | 'already_flagged' | 'skipped'> {
    for (let attempt = 0; attempt < this.config.flagRetryLimit; attempt++) {
      const current = await this.votes.findById(voteId);
      if (!current) return 'skipped';

      const nextReasons = mergeReasons(current.fraudReasons, reasons);
      const nextScore = Math.max(current.riskScore, riskScore);
      const unchanged = nextReasons.length === current.fraudReasons.length
        && nextReasons.every((r, i) => r === current.fraudReasons[i]);
      if (!current.isValid && unchanged && nextScore === current.riskScore) {
        return 'already_flagged';
      }

      const expected = {
        isValid: current.isValid,
        riskScore: current.riskScore,
        fraudReasons: current.fraudReasons,
      };
      const next = {
        isValid: false,
        riskScore: nextScore,
        fraudReasons: nextReasons,
      };

      if (await this.votes.compareAndFlag(voteId, expected, next)) {
        if (!current.isValid) return 'already_flagged';
        this.events.emit('vote_flagged', {
          voteId,
          userId: current.userId,
          pollId: current.pollId,
          reasons: next.fraudReasons,
          riskScore: next.riskScore,
        });
        return 'flagged';
      }
    }

    this.logger.warn({ voteId }, 'Gave up flagging vote after concurrent updates');
    return 'skipped';
  }

  private async resolvePolls(pollId: string | null): Promise<string[]> {
    if (pollId === null) {
      return this.polls.listOpenPollIds(this.clock());
    }
    const poll = await this.polls.getPollById(pollId);
    if (!poll) {
      throw new PollNotFoundError(pollId);
    }
    return [pollId];
  }

  private summarize(pollsAnalyzed: number, patterns: DetectedPattern[]): AnalysisResult {
    return {
      pollsAnalyzed,
      patternsDetected: patterns,
      totalSuspiciousPatterns: patterns.length,
      highestRiskScore: patterns.reduce((max, p) => Math.max(max, p.riskScore), 0),
      alertsGenerated: patterns.filter(p => p.riskScore >= this.config.alertThreshold).length,
    };
  }
}
