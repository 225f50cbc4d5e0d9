// ============================================
// VOTESHIELD - Vote Cast Orchestrator
// ============================================

import type { PollRepository, Poll } from '../repositories/poll.repository.js';
import type { VoteRepository, VoteRecord } from '../repositories/vote.repository.js';
import type { VoteAttemptRepository, VoteAttemptInput } from '../repositories/vote-attempt.repository.js';
import type { IdempotencyStore } from './idempotency.service.js';
import { resolveIdempotencyKey } from './idempotency.service.js';
import type { FingerprintBlockRegistry } from './fingerprint-block.service.js';
import type { FingerprintActivityCache } from './fingerprint-activity.service.js';
import type { FingerprintAnalysisService } from './fingerprint-analysis.service.js';
import type { SuspicionEngine, Verdict } from './suspicion.service.js';
import type { VoteEventBus } from '../events/vote-events.js';
import type { Logger } from '../utils/logger.js';
import { voterTokenFor } from '../utils/voter-identity.js';
import { normalizeFingerprint, requireFingerprintForAnonymous } from '../utils/fingerprint.js';
import {
  AppError,
  DuplicateVoteError,
  FingerprintValidationError,
  ForbiddenError,
  FraudDetectedError,
  InvalidPollError,
  InvalidVoteError,
  NotFoundError,
  PollClosedError,
  PollNotFoundError,
  ServiceUnavailableError,
  UnauthorizedError,
} from '../plugins/error-handler.plugin.js';

export type CastState =
  | 'received'
  | 'identity-resolved'
  | 'duplicate-checked'
  | 'block-checked'
  | 'suspicion-evaluated'
  | 'accepted'
  | 'rejected';

export interface VoterContext {
  userId: string | null;
  ip: string | null;
  userAgent: string | null;
  fingerprint: string | null;
}

export interface CastVoteInput {
  pollId: string;
  optionId: string;
  idempotencyKey?: string | null;
  voter: VoterContext;
}

export interface CastVoteResult {
  vote: VoteRecord;
  isNew: boolean;
}

/** Runs a post-commit job off the request path. */
export type JobScheduler = (job: () => Promise<void>) => void;

export interface VoteServiceDeps {
  polls: PollRepository;
  votes: VoteRepository;
  attempts: VoteAttemptRepository;
  idempotency: IdempotencyStore;
  blocks: FingerprintBlockRegistry;
  suspicion: SuspicionEngine;
  activity: FingerprintActivityCache;
  analysis?: FingerprintAnalysisService | null;
  events: VoteEventBus;
  logger: Logger;
  clock?: () => Date;
  schedule?: JobScheduler;
}

const REPLAY_CODE = 'IDEMPOTENT_REPLAY';

export class VoteService {
  private deps: VoteServiceDeps;
  private clock: () => Date;
  private schedule: JobScheduler;

  constructor(deps: VoteServiceDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
    this.schedule = deps.schedule ?? (job => { setImmediate(job); });
  }

  /**
   * received → identity-resolved → duplicate-checked → block-checked →
   * suspicion-evaluated → accepted | rejected.
   * Every outcome leaves exactly one VoteAttempt row.
   */
  async castVote(input: CastVoteInput): Promise<CastVoteResult> {
    const { polls, votes, attempts, blocks, suspicion, logger } = this.deps;
    const fingerprint = normalizeFingerprint(input.voter.fingerprint);
    const { userId, ip, userAgent } = input.voter;

    let state: CastState = 'received';
    let verdict: Verdict | null = null;
    const audit: VoteAttemptInput = {
      pollId: input.pollId,
      optionId: input.optionId || null,
      userId,
      voterToken: null,
      fingerprint,
      ipAddress: ip,
      userAgent,
      idempotencyKey: null,
      success: false,
    };

    try {
      if (!input.pollId || !input.optionId) {
        throw new InvalidVoteError('Poll and option identifiers are required');
      }

      const poll = await polls.getPollById(input.pollId);
      if (!poll) {
        throw new PollNotFoundError(input.pollId);
      }
      this.assertPollOpen(poll);

      const option = await polls.getOptionById(input.optionId);
      if (!option || option.pollId !== poll.id) {
        throw new InvalidVoteError('Option does not belong to this poll');
      }

      if (poll.securityRules.requireAuthentication && !userId) {
        throw new UnauthorizedError('This poll requires authentication');
      }

      const fingerprintCheck = requireFingerprintForAnonymous(fingerprint, userId !== null);
      if (!fingerprintCheck.valid) {
        throw new FingerprintValidationError(fingerprintCheck.error);
      }

      const voterToken = voterTokenFor(userId, ip, userAgent, fingerprint);
      const key = resolveIdempotencyKey(input.idempotencyKey, voterToken, poll.id, option.id);
      audit.voterToken = voterToken;
      audit.idempotencyKey = key;
      state = 'identity-resolved';

      const prior = await this.findReplay(key);
      if (prior) {
        const vote = this.assertSameVoter(prior, voterToken, poll.id);
        await this.recordReplay(audit);
        return { vote, isNew: false };
      }

      const existing = userId ? await votes.findUserVote(userId, poll.id) : null;
      if (existing) {
        // A concurrent request with this key may have committed since findReplay
        if (existing.idempotencyKey !== key) {
          throw new DuplicateVoteError();
        }
        await this.recordReplay(audit);
        return { vote: existing, isNew: false };
      }
      state = 'duplicate-checked';

      if (fingerprint) {
        const block = await this.checkRegistry(blocks, fingerprint);
        if (block) {
          verdict = {
            suspicious: true,
            blockVote: true,
            riskScore: 100,
            reasons: [`Fingerprint permanently blocked: ${block.reason}`],
          };
          throw new FraudDetectedError('This device has been blocked from voting', verdict.reasons);
        }
      }
      state = 'block-checked';

      verdict = await suspicion.evaluate(fingerprint, poll.id, userId, ip);
      if (!verdict.blockVote) {
        verdict = suspicion.combine(verdict, await suspicion.detectFingerprintChanges(fingerprint, userId, ip, poll.id));
      }
      if (verdict.blockVote) {
        logger.warn({ pollId: poll.id, fingerprint, riskScore: verdict.riskScore, reasons: verdict.reasons }, 'Vote blocked by suspicion engine');
        throw new FraudDetectedError('Vote blocked due to suspicious activity', verdict.reasons);
      }
      state = 'suspicion-evaluated';

      const result = await votes.commitVote(
        {
          pollId: poll.id,
          optionId: option.id,
          userId,
          voterToken,
          fingerprint,
          ipAddress: ip,
          userAgent,
          idempotencyKey: key,
          fraudReasons: verdict.reasons,
          riskScore: verdict.riskScore,
        },
        { ...audit, success: true, riskScore: verdict.riskScore, fraudReasons: verdict.reasons }
      );

      if (result.kind === 'duplicate') {
        throw new DuplicateVoteError();
      }
      if (result.kind === 'replay') {
        const vote = this.assertSameVoter(result.vote, voterToken, poll.id);
        await this.recordReplay(audit);
        return { vote, isNew: false };
      }

      state = 'accepted';
      logger.info({ voteId: result.vote.id, pollId: poll.id, riskScore: result.vote.riskScore, state }, 'Vote accepted');
      this.afterCommit(result.vote);
      return { vote: result.vote, isNew: true };
    } catch (err) {
      state = 'rejected';
      await this.recordFailure(audit, err, verdict);
      logger.info({ pollId: input.pollId, state, code: err instanceof AppError ? err.code : 'INTERNAL_ERROR' }, 'Vote rejected');
      throw err;
    }
  }

  /**
   * Remove the caller's own vote on a poll that allows it.
   */
  async retractVote(userId: string, voteId: string): Promise<void> {
    const { polls, votes, idempotency, events } = this.deps;

    const vote = await votes.findById(voteId);
    if (!vote) {
      throw new NotFoundError('Vote', voteId);
    }
    if (vote.userId !== userId) {
      throw new ForbiddenError('You can only retract your own vote');
    }

    const poll = await polls.getPollById(vote.pollId);
    if (!poll) {
      throw new PollNotFoundError(vote.pollId);
    }
    if (!poll.settings.allowVoteRetraction) {
      throw new ForbiddenError('This poll does not allow vote retraction');
    }
    this.assertPollOpen(poll);

    if (!await votes.deleteVote(vote)) {
      throw new NotFoundError('Vote', voteId);
    }

    this.dispatch('idempotency invalidation', () => idempotency.forget(vote.idempotencyKey));
    events.emit('poll_results_changed', { pollId: vote.pollId });
  }

  async listVotesForUser(userId: string): Promise<VoteRecord[]> {
    return this.deps.votes.listForUser(userId);
  }

  assertPollOpen(poll: Poll): void {
    const now = this.clock();
    if (poll.isDraft) {
      throw new InvalidPollError('Cannot vote on a draft poll');
    }
    if (!poll.isActive) {
      throw new PollClosedError('This poll is not active');
    }
    if (poll.startsAt.getTime() > now.getTime()) {
      throw new PollClosedError('This poll has not started yet');
    }
    if (poll.endsAt && poll.endsAt.getTime() <= now.getTime()) {
      throw new PollClosedError('This poll has ended');
    }
  }

  private async findReplay(key: string): Promise<VoteRecord | null> {
    const { idempotency, votes } = this.deps;

    const cached = await idempotency.check(key);
    if (cached.cachedResult) {
      const vote = await votes.findById(cached.cachedResult.voteId);
      if (vote) return vote;
    }

    const durable = await idempotency.checkDuplicateByKey(key);
    return durable.existingVoteId ? votes.findById(durable.existingVoteId) : null;
  }

  /** A key that resolves to someone else's vote is rejected, never replayed. */
  private assertSameVoter(vote: VoteRecord, voterToken: string, pollId: string): VoteRecord {
    if (vote.voterToken !== voterToken || vote.pollId !== pollId) {
      throw new InvalidVoteError('Idempotency key has already been used for a different vote');
    }
    return vote;
  }

  private async checkRegistry(blocks: FingerprintBlockRegistry, fingerprint: string) {
    try {
      return await blocks.isBlocked(fingerprint);
    } catch (err) {
      this.deps.logger.error({ err, fingerprint }, 'Fingerprint block lookup failed');
      throw new ServiceUnavailableError('Vote verification is temporarily unavailable, please retry', err);
    }
  }

  private async recordReplay(audit: VoteAttemptInput): Promise<void> {
    await this.deps.attempts.record({ ...audit, success: true, errorCode: REPLAY_CODE });
  }

  private async recordFailure(audit: VoteAttemptInput, err: unknown, verdict: Verdict | null): Promise<void> {
    try {
      await this.deps.attempts.record({
        ...audit,
        success: false,
        errorCode: err instanceof AppError ? err.code : 'INTERNAL_ERROR',
        errorMessage: err instanceof Error ? err.message : String(err),
        riskScore: verdict?.riskScore ?? 0,
        fraudReasons: verdict?.reasons ?? [],
      });
    } catch (auditErr) {
      this.deps.logger.error({ err: auditErr, pollId: audit.pollId }, 'Failed to record vote attempt');
    }
  }

  private afterCommit(vote: VoteRecord): void {
    const { idempotency, activity, analysis, events } = this.deps;

    this.dispatch('idempotency cache write', () => idempotency.store(vote.idempotencyKey, {
      voteId: vote.id,
      pollId: vote.pollId,
      optionId: vote.optionId,
      voterToken: vote.voterToken,
      createdAt: vote.createdAt.toISOString(),
    }));

    const fingerprint = vote.fingerprint;
    if (fingerprint) {
      this.dispatch('fingerprint activity update', () => activity.record(fingerprint, vote.pollId, vote.userId, vote.ipAddress));
      if (analysis) {
        this.dispatch('fingerprint deep analysis', () => analysis.analyze(fingerprint, vote.pollId));
      }
    }

    this.dispatch('results broadcast', async () => {
      events.emit('poll_results_changed', { pollId: vote.pollId });
    });
  }

  private dispatch(label: string, task: () => Promise<unknown>): void {
    this.schedule(async () => {
      try {
        await task();
      } catch (err) {
        this.deps.logger.error({ err }, `Post-commit ${label} failed`);
      }
    });
  }
}
