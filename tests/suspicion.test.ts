// ============================================
// VOTESHIELD - Suspicion Engine Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CLEAN_VERDICT, mergeVerdicts } from '../src/services/suspicion.service.js';
import { ServiceUnavailableError } from '../src/plugins/error-handler.plugin.js';
import type { Poll, PollOption } from '../src/repositories/poll.repository.js';
import {
  FP_A,
  FP_B,
  FP_C,
  createHarness,
  createPoll,
  insertVote,
  minutesBefore,
  UnavailableCache,
  type Harness,
} from './helpers.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('SuspicionEngine', () => {
  let harness: Harness;
  let poll: Poll;
  let option: PollOption;

  const setup = async (cache?: UnavailableCache) => {
    harness = createHarness({ clock: () => NOW, cache });
    const created = await createPoll(harness.db);
    poll = created.poll;
    option = created.options[0];
  };

  afterEach(() => {
    harness.sqlite.close();
  });

  describe('evaluate', () => {
    beforeEach(async () => {
      await setup();
    });

    it('should flag and block a fingerprint shared by two users', async () => {
      insertVote(harness.db, {
        pollId: poll.id,
        optionId: option.id,
        userId: 'user-1',
        fingerprint: FP_A,
        ip: '10.0.0.1',
        createdAt: minutesBefore(NOW, 30),
      });

      const verdict = await harness.services.suspicion.evaluate(FP_A, poll.id, 'user-2', '10.0.0.2');

      expect(verdict).toEqual({
        suspicious: true,
        blockVote: true,
        riskScore: 70,
        reasons: [
          'Fingerprint used by 2 different users',
          'Fingerprint used from 2 different IP addresses',
        ],
      });
    });

    it('should record an automatic block and announce it', async () => {
      const flagged = vi.fn();
      harness.services.events.on('vote_flagged', flagged);
      insertVote(harness.db, {
        pollId: poll.id,
        optionId: option.id,
        userId: 'user-1',
        fingerprint: FP_A,
        ip: '10.0.0.1',
        createdAt: minutesBefore(NOW, 30),
      });

      await harness.services.suspicion.evaluate(FP_A, poll.id, 'user-2', '10.0.0.1');

      const block = await harness.services.blocks.isBlocked(FP_A);
      expect(block?.reason).toBe('Auto-blocked: Fingerprint used by 2 different users');
      expect(block?.blockedBy).toBeNull();
      expect(block?.firstSeenUser).toBe('user-1');
      expect(block?.totalUsers).toBe(2);
      expect(block?.totalVotes).toBe(2);
      expect(flagged).toHaveBeenCalledWith({
        voteId: null,
        userId: 'user-2',
        pollId: poll.id,
        reasons: ['Fingerprint used by 2 different users'],
        riskScore: 40,
      });
    });

    it('should block a fingerprint seen from three addresses', async () => {
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, fingerprint: FP_B, ip: '10.0.0.1', createdAt: minutesBefore(NOW, 120) });
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, fingerprint: FP_B, ip: '10.0.0.2', createdAt: minutesBefore(NOW, 60) });

      const verdict = await harness.services.suspicion.evaluate(FP_B, poll.id, null, '10.0.0.3');

      expect(verdict).toEqual({
        suspicious: true,
        blockVote: true,
        riskScore: 30,
        reasons: ['Fingerprint used from 3 different IP addresses'],
      });
      expect(verdict.reasons[0].toLowerCase()).toContain('different ip');
    });

    it('should mark rapid voting from one device', async () => {
      for (let i = 0; i < 15; i++) {
        insertVote(harness.db, {
          pollId: poll.id,
          optionId: option.id,
          fingerprint: FP_A,
          ip: '10.0.0.5',
          createdAt: minutesBefore(NOW, 50 - i * 3),
        });
      }

      const verdict = await harness.services.suspicion.evaluate(FP_A, poll.id, 'user-1', '10.0.0.5');

      // 16 votes over 50 minutes
      expect(verdict).toEqual({
        suspicious: true,
        blockVote: false,
        riskScore: 20,
        reasons: ['Rapid voting detected: 19.2 votes/hour (high frequency)'],
      });
    });

    it('should ignore votes outside the window', async () => {
      insertVote(harness.db, {
        pollId: poll.id,
        optionId: option.id,
        userId: 'user-1',
        fingerprint: FP_A,
        ip: '10.0.0.1',
        createdAt: minutesBefore(NOW, 25 * 60),
      });

      const verdict = await harness.services.suspicion.evaluate(FP_A, poll.id, 'user-2', '10.0.0.2');

      expect(verdict).toEqual(CLEAN_VERDICT);
    });

    it('should reject every attempt on a permanently blocked fingerprint until it is unblocked', async () => {
      await harness.services.blocks.block(FP_C, 'manual review', null, 0, 0, 'admin-1');

      const blocked = {
        suspicious: true,
        blockVote: true,
        riskScore: 100,
        reasons: ['Fingerprint permanently blocked: manual review'],
      };
      expect(await harness.services.suspicion.evaluate(FP_C, poll.id, 'user-7', '192.0.2.1')).toEqual(blocked);
      expect(await harness.services.suspicion.evaluate(FP_C, poll.id, null, '198.51.100.4')).toEqual(blocked);

      await harness.services.blocks.unblock(FP_C, 'admin-1');

      const verdict = await harness.services.suspicion.evaluate(FP_C, poll.id, 'user-7', '192.0.2.1');
      expect(verdict.suspicious).toBe(false);
      expect(verdict).toEqual(CLEAN_VERDICT);
    });

    it('should report cache-only signals without scoring them', async () => {
      await harness.services.activity.record(FP_A, poll.id, 'user-1', '10.0.0.1');
      await harness.services.activity.record(FP_A, poll.id, 'user-2', '10.0.0.1');

      const verdict = await harness.services.suspicion.evaluate(FP_A, poll.id, 'user-3', '10.0.0.1');

      expect(verdict).toEqual({
        suspicious: true,
        blockVote: false,
        riskScore: 0,
        reasons: ['Unconfirmed: activity cache reports 2 different users'],
      });
      expect(await harness.services.blocks.isBlocked(FP_A)).toBeNull();
    });

    it('should return a clean verdict without a fingerprint', async () => {
      expect(await harness.services.suspicion.evaluate(null, poll.id, 'user-1', '10.0.0.1')).toEqual(CLEAN_VERDICT);
    });

    it('should fail closed when the block registry is unavailable', async () => {
      vi.spyOn(harness.services.blocks, 'isBlocked').mockRejectedValue(new Error('database is locked'));

      const attempt = harness.services.suspicion.evaluate(FP_A, poll.id, 'user-1', '10.0.0.1');

      await expect(attempt).rejects.toBeInstanceOf(ServiceUnavailableError);
      await expect(attempt).rejects.toMatchObject({ statusCode: 503, code: 'SERVICE_UNAVAILABLE' });
    });

    it('should still reject when persisting the automatic block fails', async () => {
      vi.spyOn(harness.services.blocks, 'block').mockRejectedValue(new Error('database is locked'));
      insertVote(harness.db, {
        pollId: poll.id,
        optionId: option.id,
        userId: 'user-1',
        fingerprint: FP_A,
        ip: '10.0.0.1',
        createdAt: minutesBefore(NOW, 30),
      });

      const verdict = await harness.services.suspicion.evaluate(FP_A, poll.id, 'user-2', '10.0.0.1');

      expect(verdict.blockVote).toBe(true);
    });
  });

  describe('evaluate with an unreachable cache', () => {
    beforeEach(async () => {
      await setup(new UnavailableCache());
    });

    it('should decide from the durable history alone', async () => {
      insertVote(harness.db, {
        pollId: poll.id,
        optionId: option.id,
        userId: 'user-1',
        fingerprint: FP_A,
        ip: '10.0.0.1',
        createdAt: minutesBefore(NOW, 30),
      });

      const verdict = await harness.services.suspicion.evaluate(FP_A, poll.id, 'user-2', '10.0.0.2');

      expect(verdict.riskScore).toBe(70);
      expect(verdict.blockVote).toBe(true);
    });
  });

  describe('checkIpCombination', () => {
    beforeEach(async () => {
      await setup();
    });

    it('should block a fingerprint arriving from a second address', async () => {
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, fingerprint: FP_A, ip: '10.0.0.1', createdAt: minutesBefore(NOW, 10) });

      const verdict = await harness.services.suspicion.checkIpCombination(FP_A, '10.0.0.2', poll.id);

      expect(verdict).toEqual({
        suspicious: true,
        blockVote: true,
        riskScore: 30,
        reasons: ['Fingerprint used from 2 different IP addresses'],
      });
      expect(await harness.services.blocks.isBlocked(FP_A)).not.toBeNull();
    });

    it('should pass a fingerprint seen from one address', async () => {
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, fingerprint: FP_A, ip: '10.0.0.1', createdAt: minutesBefore(NOW, 10) });

      expect(await harness.services.suspicion.checkIpCombination(FP_A, '10.0.0.1', poll.id)).toEqual(CLEAN_VERDICT);
    });
  });

  describe('detectFingerprintChanges', () => {
    let secondPoll: Poll;
    let thirdPoll: Poll;

    beforeEach(async () => {
      await setup();
      secondPoll = (await createPoll(harness.db)).poll;
      thirdPoll = (await createPoll(harness.db)).poll;
    });

    it('should flag a user whose fingerprint changed', async () => {
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, userId: 'user-1', fingerprint: FP_A, createdAt: minutesBefore(NOW, 60) });

      const verdict = await harness.services.suspicion.detectFingerprintChanges(FP_B, 'user-1', '10.0.0.1', secondPoll.id);

      expect(verdict).toEqual({
        suspicious: true,
        blockVote: false,
        riskScore: 30,
        reasons: ['Fingerprint changed from previous vote'],
      });
    });

    it('should add a rapid-change reason at three fingerprints', async () => {
      const secondOption = (await harness.services.polls.getOptions(secondPoll.id))[0];
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, userId: 'user-1', fingerprint: FP_A, createdAt: minutesBefore(NOW, 90) });
      insertVote(harness.db, { pollId: secondPoll.id, optionId: secondOption.id, userId: 'user-1', fingerprint: FP_B, createdAt: minutesBefore(NOW, 45) });

      const verdict = await harness.services.suspicion.detectFingerprintChanges(FP_C, 'user-1', '10.0.0.1', thirdPoll.id);

      expect(verdict).toEqual({
        suspicious: true,
        blockVote: false,
        riskScore: 60,
        reasons: [
          'Fingerprint changed from previous vote',
          'Rapid fingerprint changes: 3 fingerprints within 24h',
        ],
      });
    });

    it('should compare anonymous voters by address on the same poll', async () => {
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, fingerprint: FP_A, ip: '10.0.0.9', createdAt: minutesBefore(NOW, 20) });

      const verdict = await harness.services.suspicion.detectFingerprintChanges(FP_B, null, '10.0.0.9', poll.id);

      expect(verdict.reasons).toEqual(['Fingerprint changed from previous vote']);
      expect(verdict.blockVote).toBe(false);
    });

    it('should block when the combined score reaches the threshold', () => {
      const combined = harness.services.suspicion.combine(
        { suspicious: true, blockVote: false, riskScore: 20, reasons: ['Rapid voting detected: 180.0 votes/hour (high frequency)'] },
        { suspicious: true, blockVote: false, riskScore: 60, reasons: ['Fingerprint changed from previous vote', 'Rapid fingerprint changes: 3 fingerprints within 24h'] }
      );

      expect(combined).toEqual({
        suspicious: true,
        blockVote: true,
        riskScore: 80,
        reasons: [
          'Rapid voting detected: 180.0 votes/hour (high frequency)',
          'Fingerprint changed from previous vote',
          'Rapid fingerprint changes: 3 fingerprints within 24h',
        ],
      });
    });

    it('should leave a combined score below the threshold unblocked', () => {
      const combined = harness.services.suspicion.combine(
        CLEAN_VERDICT,
        { suspicious: true, blockVote: false, riskScore: 30, reasons: ['Fingerprint changed from previous vote'] }
      );

      expect(combined.blockVote).toBe(false);
      expect(combined.riskScore).toBe(30);
    });

    it('should pass an unchanged fingerprint', async () => {
      insertVote(harness.db, { pollId: poll.id, optionId: option.id, userId: 'user-1', fingerprint: FP_A, createdAt: minutesBefore(NOW, 60) });

      expect(await harness.services.suspicion.detectFingerprintChanges(FP_A, 'user-1', '10.0.0.1', secondPoll.id)).toEqual(CLEAN_VERDICT);
    });
  });
});

describe('mergeVerdicts', () => {
  it('should combine reasons without repeats and cap the score', () => {
    const merged = mergeVerdicts(
      { suspicious: true, blockVote: false, riskScore: 60, reasons: ['a', 'b'] },
      { suspicious: true, blockVote: false, riskScore: 50, reasons: ['b', 'c'] }
    );

    expect(merged).toEqual({ suspicious: true, blockVote: false, riskScore: 100, reasons: ['a', 'b', 'c'] });
  });
});
