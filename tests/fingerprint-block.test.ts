// ============================================
// VOTESHIELD - Fingerprint Block Registry Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NotFoundError, ValidationError } from '../src/plugins/error-handler.plugin.js';
import { FP_A, FP_B, createHarness, type Harness } from './helpers.js';

describe('FingerprintBlockRegistry', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  afterEach(() => {
    harness.sqlite.close();
  });

  it('should report an unknown fingerprint as not blocked', async () => {
    expect(await harness.services.blocks.isBlocked(FP_A)).toBeNull();
  });

  it('should block, unblock and block again with a full history', async () => {
    const { blocks } = harness.services;

    const first = await blocks.block(FP_A, 'shared device', 'user-1', 2, 3, 'admin-1');
    expect(first).toMatchObject({
      fingerprint: FP_A,
      reason: 'shared device',
      blockedBy: 'admin-1',
      isActive: true,
      firstSeenUser: 'user-1',
      totalUsers: 2,
      totalVotes: 3,
    });
    expect((await blocks.isBlocked(FP_A))?.reason).toBe('shared device');

    const lifted = await blocks.unblock(FP_A, 'admin-2');
    expect(lifted.isActive).toBe(false);
    expect(lifted.unblockedBy).toBe('admin-2');
    expect(await blocks.isBlocked(FP_A)).toBeNull();

    const again = await blocks.block(FP_A, 'seen again', null, 4, 6);
    expect(again.id).toBe(first.id);
    expect(again.blockedBy).toBeNull();
    expect(again.unblockedAt).toBeNull();
    expect((await blocks.isBlocked(FP_A))?.reason).toBe('seen again');

    const events = await blocks.history(FP_A);
    expect(events.map(e => [e.action, e.actor, e.reason])).toEqual([
      ['blocked', 'admin-1', 'shared device'],
      ['unblocked', 'admin-2', null],
      ['blocked', null, 'seen again'],
    ]);
  });

  it('should keep the existing block when blocking an active fingerprint', async () => {
    const { blocks } = harness.services;
    await blocks.block(FP_A, 'first reason', null, 2, 2);

    const repeat = await blocks.block(FP_A, 'second reason', null, 5, 9);

    expect(repeat.reason).toBe('first reason');
    expect(repeat.totalVotes).toBe(2);
    expect(await blocks.history(FP_A)).toHaveLength(1);
  });

  it('should refuse to unblock a fingerprint with no active block', async () => {
    const attempt = harness.services.blocks.unblock(FP_B, 'admin-1');

    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toThrow(`Active fingerprint block with ID '${FP_B}' not found`);
  });

  it('should require a fingerprint', async () => {
    await expect(harness.services.blocks.block('', 'no device', null, 0, 0)).rejects.toBeInstanceOf(ValidationError);
  });

  it('should list active blocks unless asked for all', async () => {
    const { blocks } = harness.services;
    await blocks.block(FP_A, 'one', null, 2, 2);
    await blocks.block(FP_B, 'two', null, 2, 2);
    await blocks.unblock(FP_A, 'admin-1');

    const active = await blocks.list();
    const all = await blocks.list({ activeOnly: false });

    expect(active.map(b => b.fingerprint)).toEqual([FP_B]);
    expect(all.map(b => b.fingerprint).sort()).toEqual([FP_A, FP_B]);
    expect(await blocks.countActive()).toBe(1);
  });
});
