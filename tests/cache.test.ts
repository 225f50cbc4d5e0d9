// ============================================
// VOTESHIELD - Volatile Cache Tests
// ============================================

import { describe, it, expect, vi } from 'vitest';
import { MemoryCache, type VolatileCache } from '../src/cache/volatile-cache.js';
import { BoundedCache } from '../src/cache/bounded-cache.js';
import { TimeoutError, withRetry } from '../src/utils/async.js';
import { FingerprintActivityCache } from '../src/services/fingerprint-activity.service.js';
import { FP_A } from './helpers.js';

describe('MemoryCache', () => {
  it('should not lose concurrent increments', async () => {
    const cache = new MemoryCache();

    const results = await Promise.all(Array.from({ length: 100 }, () => cache.increment('hits', 60)));

    expect(await cache.get('hits')).toBe(100);
    expect(new Set(results).size).toBe(100);
  });

  it('should add set members atomically', async () => {
    const cache = new MemoryCache();

    await Promise.all([
      cache.addToSet('users', ['u1'], 60),
      cache.addToSet('users', ['u2'], 60),
      cache.addToSet('users', ['u1'], 60),
    ]);

    expect((await cache.members('users')).sort()).toEqual(['u1', 'u2']);
  });

  it('should expire entries after their TTL', async () => {
    let now = 1_000;
    const cache = new MemoryCache(() => now);
    await cache.set('key', 'value', 10);

    now += 9_999;
    expect(await cache.get('key')).toBe('value');

    now += 1;
    expect(await cache.get('key')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('should delete entries', async () => {
    const cache = new MemoryCache();
    await cache.set('key', { a: 1 }, 60);

    await cache.delete('key');

    expect(await cache.get('key')).toBeNull();
  });
});

describe('BoundedCache', () => {
  it('should time out a hung call', async () => {
    const inner = new MemoryCache();
    vi.spyOn(inner, 'get').mockReturnValue(new Promise<unknown>(() => undefined));
    const cache = new BoundedCache(inner, { timeoutMs: 20, readRetries: 0 });

    await expect(cache.get('key')).rejects.toThrow(new TimeoutError('cache get', 20));
  });

  it('should retry failed reads', async () => {
    const inner = new MemoryCache();
    await inner.set('key', 'value', 60);
    const get = vi.spyOn(inner, 'get')
      .mockRejectedValueOnce(new Error('blip'))
      .mockRejectedValueOnce(new Error('blip'));
    const cache = new BoundedCache(inner, { timeoutMs: 100, readRetries: 2 });

    await expect(cache.get('key')).resolves.toBe('value');
    expect(get).toHaveBeenCalledTimes(3);
  });

  it('should not retry writes', async () => {
    const inner = new MemoryCache();
    const increment = vi.spyOn(inner, 'increment').mockRejectedValueOnce(new Error('blip'));
    const cache = new BoundedCache(inner, { timeoutMs: 100, readRetries: 2 });

    await expect(cache.increment('hits', 60)).rejects.toThrow('blip');
    expect(increment).toHaveBeenCalledTimes(1);
  });
});

describe('withRetry', () => {
  it('should rethrow the last error once retries run out', async () => {
    const operation = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(withRetry(operation, { retries: 1, baseDelayMs: 1 })).rejects.toThrow('second');
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe('FingerprintActivityCache', () => {
  const build = (cache: VolatileCache = new MemoryCache()) => new FingerprintActivityCache(cache, 3600);

  it('should key entries by fingerprint and poll', () => {
    expect(build().keyFor(FP_A, 'poll-1')).toBe(`fp:activity:${FP_A}:poll-1`);
  });

  it('should count uses and distinct users and addresses', async () => {
    const activity = build();

    await Promise.all([
      activity.record(FP_A, 'poll-1', 'u1', '10.0.0.1'),
      activity.record(FP_A, 'poll-1', 'u2', '10.0.0.1'),
      activity.record(FP_A, 'poll-1', null, '10.0.0.2'),
    ]);

    const snapshot = await activity.read(FP_A, 'poll-1');
    expect(snapshot?.count).toBe(3);
    expect(snapshot?.users.sort()).toEqual(['u1', 'u2']);
    expect(snapshot?.ips.sort()).toEqual(['10.0.0.1', '10.0.0.2']);
    expect(snapshot?.userCount).toBe(2);
    expect(snapshot?.ipCount).toBe(2);
    expect(snapshot?.analysis).toBeNull();
  });

  it('should return null for an unknown fingerprint', async () => {
    expect(await build().read(FP_A, 'poll-1')).toBeNull();
  });

  it('should keep a stored analysis beside the counters', async () => {
    const activity = build();
    const analysis = {
      analyzedAt: '2026-03-01T12:00:00.000Z',
      windowHours: 168,
      totalVotes: 4,
      distinctUsers: 1,
      distinctIps: 1,
      riskScore: 0,
      reasons: [],
    };

    await activity.storeAnalysis(FP_A, 'poll-1', analysis);

    const snapshot = await activity.read(FP_A, 'poll-1');
    expect(snapshot?.count).toBe(0);
    expect(snapshot?.analysis).toEqual(analysis);
  });
});
