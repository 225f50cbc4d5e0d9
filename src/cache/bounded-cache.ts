// ============================================
// VOTESHIELD - Bounded Cache Decorator
// ============================================

import { withRetry, withTimeout } from '../utils/async.js';
import type { VolatileCache } from './volatile-cache.js';

export interface BoundedCacheOptions {
  timeoutMs: number;
  readRetries: number;
}

/**
 * Puts a timeout on every cache call and retries reads. Writes are not
 * retried since increments are not idempotent.
 */
export class BoundedCache implements VolatileCache {
  constructor(
    private inner: VolatileCache,
    private options: BoundedCacheOptions
  ) {}

  private bounded<T>(operation: () => Promise<T>, label: string): Promise<T> {
    return withTimeout(operation(), this.options.timeoutMs, `cache ${label}`);
  }

  private read<T>(operation: () => Promise<T>, label: string): Promise<T> {
    return withRetry(() => this.bounded(operation, label), { retries: this.options.readRetries });
  }

  get(key: string): Promise<unknown> {
    return this.read(() => this.inner.get(key), 'get');
  }

  members(key: string): Promise<string[]> {
    return this.read(() => this.inner.members(key), 'members');
  }

  set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    return this.bounded(() => this.inner.set(key, value, ttlSeconds), 'set');
  }

  delete(key: string): Promise<void> {
    return this.bounded(() => this.inner.delete(key), 'delete');
  }

  increment(key: string, ttlSeconds: number): Promise<number> {
    return this.bounded(() => this.inner.increment(key, ttlSeconds), 'increment');
  }

  addToSet(key: string, members: string[], ttlSeconds: number): Promise<number> {
    return this.bounded(() => this.inner.addToSet(key, members, ttlSeconds), 'addToSet');
  }
}
