// ============================================
// VOTESHIELD - Cache Factory
// ============================================

import type { Env } from '../config/env.js';
import type { Logger } from '../utils/logger.js';
import { BoundedCache } from './bounded-cache.js';
import { UpstashCache } from './upstash-cache.js';
import { MemoryCache, type VolatileCache } from './volatile-cache.js';

export { BoundedCache, MemoryCache, UpstashCache };
export type { VolatileCache };

/**
 * Upstash when credentials are configured, otherwise in-process memory.
 * Either way every call is bounded by the configured timeout.
 */
export function createCache(source: Env, logger: Logger): VolatileCache {
  const { UPSTASH_REDIS_REST_URL: url, UPSTASH_REDIS_REST_TOKEN: token } = source;

  let inner: VolatileCache;
  if (url && token) {
    inner = UpstashCache.fromCredentials(url, token);
    logger.info({ backend: 'upstash' }, 'Volatile cache configured');
  } else {
    inner = new MemoryCache();
    logger.warn({ backend: 'memory' }, 'Upstash credentials not configured - using in-process cache');
  }

  return new BoundedCache(inner, {
    timeoutMs: source.CACHE_TIMEOUT_MS,
    readRetries: source.CACHE_READ_RETRIES,
  });
}
