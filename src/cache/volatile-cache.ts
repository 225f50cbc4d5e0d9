// ============================================
// VOTESHIELD - Volatile Cache Abstraction
// ============================================

/**
 * Best-effort key/value store with TTLs. Entries may vanish at any time
 * (eviction, restart); nothing stored here is authoritative.
 *
 * `increment` and `addToSet` must be atomic per key.
 */
export interface VolatileCache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Atomically add one and refresh the TTL. Returns the new value. */
  increment(key: string, ttlSeconds: number): Promise<number>;
  /** Atomically add members and refresh the TTL. Returns the set size. */
  addToSet(key: string, members: string[], ttlSeconds: number): Promise<number>;
  members(key: string): Promise<string[]>;
}

type Entry =
  | { kind: 'value'; value: unknown; expiresAt: number }
  | { kind: 'counter'; count: number; expiresAt: number }
  | { kind: 'set'; members: Set<string>; expiresAt: number };

/**
 * In-process cache. Each operation runs to completion without yielding,
 * so concurrent callers can never interleave inside a read-modify-write.
 */
export class MemoryCache implements VolatileCache {
  private entries = new Map<string, Entry>();

  constructor(private clock: () => number = Date.now) {}

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiry(ttlSeconds: number): number {
    return this.clock() + ttlSeconds * 1000;
  }

  async get(key: string): Promise<unknown> {
    const entry = this.live(key);
    if (entry?.kind === 'value') return entry.value;
    if (entry?.kind === 'counter') return entry.count;
    return null;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { kind: 'value', value, expiresAt: this.expiry(ttlSeconds) });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.live(key);
    const count = entry?.kind === 'counter' ? entry.count + 1 : 1;
    this.entries.set(key, { kind: 'counter', count, expiresAt: this.expiry(ttlSeconds) });
    return count;
  }

  async addToSet(key: string, members: string[], ttlSeconds: number): Promise<number> {
    const entry = this.live(key);
    const set = entry?.kind === 'set' ? entry.members : new Set<string>();
    for (const member of members) {
      set.add(member);
    }
    this.entries.set(key, { kind: 'set', members: set, expiresAt: this.expiry(ttlSeconds) });
    return set.size;
  }

  async members(key: string): Promise<string[]> {
    const entry = this.live(key);
    return entry?.kind === 'set' ? [...entry.members] : [];
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
