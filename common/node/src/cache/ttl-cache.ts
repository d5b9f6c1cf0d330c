/**
 * Generic in-memory TTL cache.
 *
 * Entries without a TTL never expire. Expired entries are dropped lazily on
 * read, or in bulk by purgeExpired().
 */

export interface CacheEntry<T> {
  value: T;
  /** Unix ms; undefined means the entry never expires */
  expiresAt?: number;
}

export interface TTLCacheConfig {
  /** Default TTL in milliseconds; unset means entries never expire */
  defaultTtlMs?: number;
  /** Max entries (for memory management); the oldest entry is evicted first */
  maxEntries?: number;
  /** Clock (for tests) */
  clock?: { now(): number };
}

export class TTLCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private config: TTLCacheConfig;
  private clock: { now(): number };
  /** Lower bound on the earliest expiry among stored entries */
  private nextExpiryAt: number | undefined;

  constructor(config: TTLCacheConfig = {}) {
    this.config = config;
    this.clock = config.clock ?? { now: () => Date.now() };
  }

  get(key: string): { value: T; found: true; expiresAt?: number } | { found: false } {
    const entry = this.cache.get(key);
    if (!entry) {
      return { found: false };
    }

    if (entry.expiresAt !== undefined && this.clock.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return { found: false };
    }

    return { value: entry.value, found: true, expiresAt: entry.expiresAt };
  }

  set(params: { key: string; value: T; ttlMs?: number; expiresAt?: number }): void {
    const { key, value } = params;

    if (this.config.maxEntries && !this.cache.has(key) && this.cache.size >= this.config.maxEntries) {
      this.evictOldest();
    }

    const ttlMs = params.ttlMs ?? this.config.defaultTtlMs;
    const expiresAt =
      params.expiresAt ?? (ttlMs !== undefined ? this.clock.now() + ttlMs : undefined);

    // Re-insert so that eviction order follows the latest write.
    this.cache.delete(key);
    this.cache.set(key, { value, expiresAt });
    if (expiresAt !== undefined && (this.nextExpiryAt === undefined || expiresAt < this.nextExpiryAt)) {
      this.nextExpiryAt = expiresAt;
    }
  }

  invalidate(key: string): boolean {
    return this.cache.delete(key);
  }

  /** Drops every expired entry and returns how many were removed. */
  purgeExpired(): number {
    const now = this.clock.now();
    let count = 0;
    let next: number | undefined;
    for (const [key, entry] of this.cache) {
      if (entry.expiresAt === undefined) continue;
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        count++;
      } else if (next === undefined || entry.expiresAt < next) {
        next = entry.expiresAt;
      }
    }
    this.nextExpiryAt = next;
    return count;
  }

  /** Purges once the earliest tracked expiry has passed; otherwise a no-op. */
  purgeIfDue(): number {
    if (this.nextExpiryAt === undefined || this.clock.now() < this.nextExpiryAt) return 0;
    return this.purgeExpired();
  }

  clear(): void {
    this.cache.clear();
    this.nextExpiryAt = undefined;
  }

  get size(): number {
    return this.cache.size;
  }

  has(key: string): boolean {
    return this.get(key).found;
  }

  private evictOldest(): void {
    const firstKey = this.cache.keys().next().value;
    if (firstKey !== undefined) {
      this.cache.delete(firstKey);
    }
  }
}
