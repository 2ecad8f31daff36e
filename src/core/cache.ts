/**
 * LRU Cache with TTL support
 * Used for caching price ratios and other time-sensitive data
 */

interface CacheEntry<V> {
  value: V;
  storedAt: number;
  expiresAt: number;
}

export interface LRUCacheOptions {
  /** Maximum number of entries (default: 100) */
  maxSize?: number;
  /** Default TTL in milliseconds (default: 300000 = 5 minutes) */
  defaultTTL?: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Least Recently Used cache with optional TTL
 */
export class LRUCache<K, V> {
  private readonly cache = new Map<K, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly defaultTTL: number;
  private readonly now: () => number;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 100;
    this.defaultTTL = options.defaultTTL ?? 300000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get a value from the cache
   * Returns undefined if not found or expired
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      return undefined;
    }

    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    return entry.value;
  }

  /**
   * Get a value even if it has expired, together with when it was stored
   * Expired entries are kept until evicted so callers can fall back to them
   */
  peek(key: K): { value: V; storedAt: number; expired: boolean } | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    return {
      value: entry.value,
      storedAt: entry.storedAt,
      expired: this.now() > entry.expiresAt,
    };
  }

  /**
   * Check if a key exists and is not expired
   */
  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Set a value in the cache
   * @param ttl Optional TTL in milliseconds (uses default if not provided)
   */
  set(key: K, value: V, ttl?: number): void {
    // Delete if exists to update position
    this.cache.delete(key);

    // Evict oldest entries if at capacity
    while (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;
      this.cache.delete(firstKey);
    }

    const storedAt = this.now();
    this.cache.set(key, { value, storedAt, expiresAt: storedAt + (ttl ?? this.defaultTTL) });
  }

  /**
   * Delete a specific key from the cache
   */
  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  /**
   * Clear all entries from the cache
   */
  clear(): void {
    this.cache.clear();
  }

  /**
   * Get the current number of entries (including expired ones not yet cleaned)
   */
  get size(): number {
    return this.cache.size;
  }
}
