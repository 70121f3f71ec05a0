/**
 * LRU cache with optional per-entry expiry.
 * Keeps most recently used items, evicts least recently used when full,
 * and treats entries older than `ttlMs` as absent.
 */
interface Entry<T> {
  value: T;
  expiresAt: number;
}

export interface LRUCacheOptions {
  maxSize: number;
  // Omit for entries that never expire
  ttlMs?: number;
  now?: () => number;
}

export class LRUCache<T> {
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly cache = new Map<string, Entry<T>>();

  constructor({ maxSize, ttlMs = Infinity, now = Date.now }: LRUCacheOptions) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`LRUCache maxSize must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    this.cache.delete(key);
    if (entry.expiresAt <= this.now()) {
      return undefined;
    }

    // Re-insert as most recently used
    this.cache.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxSize) {
      this.evictOldest();
    }
    this.cache.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  size(): number {
    return this.cache.size;
  }

  private evictOldest(): void {
    const firstKey = this.cache.keys().next().value;
    if (firstKey !== undefined) {
      this.cache.delete(firstKey);
    }
  }
}
