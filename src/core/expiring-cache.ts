export type Clock = () => number;

export interface CacheEntry<T> {
  value: T;
  expiresAt: number; // epoch ms
}

export interface ExpiringCacheOptions {
  defaultTtlMs: number;
  maxEntries?: number;
  clock?: Clock;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  expired: number;
  evicted: number;
}

/**
 * In-memory map whose entries expire at a fixed time.
 *
 * Expired entries are never returned: they are purged lazily on read or by
 * sweep(). Every method is synchronous, so a read or write cannot interleave
 * with another on the event loop and callers need no lock. When maxEntries is
 * set, the least recently used entry is evicted on overflow (Map keeps
 * insertion order; reads re-insert).
 */
export class ExpiringCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly clock: Clock;
  private readonly defaultTtlMs: number;
  private readonly maxEntries?: number;
  private sweepTimer: NodeJS.Timeout | null = null;

  private hits = 0;
  private misses = 0;
  private expired = 0;
  private evicted = 0;

  constructor(options: ExpiringCacheOptions) {
    if (!Number.isFinite(options.defaultTtlMs) || options.defaultTtlMs <= 0) {
      throw new RangeError('defaultTtlMs must be a positive, finite number');
    }
    this.defaultTtlMs = options.defaultTtlMs;
    this.maxEntries = options.maxEntries;
    this.clock = options.clock ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      this.expired++;
      this.misses++;
      return undefined;
    }

    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && entry.expiresAt > this.clock();
  }

  /**
   * Last write wins; the previous entry is replaced, never merged.
   */
  put(key: string, value: T, ttlMs: number = this.defaultTtlMs): void {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError('ttlMs must be a positive, finite number');
    }

    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.clock() + ttlMs });

    if (this.maxEntries !== undefined) {
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
        this.evicted++;
      }
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Number of stored entries, including expired ones not yet purged
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Remove every expired entry. Returns the number removed.
   */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.expired += removed;
    return removed;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      expired: this.expired,
      evicted: this.evicted
    };
  }
}
