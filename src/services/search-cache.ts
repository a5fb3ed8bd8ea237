interface CacheEntry<T> {
  value: Promise<T>;
  expiresAt: number;
}

export interface SearchCacheOptions<T> {
  ttlMs: number;
  /** Settled values rejected by this predicate are evicted instead of kept */
  shouldRetain?: (value: T) => boolean;
  now?: () => number;
}

/**
 * SearchCache
 * Memoizes one promise per key for ttlMs. The first caller for a key creates the
 * entry; concurrent callers share it. Rejections are never retained.
 */
export class SearchCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private readonly now: () => number;

  constructor(private readonly options: SearchCacheOptions<T>) {
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.options.ttlMs > 0;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Drops expired entries, then returns the cached promise for key, or stores and
   * returns the one create() makes.
   * `hit` tells the caller which of the two happened.
   */
  getOrCreate(key: string, create: () => Promise<T>): { value: Promise<T>; hit: boolean } {
    if (!this.enabled) {
      return { value: create(), hit: false };
    }

    const now = this.now();
    this.sweep(now);

    const existing = this.entries.get(key);
    if (existing) {
      return { value: existing.value, hit: true };
    }

    const entry: CacheEntry<T> = { value: create(), expiresAt: now + this.options.ttlMs };
    this.entries.set(key, entry);

    void entry.value.then(
      (value) => {
        if (this.options.shouldRetain && !this.options.shouldRetain(value)) {
          this.evict(key, entry);
        }
      },
      () => this.evict(key, entry)
    );

    return { value: entry.value, hit: false };
  }

  clear(): void {
    this.entries.clear();
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  private evict(key: string, entry: CacheEntry<T>): void {
    // A newer entry may have replaced this one after expiry
    if (this.entries.get(key) === entry) {
      this.entries.delete(key);
    }
  }
}
