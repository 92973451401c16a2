import { DEFAULTS } from "../utils/constants.js";

export interface CacheEntry<V> {
  key: string;
  value: V;
  /** Epoch ms at insertion */
  insertedAt: number;
  ttlMs: number;
}

export interface TtlCacheOptions {
  /** Oldest 20% of entries are evicted once this size is exceeded */
  maxEntries?: number;
  /** Clock, overridable in tests */
  now?: () => number;
}

const EVICTION_FRACTION = 0.2;

/**
 * Key→value store with per-entry expiry.
 *
 * Entries expire lazily when read past `insertedAt + ttlMs`, or eagerly when
 * `sweep()` runs (see `startSweeper`). Writes are single-key upserts performed
 * synchronously, so a reader never observes a partially written entry.
 */
export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private sweepTimer?: NodeJS.Timeout;

  constructor(options: TtlCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULTS.CACHE_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Returns the live entry for `key`, deleting it first if it has expired. */
  get(key: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  getValue(key: string): V | undefined {
    return this.get(key)?.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /** Live values in insertion order; expired entries are dropped on the way. */
  values(): V[] {
    const live: V[] = [];
    for (const key of [...this.entries.keys()]) {
      const entry = this.get(key);
      if (entry) live.push(entry.value);
    }
    return live;
  }

  set(key: string, value: V, ttlMs: number): CacheEntry<V> {
    const entry: CacheEntry<V> = { key, value, insertedAt: this.now(), ttlMs };
    // Re-inserting moves the key to the end of the iteration order (newest)
    this.entries.delete(key);
    this.entries.set(key, entry);
    if (this.entries.size > this.maxEntries) this.evictOldest();
    return entry;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Removes every key, or only keys containing `pattern`. Returns the count removed. */
  clear(pattern?: string): number {
    if (!pattern) {
      const count = this.entries.size;
      this.entries.clear();
      return count;
    }
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.includes(pattern)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Eagerly removes expired entries. Returns the count removed. */
  sweep(): number {
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    if (intervalMs <= 0) return;
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.now() - entry.insertedAt >= entry.ttlMs;
  }

  private evictOldest(): void {
    const count = Math.max(1, Math.floor(this.entries.size * EVICTION_FRACTION));
    let evicted = 0;
    for (const key of this.entries.keys()) {
      if (evicted >= count) break;
      this.entries.delete(key);
      evicted++;
    }
  }
}
