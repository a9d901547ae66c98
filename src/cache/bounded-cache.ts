import { LRUCache } from 'lru-cache';

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
  /** Hits over lookups, 0 when nothing was looked up yet. */
  hitRate: number;
}

export interface BoundedCacheOptions {
  capacity: number;
  enabled?: boolean;
}

/**
 * Least-recently-used cache with hit/miss/eviction accounting.
 *
 * Every method runs to completion without yielding, so callers on the
 * event loop always observe a consistent cache.
 */
export class BoundedCache<V extends {}> {
  readonly capacity: number;
  readonly enabled: boolean;
  private readonly entries: LRUCache<string, V>;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: BoundedCacheOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.enabled = options.enabled ?? true;
    this.entries = new LRUCache<string, V>({
      max: options.capacity,
      dispose: (_value, _key, reason) => {
        if (reason === 'evict') this.evictions++;
      },
    });
  }

  get(key: string): V | undefined {
    const value = this.enabled ? this.entries.get(key) : undefined;
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  /** Looks up without touching recency or the hit/miss counters. */
  peek(key: string): V | undefined {
    return this.entries.peek(key);
  }

  put(key: string, value: V): void {
    if (!this.enabled) return;
    this.entries.set(key, value);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Removes the exact key and every key starting with it.
   * Returns the number of entries removed.
   */
  invalidate(keyOrPrefix: string): number {
    const doomed = [...this.entries.keys()].filter((key) => key.startsWith(keyOrPrefix));
    for (const key of doomed) {
      this.entries.delete(key);
    }
    return doomed.length;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      capacity: this.capacity,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }
}
