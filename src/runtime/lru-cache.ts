/**
 * Bounded cache with strict least-recently-used eviction.
 *
 * Relies on Map iteration order: every hit re-inserts the entry, so the
 * first key is always the least recently used one.
 *
 * @module runtime/lru-cache
 */

const DEFAULT_MAX_ENTRIES = 32;

export interface LruCacheOptions {
  maxEntries?: number;
}

export class LruCache<K, V> {
  private readonly entries = new Map<K, V>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;

  constructor(options?: LruCacheOptions) {
    const maxEntries = options?.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  get(key: K): V | undefined {
    if (!this.entries.has(key)) {
      this.misses++;
      return undefined;
    }
    const value = this.entries.get(key);
    this.entries.delete(key);
    if (value !== undefined) {
      this.entries.set(key, value);
    }
    this.hits++;
    return value;
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxEntries) {
      this.evictLRU();
    }
    this.entries.set(key, value);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used */
  keys(): K[] {
    return [...this.entries.keys()];
  }

  stats(): { size: number; maxEntries: number; hits: number; misses: number } {
    return { size: this.entries.size, maxEntries: this.maxEntries, hits: this.hits, misses: this.misses };
  }

  private evictLRU(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
    }
  }
}
