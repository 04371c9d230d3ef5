/**
 * @module runtime/uri-cache
 */

import { LruCache } from './lru-cache.js';
import { ParsedUri } from './uri.js';

export const DEFAULT_URI_CACHE_SIZE = 32;

/**
 * Memoizes URI parsing for strings that recur across evaluations. Owned by
 * a single program, never shared globally.
 */
export class UriCache {
  private readonly cache: LruCache<string, ParsedUri>;

  constructor(maxEntries: number = DEFAULT_URI_CACHE_SIZE) {
    this.cache = new LruCache({ maxEntries });
  }

  /** Cached parse; null when the text is not a valid URI. */
  getOrParse(text: string): ParsedUri | null {
    const cached = this.cache.get(text);
    if (cached) return cached;
    const parsed = ParsedUri.tryParse(text);
    if (parsed) {
      this.cache.set(text, parsed);
    }
    return parsed;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
