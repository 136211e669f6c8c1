import type { HttpCache, HttpCacheEntry } from '../types';

export interface InMemoryHttpCacheOptions {
  /** Upper bound on stored entries; the least recently used entry is evicted first. Default: 256. */
  maxEntries?: number;
}

/**
 * Process-local cache provider. Entries are returned even when expired so that policies
 * such as `returnCacheDataElseLoad` can decide what staleness means to them.
 */
export class InMemoryHttpCache implements HttpCache {
  private readonly store = new Map<string, HttpCacheEntry>();
  private readonly maxEntries: number;

  constructor(options: InMemoryHttpCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 256);
  }

  get size(): number {
    return this.store.size;
  }

  async get<T = unknown>(key: string): Promise<HttpCacheEntry<T> | undefined> {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    // Re-insert to keep recently read entries away from eviction.
    this.store.delete(key);
    this.store.set(key, entry);
    return entry as HttpCacheEntry<T>;
  }

  async set<T = unknown>(key: string, entry: HttpCacheEntry<T>): Promise<void> {
    this.store.delete(key);
    this.store.set(key, entry);
    while (this.store.size > this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }
}
