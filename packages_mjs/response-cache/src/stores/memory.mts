/**
 * In-memory response cache store
 */

import type {
  CacheableRequest,
  CachedResponse,
  ResponseCacheStore,
} from '../types.mjs';
import { cacheKeyFor } from '../parser.mjs';

/**
 * LRU cache entry
 */
interface LruEntry {
  response: CachedResponse;
  size: number;
}

/**
 * In-memory store with LRU eviction.
 *
 * Entries do not expire here: whether a stored response is still usable is
 * decided by whoever reads it, so stale entries stay until they are evicted
 * explicitly or pushed out by the size limits.
 */
export class MemoryResponseCacheStore implements ResponseCacheStore {
  private cache: Map<string, LruEntry> = new Map();
  private currentSize: number = 0;

  private readonly maxSize: number;
  private readonly maxEntries: number;
  private readonly maxEntrySize: number;

  constructor(options: MemoryResponseCacheStoreOptions = {}) {
    this.maxSize = options.maxSize ?? 50 * 1024 * 1024; // 50MB default
    this.maxEntries = options.maxEntries ?? 1000;
    this.maxEntrySize = options.maxEntrySize ?? 5 * 1024 * 1024; // 5MB default
  }

  private deleteEntry(key: string): boolean {
    const entry = this.cache.get(key);
    if (entry) {
      this.currentSize -= entry.size;
      this.cache.delete(key);
      return true;
    }
    return false;
  }

  private calculateEntrySize(response: CachedResponse): number {
    let size = response.body.length;
    for (const [name, value] of Object.entries(response.headers)) {
      size += name.length + value.length;
    }
    return size + response.url.length;
  }

  private evictIfNeeded(requiredSize: number): void {
    while (this.currentSize + requiredSize > this.maxSize && this.cache.size > 0) {
      this.evictOldest();
    }

    while (this.cache.size >= this.maxEntries && this.cache.size > 0) {
      this.evictOldest();
    }
  }

  private evictOldest(): void {
    const oldestKey = this.cache.keys().next().value;
    if (oldestKey !== undefined) {
      this.deleteEntry(oldestKey);
    }
  }

  private moveToEnd(key: string, entry: LruEntry): void {
    this.cache.delete(key);
    this.cache.set(key, entry);
  }

  async lookup(request: CacheableRequest): Promise<CachedResponse | null> {
    const key = cacheKeyFor(request);
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    this.moveToEnd(key, entry);
    return entry.response;
  }

  async store(request: CacheableRequest, response: CachedResponse): Promise<void> {
    const key = cacheKeyFor(request);
    const size = this.calculateEntrySize(response);

    if (size > this.maxEntrySize) {
      return;
    }

    this.deleteEntry(key);
    this.evictIfNeeded(size);

    this.cache.set(key, { response, size });
    this.currentSize += size;
  }

  async evict(request: CacheableRequest): Promise<boolean> {
    return this.deleteEntry(cacheKeyFor(request));
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  async size(): Promise<number> {
    return this.cache.size;
  }

  async close(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  /**
   * Get cache statistics
   */
  getStats(): MemoryResponseCacheStats {
    return {
      entries: this.cache.size,
      sizeBytes: this.currentSize,
      maxSizeBytes: this.maxSize,
      maxEntries: this.maxEntries,
      utilizationPercent: (this.currentSize / this.maxSize) * 100,
    };
  }
}

/**
 * Options for memory cache store
 */
export interface MemoryResponseCacheStoreOptions {
  /** Maximum total cache size in bytes. Default: 50MB */
  maxSize?: number;
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Maximum size per entry in bytes. Default: 5MB */
  maxEntrySize?: number;
}

/**
 * Memory cache statistics
 */
export interface MemoryResponseCacheStats {
  entries: number;
  sizeBytes: number;
  maxSizeBytes: number;
  maxEntries: number;
  utilizationPercent: number;
}

/**
 * Create a memory cache store
 */
export function createMemoryResponseCacheStore(
  options?: MemoryResponseCacheStoreOptions
): MemoryResponseCacheStore {
  return new MemoryResponseCacheStore(options);
}

let sharedStore: MemoryResponseCacheStore | undefined;

/**
 * The process-wide store used when a client is not given one
 */
export function sharedResponseCache(): MemoryResponseCacheStore {
  if (!sharedStore) {
    sharedStore = new MemoryResponseCacheStore();
  }
  return sharedStore;
}
