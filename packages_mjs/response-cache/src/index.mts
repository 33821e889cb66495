/**
 * @flagwire/response-cache
 *
 * Shared HTTP response store for flag API calls:
 * - Cache-Control directive parsing
 * - HTTP Date parsing in all three RFC 9110 grammars
 * - In-memory LRU store shared across clients in one process
 *
 * @example
 * ```typescript
 * import { sharedResponseCache, parseHttpDate } from '@flagwire/response-cache';
 *
 * const store = sharedResponseCache();
 * const entry = await store.lookup({ method: 'GET', url: 'https://edge.flagwire.io/api/v1/flags/' });
 * const generatedAt = parseHttpDate(entry?.headers['date']);
 * ```
 */

export type {
  CacheControlDirectives,
  CacheableRequest,
  CachedResponse,
  ProtocolFreshness,
  ResponseCacheStore,
} from './types.mjs';

export {
  CACHEABLE_STATUSES,
  parseCacheControl,
  buildCacheControl,
  getHeaderValue,
  normalizeHeaders,
  extractETag,
  extractLastModified,
  isCacheableStatus,
  cacheKeyFor,
  protocolFreshness,
} from './parser.mjs';

export { parseHttpDate, formatHttpDate } from './http-date.mjs';

export {
  MemoryResponseCacheStore,
  createMemoryResponseCacheStore,
  sharedResponseCache,
  type MemoryResponseCacheStoreOptions,
  type MemoryResponseCacheStats,
} from './stores/index.mjs';
