/**
 * Per-request cache policy.
 *
 * The decision is made from the current CacheConfig and the Date header of
 * the stored entry, not from the entry's own Cache-Control:
 *
 * | cache state          | skipAPI = false | skipAPI = true          |
 * |----------------------|-----------------|-------------------------|
 * | caching off          | no-store        | no-store                |
 * | fresh                | default         | force-cache (no network)|
 * | stale / bad Date     | default         | evict, then reload      |
 * | absent               | default         | reload                  |
 */
import {
  getHeaderValue,
  parseHttpDate,
  type CacheableRequest,
} from '@flagwire/response-cache';
import type { CacheDirective, CachePolicySource } from '@flagwire/fetch-transport';

/**
 * State of the stored entry as judged by the configured TTL
 */
export type EntryState = 'disabled' | 'fresh' | 'stale' | 'invalid-date' | 'absent';

export interface CachePolicyDecision {
  directive: CacheDirective;
  state: EntryState;
  /** A stale entry was removed from the store */
  evicted: boolean;
  /** now - Date header, when the entry had a readable one */
  ageMs?: number;
}

/**
 * Choose the cache directive for one request
 */
export async function resolveCachePolicy(
  cache: CachePolicySource,
  request: CacheableRequest,
  now: number = Date.now()
): Promise<CachePolicyDecision> {
  if (!cache.useCache) {
    return { directive: 'no-store', state: 'disabled', evicted: false };
  }

  const { store, skipAPI, cacheTtlMs } = cache;
  const entry = await store.lookup(request);

  let state: EntryState = 'absent';
  let ageMs: number | undefined;
  if (entry) {
    const generatedAt = parseHttpDate(getHeaderValue(entry.headers, 'date'), now);
    if (generatedAt === undefined) {
      state = 'invalid-date';
    } else {
      ageMs = now - generatedAt;
      state = ageMs < cacheTtlMs ? 'fresh' : 'stale';
    }
  }

  if (state === 'fresh') {
    return { directive: skipAPI ? 'force-cache' : 'default', state, evicted: false, ageMs };
  }

  if (!skipAPI) {
    return { directive: 'default', state, evicted: false, ageMs };
  }

  const evicted = entry ? await store.evict(request) : false;
  return { directive: 'reload', state, evicted, ageMs };
}
