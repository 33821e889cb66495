/**
 * Protocol cache layer used by a session.
 *
 * Decides per request whether the stored entry is served, revalidated or
 * bypassed, and writes cacheable responses back. The store is captured when
 * the session is built; the policy source is read live at write time.
 */

import {
  buildCacheControl,
  extractETag,
  extractLastModified,
  formatHttpDate,
  isCacheableStatus,
  parseCacheControl,
  protocolFreshness,
  type CacheableRequest,
  type CachedResponse,
  type ResponseCacheStore,
} from '@flagwire/response-cache';
import type { CacheDirective, CachePolicySource } from './types.mjs';

/**
 * Outcome of consulting the cache before dispatch
 */
export type CachePlan =
  | { kind: 'hit'; entry: CachedResponse }
  | { kind: 'miss' }
  | { kind: 'network'; write: boolean; revalidate?: CachedResponse };

/**
 * 304 headers that describe the stored body and must not replace its own
 */
const BODY_HEADERS = new Set(['content-length', 'content-encoding', 'transfer-encoding']);

export class ProtocolCacheLayer {
  constructor(
    private readonly store: ResponseCacheStore,
    private readonly policy: CachePolicySource
  ) {}

  /**
   * Decide how a request uses the cache
   */
  async plan(
    request: CacheableRequest,
    directive: CacheDirective,
    now: number = Date.now()
  ): Promise<CachePlan> {
    switch (directive) {
      case 'no-store':
        return { kind: 'network', write: false };

      case 'reload':
        return { kind: 'network', write: true };

      case 'force-cache': {
        const entry = await this.store.lookup(request);
        return entry ? { kind: 'hit', entry } : { kind: 'network', write: true };
      }

      case 'only-if-cached': {
        const entry = await this.store.lookup(request);
        return entry ? { kind: 'hit', entry } : { kind: 'miss' };
      }

      case 'default': {
        const entry = await this.store.lookup(request);
        if (!entry) {
          return { kind: 'network', write: true };
        }
        if (protocolFreshness(entry, now) === 'fresh') {
          return { kind: 'hit', entry };
        }
        return { kind: 'network', write: true, revalidate: entry };
      }
    }
  }

  /**
   * Validators to send when revalidating a stored entry
   */
  conditionalHeaders(entry: CachedResponse): Record<string, string> {
    const headers: Record<string, string> = {};
    const etag = extractETag(entry.headers);
    const lastModified = extractLastModified(entry.headers);
    if (etag) headers['if-none-match'] = etag;
    if (lastModified) headers['if-modified-since'] = lastModified;
    return headers;
  }

  /**
   * Store a network response when it may be cached
   *
   * @returns whether the response was written
   */
  async write(
    request: CacheableRequest,
    statusCode: number,
    headers: Record<string, string>,
    body: Buffer,
    now: number = Date.now()
  ): Promise<boolean> {
    if (!this.policy.useCache) return false;
    if (request.method.toUpperCase() !== 'GET') return false;
    if (!isCacheableStatus(statusCode)) return false;
    if (parseCacheControl(headers['cache-control']).noStore) return false;

    await this.store.store(request, {
      url: request.url,
      method: request.method,
      statusCode,
      headers: this.withConfiguredTtl(headers, now),
      body,
      storedAt: now,
    });
    return true;
  }

  /**
   * Apply a 304 to a stored entry and return the entry to serve
   */
  async refresh(
    request: CacheableRequest,
    entry: CachedResponse,
    notModifiedHeaders: Record<string, string>,
    now: number = Date.now()
  ): Promise<CachedResponse> {
    const headers = { ...entry.headers };
    for (const [name, value] of Object.entries(notModifiedHeaders)) {
      if (!BODY_HEADERS.has(name)) headers[name] = value;
    }

    if (!this.policy.useCache) {
      return { ...entry, headers };
    }

    const refreshed: CachedResponse = {
      ...entry,
      headers: this.withConfiguredTtl(headers, now),
      storedAt: now,
    };
    await this.store.store(request, refreshed);
    return refreshed;
  }

  /**
   * Stored headers: Cache-Control from the configured TTL, and a Date of the
   * receive time when the response carried none
   */
  private withConfiguredTtl(headers: Record<string, string>, now: number): Record<string, string> {
    const maxAge = Math.max(0, Math.floor(this.policy.cacheTtlMs / 1000));
    return {
      ...headers,
      date: headers['date'] ?? formatHttpDate(now),
      'cache-control': buildCacheControl({ maxAge }),
    };
  }
}
