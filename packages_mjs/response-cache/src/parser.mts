/**
 * Cache-Control parsing and header utilities
 */

import type {
  CacheControlDirectives,
  CacheableRequest,
  CachedResponse,
  ProtocolFreshness,
} from './types.mjs';
import { parseHttpDate } from './http-date.mjs';

/**
 * Statuses a client cache may store without explicit freshness information
 */
export const CACHEABLE_STATUSES: readonly number[] = [200, 203, 204, 300, 301, 404, 410];

/**
 * Parse Cache-Control header into directives
 */
export function parseCacheControl(header: string | undefined | null): CacheControlDirectives {
  const directives: CacheControlDirectives = {};

  if (!header) {
    return directives;
  }

  const parts = header.toLowerCase().split(',').map((p) => p.trim());

  for (const part of parts) {
    const [key, rawValue] = part.split('=').map((s) => s.trim());
    const value = rawValue?.replace(/^"|"$/g, '');

    switch (key) {
      case 'no-store':
        directives.noStore = true;
        break;
      case 'no-cache':
        directives.noCache = true;
        break;
      case 'max-age': {
        const seconds = parseSeconds(value);
        if (seconds !== undefined) directives.maxAge = seconds;
        break;
      }
      case 's-maxage': {
        const seconds = parseSeconds(value);
        if (seconds !== undefined) directives.sMaxAge = seconds;
        break;
      }
      case 'private':
        directives.private = true;
        break;
      case 'public':
        directives.public = true;
        break;
      case 'must-revalidate':
        directives.mustRevalidate = true;
        break;
      case 'immutable':
        directives.immutable = true;
        break;
    }
  }

  return directives;
}

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Build Cache-Control header from directives
 */
export function buildCacheControl(directives: CacheControlDirectives): string {
  const parts: string[] = [];

  if (directives.noStore) parts.push('no-store');
  if (directives.noCache) parts.push('no-cache');
  if (directives.private) parts.push('private');
  if (directives.public) parts.push('public');
  if (directives.mustRevalidate) parts.push('must-revalidate');
  if (directives.immutable) parts.push('immutable');
  if (directives.maxAge !== undefined) parts.push(`max-age=${directives.maxAge}`);
  if (directives.sMaxAge !== undefined) parts.push(`s-maxage=${directives.sMaxAge}`);

  return parts.join(', ');
}

/**
 * Get header value case-insensitively
 */
export function getHeaderValue(
  headers: Record<string, string>,
  key: string
): string | undefined {
  const lowerKey = key.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() === lowerKey) {
      return v;
    }
  }
  return undefined;
}

/**
 * Normalize headers to lowercase keys
 */
export function normalizeHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * Extract ETag from response headers
 */
export function extractETag(headers: Record<string, string>): string | undefined {
  return getHeaderValue(headers, 'etag')?.trim();
}

/**
 * Extract Last-Modified from response headers
 */
export function extractLastModified(headers: Record<string, string>): string | undefined {
  return getHeaderValue(headers, 'last-modified')?.trim();
}

/**
 * Check if response status may be stored
 */
export function isCacheableStatus(
  statusCode: number,
  cacheableStatuses: readonly number[] = CACHEABLE_STATUSES
): boolean {
  return cacheableStatuses.includes(statusCode);
}

/**
 * Cache key for a request: method, URL and sorted request headers
 */
export function cacheKeyFor(request: CacheableRequest): string {
  let key = `${request.method.toUpperCase()}:${request.url}`;
  const headers = request.headers ? normalizeHeaders(request.headers) : {};
  const names = Object.keys(headers);
  if (names.length > 0) {
    const sortedHeaders = names
      .sort()
      .map((name) => `${name}=${headers[name]}`)
      .join('&');
    key += `|${sortedHeaders}`;
  }
  return key;
}

/**
 * Judge a stored response by its own Cache-Control / Expires headers.
 *
 * Age is measured from the response `Date` header, or from the time the
 * entry was stored when that header is missing or unreadable.
 */
export function protocolFreshness(
  response: CachedResponse,
  now: number = Date.now()
): ProtocolFreshness {
  const directives = parseCacheControl(getHeaderValue(response.headers, 'cache-control'));

  if (directives.noCache) {
    return 'must-revalidate';
  }

  const generatedAt = parseHttpDate(getHeaderValue(response.headers, 'date')) ?? response.storedAt;
  const lifetimeMs = freshnessLifetimeMs(response.headers, directives, generatedAt);

  if (lifetimeMs !== undefined && now - generatedAt < lifetimeMs) {
    return 'fresh';
  }

  return directives.mustRevalidate ? 'must-revalidate' : 'stale';
}

function freshnessLifetimeMs(
  headers: Record<string, string>,
  directives: CacheControlDirectives,
  generatedAt: number
): number | undefined {
  if (directives.maxAge !== undefined) {
    return directives.maxAge * 1000;
  }

  const expires = parseHttpDate(getHeaderValue(headers, 'expires'));
  if (expires !== undefined) {
    return expires - generatedAt;
  }

  return undefined;
}
