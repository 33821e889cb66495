/**
 * Types for the flag response cache
 */

/**
 * Parsed Cache-Control directives
 */
export interface CacheControlDirectives {
  /** Response must not be stored */
  noStore?: boolean;
  /** Stored response must be revalidated before use */
  noCache?: boolean;
  /** Freshness lifetime in seconds */
  maxAge?: number;
  /** Shared cache freshness lifetime in seconds */
  sMaxAge?: number;
  /** Response is private (user-specific) */
  private?: boolean;
  /** Response is public */
  public?: boolean;
  /** Response must be revalidated once stale */
  mustRevalidate?: boolean;
  /** Immutable - response will not change */
  immutable?: boolean;
}

/**
 * Identity of a cacheable request: method, URL and the request's own headers.
 */
export interface CacheableRequest {
  method: string;
  url: string;
  headers?: Record<string, string>;
}

/**
 * A stored response
 */
export interface CachedResponse {
  /** Request URL the response answers */
  url: string;
  /** Request method */
  method: string;
  /** Response status code */
  statusCode: number;
  /** Response headers, lower-cased keys */
  headers: Record<string, string>;
  /** Response body bytes */
  body: Buffer;
  /** When the entry was written (Unix timestamp ms) */
  storedAt: number;
}

/**
 * Freshness of a stored response judged by its own headers
 */
export type ProtocolFreshness = 'fresh' | 'stale' | 'must-revalidate';

/**
 * Cache store contract. One instance is normally shared by every client in
 * the process, so all of them observe the same contents.
 */
export interface ResponseCacheStore {
  /**
   * Find the entry stored for a request
   */
  lookup(request: CacheableRequest): Promise<CachedResponse | null>;

  /**
   * Store (or replace) the entry for a request
   */
  store(request: CacheableRequest, response: CachedResponse): Promise<void>;

  /**
   * Remove the entry for a request
   */
  evict(request: CacheableRequest): Promise<boolean>;

  /**
   * Remove every entry
   */
  clear(): Promise<void>;

  /**
   * Number of stored entries
   */
  size(): Promise<number>;

  /**
   * Release resources held by the store
   */
  close(): Promise<void>;
}
