/**
 * Types for fetch-transport
 */

import type { ResponseCacheStore } from '@flagwire/response-cache';

/**
 * HTTP methods used by the flag API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * How a single request may use the response cache.
 *
 * - `no-store`: network only; nothing read or written
 * - `default`: reuse a protocol-fresh entry, otherwise revalidate
 * - `reload`: network only; cacheable responses are written
 * - `force-cache`: any stored entry, otherwise network
 * - `only-if-cached`: stored entry or a CacheMissError
 */
export type CacheDirective = 'no-store' | 'default' | 'reload' | 'force-cache' | 'only-if-cached';

/**
 * A fully formed request ready for dispatch
 */
export interface TransportRequest {
  /** Absolute URL */
  url: string;
  method: HttpMethod;
  /** Request headers; these also identify the request in the cache */
  headers: Record<string, string>;
  body?: string;
  cacheDirective: CacheDirective;
}

/**
 * Frozen network settings a session was built from
 */
export interface NetworkSettings {
  readonly requestTimeoutMs: number;
  readonly resourceTimeoutMs: number;
  readonly waitsForConnectivity: boolean;
  readonly allowsCellularAccess: boolean;
  readonly maxConnectionsPerHost: number;
  readonly additionalHeaders: Readonly<Record<string, string>>;
  readonly usePipelining: boolean;
  readonly shouldSetCookies: boolean;
}

/**
 * Read contract for cache policy. Read at the moment it is needed, so
 * mutations are seen by the next decision.
 */
export interface CachePolicySource {
  readonly useCache: boolean;
  readonly cacheTtlMs: number;
  readonly skipAPI: boolean;
  readonly store: ResponseCacheStore;
}

/**
 * A started or startable exchange on a session
 */
export interface DataOperation {
  /** Process-wide unique identifier */
  readonly id: number;
  readonly request: TransportRequest;
  /** Id of the session that owns the operation */
  readonly sessionId: number;
  /** Start the exchange. Calling it more than once has no effect. */
  resume(): void;
  /** Abort the exchange; didComplete reports an OperationCancelledError */
  cancel(): void;
}

/**
 * Receives the events of a data operation
 */
export interface SessionDelegate {
  didReceiveResponse?(
    operation: DataOperation,
    statusCode: number,
    headers: Record<string, string>
  ): void;
  didReceiveData(operation: DataOperation, chunk: Buffer): void;
  /** Called exactly once per operation */
  didComplete(operation: DataOperation, error?: Error): void;
}
