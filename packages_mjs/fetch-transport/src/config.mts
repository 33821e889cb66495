/**
 * Network and cache configuration
 *
 * Both records are plain mutable objects: any field may be assigned at any
 * time and no range is validated. A session reads the network record once,
 * through snapshot(), so a change only reaches sessions built after it.
 */

import { sharedResponseCache, type ResponseCacheStore } from '@flagwire/response-cache';
import type { CachePolicySource, NetworkSettings } from './types.mjs';

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_RESOURCE_TIMEOUT_MS = 604_800_000; // 7 days
export const DEFAULT_MAX_CONNECTIONS_PER_HOST = 6;

/**
 * Initial values for a NetworkConfig
 */
export type NetworkConfigInit = Partial<Omit<NetworkSettings, 'additionalHeaders'>> & {
  additionalHeaders?: Record<string, string>;
};

/**
 * Transport tuning parameters
 */
export class NetworkConfig {
  /** Per-request deadline */
  requestTimeoutMs: number;
  /** Deadline for the whole exchange, retries included */
  resourceTimeoutMs: number;
  /** Keep retrying connectivity failures until the resource deadline */
  waitsForConnectivity: boolean;
  allowsCellularAccess: boolean;
  maxConnectionsPerHost: number;
  /** Merged into every request; a request's own headers win */
  additionalHeaders: Record<string, string>;
  usePipelining: boolean;
  shouldSetCookies: boolean;

  constructor(init: NetworkConfigInit = {}) {
    this.requestTimeoutMs = init.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.resourceTimeoutMs = init.resourceTimeoutMs ?? DEFAULT_RESOURCE_TIMEOUT_MS;
    this.waitsForConnectivity = init.waitsForConnectivity ?? true;
    this.allowsCellularAccess = init.allowsCellularAccess ?? true;
    this.maxConnectionsPerHost = init.maxConnectionsPerHost ?? DEFAULT_MAX_CONNECTIONS_PER_HOST;
    this.additionalHeaders = { ...init.additionalHeaders };
    this.usePipelining = init.usePipelining ?? true;
    this.shouldSetCookies = init.shouldSetCookies ?? true;
  }

  /**
   * Copy the current values into a frozen settings object
   */
  snapshot(): NetworkSettings {
    return Object.freeze({
      requestTimeoutMs: this.requestTimeoutMs,
      resourceTimeoutMs: this.resourceTimeoutMs,
      waitsForConnectivity: this.waitsForConnectivity,
      allowsCellularAccess: this.allowsCellularAccess,
      maxConnectionsPerHost: this.maxConnectionsPerHost,
      additionalHeaders: Object.freeze({ ...this.additionalHeaders }),
      usePipelining: this.usePipelining,
      shouldSetCookies: this.shouldSetCookies,
    });
  }
}

/**
 * Initial values for a CacheConfig
 */
export type CacheConfigInit = Partial<CachePolicySource>;

/**
 * Cache policy parameters plus the store they apply to
 */
export class CacheConfig implements CachePolicySource {
  useCache: boolean;
  /** Freshness window for the Date-header check */
  cacheTtlMs: number;
  /** Serve fresh entries without contacting the network */
  skipAPI: boolean;
  /** Shared by every client in the process unless replaced */
  store: ResponseCacheStore;

  constructor(init: CacheConfigInit = {}) {
    this.useCache = init.useCache ?? false;
    this.cacheTtlMs = init.cacheTtlMs ?? 0;
    this.skipAPI = init.skipAPI ?? false;
    this.store = init.store ?? sharedResponseCache();
  }
}

/**
 * Stable string identifying a set of network settings
 */
export function networkFingerprint(settings: NetworkSettings): string {
  const headers = Object.keys(settings.additionalHeaders)
    .sort()
    .map((name) => [name, settings.additionalHeaders[name]]);

  return JSON.stringify([
    settings.requestTimeoutMs,
    settings.resourceTimeoutMs,
    settings.waitsForConnectivity,
    settings.allowsCellularAccess,
    settings.maxConnectionsPerHost,
    settings.usePipelining,
    settings.shouldSetCookies,
    headers,
  ]);
}
