/**
 * Types for @flagwire/flag-client
 */

import type { Dispatcher } from 'undici';
import type {
  CachePolicySource,
  CacheDirective,
  HttpMethod,
  Logger,
  NetworkConfig,
  NetworkConfigInit,
  NetworkSettingsSource,
  CacheConfig,
  CacheConfigInit,
  SessionFactory,
  TransportRequest,
} from '@flagwire/fetch-transport';
import type { FlagClientError } from './errors.mjs';
import type { Route } from './core/request-builder.mjs';

/**
 * Outcome delivered to a completion callback
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: FlagClientError };

/**
 * Completion callback; called exactly once
 */
export type Completion<T> = (result: Result<T>) => void;

/**
 * Where completion callbacks run
 */
export type CompletionContext = (task: () => void) => void;

/**
 * Turns a route into a request
 */
export type RequestBuilder = (baseUrl: string, credential: string, route: Route) => TransportRequest;

/**
 * Turns response bytes into a value
 */
export interface Decoder<T> {
  decode(bytes: Buffer): T;
}

/**
 * Options for ApiClient
 */
export interface ApiClientOptions {
  network: NetworkSettingsSource;
  cache: CachePolicySource;
  baseUrl?: string;
  credential?: string;
  builder?: RequestBuilder;
  createSession?: SessionFactory;
  /** Caller-owned dispatcher; never closed by the client */
  dispatcher?: Dispatcher;
  /** Default: setImmediate */
  completionContext?: CompletionContext;
  /** Rebuild the session only when the network settings or store change */
  reuseSessionUntilConfigChanges?: boolean;
  logger?: Logger;
}

/**
 * Event published on the diagnostics channels
 */
export interface DiagnosticsEvent {
  name: 'request:start' | 'request:end' | 'request:error' | 'cache:policy';
  timestamp: number;
  operationId?: number;
  duration?: number;
  request: {
    method: HttpMethod;
    url: string;
  };
  response?: {
    status: number;
    bytes: number;
  };
  cache?: {
    directive: CacheDirective;
    reason: string;
    evicted: boolean;
  };
  error?: Error;
}

/**
 * Options for createFlagClient
 */
export interface FlagClientOptions {
  apiKey: string;
  /** Default: https://edge.flagwire.io/api/v1/ */
  baseUrl?: string;
  /** Default: https://realtime.flagwire.io/ */
  realtimeUrl?: string;
  network?: NetworkConfig | NetworkConfigInit;
  cache?: CacheConfig | CacheConfigInit;
  dispatcher?: Dispatcher;
  completionContext?: CompletionContext;
  reuseSessionUntilConfigChanges?: boolean;
}
