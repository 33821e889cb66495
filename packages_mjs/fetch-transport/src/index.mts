/**
 * @flagwire/fetch-transport
 *
 * undici-based transport for the flagwire client:
 * - Mutable NetworkConfig / CacheConfig records
 * - Session factory building an Agent from a config snapshot
 * - Protocol cache layer and cookie jar inside each session
 *
 * @example
 * ```typescript
 * import { NetworkConfig, CacheConfig, createSession } from '@flagwire/fetch-transport';
 *
 * const network = new NetworkConfig({ requestTimeoutMs: 10_000 });
 * const session = createSession(network, new CacheConfig({ useCache: true, cacheTtlMs: 60_000 }));
 * const operation = session.dataOperation(request, delegate);
 * operation.resume();
 * ```
 */

export type {
  HttpMethod,
  CacheDirective,
  TransportRequest,
  NetworkSettings,
  CachePolicySource,
  DataOperation,
  SessionDelegate,
} from './types.mjs';

export {
  NetworkConfig,
  CacheConfig,
  networkFingerprint,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RESOURCE_TIMEOUT_MS,
  DEFAULT_MAX_CONNECTIONS_PER_HOST,
  type NetworkConfigInit,
  type CacheConfigInit,
} from './config.mjs';

export { loadNetworkConfigFromEnv, loadCacheConfigFromEnv } from './env.mjs';

export {
  createSession,
  toAgentOptions,
  DEFAULT_TRANSPORT_TIMEOUT_MS,
  PIPELINING_DEPTH,
  type CreateSessionOptions,
  type NetworkSettingsSource,
  type SessionFactory,
} from './factory.mjs';

export {
  Session,
  isConnectivityError,
  parseResponseHeaders,
  CONNECTIVITY_ERROR_CODES,
  CONNECTIVITY_RETRY_DELAY_MS,
  type SessionInit,
} from './session.mjs';

export { ProtocolCacheLayer, type CachePlan } from './cache-layer.mjs';
export { CookieJar, sharedCookieJar } from './cookie-jar.mjs';
export {
  FlagClientError,
  CacheMissError,
  ResourceTimeoutError,
  OperationCancelledError,
  isFlagClientError,
} from './errors.mjs';
export { createLogger, maskSecret, type Logger } from './logger.mjs';
