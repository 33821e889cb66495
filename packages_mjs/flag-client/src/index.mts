/**
 * @flagwire/flag-client
 *
 * Flag API client with:
 * - Per-request cache policy driven by CacheConfig
 * - Sessions rebuilt from the live NetworkConfig
 * - Realtime (SSE) update stream
 * - Diagnostics channel events
 *
 * @example
 * ```typescript
 * import { createFlagClient } from '@flagwire/flag-client';
 *
 * const client = createFlagClient({ apiKey: 'env-key' });
 * const flags = await client.getFeatureFlags();
 * ```
 */

export type {
  Result,
  Completion,
  CompletionContext,
  RequestBuilder,
  Decoder,
  ApiClientOptions,
  DiagnosticsEvent,
  FlagClientOptions,
} from './types.mjs';

export { FlagClient, createFlagClient } from './factory.mjs';

export { ApiClient, DOCUMENT_UPDATED_AT_HEADER, immediateCompletionContext } from './core/api-client.mjs';
export {
  resolveCachePolicy,
  type CachePolicyDecision,
  type EntryState,
} from './core/cache-policy.mjs';
export { OperationRegistry, type CompletedOperation } from './core/operation-registry.mjs';
export {
  buildRequest,
  DEFAULT_BASE_URL,
  ENVIRONMENT_KEY_HEADER,
  type Route,
  type TraitInput,
  type TraitValue,
} from './core/request-builder.mjs';
export {
  jsonDecoder,
  flagsDecoder,
  identityDecoder,
  realtimeUpdateDecoder,
  type ParseSchema,
} from './core/decoder.mjs';

export {
  flagValueSchema,
  featureSchema,
  flagSchema,
  flagListSchema,
  traitSchema,
  identitySchema,
  realtimeEventSchema,
  type FlagValue,
  type Feature,
  type Flag,
  type Trait,
  type Identity,
  type RealtimeUpdate,
} from './schemas.mjs';

export {
  FlagClientError,
  CacheMissError,
  MissingCredentialError,
  RequestBuildError,
  UnhandledTransportError,
  DecodeError,
  isFlagClientError,
  toFlagClientError,
} from './errors.mjs';

export {
  RealtimeStream,
  DEFAULT_REALTIME_URL,
  realtimeStreamUrl,
  type RealtimeStreamOptions,
} from './streaming/realtime-stream.mjs';
export { SSEParser, parseSSEEvent, type SSEEvent } from './streaming/sse-reader.mjs';

export {
  CHANNELS,
  onRequestStart,
  onRequestEnd,
  onRequestError,
  onCachePolicy,
  onAllEvents,
} from './diagnostics.mjs';

export { logger } from './logger.mjs';

export {
  NetworkConfig,
  CacheConfig,
  loadNetworkConfigFromEnv,
  loadCacheConfigFromEnv,
  type NetworkConfigInit,
  type CacheConfigInit,
} from '@flagwire/fetch-transport';
