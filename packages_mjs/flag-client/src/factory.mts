/**
 * High-level flag client
 */
import { CacheConfig, NetworkConfig } from '@flagwire/fetch-transport';
import { ApiClient, immediateCompletionContext } from './core/api-client.mjs';
import { flagsDecoder, identityDecoder } from './core/decoder.mjs';
import type { TraitInput } from './core/request-builder.mjs';
import { logger } from './logger.mjs';
import type { Flag, Identity } from './schemas.mjs';
import { RealtimeStream } from './streaming/realtime-stream.mjs';
import type { Completion, CompletionContext, FlagClientOptions } from './types.mjs';

export class FlagClient {
  readonly network: NetworkConfig;
  readonly cache: CacheConfig;
  readonly api: ApiClient;
  readonly realtime: RealtimeStream;

  private readonly completionContext: CompletionContext;
  private readonly log = logger.child({ component: 'flag-client' });

  constructor(options: FlagClientOptions) {
    this.network =
      options.network instanceof NetworkConfig ? options.network : new NetworkConfig(options.network);
    this.cache = options.cache instanceof CacheConfig ? options.cache : new CacheConfig(options.cache);
    this.completionContext = options.completionContext ?? immediateCompletionContext;

    this.api = new ApiClient({
      network: this.network,
      cache: this.cache,
      baseUrl: options.baseUrl,
      credential: options.apiKey,
      dispatcher: options.dispatcher,
      completionContext: this.completionContext,
      reuseSessionUntilConfigChanges: options.reuseSessionUntilConfigChanges,
    });

    this.realtime = new RealtimeStream(this.network, this.cache, {
      apiKey: options.apiKey,
      realtimeUrl: options.realtimeUrl,
      dispatcher: options.dispatcher,
    });
  }

  /**
   * Environment flags, or the flags of an identity when one is given
   */
  async getFeatureFlags(identifier?: string): Promise<Flag[]> {
    if (identifier === undefined) {
      return this.api.fetch({ type: 'getFlags' }, flagsDecoder);
    }
    const identity = await this.getIdentity(identifier);
    return identity.flags;
  }

  getIdentity(identifier: string, traits?: TraitInput[], transient?: boolean): Promise<Identity> {
    return this.api.fetch({ type: 'getIdentity', identifier, traits, transient }, identityDecoder);
  }

  /**
   * Store traits for an identity and return the identity as the server now sees it
   */
  setTraits(identifier: string, traits: TraitInput[]): Promise<Identity> {
    return this.api.fetch({ type: 'postTraits', identifier, traits }, identityDecoder);
  }

  /**
   * Send flag evaluation counts keyed by feature name
   */
  postAnalytics(events: Record<string, number>): Promise<void> {
    return this.api.send({ type: 'postAnalytics', events });
  }

  /**
   * Refetch the environment flags whenever the realtime stream reports a
   * document newer than the last one seen
   */
  startRealtimeUpdates(listener: Completion<Flag[]>): void {
    this.realtime.start((result) => {
      if (!result.ok) {
        this.completionContext(() => listener(result));
        return;
      }

      const lastUpdatedAt = this.api.lastUpdatedAt;
      const { updatedAt } = result.value;
      if (lastUpdatedAt !== undefined && updatedAt <= lastUpdatedAt) {
        this.log.debug({ updatedAt, lastUpdatedAt }, 'Realtime update already seen');
        return;
      }

      this.log.debug({ updatedAt, lastUpdatedAt }, 'Realtime update, refetching flags');
      this.api.request({ type: 'getFlags' }, flagsDecoder, listener);
    });
  }

  stopRealtimeUpdates(): void {
    this.realtime.stop();
  }

  async close(): Promise<void> {
    await this.realtime.close();
    await this.api.close();
  }
}

/**
 * Create a flag client for one environment
 *
 * @example
 * ```typescript
 * const client = createFlagClient({
 *   apiKey: process.env.FLAGWIRE_ENVIRONMENT_KEY ?? '',
 *   cache: { useCache: true, cacheTtlMs: 60_000 },
 * });
 * const flags = await client.getFeatureFlags();
 * ```
 */
export function createFlagClient(options: FlagClientOptions): FlagClient {
  return new FlagClient(options);
}
