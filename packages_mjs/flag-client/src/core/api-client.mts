/**
 * Request orchestrator
 *
 * Turns a route into one HTTP exchange: picks the cache directive from the
 * current CacheConfig, dispatches on a session built from the current
 * NetworkConfig, collects the delegate events per operation id and delivers
 * exactly one result per call on the completion context.
 */
import {
  createSession,
  maskSecret,
  networkFingerprint,
  type CachePolicySource,
  type DataOperation,
  type Logger,
  type NetworkSettingsSource,
  type Session,
  type SessionDelegate,
  type SessionFactory,
  type TransportRequest,
} from '@flagwire/fetch-transport';
import { buildCacheControl, formatHttpDate } from '@flagwire/response-cache';
import type { Dispatcher } from 'undici';
import {
  emitCachePolicy,
  emitRequestEnd,
  emitRequestError,
  emitRequestStart,
} from '../diagnostics.mjs';
import {
  DecodeError,
  MissingCredentialError,
  RequestBuildError,
  UnhandledTransportError,
  isFlagClientError,
  toFlagClientError,
  type FlagClientError,
} from '../errors.mjs';
import { logger } from '../logger.mjs';
import type {
  ApiClientOptions,
  Completion,
  CompletionContext,
  Decoder,
  RequestBuilder,
  Result,
} from '../types.mjs';
import { resolveCachePolicy } from './cache-policy.mjs';
import { OperationRegistry } from './operation-registry.mjs';
import { DEFAULT_BASE_URL, buildRequest, type Route } from './request-builder.mjs';

/**
 * Response header carrying the flag document's last update (seconds)
 */
export const DOCUMENT_UPDATED_AT_HEADER = 'x-flagwire-document-updated-at';

/**
 * Callbacks run on a later turn of the event loop
 */
export const immediateCompletionContext: CompletionContext = (task) => {
  setImmediate(task);
};

interface PendingContext {
  request: TransportRequest;
  startedAt: number;
  statusCode: number;
  resolve: (exchange: Exchange) => void;
  reject: (error: FlagClientError) => void;
}

interface Exchange {
  request: TransportRequest;
  statusCode: number;
  body: Buffer;
}

export class ApiClient implements SessionDelegate {
  private _baseUrl: string;
  private _credential: string | undefined;
  private _session: Session | undefined;
  private _fingerprint: string | undefined;
  private _lastUpdatedAt: number | undefined;

  private readonly network: NetworkSettingsSource;
  private readonly cache: CachePolicySource;
  private readonly builder: RequestBuilder;
  private readonly sessionFactory: SessionFactory;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly completionContext: CompletionContext;
  private readonly reuseSession: boolean;
  private readonly log: Logger;
  private readonly registry = new OperationRegistry<PendingContext>();

  constructor(options: ApiClientOptions) {
    this.network = options.network;
    this.cache = options.cache;
    this._baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this._credential = options.credential;
    this.builder = options.builder ?? buildRequest;
    this.sessionFactory = options.createSession ?? createSession;
    this.dispatcher = options.dispatcher;
    this.completionContext = options.completionContext ?? immediateCompletionContext;
    this.reuseSession = options.reuseSessionUntilConfigChanges ?? false;
    this.log = (options.logger ?? logger).child({ component: 'api-client' });
  }

  get baseUrl(): string {
    return this._baseUrl;
  }

  setBaseURL(url: string): void {
    this._baseUrl = url;
  }

  get credential(): string | undefined {
    return this._credential;
  }

  setCredential(key: string | undefined): void {
    this._credential = key;
    this.log.debug({ credential: maskSecret(key) }, 'Credential updated');
  }

  /**
   * Session used by the most recent dispatch
   */
  get session(): Session | undefined {
    return this._session;
  }

  /**
   * Value of the last readable document-updated-at header
   */
  get lastUpdatedAt(): number | undefined {
    return this._lastUpdatedAt;
  }

  /**
   * Operations dispatched and not yet completed
   */
  get pendingCount(): number {
    return this.registry.size;
  }

  /**
   * Request a route and deliver the raw response bytes
   */
  requestData(route: Route, completion: Completion<Buffer>): void {
    this.perform(route).then(
      (exchange) => this.deliver(completion, { ok: true, value: exchange.body }),
      (error: unknown) => this.deliver(completion, { ok: false, error: toFlagClientError(error) })
    );
  }

  /**
   * Request a route and deliver only success or failure
   */
  requestVoid(route: Route, completion: Completion<void>): void {
    this.requestData(route, (result) => {
      completion(result.ok ? { ok: true, value: undefined } : result);
    });
  }

  /**
   * Request a route and decode the response
   */
  request<T>(route: Route, decoder: Decoder<T>, completion: Completion<T>): void {
    this.perform(route)
      .then(async (exchange) => {
        const value = decodeWith(decoder, exchange.body);
        await this.backfill(exchange);
        return value;
      })
      .then(
        (value) => this.deliver(completion, { ok: true, value }),
        (error: unknown) => this.deliver(completion, { ok: false, error: toFlagClientError(error) })
      );
  }

  /**
   * Promise form of requestData
   */
  fetchData(route: Route): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      this.requestData(route, (result) => (result.ok ? resolve(result.value) : reject(result.error)));
    });
  }

  /**
   * Promise form of requestVoid
   */
  send(route: Route): Promise<void> {
    return new Promise((resolve, reject) => {
      this.requestVoid(route, (result) => (result.ok ? resolve() : reject(result.error)));
    });
  }

  /**
   * Promise form of request
   */
  fetch<T>(route: Route, decoder: Decoder<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.request(route, decoder, (result) => (result.ok ? resolve(result.value) : reject(result.error)));
    });
  }

  /**
   * Close the current session once its operations have finished
   */
  async close(): Promise<void> {
    const session = this._session;
    this._session = undefined;
    this._fingerprint = undefined;
    if (session) {
      await session.whenIdle();
      await session.close();
    }
  }

  didReceiveResponse(
    operation: DataOperation,
    statusCode: number,
    headers: Record<string, string>
  ): void {
    const context = this.registry.get(operation.id);
    if (!context) return;
    context.statusCode = statusCode;
    this.recordDocumentUpdatedAt(headers[DOCUMENT_UPDATED_AT_HEADER]);
  }

  didReceiveData(operation: DataOperation, chunk: Buffer): void {
    this.registry.append(operation.id, chunk);
  }

  didComplete(operation: DataOperation, error?: Error): void {
    const completed = this.registry.take(operation.id);
    if (!completed) {
      this.log.debug({ operationId: operation.id }, 'Completion for unknown operation ignored');
      return;
    }

    const { context, body } = completed;
    const { request } = context;
    const duration = Date.now() - context.startedAt;

    if (error) {
      this.log.debug({ operationId: operation.id, err: error, duration }, 'Request failed');
      emitRequestError(request.method, request.url, error, duration, operation.id);
      context.reject(new UnhandledTransportError(error));
      return;
    }

    this.log.debug(
      { operationId: operation.id, status: context.statusCode, bytes: body.length, duration },
      'Request completed'
    );
    emitRequestEnd(operation.id, request.method, request.url, context.statusCode, body.length, duration);
    context.resolve({ request, statusCode: context.statusCode, body });
  }

  private deliver<T>(completion: Completion<T>, result: Result<T>): void {
    this.completionContext(() => completion(result));
  }

  private async perform(route: Route): Promise<Exchange> {
    const credential = this._credential;
    if (!credential) {
      throw new MissingCredentialError();
    }

    let request = this.build(credential, route);
    const decision = await resolveCachePolicy(this.cache, {
      method: request.method,
      url: request.url,
      headers: request.headers,
    });
    request = { ...request, cacheDirective: decision.directive };

    this.log.debug(
      { url: request.url, directive: decision.directive, state: decision.state, evicted: decision.evicted },
      'Cache policy'
    );
    emitCachePolicy(request.method, request.url, decision.directive, decision.state, decision.evicted);

    return new Promise<Exchange>((resolve, reject) => {
      const session = this.acquireSession();
      const operation = session.dataOperation(request, this);
      this.registry.register(operation.id, {
        request,
        startedAt: Date.now(),
        statusCode: 0,
        resolve,
        reject,
      });
      this.log.debug(
        { operationId: operation.id, sessionId: session.id, method: request.method, url: request.url },
        'Dispatching'
      );
      emitRequestStart(operation.id, request.method, request.url);
      operation.resume();
    });
  }

  private build(credential: string, route: Route): TransportRequest {
    try {
      return this.builder(this._baseUrl, credential, route);
    } catch (error) {
      if (isFlagClientError(error)) throw error;
      throw new RequestBuildError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  /**
   * Current session, rebuilt from the live configuration when required
   */
  private acquireSession(): Session {
    const current = this._session;
    if (this.reuseSession && current && !current.isClosed && current.store === this.cache.store) {
      if (networkFingerprint(this.network.snapshot()) === this._fingerprint) {
        return current;
      }
    }

    const next = this.sessionFactory(this.network, this.cache, { dispatcher: this.dispatcher });
    this._session = next;
    this._fingerprint = networkFingerprint(next.settings);
    this.log.debug({ sessionId: next.id, previousSessionId: current?.id }, 'Session rebuilt');

    if (current) {
      this.retire(current);
    }
    return next;
  }

  private retire(session: Session): void {
    session
      .whenIdle()
      .then(() => session.close())
      .catch((error: unknown) => {
        this.log.warn({ err: error, sessionId: session.id }, 'Failed to close replaced session');
      });
  }

  private recordDocumentUpdatedAt(value: string | undefined): void {
    if (value === undefined) return;
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(parsed)) {
      this.log.warn({ value }, 'Ignoring malformed document-updated-at header');
      return;
    }
    this._lastUpdatedAt = parsed;
  }

  /**
   * Store a decoded 2xx GET response when the cache has no entry for it
   */
  private async backfill(exchange: Exchange): Promise<void> {
    const { useCache, cacheTtlMs, store } = this.cache;
    const { request, statusCode, body } = exchange;
    if (!useCache || request.method !== 'GET' || statusCode < 200 || statusCode >= 300) {
      return;
    }

    const key = { method: request.method, url: request.url, headers: request.headers };
    try {
      if (await store.lookup(key)) return;

      const now = Date.now();
      await store.store(key, {
        url: request.url,
        method: request.method,
        statusCode: 200,
        headers: {
          'content-type': 'application/json',
          'cache-control': buildCacheControl({ maxAge: Math.max(0, Math.floor(cacheTtlMs / 1000)) }),
          date: formatHttpDate(now),
        },
        body,
        storedAt: now,
      });
      this.log.debug({ url: request.url }, 'Backfilled response cache');
    } catch (error) {
      this.log.warn({ err: error, url: request.url }, 'Failed to backfill response cache');
    }
  }
}

function decodeWith<T>(decoder: Decoder<T>, body: Buffer): T {
  try {
    return decoder.decode(body);
  } catch (error) {
    throw isFlagClientError(error) ? error : new DecodeError(error);
  }
}
