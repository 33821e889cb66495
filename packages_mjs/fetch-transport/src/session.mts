/**
 * Transport session: one undici dispatcher plus the settings it was built
 * from. Operations capture their session when created, so replacing a
 * client's current session never disturbs exchanges already running.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Agent, Dispatcher } from 'undici';
import {
  normalizeHeaders,
  type CacheableRequest,
  type CachedResponse,
  type ResponseCacheStore,
} from '@flagwire/response-cache';
import { ProtocolCacheLayer } from './cache-layer.mjs';
import type { CookieJar } from './cookie-jar.mjs';
import { CacheMissError, OperationCancelledError, ResourceTimeoutError } from './errors.mjs';
import { logger } from './logger.mjs';
import type {
  CachePolicySource,
  DataOperation,
  NetworkSettings,
  SessionDelegate,
  TransportRequest,
} from './types.mjs';

const log = logger.child({ component: 'session' });

/**
 * Error codes meaning the host could not be reached at all
 */
export const CONNECTIVITY_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export const CONNECTIVITY_RETRY_DELAY_MS = 1000;

// setTimeout fires at once above this
const MAX_TIMER_MS = 2_147_483_647;

let nextSessionId = 1;
let nextOperationId = 1;

/**
 * Everything a session is built from
 */
export interface SessionInit {
  settings: NetworkSettings;
  agentOptions: Agent.Options;
  cache: CachePolicySource;
  dispatcher: Dispatcher;
  /** Whether close() also closes the dispatcher */
  ownsDispatcher: boolean;
  /** Present when the settings ask for cookies */
  cookieJar?: CookieJar;
}

interface ExchangeResult {
  statusCode: number;
  headers: Record<string, string>;
  body: Buffer;
  notModified: boolean;
}

/**
 * Check whether an error means the network was unreachable
 */
export function isConnectivityError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string' && CONNECTIVITY_ERROR_CODES.has(current.code)) {
      return true;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}

/**
 * Split raw undici headers into a record and the Set-Cookie values
 */
export function parseResponseHeaders(raw: Buffer[] | string[] | null): {
  headers: Record<string, string>;
  setCookies: string[];
} {
  const headers: Record<string, string> = {};
  const setCookies: string[] = [];
  if (!raw) return { headers, setCookies };

  for (let i = 0; i + 1 < raw.length; i += 2) {
    const name = raw[i].toString().toLowerCase();
    const value = raw[i + 1].toString();
    if (name === 'set-cookie') {
      setCookies.push(value);
    }
    headers[name] = name in headers ? `${headers[name]}, ${value}` : value;
  }
  return { headers, setCookies };
}

class SessionDataOperation implements DataOperation {
  private started = false;
  private abortExchange: ((error: Error) => void) | undefined;
  cancelled = false;

  constructor(
    readonly id: number,
    readonly request: TransportRequest,
    readonly sessionId: number,
    private readonly start: (operation: SessionDataOperation) => void
  ) {}

  resume(): void {
    if (this.started) return;
    this.started = true;
    this.start(this);
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.abortExchange?.(new OperationCancelledError());
  }

  /**
   * Set while an exchange is on the wire
   */
  bindAbort(abort: ((error: Error) => void) | undefined): void {
    this.abortExchange = abort;
  }
}

export class Session {
  readonly id: number = nextSessionId++;
  readonly settings: NetworkSettings;
  readonly agentOptions: Agent.Options;
  readonly store: ResponseCacheStore;
  readonly dispatcher: Dispatcher;

  private readonly ownsDispatcher: boolean;
  private readonly cookieJar: CookieJar | undefined;
  private readonly cacheLayer: ProtocolCacheLayer;
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(init: SessionInit) {
    this.settings = init.settings;
    this.agentOptions = init.agentOptions;
    this.store = init.cache.store;
    this.dispatcher = init.dispatcher;
    this.ownsDispatcher = init.ownsDispatcher;
    this.cookieJar = init.cookieJar;
    this.cacheLayer = new ProtocolCacheLayer(init.cache.store, init.cache);
  }

  /**
   * Number of operations started and not yet completed
   */
  get inFlight(): number {
    return this.active;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Create an operation for a request. Nothing is sent until resume().
   */
  dataOperation(request: TransportRequest, delegate: SessionDelegate): DataOperation {
    if (this.closed) {
      throw new Error(`Session ${this.id} has been closed`);
    }
    return new SessionDataOperation(nextOperationId++, request, this.id, (operation) => {
      this.active++;
      this.run(operation, delegate).catch((error: unknown) => {
        log.error({ err: error, operationId: operation.id }, 'Session delegate threw');
      });
    });
  }

  /**
   * Resolves once no operation is in flight
   */
  whenIdle(): Promise<void> {
    if (this.active === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Close the session. An owned agent waits for its pending requests.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    log.debug({ sessionId: this.id, owned: this.ownsDispatcher }, 'Closing session');
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async run(operation: SessionDataOperation, delegate: SessionDelegate): Promise<void> {
    let failure: Error | undefined;
    try {
      await this.execute(operation, delegate);
    } catch (error) {
      failure = error instanceof Error ? error : new Error(String(error));
    } finally {
      this.active--;
    }

    try {
      delegate.didComplete(operation, failure);
    } finally {
      if (this.active === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }

  private async execute(operation: SessionDataOperation, delegate: SessionDelegate): Promise<void> {
    const { request } = operation;
    const cacheRequest: CacheableRequest = {
      method: request.method,
      url: request.url,
      headers: request.headers,
    };

    const plan = await this.cacheLayer.plan(cacheRequest, request.cacheDirective);
    log.debug(
      { operationId: operation.id, directive: request.cacheDirective, plan: plan.kind },
      'Cache plan'
    );

    if (plan.kind === 'hit') {
      this.deliver(operation, delegate, plan.entry);
      return;
    }
    if (plan.kind === 'miss') {
      throw new CacheMissError(request.url);
    }

    if (operation.cancelled) {
      throw new OperationCancelledError();
    }

    const headers = this.composeHeaders(request, plan.revalidate);
    const response = await this.exchangeWithRetry(operation, delegate, headers, plan.revalidate !== undefined);

    if (response.notModified && plan.revalidate) {
      const refreshed = await this.cacheLayer.refresh(cacheRequest, plan.revalidate, response.headers);
      this.deliver(operation, delegate, refreshed);
      return;
    }

    if (plan.write) {
      try {
        await this.cacheLayer.write(cacheRequest, response.statusCode, response.headers, response.body);
      } catch (error) {
        log.warn({ err: error, url: request.url }, 'Failed to write response to cache');
      }
    }
  }

  private composeHeaders(
    request: TransportRequest,
    revalidate: CachedResponse | undefined
  ): Record<string, string> {
    const headers = normalizeHeaders({ ...this.settings.additionalHeaders });
    Object.assign(headers, normalizeHeaders(request.headers));

    if (this.cookieJar && headers['cookie'] === undefined) {
      const cookie = this.cookieJar.cookieHeader(request.url);
      if (cookie) headers['cookie'] = cookie;
    }
    if (revalidate) {
      Object.assign(headers, this.cacheLayer.conditionalHeaders(revalidate));
    }
    return headers;
  }

  private deliver(operation: DataOperation, delegate: SessionDelegate, entry: CachedResponse): void {
    delegate.didReceiveResponse?.(operation, entry.statusCode, entry.headers);
    if (entry.body.length > 0) {
      delegate.didReceiveData(operation, entry.body);
    }
  }

  private resourceTimeoutMs(): number {
    return this.settings.resourceTimeoutMs > 0 ? this.settings.resourceTimeoutMs : MAX_TIMER_MS;
  }

  private async exchangeWithRetry(
    operation: SessionDataOperation,
    delegate: SessionDelegate,
    headers: Record<string, string>,
    revalidating: boolean
  ): Promise<ExchangeResult> {
    const deadline = Date.now() + this.resourceTimeoutMs();

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.exchange(operation, delegate, headers, revalidating, deadline);
      } catch (error) {
        if (operation.cancelled || !this.settings.waitsForConnectivity || !isConnectivityError(error)) {
          throw error;
        }
        if (Date.now() + CONNECTIVITY_RETRY_DELAY_MS >= deadline) {
          throw error;
        }
        log.debug({ operationId: operation.id, attempt }, 'Waiting for connectivity');
        await delay(CONNECTIVITY_RETRY_DELAY_MS);
      }
    }
  }

  private exchange(
    operation: SessionDataOperation,
    delegate: SessionDelegate,
    headers: Record<string, string>,
    revalidating: boolean,
    deadline: number
  ): Promise<ExchangeResult> {
    const { request } = operation;
    const url = new URL(request.url);

    return new Promise<ExchangeResult>((resolve, reject) => {
      let statusCode = 0;
      let responseHeaders: Record<string, string> = {};
      const chunks: Buffer[] = [];
      let notModified = false;
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (complete: () => void): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        operation.bindAbort(undefined);
        complete();
      };

      const handler: Dispatcher.DispatchHandlers = {
        onConnect: (abort) => {
          operation.bindAbort(abort);
          if (operation.cancelled) {
            abort(new OperationCancelledError());
            return;
          }
          if (timer) clearTimeout(timer);
          const remaining = deadline - Date.now();
          const timeoutError = new ResourceTimeoutError(this.settings.resourceTimeoutMs);
          if (remaining <= 0) {
            abort(timeoutError);
            return;
          }
          timer = setTimeout(() => abort(timeoutError), Math.min(remaining, MAX_TIMER_MS));
          timer.unref();
        },
        onHeaders: (status, rawHeaders) => {
          if (settled) return false;
          statusCode = status;
          const parsed = parseResponseHeaders(rawHeaders);
          responseHeaders = parsed.headers;

          if (this.cookieJar && parsed.setCookies.length > 0) {
            this.cookieJar.setCookies(request.url, parsed.setCookies);
          }
          if (status === 304 && revalidating) {
            notModified = true;
            return true;
          }
          delegate.didReceiveResponse?.(operation, status, responseHeaders);
          return true;
        },
        onData: (chunk) => {
          if (settled) return false;
          if (!notModified) {
            chunks.push(chunk);
            delegate.didReceiveData(operation, chunk);
          }
          return true;
        },
        onComplete: () => {
          settle(() =>
            resolve({
              statusCode,
              headers: responseHeaders,
              body: Buffer.concat(chunks),
              notModified,
            })
          );
        },
        onError: (error) => {
          settle(() => reject(error));
        },
      };

      log.debug(
        { operationId: operation.id, sessionId: this.id, method: request.method, url: request.url },
        'Dispatching request'
      );

      try {
        this.dispatcher.dispatch(
          {
            origin: url.origin,
            path: `${url.pathname}${url.search}`,
            method: request.method,
            headers,
            body: request.body,
          },
          handler
        );
      } catch (error) {
        settle(() => reject(error));
      }
    });
  }
}
