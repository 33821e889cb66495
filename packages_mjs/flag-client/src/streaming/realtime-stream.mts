/**
 * Realtime flag update stream
 *
 * Holds one long-lived SSE request on its own session, built by the same
 * factory and from the same NetworkConfig as the API client's sessions.
 */
import {
  createSession,
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
import type { Dispatcher } from 'undici';
import { RequestBuildError, UnhandledTransportError, toFlagClientError } from '../errors.mjs';
import { logger } from '../logger.mjs';
import { realtimeUpdateDecoder } from '../core/decoder.mjs';
import { ENVIRONMENT_KEY_HEADER } from '../core/request-builder.mjs';
import type { RealtimeUpdate } from '../schemas.mjs';
import type { Completion } from '../types.mjs';
import { SSEParser, type SSEEvent } from './sse-reader.mjs';

export const DEFAULT_REALTIME_URL = 'https://realtime.flagwire.io/';

export interface RealtimeStreamOptions {
  apiKey: string;
  /** Default: https://realtime.flagwire.io/ */
  realtimeUrl?: string;
  createSession?: SessionFactory;
  /** Caller-owned dispatcher; never closed by the stream */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * URL of the environment's event stream
 */
export function realtimeStreamUrl(realtimeUrl: string, apiKey: string): string {
  let base: URL;
  try {
    base = new URL(realtimeUrl.endsWith('/') ? realtimeUrl : `${realtimeUrl}/`);
  } catch (error) {
    throw new RequestBuildError(`Invalid realtime URL: ${realtimeUrl}`, { cause: error });
  }
  return new URL(`sse/environments/${encodeURIComponent(apiKey)}/stream`, base).toString();
}

export class RealtimeStream implements SessionDelegate {
  private session: Session | undefined;
  private fingerprint: string | undefined;
  private operation: DataOperation | undefined;
  private listener: Completion<RealtimeUpdate> | undefined;
  private parser = new SSEParser();
  private statusCode = 0;

  private readonly apiKey: string;
  private readonly realtimeUrl: string;
  private readonly sessionFactory: SessionFactory;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly log: Logger;

  constructor(
    private readonly network: NetworkSettingsSource,
    private readonly cache: CachePolicySource,
    options: RealtimeStreamOptions
  ) {
    this.apiKey = options.apiKey;
    this.realtimeUrl = options.realtimeUrl ?? DEFAULT_REALTIME_URL;
    this.sessionFactory = options.createSession ?? createSession;
    this.dispatcher = options.dispatcher;
    this.log = (options.logger ?? logger).child({ component: 'realtime' });
  }

  get isRunning(): boolean {
    return this.operation !== undefined;
  }

  /**
   * Open the stream; each update or a terminal error goes to onEvent.
   * A running stream is stopped first.
   */
  start(onEvent: Completion<RealtimeUpdate>): void {
    this.stop();

    let url: string;
    try {
      url = realtimeStreamUrl(this.realtimeUrl, this.apiKey);
    } catch (error) {
      onEvent({ ok: false, error: toFlagClientError(error) });
      return;
    }

    const request: TransportRequest = {
      url,
      method: 'GET',
      headers: {
        Accept: 'text/event-stream',
        [ENVIRONMENT_KEY_HEADER]: this.apiKey,
      },
      cacheDirective: 'no-store',
    };

    const session = this.acquireSession();
    this.listener = onEvent;
    this.parser = new SSEParser();
    this.statusCode = 0;
    this.operation = session.dataOperation(request, this);
    this.log.debug({ operationId: this.operation.id, sessionId: session.id }, 'Realtime stream starting');
    this.operation.resume();
  }

  /**
   * Abort the stream. Nothing is reported afterwards.
   */
  stop(): void {
    const operation = this.operation;
    this.operation = undefined;
    this.listener = undefined;
    if (operation) {
      this.log.debug({ operationId: operation.id }, 'Realtime stream stopped');
      operation.cancel();
    }
  }

  /**
   * Stop and close the stream's session
   */
  async close(): Promise<void> {
    this.stop();
    const session = this.session;
    this.session = undefined;
    this.fingerprint = undefined;
    if (session) {
      await session.whenIdle();
      await session.close();
    }
  }

  didReceiveResponse(operation: DataOperation, statusCode: number): void {
    if (operation !== this.operation) return;
    this.statusCode = statusCode;
  }

  didReceiveData(operation: DataOperation, chunk: Buffer): void {
    if (operation !== this.operation || !this.isSuccessStatus()) return;
    for (const event of this.parser.push(chunk)) {
      this.report(event);
    }
  }

  didComplete(operation: DataOperation, error?: Error): void {
    if (operation !== this.operation) return;

    if (!error && this.isSuccessStatus()) {
      for (const event of this.parser.flush()) {
        this.report(event);
      }
    }

    const listener = this.listener;
    this.operation = undefined;
    this.listener = undefined;

    if (error) {
      listener?.({ ok: false, error: new UnhandledTransportError(error) });
    } else if (!this.isSuccessStatus()) {
      listener?.({
        ok: false,
        error: new UnhandledTransportError(new Error(`Realtime stream responded with status ${this.statusCode}`)),
      });
    } else {
      this.log.debug({ operationId: operation.id }, 'Realtime stream ended');
    }
  }

  private isSuccessStatus(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  private report(event: SSEEvent): void {
    if (!event.data) return;
    try {
      const update = realtimeUpdateDecoder.decode(Buffer.from(event.data));
      this.listener?.({ ok: true, value: update });
    } catch (error) {
      this.listener?.({ ok: false, error: toFlagClientError(error) });
    }
  }

  private acquireSession(): Session {
    const fingerprint = networkFingerprint(this.network.snapshot());
    const current = this.session;
    if (current && !current.isClosed && fingerprint === this.fingerprint) {
      return current;
    }

    const next = this.sessionFactory(this.network, this.cache, { dispatcher: this.dispatcher });
    this.session = next;
    this.fingerprint = networkFingerprint(next.settings);
    this.log.debug({ sessionId: next.id, previousSessionId: current?.id }, 'Realtime session rebuilt');

    if (current) {
      current
        .whenIdle()
        .then(() => current.close())
        .catch((error: unknown) => {
          this.log.warn({ err: error, sessionId: current.id }, 'Failed to close replaced realtime session');
        });
    }
    return next;
  }
}
