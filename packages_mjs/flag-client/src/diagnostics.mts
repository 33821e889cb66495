/**
 * Diagnostics for @flagwire/flag-client
 *
 * Uses Node.js diagnostics_channel for emitting request and cache events.
 */
import diagnostics_channel, { type Channel } from 'node:diagnostics_channel';
import type { CacheDirective, HttpMethod } from '@flagwire/fetch-transport';
import type { DiagnosticsEvent } from './types.mjs';

/**
 * Channel names
 */
export const CHANNELS = {
  REQUEST_START: 'flagwire:request:start',
  REQUEST_END: 'flagwire:request:end',
  REQUEST_ERROR: 'flagwire:request:error',
  CACHE_POLICY: 'flagwire:cache:policy',
} as const;

function getChannel(name: string): Channel {
  return diagnostics_channel.channel(name);
}

function isDiagnosticsEvent(message: unknown): message is DiagnosticsEvent {
  return typeof message === 'object' && message !== null && 'name' in message && 'request' in message;
}

function publish(name: string, event: DiagnosticsEvent): void {
  const channel = getChannel(name);
  if (channel.hasSubscribers) {
    channel.publish(event);
  }
}

/**
 * Emit request start event
 */
export function emitRequestStart(operationId: number, method: HttpMethod, url: string): void {
  publish(CHANNELS.REQUEST_START, {
    name: 'request:start',
    timestamp: Date.now(),
    operationId,
    request: { method, url },
  });
}

/**
 * Emit request end event
 */
export function emitRequestEnd(
  operationId: number,
  method: HttpMethod,
  url: string,
  status: number,
  bytes: number,
  duration: number
): void {
  publish(CHANNELS.REQUEST_END, {
    name: 'request:end',
    timestamp: Date.now(),
    operationId,
    duration,
    request: { method, url },
    response: { status, bytes },
  });
}

/**
 * Emit request error event
 */
export function emitRequestError(
  method: HttpMethod,
  url: string,
  error: Error,
  duration: number,
  operationId?: number
): void {
  publish(CHANNELS.REQUEST_ERROR, {
    name: 'request:error',
    timestamp: Date.now(),
    operationId,
    duration,
    request: { method, url },
    error,
  });
}

/**
 * Emit the cache policy chosen for a request
 */
export function emitCachePolicy(
  method: HttpMethod,
  url: string,
  directive: CacheDirective,
  reason: string,
  evicted: boolean
): void {
  publish(CHANNELS.CACHE_POLICY, {
    name: 'cache:policy',
    timestamp: Date.now(),
    request: { method, url },
    cache: { directive, reason, evicted },
  });
}

function subscribe(name: string, handler: (event: DiagnosticsEvent) => void): () => void {
  const channel = getChannel(name);
  const listener = (message: unknown): void => {
    if (isDiagnosticsEvent(message)) {
      handler(message);
    }
  };
  channel.subscribe(listener);
  return () => {
    channel.unsubscribe(listener);
  };
}

/**
 * Subscribe to request start events
 */
export function onRequestStart(handler: (event: DiagnosticsEvent) => void): () => void {
  return subscribe(CHANNELS.REQUEST_START, handler);
}

/**
 * Subscribe to request end events
 */
export function onRequestEnd(handler: (event: DiagnosticsEvent) => void): () => void {
  return subscribe(CHANNELS.REQUEST_END, handler);
}

/**
 * Subscribe to request error events
 */
export function onRequestError(handler: (event: DiagnosticsEvent) => void): () => void {
  return subscribe(CHANNELS.REQUEST_ERROR, handler);
}

/**
 * Subscribe to cache policy events
 */
export function onCachePolicy(handler: (event: DiagnosticsEvent) => void): () => void {
  return subscribe(CHANNELS.CACHE_POLICY, handler);
}

/**
 * Subscribe to all events
 */
export function onAllEvents(handler: (event: DiagnosticsEvent) => void): () => void {
  const unsubscribes = [
    onRequestStart(handler),
    onRequestEnd(handler),
    onRequestError(handler),
    onCachePolicy(handler),
  ];

  return () => {
    for (const unsubscribe of unsubscribes) {
      unsubscribe();
    }
  };
}
