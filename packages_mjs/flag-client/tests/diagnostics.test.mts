/**
 * Tests for diagnostics channel events
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  emitCachePolicy,
  emitRequestEnd,
  emitRequestError,
  emitRequestStart,
  onAllEvents,
  onCachePolicy,
  onRequestEnd,
} from '../src/diagnostics.mjs';
import type { DiagnosticsEvent } from '../src/types.mjs';

describe('diagnostics', () => {
  const unsubscribes: Array<() => void> = [];

  afterEach(() => {
    for (const unsubscribe of unsubscribes.splice(0)) unsubscribe();
  });

  it('should publish request end events with response details', () => {
    const events: DiagnosticsEvent[] = [];
    unsubscribes.push(onRequestEnd((event) => events.push(event)));

    emitRequestEnd(4, 'GET', 'https://api.test/flags/', 200, 12, 30);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      name: 'request:end',
      operationId: 4,
      duration: 30,
      request: { method: 'GET', url: 'https://api.test/flags/' },
      response: { status: 200, bytes: 12 },
    });
  });

  it('should publish cache policy decisions', () => {
    const events: DiagnosticsEvent[] = [];
    unsubscribes.push(onCachePolicy((event) => events.push(event)));

    emitCachePolicy('GET', 'https://api.test/flags/', 'reload', 'stale', true);

    expect(events[0]?.cache).toEqual({ directive: 'reload', reason: 'stale', evicted: true });
  });

  it('should deliver every event kind to onAllEvents', () => {
    const names: string[] = [];
    unsubscribes.push(onAllEvents((event) => names.push(event.name)));

    emitCachePolicy('GET', 'https://api.test/flags/', 'default', 'absent', false);
    emitRequestStart(1, 'GET', 'https://api.test/flags/');
    emitRequestError('GET', 'https://api.test/flags/', new Error('reset'), 5, 1);
    emitRequestEnd(2, 'POST', 'https://api.test/identities/', 200, 0, 8);

    expect(names).toEqual(['cache:policy', 'request:start', 'request:error', 'request:end']);
  });

  it('should stop delivering after unsubscribe', () => {
    const events: DiagnosticsEvent[] = [];
    const unsubscribe = onRequestEnd((event) => events.push(event));

    unsubscribe();
    emitRequestEnd(1, 'GET', 'https://api.test/flags/', 200, 0, 1);

    expect(events).toEqual([]);
  });
});
