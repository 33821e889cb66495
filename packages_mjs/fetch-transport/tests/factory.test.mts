/**
 * Tests for the session factory
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Agent, MockAgent } from 'undici';
import { MemoryResponseCacheStore } from '@flagwire/response-cache';
import { CacheConfig, NetworkConfig } from '../src/config.mjs';
import { createSession, toAgentOptions, DEFAULT_TRANSPORT_TIMEOUT_MS } from '../src/factory.mjs';
import { CookieJar } from '../src/cookie-jar.mjs';
import { ORIGIN, getRequest, headersOf, runOperation } from './helpers.mjs';

describe('toAgentOptions', () => {
  it('should map settings onto agent options', () => {
    const settings = new NetworkConfig({
      requestTimeoutMs: 2500,
      maxConnectionsPerHost: 3,
      usePipelining: true,
    }).snapshot();

    expect(toAgentOptions(settings)).toEqual({
      connections: 3,
      pipelining: 10,
      headersTimeout: 2500,
      bodyTimeout: 2500,
    });
  });

  it('should disable pipelining', () => {
    const settings = new NetworkConfig({ usePipelining: false }).snapshot();
    expect(toAgentOptions(settings).pipelining).toBe(1);
  });

  it('should fall back to the transport default for non-positive timeouts', () => {
    const settings = new NetworkConfig({ requestTimeoutMs: 0, maxConnectionsPerHost: 0 }).snapshot();
    const options = toAgentOptions(settings);

    expect(options.headersTimeout).toBe(DEFAULT_TRANSPORT_TIMEOUT_MS);
    expect(options.bodyTimeout).toBe(DEFAULT_TRANSPORT_TIMEOUT_MS);
    expect(options.connections).toBeNull();
  });
});

describe('createSession', () => {
  let mockAgent: MockAgent;
  let cache: CacheConfig;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    cache = new CacheConfig({ store: new MemoryResponseCacheStore() });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it('should record the exact configured values', () => {
    const network = new NetworkConfig({
      requestTimeoutMs: -1,
      resourceTimeoutMs: 0,
      maxConnectionsPerHost: 4,
      additionalHeaders: { 'X-Client': 'test' },
    });
    const session = createSession(network, cache, { dispatcher: mockAgent });

    expect(session.settings.requestTimeoutMs).toBe(-1);
    expect(session.settings.resourceTimeoutMs).toBe(0);
    expect(session.settings.additionalHeaders).toEqual({ 'X-Client': 'test' });
    expect(session.agentOptions.connections).toBe(4);
    expect(session.store).toBe(cache.store);
  });

  it('should build a new Agent when no dispatcher is given', async () => {
    const session = createSession(new NetworkConfig(), cache);

    expect(session.dispatcher).toBeInstanceOf(Agent);
    await session.close();
    expect(session.isClosed).toBe(true);
  });

  it('should give every session a new identity', () => {
    const network = new NetworkConfig();
    const first = createSession(network, cache, { dispatcher: mockAgent });
    const second = createSession(network, cache, { dispatcher: mockAgent });

    expect(second.id).not.toBe(first.id);
  });

  it('should leave a caller-supplied dispatcher open', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/ping', method: 'GET' }).reply(200, 'pong');

    const first = createSession(new NetworkConfig(), cache, { dispatcher: mockAgent });
    await first.close();

    const second = createSession(new NetworkConfig(), cache, { dispatcher: mockAgent });
    const outcome = await runOperation(second, getRequest('/ping'));

    expect(outcome.error).toBeUndefined();
    expect(outcome.body).toBe('pong');
  });

  it('should send cookies only when the settings ask for them', async () => {
    const jar = new CookieJar();
    jar.setCookies(`${ORIGIN}/`, ['session=abc']);
    let sent: Record<string, string> = {};

    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/flags', method: 'GET' })
      .reply(200, (opts) => {
        sent = headersOf(opts.headers);
        return '[]';
      })
      .times(2);

    const withCookies = createSession(new NetworkConfig(), cache, { dispatcher: mockAgent, cookieJar: jar });
    await runOperation(withCookies, getRequest('/flags'));
    expect(sent['cookie']).toBe('session=abc');

    const withoutCookies = createSession(new NetworkConfig({ shouldSetCookies: false }), cache, {
      dispatcher: mockAgent,
      cookieJar: jar,
    });
    await runOperation(withoutCookies, getRequest('/flags'));
    expect(sent['cookie']).toBeUndefined();
  });
});
