/**
 * Tests for the realtime update stream
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent } from 'undici';
import { MemoryResponseCacheStore } from '@flagwire/response-cache';
import { CacheConfig, NetworkConfig, createSession } from '@flagwire/fetch-transport';
import { DecodeError, RequestBuildError, UnhandledTransportError } from '../src/errors.mjs';
import type { RealtimeUpdate } from '../src/schemas.mjs';
import { RealtimeStream, realtimeStreamUrl, type RealtimeStreamOptions } from '../src/streaming/realtime-stream.mjs';
import type { Result } from '../src/types.mjs';

const REALTIME_ORIGIN = 'https://realtime.test';
const STREAM_PATH = '/sse/environments/test-key/stream';

describe('realtimeStreamUrl', () => {
  it('should place the encoded key under the realtime URL', () => {
    expect(realtimeStreamUrl('https://realtime.test', 'key/with space')).toBe(
      'https://realtime.test/sse/environments/key%2Fwith%20space/stream'
    );
  });

  it('should reject an invalid realtime URL', () => {
    expect(() => realtimeStreamUrl('::', 'test-key')).toThrow(RequestBuildError);
  });
});

describe('RealtimeStream', () => {
  let mockAgent: MockAgent;
  let network: NetworkConfig;
  let cache: CacheConfig;
  let stream: RealtimeStream;
  let results: Array<Result<RealtimeUpdate>>;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    network = new NetworkConfig({ waitsForConnectivity: false });
    cache = new CacheConfig({ store: new MemoryResponseCacheStore() });
    results = [];
  });

  afterEach(async () => {
    await stream.close();
    await mockAgent.close();
  });

  const createStream = (overrides: Partial<RealtimeStreamOptions> = {}): RealtimeStream =>
    new RealtimeStream(network, cache, {
      apiKey: 'test-key',
      realtimeUrl: `${REALTIME_ORIGIN}/`,
      dispatcher: mockAgent,
      ...overrides,
    });

  const streamReply = () =>
    mockAgent.get(REALTIME_ORIGIN).intercept({
      path: STREAM_PATH,
      method: 'GET',
      headers: { accept: 'text/event-stream', 'x-environment-key': 'test-key' },
    });

  it('should report each update until the stream ends', async () => {
    streamReply().reply(
      200,
      'data: {"updated_at": 1700000000}\n\n: ping\n\ndata: {"updated_at": 1700000100}\n\n',
      { headers: { 'content-type': 'text/event-stream' } }
    );
    stream = createStream();

    stream.start((result) => results.push(result));
    expect(stream.isRunning).toBe(true);

    await vi.waitFor(() => expect(stream.isRunning).toBe(false));
    expect(results).toEqual([
      { ok: true, value: { updatedAt: 1700000000 } },
      { ok: true, value: { updatedAt: 1700000100 } },
    ]);
  });

  it('should report undecodable events and keep going', async () => {
    streamReply().reply(200, 'data: nope\n\ndata: {"updated_at": 5}');
    stream = createStream();

    stream.start((result) => results.push(result));
    await vi.waitFor(() => expect(stream.isRunning).toBe(false));

    expect(results).toHaveLength(2);
    expect(results[0]?.ok === false && results[0].error).toBeInstanceOf(DecodeError);
    expect(results[1]).toEqual({ ok: true, value: { updatedAt: 5 } });
  });

  it('should report a non-2xx response as a terminal error', async () => {
    streamReply().reply(401, 'data: {"updated_at": 1}\n\n');
    stream = createStream();

    stream.start((result) => results.push(result));
    await vi.waitFor(() => expect(results).toHaveLength(1));

    const [result] = results;
    expect(result?.ok === false && result.error).toBeInstanceOf(UnhandledTransportError);
    expect(result?.ok === false && result.error.message).toBe(
      'Request failed: Realtime stream responded with status 401'
    );
  });

  it('should report transport failures with the native cause', async () => {
    const failure = new Error('connection reset');
    streamReply().replyWithError(failure);
    stream = createStream();

    stream.start((result) => results.push(result));
    await vi.waitFor(() => expect(results).toHaveLength(1));

    expect(results[0]?.ok === false && results[0].error.cause).toBe(failure);
  });

  it('should report nothing after stop', async () => {
    streamReply().reply(200, 'data: {"updated_at": 1}\n\n').delay(20);
    stream = createStream();

    stream.start((result) => results.push(result));
    stream.stop();
    expect(stream.isRunning).toBe(false);

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(results).toEqual([]);
  });

  it('should report an invalid realtime URL to the listener', () => {
    stream = createStream({ realtimeUrl: '::' });

    stream.start((result) => results.push(result));

    expect(stream.isRunning).toBe(false);
    expect(results[0]?.ok === false && results[0].error).toBeInstanceOf(RequestBuildError);
  });

  it('should rebuild its session only when the network config changes', () => {
    const factory = vi.fn(createSession);
    stream = createStream({ createSession: factory });

    stream.start((result) => results.push(result));
    stream.stop();
    stream.start((result) => results.push(result));
    stream.stop();
    expect(factory).toHaveBeenCalledTimes(1);

    network.requestTimeoutMs = 1_000;
    stream.start((result) => results.push(result));
    stream.stop();
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
