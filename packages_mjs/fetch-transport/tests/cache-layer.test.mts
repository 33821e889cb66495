/**
 * Tests for the protocol cache layer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryResponseCacheStore, formatHttpDate, type CachedResponse } from '@flagwire/response-cache';
import { ProtocolCacheLayer } from '../src/cache-layer.mjs';
import { CacheConfig } from '../src/config.mjs';

const NOW = Date.UTC(2026, 0, 1, 12, 0, 0);
const request = { method: 'GET', url: 'https://api.test/flags/', headers: { accept: 'application/json' } };

describe('ProtocolCacheLayer', () => {
  let store: MemoryResponseCacheStore;
  let policy: CacheConfig;
  let layer: ProtocolCacheLayer;

  beforeEach(() => {
    store = new MemoryResponseCacheStore();
    policy = new CacheConfig({ store, useCache: true, cacheTtlMs: 120_000 });
    layer = new ProtocolCacheLayer(store, policy);
  });

  const entry = (headers: Record<string, string>): CachedResponse => ({
    url: request.url,
    method: 'GET',
    statusCode: 200,
    headers,
    body: Buffer.from('[]'),
    storedAt: NOW,
  });

  describe('plan', () => {
    it('should bypass the cache for no-store', async () => {
      await store.store(request, entry({}));
      expect(await layer.plan(request, 'no-store', NOW)).toEqual({ kind: 'network', write: false });
    });

    it('should skip the read for reload', async () => {
      await store.store(request, entry({}));
      expect(await layer.plan(request, 'reload', NOW)).toEqual({ kind: 'network', write: true });
    });

    it('should serve any stored entry for force-cache', async () => {
      const stored = entry({ 'cache-control': 'max-age=0' });
      await store.store(request, stored);
      expect(await layer.plan(request, 'force-cache', NOW)).toEqual({ kind: 'hit', entry: stored });
    });

    it('should go to the network for force-cache without an entry', async () => {
      expect(await layer.plan(request, 'force-cache', NOW)).toEqual({ kind: 'network', write: true });
    });

    it('should report a miss for only-if-cached without an entry', async () => {
      expect(await layer.plan(request, 'only-if-cached', NOW)).toEqual({ kind: 'miss' });
    });

    it('should serve a fresh entry for default', async () => {
      const stored = entry({ 'cache-control': 'max-age=60', date: formatHttpDate(NOW - 10_000) });
      await store.store(request, stored);
      expect(await layer.plan(request, 'default', NOW)).toEqual({ kind: 'hit', entry: stored });
    });

    it('should revalidate a stale entry for default', async () => {
      const stored = entry({ 'cache-control': 'max-age=60', date: formatHttpDate(NOW - 90_000) });
      await store.store(request, stored);
      expect(await layer.plan(request, 'default', NOW)).toEqual({
        kind: 'network',
        write: true,
        revalidate: stored,
      });
    });

    it('should revalidate a no-cache entry for default', async () => {
      const stored = entry({ 'cache-control': 'no-cache, max-age=60', date: formatHttpDate(NOW) });
      await store.store(request, stored);
      expect((await layer.plan(request, 'default', NOW)).kind).toBe('network');
    });
  });

  describe('conditionalHeaders', () => {
    it('should send the stored validators', () => {
      const stored = entry({ etag: ' "v1" ', 'last-modified': 'Wed, 31 Dec 2025 12:00:00 GMT' });
      expect(layer.conditionalHeaders(stored)).toEqual({
        'if-none-match': '"v1"',
        'if-modified-since': 'Wed, 31 Dec 2025 12:00:00 GMT',
      });
    });

    it('should send nothing without validators', () => {
      expect(layer.conditionalHeaders(entry({}))).toEqual({});
    });
  });

  describe('write', () => {
    it('should store with the configured TTL', async () => {
      const written = await layer.write(
        request,
        200,
        { 'cache-control': 'max-age=5', date: 'Thu, 01 Jan 2026 12:00:00 GMT' },
        Buffer.from('[1]'),
        NOW
      );

      expect(written).toBe(true);
      const stored = await store.lookup(request);
      expect(stored?.headers).toEqual({ 'cache-control': 'max-age=120', date: 'Thu, 01 Jan 2026 12:00:00 GMT' });
      expect(stored?.body.toString()).toBe('[1]');
      expect(stored?.storedAt).toBe(NOW);
    });

    it('should add a Date of the receive time when the response has none', async () => {
      await layer.write(request, 200, { 'content-type': 'application/json' }, Buffer.from('[]'), NOW);

      expect((await store.lookup(request))?.headers).toEqual({
        'content-type': 'application/json',
        date: formatHttpDate(NOW),
        'cache-control': 'max-age=120',
      });
    });

    it('should not store when caching is off', async () => {
      policy.useCache = false;
      expect(await layer.write(request, 200, {}, Buffer.from('[]'), NOW)).toBe(false);
      expect(await store.size()).toBe(0);
    });

    it('should not store POST responses', async () => {
      const post = { ...request, method: 'POST' };
      expect(await layer.write(post, 200, {}, Buffer.from('{}'), NOW)).toBe(false);
    });

    it('should not store uncacheable statuses', async () => {
      expect(await layer.write(request, 500, {}, Buffer.from(''), NOW)).toBe(false);
    });

    it('should not store no-store responses', async () => {
      expect(await layer.write(request, 200, { 'cache-control': 'no-store' }, Buffer.from('[]'), NOW)).toBe(false);
    });
  });

  describe('refresh', () => {
    it('should merge the 304 headers and keep the stored body', async () => {
      const stored = entry({ etag: '"v1"', 'content-length': '2', date: formatHttpDate(NOW - 90_000) });
      await store.store(request, stored);

      const refreshed = await layer.refresh(
        request,
        stored,
        { date: formatHttpDate(NOW), 'content-length': '0', etag: '"v1"' },
        NOW
      );

      expect(refreshed.headers).toEqual({
        etag: '"v1"',
        'content-length': '2',
        date: formatHttpDate(NOW),
        'cache-control': 'max-age=120',
      });
      expect(refreshed.body.toString()).toBe('[]');
      expect(refreshed.storedAt).toBe(NOW);
      expect(await store.lookup(request)).toEqual(refreshed);
    });

    it('should date a refreshed entry that never had a Date', async () => {
      const stored = entry({ etag: '"v1"' });
      await store.store(request, stored);

      const refreshed = await layer.refresh(request, stored, { etag: '"v1"' }, NOW);

      expect(refreshed.headers).toEqual({
        etag: '"v1"',
        date: formatHttpDate(NOW),
        'cache-control': 'max-age=120',
      });
    });

    it('should leave the store alone when caching is off', async () => {
      policy.useCache = false;
      const stored = entry({ etag: '"v1"' });

      const refreshed = await layer.refresh(request, stored, { etag: '"v2"' }, NOW);

      expect(refreshed.headers).toEqual({ etag: '"v2"' });
      expect(await store.size()).toBe(0);
    });
  });
});
