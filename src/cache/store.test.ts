import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CacheStore } from './store.js';
import { MemoryCacheRepository } from './memory-repository.js';
import type { MediaMetadata } from './types.js';
import { CacheBackendError } from '../errors.js';

const HOUR = 60 * 60 * 1000;

const media = (overrides: Partial<MediaMetadata> = {}): MediaMetadata => ({
  query: 'aurora borealis',
  provider: 'nasa',
  mediaType: 'image',
  sourceUrl: 'https://images.example.test/aurora.jpg',
  fileSize: 2048,
  fileHash: 'abc123',
  ...overrides,
});

describe('CacheStore', () => {
  let clock: Date;
  let repo: MemoryCacheRepository;
  let store: CacheStore;

  beforeEach(() => {
    clock = new Date('2026-01-01T00:00:00.000Z');
    repo = new MemoryCacheRepository();
    store = new CacheStore(repo, { ttlMs: HOUR, now: () => clock });
  });

  it('returns null for an unknown key', async () => {
    expect(await store.lookup('media', 'missing')).toBeNull();
  });

  it('creates entries with zero uses and a TTL-based expiry', async () => {
    const entry = await store.put('media', 'k1', '/cache/media/k1.jpg', media());

    expect(entry.useCount).toBe(0);
    expect(entry.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    expect(entry.expiresAt.toISOString()).toBe('2026-01-01T01:00:00.000Z');
  });

  it('treats a repeat put as a touch and keeps the original payload', async () => {
    await store.put('media', 'k1', '/cache/media/first.jpg', media());
    clock = new Date('2026-01-01T00:10:00.000Z');

    const second = await store.put('media', 'k1', '/cache/media/second.jpg', media({ fileSize: 1 }));

    expect(second.useCount).toBe(1);
    expect(second.payloadRef).toBe('/cache/media/first.jpg');
    expect(second.metadata.fileSize).toBe(2048);
    expect(second.lastUsedAt.toISOString()).toBe('2026-01-01T00:10:00.000Z');
    expect(repo.size).toBe(1);
  });

  it('still serves an entry at exactly its expiry instant', async () => {
    await store.put('media', 'k1', '/cache/media/k1.jpg', media());
    clock = new Date('2026-01-01T01:00:00.000Z');

    expect(await store.lookup('media', 'k1')).not.toBeNull();
  });

  it('hides expired entries from lookup but keeps them until eviction', async () => {
    await store.put('media', 'k1', '/cache/media/k1.jpg', media());
    clock = new Date('2026-01-01T01:00:00.001Z');

    expect(await store.lookup('media', 'k1')).toBeNull();
    expect(repo.size).toBe(1);

    const touched = await store.touch('media', 'k1');
    expect(touched?.useCount).toBe(1);

    expect(await store.evictExpired()).toBe(1);
    expect(repo.size).toBe(0);
  });

  it('leaves live entries alone when evicting', async () => {
    await store.put('media', 'old', '/cache/media/old.jpg', media());
    clock = new Date('2026-01-01T00:30:00.000Z');
    await store.put('media', 'new', '/cache/media/new.jpg', media());
    clock = new Date('2026-01-01T01:15:00.000Z');

    expect(await store.evictExpired()).toBe(1);
    expect(repo.keys()).toEqual(['new']);
  });

  it('replaces an expired entry on put', async () => {
    await store.put('media', 'k1', '/cache/media/stale.jpg', media());
    clock = new Date('2026-01-02T00:00:00.000Z');

    const refreshed = await store.put('media', 'k1', '/cache/media/fresh.jpg', media());

    expect(refreshed.payloadRef).toBe('/cache/media/fresh.jpg');
    expect(refreshed.useCount).toBe(0);
    expect(refreshed.expiresAt.toISOString()).toBe('2026-01-02T01:00:00.000Z');
  });

  it('keeps kinds in separate key spaces', async () => {
    await store.put('script', 'shared', '/cache/scripts/shared.json', { provider: 'template', model: 'template', wordCount: 120 });

    expect(await store.lookup('media', 'shared')).toBeNull();
    const hit = await store.lookup('script', 'shared');
    expect(hit?.metadata.wordCount).toBe(120);
  });

  it('touches the winner when a concurrent writer inserted first', async () => {
    await repo.insertIfAbsent({
      kind: 'media',
      cacheKey: 'k1',
      payloadRef: '/cache/media/winner.jpg',
      metadata: media(),
      createdAt: clock.toISOString(),
      lastUsedAt: clock.toISOString(),
      useCount: 0,
      expiresAt: new Date(clock.getTime() + HOUR).toISOString(),
    });
    vi.spyOn(repo, 'find').mockResolvedValueOnce(null);

    const entry = await store.put('media', 'k1', '/cache/media/loser.jpg', media());

    expect(entry.payloadRef).toBe('/cache/media/winner.jpg');
    expect(entry.useCount).toBe(1);
  });

  it('reads a corrupt entry as a miss and overwrites it on the next put', async () => {
    await repo.replace({
      kind: 'transcript',
      cacheKey: 'bad',
      payloadRef: '/cache/transcripts/bad.json',
      metadata: { model: 'small' },
      createdAt: clock.toISOString(),
      lastUsedAt: clock.toISOString(),
      useCount: 0,
      expiresAt: new Date(clock.getTime() + HOUR).toISOString(),
    });

    expect(await store.lookup('transcript', 'bad')).toBeNull();

    const fixed = await store.put('transcript', 'bad', '/cache/transcripts/good.json', { model: 'small', durationSec: 42, segmentCount: 3 });
    expect(fixed.payloadRef).toBe('/cache/transcripts/good.json');
    expect((await store.lookup('transcript', 'bad'))?.metadata.durationSec).toBe(42);
  });

  it('wraps repository failures in CacheBackendError', async () => {
    vi.spyOn(repo, 'find').mockRejectedValueOnce(new Error('connection refused'));

    const err = await store.lookup('media', 'k1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CacheBackendError);
    expect(err).toHaveProperty('message', 'Cache lookup media failed: connection refused');
  });

  it('retries a dropped connection before giving up on the backend', async () => {
    const sleep = vi.fn(async () => undefined);
    const flaky = new CacheStore(repo, { ttlMs: HOUR, now: () => clock, backendRetryDelayMs: 10, sleep });
    const insert = vi.spyOn(repo, 'insertIfAbsent')
      .mockRejectedValueOnce(new TypeError('fetch failed', { cause: Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }) }));

    const entry = await flaky.put('script', 'k1', '/cache/scripts/k1.txt', { provider: 'openai', model: 'test-model', wordCount: 2 });

    expect(entry.payloadRef).toBe('/cache/scripts/k1.txt');
    expect(insert).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(repo.size).toBe(1);
  });

  it('reports the last connection error once every attempt has failed', async () => {
    const flaky = new CacheStore(repo, { ttlMs: HOUR, backendAttempts: 2, sleep: async () => undefined });
    const find = vi.spyOn(repo, 'find').mockRejectedValue(new TypeError('fetch failed'));

    const err = await flaky.lookup('media', 'k1').catch((e: unknown) => e);

    expect(find).toHaveBeenCalledTimes(2);
    expect(err).toBeInstanceOf(CacheBackendError);
    expect(err).toHaveProperty('message', 'Cache lookup media failed: fetch failed');
  });
});
