import { describe, it, expect, vi, afterEach } from 'vitest';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';

afterEach(() => {
  vi.useRealTimers();
});

describe('InMemCache', () => {
  it('expires string keys after their TTL', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    const cache = new InMemCache();

    await cache.set('k', 'v', { ttlSeconds: 10 });
    vi.setSystemTime(new Date('2026-03-01T12:00:09.999Z'));
    expect(await cache.get('k')).toBe('v');

    vi.setSystemTime(new Date('2026-03-01T12:00:10.000Z'));
    expect(await cache.get('k')).toBeNull();
  });

  it('keeps keys without TTL', async () => {
    const cache = new InMemCache();
    await cache.set('k', 'v');
    expect(await cache.get('k')).toBe('v');
  });

  it('treats sets as idempotent and expiring', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    const cache = new InMemCache();

    await cache.sadd('s', 'a', { ttlSeconds: 5 });
    await cache.sadd('s', 'a', { ttlSeconds: 5 });
    await cache.sadd('s', 'b');
    expect(await cache.smembers('s')).toEqual(['a', 'b']);

    await cache.srem('s', 'a');
    expect(await cache.smembers('s')).toEqual(['b']);

    vi.setSystemTime(new Date('2026-03-01T12:00:05.000Z'));
    expect(await cache.smembers('s')).toEqual([]);
  });

  it('del removes strings and sets alike', async () => {
    const cache = new InMemCache();
    await cache.set('k', 'v');
    await cache.sadd('s', 'a');

    await cache.del('k');
    await cache.del('s');

    expect(await cache.get('k')).toBeNull();
    expect(await cache.smembers('s')).toEqual([]);
  });
});
