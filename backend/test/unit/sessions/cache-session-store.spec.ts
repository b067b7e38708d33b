import { describe, it, expect, vi } from 'vitest';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { logger } from '../../../src/shared/logger/logger';
import { Sha256TokenHasher } from '../../../src/shared/security/sha256-token-hasher';
import { CacheSessionStore } from '../../../src/modules/sessions';
import type { SessionToken } from '../../../src/modules/sessions';

const tokenHasher = new Sha256TokenHasher();

function setup() {
  const cache = new InMemCache();
  const store = new CacheSessionStore({ cache, tokenHasher, logger });
  return { cache, store };
}

function token(tokenId: string, username = 'alice'): SessionToken {
  return {
    tokenId,
    username,
    issuedAt: new Date('2026-03-01T12:00:00.000Z'),
    expiresAt: new Date('2026-03-01T13:00:00.000Z'),
  };
}

describe('CacheSessionStore', () => {
  it('round-trips a session token', async () => {
    const { store } = setup();
    await store.put(token('tok-1'));

    expect(await store.get('tok-1')).toEqual(token('tok-1'));
  });

  it('returns null for an unknown token', async () => {
    const { store } = setup();
    expect(await store.get('missing')).toBeNull();
  });

  it('keys records by the token hash, never the raw token', async () => {
    const { cache, store } = setup();
    await store.put(token('tok-raw'));

    expect(await cache.get('session:tok-raw')).toBeNull();
    expect(await cache.get(`session:${tokenHasher.hash('tok-raw')}`)).toBe(
      JSON.stringify({
        username: 'alice',
        issuedAt: '2026-03-01T12:00:00.000Z',
        expiresAt: '2026-03-01T13:00:00.000Z',
      }),
    );
  });

  it('gives the record the session lifetime plus a 60s grace period', async () => {
    const { cache, store } = setup();
    const setSpy = vi.spyOn(cache, 'set');
    const saddSpy = vi.spyOn(cache, 'sadd');

    await store.put(token('tok-ttl'));

    expect(setSpy).toHaveBeenCalledWith(`session:${tokenHasher.hash('tok-ttl')}`, expect.any(String), {
      ttlSeconds: 3660,
    });
    expect(saddSpy).toHaveBeenCalledWith('session:user:alice', tokenHasher.hash('tok-ttl'), {
      ttlSeconds: 3660,
    });
  });

  it('delete removes the record and its index entry; repeating it is a no-op', async () => {
    const { cache, store } = setup();
    await store.put(token('tok-a'));
    await store.put(token('tok-b'));

    await store.delete('tok-a');
    await store.delete('tok-a');

    expect(await store.get('tok-a')).toBeNull();
    expect(await store.get('tok-b')).not.toBeNull();
    expect(await cache.smembers('session:user:alice')).toEqual([tokenHasher.hash('tok-b')]);
  });

  it('deleteAllForUser removes only that user’s sessions', async () => {
    const { cache, store } = setup();
    await store.put(token('tok-a1', 'alice'));
    await store.put(token('tok-a2', 'alice'));
    await store.put(token('tok-b1', 'bob'));

    await store.deleteAllForUser('alice');

    expect(await store.get('tok-a1')).toBeNull();
    expect(await store.get('tok-a2')).toBeNull();
    expect(await store.get('tok-b1')).not.toBeNull();
    expect(await cache.smembers('session:user:alice')).toEqual([]);
  });

  it('deleteAllForUser on a user without sessions is a no-op', async () => {
    const { store } = setup();
    await expect(store.deleteAllForUser('nobody')).resolves.toBeUndefined();
  });

  it('drops a corrupted record and reports it missing', async () => {
    const { cache, store } = setup();
    const key = `session:${tokenHasher.hash('tok-bad')}`;
    await cache.set(key, '{"username":');

    expect(await store.get('tok-bad')).toBeNull();
    expect(await cache.get(key)).toBeNull();
  });

  it('drops a record that is valid JSON but not a session', async () => {
    const { cache, store } = setup();
    const key = `session:${tokenHasher.hash('tok-shape')}`;
    await cache.set(key, JSON.stringify({ username: 'alice' }));

    expect(await store.get('tok-shape')).toBeNull();
    expect(await cache.get(key)).toBeNull();
  });
});
