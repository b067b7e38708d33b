/**
 * backend/src/modules/sessions/cache-session-store.ts
 *
 * WHY:
 * - Server-side session records via the Cache interface (Redis in prod, InMemCache in tests).
 * - Sessions are instantly revocable via del().
 * - Keys are SHA-256 of the token, so a cache dump holds no usable token.
 *
 * USER-SESSION INDEX (deleteAllForUser):
 * - On put(): SADD session:user:{username} {tokenHash} with TTL refresh.
 * - On delete(): SREM removes the hash from the user index, then DELs the record.
 * - On deleteAllForUser(): SMEMBERS -> DEL each record -> DEL the index.
 *
 * RULES:
 * - Depends only on Cache + TokenHasher (DIP).
 * - No expiry decisions here; the cache TTL only garbage-collects after the grace period.
 * - A record that fails schema validation is deleted and reported as missing.
 */

import { z } from 'zod';
import type { Cache } from '../../shared/cache/cache';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { SessionStore } from './session-store';
import type { SessionToken } from './session.types';
import {
  SESSION_EXPIRY_GRACE_SECONDS,
  SESSION_KEY_PREFIX,
  SESSION_USER_INDEX_PREFIX,
} from './session.types';

const StoredSessionSchema = z.object({
  username: z.string().min(1),
  issuedAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
});

type StoredSession = z.infer<typeof StoredSessionSchema>;

export class CacheSessionStore implements SessionStore {
  constructor(
    private readonly deps: {
      cache: Cache;
      tokenHasher: TokenHasher;
      logger: Logger;
    },
  ) {}

  private key(tokenHash: string): string {
    return `${SESSION_KEY_PREFIX}:${tokenHash}`;
  }

  private userIndexKey(username: string): string {
    return `${SESSION_USER_INDEX_PREFIX}:${username}`;
  }

  private ttlSeconds(token: SessionToken): number {
    const lifetimeMs = token.expiresAt.getTime() - token.issuedAt.getTime();
    return Math.max(1, Math.ceil(lifetimeMs / 1000)) + SESSION_EXPIRY_GRACE_SECONDS;
  }

  private async read(tokenHash: string): Promise<StoredSession | null> {
    const raw = await this.deps.cache.get(this.key(tokenHash));
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }

    const parsed = StoredSessionSchema.safeParse(json);
    if (!parsed.success) {
      this.deps.logger.warn('session.store.corrupted_record', { flow: 'session' });
      await this.deps.cache.del(this.key(tokenHash));
      return null;
    }

    return parsed.data;
  }

  async put(token: SessionToken): Promise<void> {
    const tokenHash = this.deps.tokenHasher.hash(token.tokenId);
    const ttlSeconds = this.ttlSeconds(token);

    const stored: StoredSession = {
      username: token.username,
      issuedAt: token.issuedAt.toISOString(),
      expiresAt: token.expiresAt.toISOString(),
    };

    await this.deps.cache.set(this.key(tokenHash), JSON.stringify(stored), { ttlSeconds });

    // Index TTL is refreshed to the newest session's lifetime; later sessions expire later.
    await this.deps.cache.sadd(this.userIndexKey(token.username), tokenHash, { ttlSeconds });
  }

  async get(tokenId: string): Promise<SessionToken | null> {
    const stored = await this.read(this.deps.tokenHasher.hash(tokenId));
    if (!stored) return null;

    return {
      tokenId,
      username: stored.username,
      issuedAt: new Date(stored.issuedAt),
      expiresAt: new Date(stored.expiresAt),
    };
  }

  async delete(tokenId: string): Promise<void> {
    const tokenHash = this.deps.tokenHasher.hash(tokenId);

    const stored = await this.read(tokenHash);
    if (stored) {
      await this.deps.cache.srem(this.userIndexKey(stored.username), tokenHash);
    }

    await this.deps.cache.del(this.key(tokenHash));
  }

  /**
   * Stale hashes (records already evicted) are harmless: DEL on a missing key is a no-op.
   */
  async deleteAllForUser(username: string): Promise<void> {
    const indexKey = this.userIndexKey(username);
    const tokenHashes = await this.deps.cache.smembers(indexKey);

    await Promise.all(tokenHashes.map((hash) => this.deps.cache.del(this.key(hash))));

    await this.deps.cache.del(indexKey);
  }
}
