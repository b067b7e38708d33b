/**
 * backend/src/modules/sessions/session.types.ts
 *
 * WHY:
 * - Defines the session token model handed to callers after a successful login.
 * - The caller presents tokenId on every request; the kernel validates it fresh each time.
 *
 * RULES:
 * - tokenId is random (>= 128 bits) and is the only secret in the record.
 * - Never store passwords or digests in session data.
 */

export type SessionToken = {
  readonly tokenId: string;
  readonly username: string;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
};

/**
 * Cache key prefix. Full key: `session:{sha256(tokenId)}`.
 */
export const SESSION_KEY_PREFIX = 'session';

/**
 * Per-user index prefix. Full key: `session:user:{username}`.
 * A SET of token hashes, used by deleteAllForUser().
 */
export const SESSION_USER_INDEX_PREFIX = 'session:user';

/**
 * Extra seconds a record outlives its expiresAt in the cache, so the kernel reads it
 * back and reports EXPIRED (then deletes it) instead of seeing a plain miss.
 */
export const SESSION_EXPIRY_GRACE_SECONDS = 60;
