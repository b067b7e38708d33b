/**
 * backend/src/modules/sessions/session-store.ts
 *
 * Storage contract for session tokens. Expiry is decided by the kernel (via its Clock),
 * not by the store: get() may return a record whose expiresAt has passed.
 * delete() and deleteAllForUser() are idempotent.
 */

import type { SessionToken } from './session.types';

export interface SessionStore {
  put(token: SessionToken): Promise<void>;
  get(tokenId: string): Promise<SessionToken | null>;
  delete(tokenId: string): Promise<void>;
  deleteAllForUser(username: string): Promise<void>;
}
