/**
 * backend/src/modules/users/user-store.ts
 *
 * WHY:
 * - The kernel depends on this contract, not on Postgres (DIP).
 * - KyselyUserStore in production, InMemUserStore in tests / local dev.
 *
 * RULES:
 * - insert() MUST throw DUPLICATE_USERNAME (AppError) when the username exists,
 *   including when a concurrent insert wins the race at the storage layer.
 * - Other I/O failures are thrown as-is; the service reports them as STORAGE_UNAVAILABLE.
 */

import type { Credential } from './user.types';

export interface UserStore {
  findByUsername(username: string): Promise<Credential | null>;
  insert(credential: Credential): Promise<void>;

  /** Replaces the stored digest. Returns false when no such user exists. */
  updateDigest(username: string, passwordDigest: string): Promise<boolean>;
}
