/**
 * backend/src/modules/users/dal/inmem-user-store.ts
 *
 * WHY:
 * - Lets the kernel run in tests and local dev without Postgres.
 * - Same uniqueness contract as KyselyUserStore.
 */

import { AppError } from '../../../shared/errors/errors';
import type { Credential } from '../user.types';
import type { UserStore } from '../user-store';

export class InMemUserStore implements UserStore {
  private readonly rows = new Map<string, Credential>();

  findByUsername(username: string): Promise<Credential | null> {
    return Promise.resolve(this.rows.get(username) ?? null);
  }

  insert(credential: Credential): Promise<void> {
    if (this.rows.has(credential.username)) {
      return Promise.reject(AppError.duplicateUsername(undefined, { source: 'storage' }));
    }
    this.rows.set(credential.username, { ...credential });
    return Promise.resolve();
  }

  updateDigest(username: string, passwordDigest: string): Promise<boolean> {
    const existing = this.rows.get(username);
    if (!existing) return Promise.resolve(false);

    this.rows.set(username, { ...existing, passwordDigest });
    return Promise.resolve(true);
  }
}
