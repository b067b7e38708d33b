/**
 * backend/src/modules/users/dal/kysely-user-store.ts
 *
 * WHY:
 * - Postgres-backed UserStore (table `credentials`, see migrations/0001_credentials).
 * - Username uniqueness is the primary key; a lost insert race shows up as 23505.
 *
 * RULES:
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { CredentialRow } from '../../../shared/db/db.schema';
import { AppError } from '../../../shared/errors/errors';
import type { Credential } from '../user.types';
import type { UserStore } from '../user-store';

const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return err.code === PG_UNIQUE_VIOLATION;
}

function toCredential(row: CredentialRow): Credential {
  return {
    username: row.username,
    passwordDigest: row.password_digest,
    createdAt: row.created_at,
  };
}

export class KyselyUserStore implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  async findByUsername(username: string): Promise<Credential | null> {
    const row = await this.db
      .selectFrom('credentials')
      .selectAll()
      .where('username', '=', username)
      .executeTakeFirst();

    return row ? toCredential(row) : null;
  }

  async insert(credential: Credential): Promise<void> {
    try {
      await this.db
        .insertInto('credentials')
        .values({
          username: credential.username,
          password_digest: credential.passwordDigest,
          created_at: credential.createdAt,
        })
        .execute();
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw AppError.duplicateUsername(undefined, { source: 'storage' });
      }
      throw err;
    }
  }

  async updateDigest(username: string, passwordDigest: string): Promise<boolean> {
    const result = await this.db
      .updateTable('credentials')
      .set({ password_digest: passwordDigest })
      .where('username', '=', username)
      .executeTakeFirstOrThrow();

    return result.numUpdatedRows > 0n;
  }
}
