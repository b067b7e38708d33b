/**
 * backend/src/shared/db/db.schema.ts
 *
 * Kysely table interfaces. Keep aligned with migrations/.
 */

import type { ColumnType, Selectable } from 'kysely';

export interface CredentialsTable {
  username: string;
  password_digest: string;
  // pg returns timestamptz as Date; inserts accept Date or ISO string
  created_at: ColumnType<Date, Date | string, never>;
}

export interface DB {
  credentials: CredentialsTable;
}

export type CredentialRow = Selectable<CredentialsTable>;
