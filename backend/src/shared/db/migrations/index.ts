/**
 * backend/src/shared/db/migrations/index.ts
 *
 * Ordered migration registry. Add new migrations here with a zero-padded prefix;
 * Kysely applies them in key order.
 */

import type { Migration } from 'kysely';
import * as m0001 from './0001_credentials';

export const migrations: Record<string, Migration> = {
  '0001_credentials': m0001,
};
