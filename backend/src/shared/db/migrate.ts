/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply schema migrations before the kernel's Postgres user store is used.
 * - Migrations are registered statically (migrations/index.ts), so this works from
 *   sources (tsx) and from a build alike.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import { Migrator, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const provider: MigrationProvider = {
  getMigrations: () => Promise.resolve(migrations),
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('db.migrate.start', { count: Object.keys(migrations).length });

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migrate.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migrate.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    throw error;
  }

  logger.info('db.migrate.done');
}

void runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.failed', { err });
  process.exit(1);
});
