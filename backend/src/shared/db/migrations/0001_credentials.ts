import { type Kysely, sql } from 'kysely';

// Migrations run against an unknown (older) schema, so they stay untyped.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('credentials')
    .addColumn('username', 'text', (col) => col.primaryKey())
    .addColumn('password_digest', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('credentials').ifExists().execute();
}
