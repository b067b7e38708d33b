import {
  type CompiledQuery,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type DatabaseConnection,
  type Driver,
  type QueryResult,
} from 'kysely';
import type { DB } from '../../src/shared/db/db.schema';

export type FakeResponse = {
  rows?: Record<string, unknown>[];
  numAffectedRows?: bigint;
  error?: unknown;
};

export type RecordedQuery = { sql: string; parameters: readonly unknown[] };

/**
 * WHY:
 * - Exercise Kysely-backed stores without a Postgres server.
 * - Queries are compiled by Kysely's real Postgres compiler, recorded, and answered by
 *   `respond` (rows, affected-row count, or a thrown driver error).
 */
export function createFakePostgres(respond: (query: RecordedQuery) => FakeResponse) {
  const queries: RecordedQuery[] = [];

  const connection: DatabaseConnection = {
    executeQuery<R>(compiled: CompiledQuery): Promise<QueryResult<R>> {
      const query = { sql: compiled.sql, parameters: compiled.parameters };
      queries.push(query);

      const response = respond(query);
      if (response.error !== undefined) return Promise.reject(response.error);

      return Promise.resolve({
        rows: (response.rows ?? []) as R[],
        numAffectedRows: response.numAffectedRows,
      });
    },
    streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
      throw new Error('streamQuery is not supported by the fake driver');
    },
  };

  const driver: Driver = {
    init: () => Promise.resolve(),
    acquireConnection: () => Promise.resolve(connection),
    beginTransaction: () => Promise.resolve(),
    commitTransaction: () => Promise.resolve(),
    rollbackTransaction: () => Promise.resolve(),
    releaseConnection: () => Promise.resolve(),
    destroy: () => Promise.resolve(),
  };

  const db = new Kysely<DB>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => driver,
      createIntrospector: (k) => new PostgresIntrospector(k),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

  return { db, queries };
}
