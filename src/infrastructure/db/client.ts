import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import type { Logger } from 'pino';
import * as schema from './schema.js';

export interface DbClientOptions {
  databaseUrl: string;
  /** Pool size. Output administration is low-volume, so the default is 5. */
  maxConnections?: number;
  /** Receives server notices (e.g. "relation already exists, skipping"). */
  log?: Logger;
}

/**
 * Creates the Drizzle client for the output store.
 *
 * `sql` is the postgres.js pool (bootstrap and shutdown), `db` the typed
 * query builder handed to the output repository.
 */
export function createDbClient(opts: DbClientOptions) {
  const { log } = opts;

  const sql = postgres(opts.databaseUrl, {
    max: opts.maxConnections ?? 5,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => {
      log?.debug({ code: notice['code'], notice: notice['message'] }, 'Postgres notice');
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];

/** Either the database or an open transaction on it. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
