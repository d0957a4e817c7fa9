import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { createDbClient } from './client.js';
import type { Database } from './client.js';

export interface DbPluginOptions {
  databaseUrl: string;
  maxConnections?: number;
  log?: Logger;
}

/** Idempotent bootstrap for `journal_outputs`; drizzle-kit owns later migrations. */
export const BOOTSTRAP_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS journal_outputs (
    output_id       UUID PRIMARY KEY,
    scope           VARCHAR(255),
    destination_id  VARCHAR(255)  NOT NULL,
    path            VARCHAR(1024) NOT NULL,
    recursive       BOOLEAN       NOT NULL DEFAULT true,
    created_at      TIMESTAMPTZ   NOT NULL DEFAULT NOW(),
    updated_at      TIMESTAMPTZ   NOT NULL DEFAULT NOW()
  )`,
  'CREATE UNIQUE INDEX IF NOT EXISTS uq_journal_outputs_destination_path ON journal_outputs (destination_id, path)',
  'CREATE INDEX IF NOT EXISTS idx_journal_outputs_scope ON journal_outputs (scope)',
];

/**
 * Fastify plugin for the Postgres output store.
 *
 * Bootstraps the table before decorating `fastify.db`. If the database is
 * unreachable the pool is closed and startup fails; otherwise the pool is
 * closed on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts);

  try {
    for (const statement of BOOTSTRAP_STATEMENTS) {
      await sql.unsafe(statement);
    }
  } catch (err: unknown) {
    await sql.end({ timeout: 0 });
    throw new Error('Cannot prepare journal_outputs table', { cause: err });
  }
  fastify.log.info('Database ready (journal_outputs table)');

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
