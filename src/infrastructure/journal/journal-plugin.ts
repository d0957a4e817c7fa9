import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { ConfigError } from '../../domain/index.js';
import type { OutputStore } from '../../application/index.js';
import type { JournalConfig } from '../config/index.js';
import { DestinationRegistry } from '../destinations/index.js';
import { InMemoryOutputStore, createPgOutputStore } from '../outputs/index.js';
import { createJournal } from './create-journal.js';
import type { JournalService } from './create-journal.js';

export interface JournalPluginOptions {
  config: JournalConfig;
  log: Logger;
}

/**
 * Fastify plugin that owns the journal router lifecycle.
 *
 * 1) Builds destinations and the output store from configuration
 * 2) Rebuilds the listener registry from the store
 * 3) Starts the dispatch task
 * 4) Drains queued events on close, within the configured grace period
 */
async function journalPlugin(fastify: FastifyInstance, opts: JournalPluginOptions): Promise<void> {
  const { config, log } = opts;

  const destinations = DestinationRegistry.fromConfig(config.destinations, {
    log,
    redis: fastify.hasDecorator('redis') ? fastify.redis : undefined,
  });

  let store: OutputStore;
  if (config.storage.driver === 'postgres') {
    if (!fastify.hasDecorator('db')) {
      throw new ConfigError('storage.driver is postgres but DATABASE_URL is not configured');
    }
    store = createPgOutputStore(fastify.db);
  } else {
    store = new InMemoryOutputStore();
  }

  const journal = createJournal({ config, log, store, destinations });

  const loaded = await journal.admin.loadOutputs();
  log.info(
    { outputs: loaded, destinations: destinations.list().map((d) => d.id), storage: config.storage.driver },
    'Journal outputs loaded',
  );

  journal.router.start();

  fastify.decorate('journal', journal);

  fastify.addHook('onClose', async () => {
    await journal.router.stop(config.dispatch.shutdown_grace_ms);
  });
}

export default fp(journalPlugin, {
  name: 'journal',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.journal` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    journal: JournalService;
  }
}
