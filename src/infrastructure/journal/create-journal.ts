import type { Logger } from 'pino';
import type { DestinationResolver, OutputStore } from '../../application/index.js';
import { JournalAdmin, JournalHistory, Router } from '../../application/index.js';
import type { JournalConfig } from '../config/index.js';

export interface JournalService {
  readonly router: Router;
  readonly admin: JournalAdmin;
}

export interface CreateJournalOptions {
  config: JournalConfig;
  log: Logger;
  store: OutputStore;
  destinations: DestinationResolver;
}

/** Wires history, router and admin from configuration. Does not start. */
export function createJournal(opts: CreateJournalOptions): JournalService {
  const { config, log } = opts;

  const router = new Router({
    log: log.child({ component: 'journal-router' }),
    history: new JournalHistory(config.history.capacity ?? undefined),
    delivery: config.dispatch.delivery,
  });

  const admin = new JournalAdmin({
    router,
    store: opts.store,
    destinations: opts.destinations,
    log: log.child({ component: 'journal-admin' }),
    journalRoot: config.journal_root,
    render: { attributes: config.render.attributes },
  });

  return { router, admin };
}
