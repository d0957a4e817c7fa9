import pino from 'pino';

import { loadJournalConfig } from './infrastructure/index.js';
import { buildApp, reportStartupFailure } from './app.js';

const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

/**
 * Bootstrap the journal service: configuration, app, shutdown signals,
 * then listen(). Closing Fastify drains the router through its onClose hook.
 */
async function main(): Promise<void> {
  const config = loadJournalConfig();
  const fastify = await buildApp({ config, log });

  let closing = false;
  const shutdown = (signal: string): void => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutting down journal service...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({
    host,
    port,
  });
}

main().catch((err: unknown) => reportStartupFailure(log, err));
