import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { journalPlugin, createJournal } from '../../src/infrastructure/journal/index.js';
import { journalConfigSchema } from '../../src/infrastructure/config/index.js';
import { InMemoryOutputStore } from '../../src/infrastructure/outputs/index.js';
import { DestinationRegistry } from '../../src/infrastructure/destinations/index.js';
import { fakeLogger, RecordingDestination } from '../helpers.js';

let dir: string;
let app: FastifyInstance;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'journal-plugin-'));
  app = Fastify({ logger: false });
});

afterEach(async () => {
  // An instance that failed to boot may refuse to close
  await app.close().catch(() => undefined);
  await rm(dir, { recursive: true, force: true });
});

describe('createJournal', () => {
  it('wires history capacity and journal root', async () => {
    const config = journalConfigSchema.parse({
      journal_root: '/meta',
      history: { capacity: 2 },
    });
    const ops = new RecordingDestination('ops');
    const journal = createJournal({
      config,
      log: fakeLogger(),
      store: new InMemoryOutputStore(),
      destinations: new DestinationRegistry([ops]),
    });

    await journal.admin.addOutput({ scope: null, destination_id: 'ops', path: '/meta', recursive: true });
    journal.admin.sendEvent({ scope: null, path: '/x', content: 'x', attributes: {} });
    journal.admin.sendEvent({ scope: null, path: '/y', content: 'y', attributes: {} });

    expect(journal.router.status).toBe('idle');
    expect(journal.router.history.capacity).toBe(2);
    expect(journal.router.history.query().map((e) => e.path)).toEqual(['/y', '/x']);
  });

  it('keeps every event when capacity is null', () => {
    const config = journalConfigSchema.parse({ history: { capacity: null } });
    const journal = createJournal({
      config,
      log: fakeLogger(),
      store: new InMemoryOutputStore(),
      destinations: new DestinationRegistry(),
    });

    expect(journal.router.history.capacity).toBeUndefined();
  });
});

describe('journalPlugin', () => {
  it('starts the router, delivers to configured destinations and stops on close', async () => {
    const filePath = join(dir, 'journal.log');
    const config = journalConfigSchema.parse({
      destinations: [{ kind: 'file', id: 'audit', file_path: filePath }],
    });

    await app.register(journalPlugin, { config, log: fakeLogger() });
    await app.ready();

    const { router, admin } = app.journal;
    expect(router.status).toBe('running');

    await admin.addOutput({ scope: null, destination_id: 'audit', path: '/deploy', recursive: true });
    admin.sendEvent({ scope: null, path: '/deploy/web', content: 'Deployed web', attributes: {} });
    await router.idle();

    expect(await readFile(filePath, 'utf-8')).toBe('Deployed web\n');

    await app.close();
    expect(router.status).toBe('stopped');
  });

  it('refuses postgres storage without a database', async () => {
    const config = journalConfigSchema.parse({ storage: { driver: 'postgres' } });

    app.register(journalPlugin, { config, log: fakeLogger() });

    await expect(app.ready()).rejects.toThrow('storage.driver is postgres but DATABASE_URL is not configured');
  });

  it('refuses redis destinations without a connection', async () => {
    const config = journalConfigSchema.parse({
      destinations: [{ kind: 'redis', id: 'bus', channel: 'journal' }],
    });

    app.register(journalPlugin, { config, log: fakeLogger() });

    await expect(app.ready()).rejects.toThrow("Destination 'bus' needs Redis but REDIS_URL is not configured");
  });
});
