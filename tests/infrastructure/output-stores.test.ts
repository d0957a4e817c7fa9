import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 * The Postgres store is exercised against mocked repository functions.
 */
vi.mock('../../src/infrastructure/db/index.js', () => ({
  findOutputs: vi.fn(),
  findOutput: vi.fn(),
  insertOutput: vi.fn(),
  updateOutput: vi.fn(),
  deleteOutput: vi.fn(),
}));

import { InMemoryOutputStore, createPgOutputStore } from '../../src/infrastructure/outputs/index.js';
import {
  findOutputs,
  findOutput,
  insertOutput,
  deleteOutput,
} from '../../src/infrastructure/db/index.js';
import type { Executor, OutputRow } from '../../src/infrastructure/db/index.js';
import type { OutputRecord } from '../../src/application/index.js';

const record: OutputRecord = { scope: 'acme', destination_id: 'ops', path: '/deploy', recursive: true };

function row(overrides: Partial<OutputRow> = {}): OutputRow {
  return {
    output_id: '00000000-0000-4000-8000-000000000001',
    scope: 'acme',
    destination_id: 'ops',
    path: '/deploy',
    recursive: true,
    created_at: new Date('2026-01-01T00:00:00Z'),
    updated_at: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

beforeEach(() => {
  vi.clearAllMocks();
});

// ── InMemoryOutputStore ──────────────────────────────────

describe('InMemoryOutputStore', () => {
  it('adds, finds and lists outputs by scope', async () => {
    const store = new InMemoryOutputStore();
    await store.addOutput(record);
    await store.addOutput({ ...record, scope: null, destination_id: 'audit' });

    expect(await store.findOutput('ops', '/deploy')).toEqual(record);
    expect(await store.listOutputs()).toHaveLength(2);
    expect(await store.listOutputs('acme')).toEqual([record]);
    expect((await store.listOutputs(null)).map((r) => r.destination_id)).toEqual(['audit']);
  });

  it('refuses a duplicate (destination, path)', async () => {
    const store = new InMemoryOutputStore([record]);

    await expect(store.addOutput(record)).rejects.toThrow('Output for ops on /deploy already exists');
  });

  it('updates only existing outputs', async () => {
    const store = new InMemoryOutputStore([record]);
    await store.updateOutput({ ...record, recursive: false });
    await store.updateOutput({ ...record, path: '/other' });

    expect((await store.findOutput('ops', '/deploy'))?.recursive).toBe(false);
    expect(store.size).toBe(1);
  });

  it('reports whether a delete matched', async () => {
    const store = new InMemoryOutputStore([record]);

    await expect(store.deleteOutput('ops', '/deploy')).resolves.toBe(true);
    await expect(store.deleteOutput('ops', '/deploy')).resolves.toBe(false);
  });

  it('runs transactions against itself', async () => {
    const store = new InMemoryOutputStore();
    const result = await store.transaction(async (tx) => {
      await tx.addOutput(record);
      return tx.findOutput('ops', '/deploy');
    });

    expect(result).toEqual(record);
  });
});

// ── createPgOutputStore ──────────────────────────────────

describe('createPgOutputStore', () => {
  const tx = { name: 'tx' };
  const db = {
    transaction: vi.fn(async (work: (t: unknown) => Promise<unknown>) => work(tx)),
  };
  const store = createPgOutputStore(db as unknown as Executor);

  it('maps rows to records', async () => {
    vi.mocked(findOutputs).mockResolvedValue([row(), row({ destination_id: 'audit', scope: null })]);

    const records = await store.listOutputs('acme');

    expect(findOutputs).toHaveBeenCalledWith(db, 'acme');
    expect(records).toEqual([
      record,
      { scope: null, destination_id: 'audit', path: '/deploy', recursive: true },
    ]);
  });

  it('returns undefined when no row is found', async () => {
    vi.mocked(findOutput).mockResolvedValue(undefined);

    await expect(store.findOutput('ops', '/deploy')).resolves.toBeUndefined();
    expect(findOutput).toHaveBeenCalledWith(db, 'ops', '/deploy');
  });

  it('passes delete results through', async () => {
    vi.mocked(deleteOutput).mockResolvedValue(true);

    await expect(store.deleteOutput('ops', '/deploy')).resolves.toBe(true);
  });

  it('binds the transaction store to the transaction executor', async () => {
    vi.mocked(insertOutput).mockResolvedValue(undefined);

    await store.transaction((inner) => inner.addOutput(record));

    expect(db.transaction).toHaveBeenCalledOnce();
    expect(insertOutput).toHaveBeenCalledWith(tx, record);
  });
});
