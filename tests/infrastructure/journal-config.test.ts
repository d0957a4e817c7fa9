import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, loadJournalConfig } from '../../src/infrastructure/config/index.js';
import { ConfigError } from '../../src/domain/index.js';

let dir: string;

async function writeConfig(content: unknown): Promise<string> {
  const filePath = join(dir, 'journal.json');
  await writeFile(filePath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filePath;
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'journal-config-'));
});

afterEach(async () => {
  vi.unstubAllEnvs();
  await rm(dir, { recursive: true, force: true });
});

describe('DEFAULT_CONFIG', () => {
  it('has the documented defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({
      journal_root: '/journal',
      history: { capacity: 1000 },
      dispatch: { delivery: 'sequential', shutdown_grace_ms: 5000 },
      render: { attributes: true },
      storage: { driver: 'memory' },
      destinations: [],
    });
  });
});

describe('loadJournalConfig', () => {
  it('returns defaults when the file is missing', () => {
    expect(loadJournalConfig(join(dir, 'missing.json'))).toEqual(DEFAULT_CONFIG);
  });

  it('merges a partial file over the defaults', async () => {
    const filePath = await writeConfig({
      dispatch: { delivery: 'concurrent' },
      history: { capacity: null },
      destinations: [{ kind: 'file', id: 'audit', file_path: 'logs/journal.log' }],
    });

    const config = loadJournalConfig(filePath);

    expect(config.dispatch).toEqual({ delivery: 'concurrent', shutdown_grace_ms: 5000 });
    expect(config.history.capacity).toBeNull();
    expect(config.destinations).toEqual([{ kind: 'file', id: 'audit', file_path: 'logs/journal.log' }]);
  });

  it('reads the path from JOURNAL_CONFIG', async () => {
    const filePath = await writeConfig({ journal_root: '/meta' });
    vi.stubEnv('JOURNAL_CONFIG', filePath);

    expect(loadJournalConfig().journal_root).toBe('/meta');
  });

  it('rejects invalid JSON', async () => {
    const filePath = await writeConfig('{ not json');

    expect(() => loadJournalConfig(filePath)).toThrow(ConfigError);
    expect(() => loadJournalConfig(filePath)).toThrow(`Journal config at ${filePath} is not valid JSON`);
  });

  it('rejects duplicate destination ids', async () => {
    const filePath = await writeConfig({
      destinations: [
        { kind: 'file', id: 'a', file_path: 'one.log' },
        { kind: 'file', id: 'a', file_path: 'two.log' },
      ],
    });

    expect(() => loadJournalConfig(filePath)).toThrow(
      `Invalid journal config at ${filePath}: destinations.1.id: Duplicate destination id 'a'`,
    );
  });

  it('rejects a malformed journal root', async () => {
    const filePath = await writeConfig({ journal_root: '/journal/' });

    expect(() => loadJournalConfig(filePath)).toThrow(
      `Invalid journal config at ${filePath}: journal_root: Must be a valid journal path`,
    );
  });

  it('rejects an unknown destination kind', async () => {
    const filePath = await writeConfig({ destinations: [{ kind: 'pager', id: 'p' }] });

    expect(() => loadJournalConfig(filePath)).toThrow(ConfigError);
  });

  it('rejects a slack destination without a valid webhook URL', async () => {
    const filePath = await writeConfig({ destinations: [{ kind: 'slack', id: 's', webhook_url: 'nope' }] });

    expect(() => loadJournalConfig(filePath)).toThrow(ConfigError);
  });
});
