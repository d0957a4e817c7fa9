import type { OutputRecord, OutputStore } from '../../application/index.js';

function keyOf(destinationId: string, path: string): string {
  return `${destinationId}\u0000${path}`;
}

/**
 * In-memory output store.
 *
 * Used when no database is configured and in tests. Nothing survives a
 * restart, and `transaction` does not roll back on failure.
 */
export class InMemoryOutputStore implements OutputStore {
  private readonly outputs: Map<string, OutputRecord> = new Map();

  constructor(initial: readonly OutputRecord[] = []) {
    for (const record of initial) {
      this.outputs.set(keyOf(record.destination_id, record.path), record);
    }
  }

  async listOutputs(scope?: string | null): Promise<OutputRecord[]> {
    const records = [...this.outputs.values()];
    return scope === undefined ? records : records.filter((record) => record.scope === scope);
  }

  async findOutput(destinationId: string, path: string): Promise<OutputRecord | undefined> {
    return this.outputs.get(keyOf(destinationId, path));
  }

  async addOutput(record: OutputRecord): Promise<void> {
    const key = keyOf(record.destination_id, record.path);
    if (this.outputs.has(key)) {
      throw new Error(`Output for ${record.destination_id} on ${record.path} already exists`);
    }
    this.outputs.set(key, { ...record });
  }

  async updateOutput(record: OutputRecord): Promise<void> {
    const key = keyOf(record.destination_id, record.path);
    if (this.outputs.has(key)) {
      this.outputs.set(key, { ...record });
    }
  }

  async deleteOutput(destinationId: string, path: string): Promise<boolean> {
    return this.outputs.delete(keyOf(destinationId, path));
  }

  async transaction<T>(work: (store: OutputStore) => Promise<T>): Promise<T> {
    return work(this);
  }

  get size(): number {
    return this.outputs.size;
  }
}
