import type { OutputRecord, OutputStore } from '../../application/index.js';
import type { Executor, OutputRow } from '../db/index.js';
import {
  findOutputs,
  findOutput,
  insertOutput,
  updateOutput,
  deleteOutput,
} from '../db/index.js';

function toRecord(row: OutputRow): OutputRecord {
  return {
    scope: row.scope,
    destination_id: row.destination_id,
    path: row.path,
    recursive: row.recursive,
  };
}

/**
 * OutputStore over the `journal_outputs` table. `transaction` runs the
 * callback against a store bound to a Drizzle transaction.
 */
export function createPgOutputStore(db: Executor): OutputStore {
  return {
    async listOutputs(scope) {
      const rows = await findOutputs(db, scope);
      return rows.map(toRecord);
    },

    async findOutput(destinationId, path) {
      const row = await findOutput(db, destinationId, path);
      return row === undefined ? undefined : toRecord(row);
    },

    addOutput: (record) => insertOutput(db, record),

    updateOutput: (record) => updateOutput(db, record),

    deleteOutput: (destinationId, path) => deleteOutput(db, destinationId, path),

    transaction: (work) => db.transaction((tx) => work(createPgOutputStore(tx))),
  };
}
