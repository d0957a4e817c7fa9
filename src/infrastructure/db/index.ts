export { journalOutputs } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Executor, DbClientOptions } from './client.js';
export {
  findOutputs,
  findOutput,
  insertOutput,
  updateOutput,
  deleteOutput,
} from './output-repository.js';
export type { OutputRow, OutputInput } from './output-repository.js';
export { default as dbPlugin, BOOTSTRAP_STATEMENTS } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
