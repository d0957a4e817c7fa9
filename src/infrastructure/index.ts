export { redisPlugin } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export { dbPlugin, createDbClient, journalOutputs } from './db/index.js';
export type { Database, Executor, DbPluginOptions } from './db/index.js';
export { loadJournalConfig, DEFAULT_CONFIG } from './config/index.js';
export type { JournalConfig, DestinationConfig } from './config/index.js';
export {
  DestinationRegistry,
  SlackDestination,
  RedisDestination,
  FileDestination,
} from './destinations/index.js';
export { InMemoryOutputStore, createPgOutputStore } from './outputs/index.js';
export { journalPlugin, createJournal } from './journal/index.js';
export type { JournalService, JournalPluginOptions } from './journal/index.js';
