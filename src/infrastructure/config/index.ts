export {
  loadJournalConfig,
  journalConfigSchema,
  destinationConfigSchema,
  DEFAULT_CONFIG,
} from './journal-config.js';
export type { JournalConfig, DestinationConfig } from './journal-config.js';
