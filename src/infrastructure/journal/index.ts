export { default as journalPlugin } from './journal-plugin.js';
export type { JournalPluginOptions } from './journal-plugin.js';
export { createJournal } from './create-journal.js';
export type { JournalService, CreateJournalOptions } from './create-journal.js';
