export { default as outputRoutes } from './output-routes.js';
export { default as journalRoutes } from './journal-routes.js';
export { replyWithJournalError } from './errors.js';
