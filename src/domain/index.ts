export type { JournalEvent, JournalEventInput, JournalAttributes, AttributeValue } from './journal-event.js';
export { createJournalEvent } from './journal-event.js';
export type { Destination } from './destination.js';
export {
  ROOT_PATH,
  PATH_SEPARATOR,
  assertValidPath,
  isValidPath,
  isDescendantPath,
  isWithinPath,
  pathMatches,
  pathLineage,
  joinPath,
} from './path.js';
export {
  JournalError,
  PathFormatError,
  DeliveryFailure,
  RouterStateError,
  UnknownDestinationError,
  RootBroadcastError,
  ConfigError,
} from './errors.js';
