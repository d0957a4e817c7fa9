export { JournalHistory, DEFAULT_QUERY_LIMIT } from './history.js';
export type { HistoryQuery } from './history.js';
export { historyFilterSchema, attributeValueSchema, compileHistoryFilter } from './history-filter.js';
export type { HistoryFilter, EventPredicate } from './history-filter.js';
export { OutputListener, toDeliveryFailure } from './output-listener.js';
export type { DeliveryResult } from './output-listener.js';
export { ChannelOutputListener, renderEvent } from './channel-output-listener.js';
export type { RenderOptions } from './channel-output-listener.js';
export { Router, DEFAULT_SHUTDOWN_GRACE_MS } from './router.js';
export type { RouterOptions, RouterState, RouterStats, DeliveryMode } from './router.js';
export { Broadcaster } from './broadcaster.js';
export type { OutputRecord, OutputStore } from './output-store.js';
export { JournalAdmin, DEFAULT_JOURNAL_ROOT } from './journal-admin.js';
export type { DestinationResolver, JournalAdminDeps } from './journal-admin.js';
export {
  addOutputSchema,
  removeOutputSchema,
  moveOutputSchema,
  sendEventSchema,
  findEventsSchema,
} from './output-schema.js';
export type {
  AddOutputInput,
  RemoveOutputInput,
  MoveOutputInput,
  SendEventInput,
  FindEventsInput,
} from './output-schema.js';
