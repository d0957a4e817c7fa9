export { SlackDestination } from './slack-destination.js';
export { RedisDestination } from './redis-destination.js';
export { FileDestination } from './file-destination.js';
export { DestinationRegistry, createDestination } from './registry.js';
export type { DestinationDeps } from './registry.js';
