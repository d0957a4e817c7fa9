export { createPgOutputStore } from './pg-output-store.js';
export { InMemoryOutputStore } from './in-memory-output-store.js';
