export { InMemoryEventStore } from './in-memory-event-store.js';
export { DEFAULT_SWEEP_INTERVAL_SECONDS } from './in-memory-event-store.js';
export type { InMemoryEventStoreOptions } from './in-memory-event-store.js';
export { InMemoryIdempotencyGate } from './in-memory-idempotency-gate.js';
