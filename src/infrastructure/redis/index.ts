export { RedisEventStore } from './redis-event-store.js';
export type { RedisEventStoreOptions } from './redis-event-store.js';
export { RedisIdempotencyGate } from './redis-idempotency-gate.js';
export { recordKey, eventMarkKey } from './keys.js';
export { encodeRecord, decodeRecord } from './record-codec.js';
