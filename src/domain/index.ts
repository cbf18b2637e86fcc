export type { Payload, StoredRecord, StoreShape, StoreScope, Clock } from './record.js';
export { systemClock } from './record.js';
export type { InboundBody, KeyRule } from './correlation-key.js';
export {
  TO_KEY_RULE,
  SESSION_KEY_RULE,
  isMapping,
  classifyBody,
  normalizePayload,
  deriveCorrelationKey,
} from './correlation-key.js';
export type {
  StoreBackend,
  StoreHealth,
  EventStore,
  ListableEventStore,
  IdempotencyGate,
} from './store.js';
export { isListable } from './store.js';
