import type { Redis } from 'ioredis';
import type { Clock, EventStore, IdempotencyGate } from '../domain/index.js';
import type { AppConfig } from './config.js';
import { InMemoryEventStore, InMemoryIdempotencyGate } from './memory/index.js';
import { RedisEventStore, RedisIdempotencyGate } from './redis/index.js';

/** Everything the routes persist through. One instance per process. */
export interface Stores {
  /** Open deliveries, keyed by `to`. */
  messages: EventStore;
  /** CloudEvents deliveries, keyed by service/session id. */
  sessions: EventStore;
  idempotency: IdempotencyGate;
}

type StoreSettings = Pick<AppConfig, 'shape' | 'historyMaxEntries'>;

export function createMemoryStores(settings: StoreSettings, clock?: Clock): Stores {
  const options = { shape: settings.shape, historyMaxEntries: settings.historyMaxEntries, clock };
  return {
    messages: new InMemoryEventStore(options),
    sessions: new InMemoryEventStore(options),
    idempotency: new InMemoryIdempotencyGate(clock),
  };
}

export function createRedisStores(
  redis: Redis,
  settings: StoreSettings & Pick<AppConfig, 'namespace'>,
): Stores {
  const base = {
    namespace: settings.namespace,
    shape: settings.shape,
    historyMaxEntries: settings.historyMaxEntries,
  };
  return {
    messages: new RedisEventStore(redis, { ...base, scope: 'to' }),
    sessions: new RedisEventStore(redis, { ...base, scope: 'session' }),
    idempotency: new RedisIdempotencyGate(redis, settings.namespace),
  };
}
