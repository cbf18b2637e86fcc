import type { StoredRecord, StoreShape } from './record.js';

export type StoreBackend = 'memory' | 'redis';

/** An unreachable backend reports the error its liveness check raised. */
export type StoreHealth =
  | { backend: StoreBackend; reachable: true }
  | { backend: StoreBackend; reachable: false; error: unknown };

/**
 * Keyed persistence for StoredRecords, one instance per scope.
 *
 * Absence (never written, expired, deleted) is `null` / `false`, never an
 * error. Implementations throw `StoreUnavailableError` when the backend
 * cannot be reached.
 */
export interface EventStore {
  readonly backend: StoreBackend;
  readonly shape: StoreShape;

  /** Overwrites (latest) or appends and trims (history), resetting the TTL. */
  put(key: string, record: StoredRecord, ttlSeconds: number): Promise<void>;

  getLatest(key: string): Promise<StoredRecord | null>;

  /** Oldest to newest. */
  getAll(key: string): Promise<StoredRecord[] | null>;

  delete(key: string): Promise<boolean>;

  health(): Promise<StoreHealth>;
}

/** Stores that can enumerate resident keys (in-process only). */
export interface ListableEventStore extends EventStore {
  listKeys(limit: number): Promise<string[]>;
}

export function isListable(store: EventStore): store is ListableEventStore {
  return 'listKeys' in store && typeof store.listKeys === 'function';
}

/**
 * Existence-only marks for processed event ids.
 * Marks expire independently of any StoredRecord.
 */
export interface IdempotencyGate {
  seen(eventId: string): Promise<boolean>;
  mark(eventId: string, ttlSeconds: number): Promise<void>;
}
