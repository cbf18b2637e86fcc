import type { EventStore, ListableEventStore, StoredRecord } from '../domain/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface ListKeysParams {
  limit?: number;
}

/**
 * Use case: most recent record for a correlation key.
 * Returns null if nothing live is stored.
 */
export async function getLatestRecord(
  store: EventStore,
  key: string,
): Promise<StoredRecord | null> {
  return store.getLatest(key);
}

/**
 * Use case: every retained record, oldest first.
 * Returns null for unknown, expired and deleted keys alike.
 */
export async function getRecordHistory(
  store: EventStore,
  key: string,
): Promise<StoredRecord[] | null> {
  const records = await store.getAll(key);
  if (records === null || records.length === 0) return null;
  return records;
}

/** Use case: drop all state of a key. False when nothing existed. */
export async function removeRecords(store: EventStore, key: string): Promise<boolean> {
  return store.delete(key);
}

/**
 * Use case: resident correlation keys, in order of first write.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listResidentKeys(store: ListableEventStore, params: ListKeysParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const keys = await store.listKeys(limit);

  return { count: keys.length, keys };
}
