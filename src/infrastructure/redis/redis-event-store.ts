import type { Redis } from 'ioredis';
import type {
  EventStore,
  StoredRecord,
  StoreHealth,
  StoreScope,
  StoreShape,
} from '../../domain/index.js';
import { StoreUnavailableError } from '../../errors.js';
import { recordKey } from './keys.js';
import { decodeRecord, encodeRecord } from './record-codec.js';

export interface RedisEventStoreOptions {
  namespace: string;
  scope: StoreScope;
  shape: StoreShape;
  historyMaxEntries: number;
}

/**
 * Redis-backed event store.
 *
 * - latest:  `SET key value EX ttl` — each write replaces the previous one.
 * - history: `MULTI RPUSH / EXPIRE / LTRIM -N -1` — append at the tail,
 *   refresh the TTL of the whole list, keep the newest N.
 *
 * Expiry is delegated to Redis. Every command failure surfaces as
 * `StoreUnavailableError`; absent keys are `null` / `false`.
 */
export class RedisEventStore implements EventStore {
  readonly backend = 'redis' as const;
  readonly shape: StoreShape;

  private readonly namespace: string;
  private readonly scope: StoreScope;
  private readonly historyMaxEntries: number;

  constructor(
    private readonly redis: Redis,
    options: RedisEventStoreOptions,
  ) {
    this.namespace = options.namespace;
    this.scope = options.scope;
    this.shape = options.shape;
    this.historyMaxEntries = options.historyMaxEntries;
  }

  async put(key: string, record: StoredRecord, ttlSeconds: number): Promise<void> {
    const storageKey = this.storageKey(key);
    const value = encodeRecord(record);

    await this.call('put', async () => {
      if (this.shape === 'latest') {
        await this.redis.set(storageKey, value, 'EX', ttlSeconds);
        return;
      }

      const results = await this.redis
        .multi()
        .rpush(storageKey, value)
        .expire(storageKey, ttlSeconds)
        .ltrim(storageKey, -this.historyMaxEntries, -1)
        .exec();

      for (const [err] of results ?? []) {
        if (err) throw err;
      }
    });
  }

  async getLatest(key: string): Promise<StoredRecord | null> {
    const storageKey = this.storageKey(key);
    const raw = await this.call('getLatest', () =>
      this.shape === 'latest'
        ? this.redis.get(storageKey)
        : this.redis.lindex(storageKey, -1),
    );
    return raw === null ? null : decodeRecord(storageKey, raw);
  }

  async getAll(key: string): Promise<StoredRecord[] | null> {
    const storageKey = this.storageKey(key);

    if (this.shape === 'latest') {
      const raw = await this.call('getAll', () => this.redis.get(storageKey));
      return raw === null ? null : [decodeRecord(storageKey, raw)];
    }

    const items = await this.call('getAll', () => this.redis.lrange(storageKey, 0, -1));
    if (items.length === 0) return null;
    return items.map((raw) => decodeRecord(storageKey, raw));
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.call('delete', () => this.redis.del(this.storageKey(key)));
    return removed > 0;
  }

  /** Verifies Redis is reachable via PING. */
  async health(): Promise<StoreHealth> {
    try {
      await this.redis.ping();
      return { backend: this.backend, reachable: true };
    } catch (error) {
      return { backend: this.backend, reachable: false, error };
    }
  }

  private storageKey(key: string): string {
    return recordKey(this.namespace, this.scope, key, this.shape);
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      throw new StoreUnavailableError(operation, err);
    }
  }
}
