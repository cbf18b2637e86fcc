import { systemClock } from '../../domain/index.js';
import type {
  Clock,
  ListableEventStore,
  StoredRecord,
  StoreHealth,
  StoreShape,
} from '../../domain/index.js';

interface Entry {
  records: StoredRecord[];
  expiresAt: number;
}

export interface InMemoryEventStoreOptions {
  shape: StoreShape;
  historyMaxEntries: number;
  clock?: Clock;
  /** Minimum gap between full sweeps of expired entries. */
  sweepIntervalSeconds?: number;
}

export const DEFAULT_SWEEP_INTERVAL_SECONDS = 60;

/**
 * Process-local event store. Volatile: everything is lost on restart.
 *
 * An entry past its deadline is dropped the next time it is touched; `put`
 * also sweeps every expired entry at most once per sweep interval. The Map
 * keeps insertion order of the first write, which is the order `listKeys`
 * reports; overwriting a key keeps its position.
 */
export class InMemoryEventStore implements ListableEventStore {
  readonly backend = 'memory' as const;
  readonly shape: StoreShape;

  private readonly entries: Map<string, Entry> = new Map();
  private readonly historyMaxEntries: number;
  private readonly clock: Clock;
  private readonly sweepIntervalMs: number;
  private nextSweepAt: number;

  constructor(options: InMemoryEventStoreOptions) {
    this.shape = options.shape;
    this.historyMaxEntries = options.historyMaxEntries;
    this.clock = options.clock ?? systemClock;
    this.sweepIntervalMs = (options.sweepIntervalSeconds ?? DEFAULT_SWEEP_INTERVAL_SECONDS) * 1000;
    this.nextSweepAt = this.clock() + this.sweepIntervalMs;
  }

  async put(key: string, record: StoredRecord, ttlSeconds: number): Promise<void> {
    this.sweep();

    const expiresAt = this.clock() + ttlSeconds * 1000;
    const current = this.live(key);

    if (this.shape === 'latest' || current === undefined) {
      this.entries.set(key, { records: [record], expiresAt });
      return;
    }

    const records = [...current.records, record];
    const overflow = records.length - this.historyMaxEntries;
    this.entries.set(key, {
      records: overflow > 0 ? records.slice(overflow) : records,
      expiresAt,
    });
  }

  async getLatest(key: string): Promise<StoredRecord | null> {
    return this.live(key)?.records.at(-1) ?? null;
  }

  async getAll(key: string): Promise<StoredRecord[] | null> {
    const entry = this.live(key);
    return entry ? [...entry.records] : null;
  }

  async delete(key: string): Promise<boolean> {
    if (this.live(key) === undefined) return false;
    return this.entries.delete(key);
  }

  async listKeys(limit: number): Promise<string[]> {
    const keys: string[] = [];
    for (const key of [...this.entries.keys()]) {
      if (keys.length >= limit) break;
      if (this.live(key) !== undefined) keys.push(key);
    }
    return keys;
  }

  async health(): Promise<StoreHealth> {
    return { backend: this.backend, reachable: true };
  }

  /** Entries currently held, including expired ones not yet swept. */
  size(): number {
    return this.entries.size;
  }

  private sweep(): void {
    const now = this.clock();
    if (now < this.nextSweepAt) return;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
    this.nextSweepAt = now + this.sweepIntervalMs;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
