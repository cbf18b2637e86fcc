import { vi } from 'vitest';
import type { BaseLogger } from 'pino';
import type { Redis } from 'ioredis';
import { CONVERSATION_MESSAGE_TYPE } from '../src/application/cloud-event-schema.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    level: 'info',
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  } as unknown as BaseLogger;
}

/** Mutable clock starting at 2026-03-01T10:00:00Z. */
export function fakeClock(start = Date.parse('2026-03-01T10:00:00.000Z')) {
  let now = start;
  return {
    now: () => now,
    advance(seconds: number) {
      now += seconds * 1000;
    },
  };
}

/** Well-formed CloudEvents message; override envelope or data fields per test. */
export function cloudEvent(
  overrides: Record<string, unknown> = {},
  data: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    specversion: '1.0',
    id: 'e1',
    type: CONVERSATION_MESSAGE_TYPE,
    source: 'test-platform',
    subject: 'conversation',
    time: '2026-03-01T09:59:58Z',
    datacontenttype: 'application/json',
    data: {
      id: 'm1',
      type: 'text',
      createdAt: '2026-03-01T09:59:58Z',
      sentAt: '2026-03-01T09:59:59Z',
      by: 'user',
      serviceId: 'svc1',
      text: 'hi',
      ...data,
    },
    ...overrides,
  };
}

type Value = string | string[];

interface FakeMulti {
  rpush(key: string, value: string): FakeMulti;
  expire(key: string, seconds: number): FakeMulti;
  ltrim(key: string, start: number, stop: number): FakeMulti;
  exec(): Promise<[Error | null, unknown][]>;
}

interface Slot {
  value: Value;
  expiresAt: number | null;
}

/**
 * In-process stand-in for the Redis commands the adapters issue:
 * SET EX, GET, EXISTS, DEL, LINDEX, LRANGE, PING and MULTI(RPUSH, EXPIRE, LTRIM).
 *
 * Set `down = true` to make every command reject like a lost connection.
 */
export class FakeRedis {
  down = false;
  readonly ttls: Map<string, number> = new Map();
  private readonly data: Map<string, Slot> = new Map();

  constructor(private readonly clock: () => number = () => Date.now()) {}

  asRedis(): Redis {
    return this as unknown as Redis;
  }

  async set(key: string, value: string, mode: 'EX', seconds: number): Promise<'OK'> {
    this.guard();
    this.data.set(key, { value, expiresAt: this.deadline(mode, seconds) });
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async get(key: string): Promise<string | null> {
    this.guard();
    const slot = this.live(key);
    return slot && typeof slot.value === 'string' ? slot.value : null;
  }

  async exists(key: string): Promise<number> {
    this.guard();
    return this.live(key) ? 1 : 0;
  }

  async del(key: string): Promise<number> {
    this.guard();
    if (!this.live(key)) return 0;
    this.data.delete(key);
    return 1;
  }

  async lindex(key: string, index: number): Promise<string | null> {
    this.guard();
    const list = this.list(key);
    return list.at(index) ?? null;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.guard();
    const list = this.list(key);
    const from = start < 0 ? Math.max(list.length + start, 0) : start;
    const to = stop < 0 ? list.length + stop : stop;
    return list.slice(from, to + 1);
  }

  async ping(): Promise<'PONG'> {
    this.guard();
    return 'PONG';
  }

  multi(): FakeMulti {
    const ops: Array<() => void> = [];
    const chain: FakeMulti = {
      rpush: (key: string, value: string) => {
        ops.push(() => {
          const slot = this.live(key);
          const list = slot && Array.isArray(slot.value) ? slot.value : [];
          this.data.set(key, { value: [...list, value], expiresAt: slot?.expiresAt ?? null });
        });
        return chain;
      },
      expire: (key: string, seconds: number) => {
        ops.push(() => {
          const slot = this.live(key);
          if (slot) slot.expiresAt = this.deadline('EX', seconds);
          this.ttls.set(key, seconds);
        });
        return chain;
      },
      ltrim: (key: string, start: number, stop: number) => {
        ops.push(() => {
          const slot = this.live(key);
          if (!slot || !Array.isArray(slot.value)) return;
          const list = slot.value;
          const from = start < 0 ? Math.max(list.length + start, 0) : start;
          const to = stop < 0 ? list.length + stop : stop;
          slot.value = list.slice(from, to + 1);
        });
        return chain;
      },
      exec: async (): Promise<[Error | null, unknown][]> => {
        this.guard();
        return ops.map((op): [Error | null, unknown] => {
          op();
          return [null, 'OK'];
        });
      },
    };
    return chain;
  }

  private deadline(_mode: 'EX', seconds: number): number {
    return this.clock() + seconds * 1000;
  }

  private list(key: string): string[] {
    const slot = this.live(key);
    return slot && Array.isArray(slot.value) ? slot.value : [];
  }

  private live(key: string): Slot | undefined {
    const slot = this.data.get(key);
    if (!slot) return undefined;
    if (slot.expiresAt !== null && slot.expiresAt <= this.clock()) {
      this.data.delete(key);
      return undefined;
    }
    return slot;
  }

  private guard(): void {
    if (this.down) throw new Error('Connection is closed.');
  }
}
