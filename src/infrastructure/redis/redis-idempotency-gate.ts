import type { Redis } from 'ioredis';
import type { IdempotencyGate } from '../../domain/index.js';
import { StoreUnavailableError } from '../../errors.js';
import { eventMarkKey } from './keys.js';

/**
 * Idempotency marks as `{ns}:event:{eventId}` keys holding "1" with their
 * own TTL. `seen` and `mark` are separate round-trips.
 */
export class RedisIdempotencyGate implements IdempotencyGate {
  constructor(
    private readonly redis: Redis,
    private readonly namespace: string,
  ) {}

  async seen(eventId: string): Promise<boolean> {
    try {
      return (await this.redis.exists(eventMarkKey(this.namespace, eventId))) > 0;
    } catch (err: unknown) {
      throw new StoreUnavailableError('seen', err);
    }
  }

  async mark(eventId: string, ttlSeconds: number): Promise<void> {
    try {
      await this.redis.set(eventMarkKey(this.namespace, eventId), '1', 'EX', ttlSeconds);
    } catch (err: unknown) {
      throw new StoreUnavailableError('mark', err);
    }
  }
}
