import { systemClock } from '../../domain/index.js';
import type { Clock, IdempotencyGate } from '../../domain/index.js';
import { DEFAULT_SWEEP_INTERVAL_SECONDS } from './in-memory-event-store.js';

/**
 * Process-local idempotency marks with per-mark expiry.
 *
 * An expired mark is dropped when looked up; `mark` also sweeps every
 * expired mark at most once per sweep interval.
 */
export class InMemoryIdempotencyGate implements IdempotencyGate {
  private readonly marks: Map<string, number> = new Map();
  private readonly sweepIntervalMs: number;
  private nextSweepAt: number;

  constructor(
    private readonly clock: Clock = systemClock,
    sweepIntervalSeconds: number = DEFAULT_SWEEP_INTERVAL_SECONDS,
  ) {
    this.sweepIntervalMs = sweepIntervalSeconds * 1000;
    this.nextSweepAt = this.clock() + this.sweepIntervalMs;
  }

  async seen(eventId: string): Promise<boolean> {
    const expiresAt = this.marks.get(eventId);
    if (expiresAt === undefined) return false;
    if (expiresAt <= this.clock()) {
      this.marks.delete(eventId);
      return false;
    }
    return true;
  }

  async mark(eventId: string, ttlSeconds: number): Promise<void> {
    this.sweep();
    this.marks.set(eventId, this.clock() + ttlSeconds * 1000);
  }

  /** Marks currently held, including expired ones not yet swept. */
  size(): number {
    return this.marks.size;
  }

  private sweep(): void {
    const now = this.clock();
    if (now < this.nextSweepAt) return;

    for (const [eventId, expiresAt] of this.marks) {
      if (expiresAt <= now) this.marks.delete(eventId);
    }
    this.nextSweepAt = now + this.sweepIntervalMs;
  }
}
