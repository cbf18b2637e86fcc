/**
 * Core domain types for the hooklog record model.
 *
 * These types define the canonical shape of a persisted webhook delivery.
 * They carry no framework dependencies.
 */

/** Inbound body after root normalization — always a mapping. */
export type Payload = Record<string, unknown>;

/**
 * Unit of persistence.
 *
 * `payload` is stored verbatim. The enriched fields are only present for
 * deliveries that came through the CloudEvents path.
 */
export interface StoredRecord {
  readonly key: string;
  readonly receivedAt: string; // ISO-8601, UTC
  readonly payload: Payload;
  readonly eventId?: string;
  readonly messageId?: string;
  readonly text?: string;
  readonly sentBy?: string;
  readonly createdAt?: string;
  readonly sentAt?: string;
  readonly serviceId?: string;
}

/** `latest` keeps one record per key; `history` keeps the last N. */
export type StoreShape = 'latest' | 'history';

/** Key space a store instance operates in. */
export type StoreScope = 'to' | 'session';

/** Millisecond wall clock, injectable for TTL tests. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
