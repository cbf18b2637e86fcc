import type { BaseLogger } from 'pino';
import type { ZodIssue } from 'zod';
import {
  TO_KEY_RULE,
  SESSION_KEY_RULE,
  deriveCorrelationKey,
  normalizePayload,
  systemClock,
} from '../domain/index.js';
import type {
  Clock,
  EventStore,
  IdempotencyGate,
  KeyRule,
  StoredRecord,
} from '../domain/index.js';
import {
  cloudEventSchema,
  CONVERSATION_MESSAGE_TYPE,
  TEXT_MESSAGE_TYPE,
} from './cloud-event-schema.js';

export interface OpenIngestionProfile {
  readonly name: string;
  readonly mode: 'open';
  readonly keyRule: KeyRule;
}

export interface CloudEventIngestionProfile {
  readonly name: string;
  readonly mode: 'cloudevent';
  readonly keyRule: KeyRule;
  readonly deduplicate: boolean;
}

/**
 * How one webhook endpoint turns a body into a record.
 *
 * - `open`: any JSON is accepted and stored verbatim.
 * - `cloudevent`: the envelope is validated and filtered, optionally
 *   deduplicated by event id.
 */
export type IngestionProfile = OpenIngestionProfile | CloudEventIngestionProfile;

export const MESSAGES_PROFILE: OpenIngestionProfile = {
  name: 'messages',
  mode: 'open',
  keyRule: TO_KEY_RULE,
};

export const SESSIONS_PROFILE: CloudEventIngestionProfile = {
  name: 'sessions',
  mode: 'cloudevent',
  keyRule: SESSION_KEY_RULE,
  deduplicate: true,
};

export type IgnoreReason =
  | 'unsupported type'
  | 'duplicate event'
  | 'unsupported data.type';

export interface StoredOutcome {
  readonly outcome: 'stored';
  readonly key: string;
  readonly record: StoredRecord;
}

/** Open profiles only ever produce `StoredOutcome`. */
export type IngestOutcome =
  | StoredOutcome
  | { readonly outcome: 'ignored'; readonly reason: IgnoreReason; readonly eventId: string }
  | { readonly outcome: 'invalid'; readonly issues: ZodIssue[] };

export interface IngestionDeps {
  store: EventStore;
  /** Required when the profile deduplicates. */
  idempotency?: IdempotencyGate;
  recordTtlSeconds: number;
  idempotencyTtlSeconds: number;
  log: BaseLogger;
  clock?: Clock;
}

export interface IngestionPipeline<O extends IngestOutcome = IngestOutcome> {
  readonly profile: IngestionProfile;
  ingest(body: unknown): Promise<O>;
}

/**
 * Builds the single ingestion pipeline used by every webhook endpoint.
 *
 * Order for CloudEvents: envelope → type → duplicate check → mark →
 * data.type → store. The mark is written before the store write and the
 * two are not atomic, so concurrent deliveries of one id can both be stored.
 */
export function createIngestionPipeline(
  profile: OpenIngestionProfile,
  deps: IngestionDeps,
): IngestionPipeline<StoredOutcome>;
export function createIngestionPipeline(
  profile: CloudEventIngestionProfile,
  deps: IngestionDeps,
): IngestionPipeline;
export function createIngestionPipeline(
  profile: IngestionProfile,
  deps: IngestionDeps,
): IngestionPipeline {
  const clock = deps.clock ?? systemClock;

  if (profile.mode === 'cloudevent' && profile.deduplicate && deps.idempotency === undefined) {
    throw new Error(`Profile '${profile.name}' deduplicates but no idempotency gate was provided`);
  }

  async function store(key: string, record: StoredRecord): Promise<StoredOutcome> {
    await deps.store.put(key, record, deps.recordTtlSeconds);
    deps.log.debug({ profile: profile.name, key }, 'Stored webhook record');
    return { outcome: 'stored', key, record };
  }

  function ignore(eventId: string, reason: IgnoreReason): IngestOutcome {
    deps.log.info({ profile: profile.name, event_id: eventId, reason }, 'Ignored webhook event');
    return { outcome: 'ignored', reason, eventId };
  }

  async function ingestOpen(body: unknown): Promise<StoredOutcome> {
    const payload = normalizePayload(body);
    const key = deriveCorrelationKey(payload, profile.keyRule);

    return store(key, {
      key,
      receivedAt: new Date(clock()).toISOString(),
      payload,
    });
  }

  async function ingestCloudEvent(body: unknown, deduplicate: boolean): Promise<IngestOutcome> {
    const parsed = cloudEventSchema.safeParse(body);
    if (!parsed.success) {
      return { outcome: 'invalid', issues: parsed.error.issues };
    }

    const event = parsed.data;

    if (event.type !== CONVERSATION_MESSAGE_TYPE) {
      return ignore(event.id, 'unsupported type');
    }

    if (deduplicate && deps.idempotency !== undefined) {
      if (await deps.idempotency.seen(event.id)) {
        return ignore(event.id, 'duplicate event');
      }
      await deps.idempotency.mark(event.id, deps.idempotencyTtlSeconds);
    }

    if (event.data.type !== TEXT_MESSAGE_TYPE) {
      return ignore(event.id, 'unsupported data.type');
    }

    const payload = normalizePayload(body);
    const key = deriveCorrelationKey(payload, profile.keyRule);

    return store(key, {
      key,
      receivedAt: new Date(clock()).toISOString(),
      payload,
      eventId: event.id,
      messageId: event.data.id,
      text: event.data.text ?? '',
      sentBy: event.data.by,
      createdAt: event.data.createdAt,
      sentAt: event.data.sentAt,
      serviceId: event.data.serviceId,
    });
  }

  return {
    profile,
    ingest(body: unknown): Promise<IngestOutcome> {
      return profile.mode === 'open'
        ? ingestOpen(body)
        : ingestCloudEvent(body, profile.deduplicate);
    },
  };
}
