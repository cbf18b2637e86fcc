import { describe, it, expect, expectTypeOf, beforeEach, vi } from 'vitest';
import {
  createIngestionPipeline,
  MESSAGES_PROFILE,
  SESSIONS_PROFILE,
} from '../../src/application/index.js';
import type { IngestionDeps, IngestOutcome, StoredOutcome } from '../../src/application/index.js';
import { InMemoryEventStore, InMemoryIdempotencyGate } from '../../src/infrastructure/memory/index.js';
import { StoreUnavailableError } from '../../src/errors.js';
import { cloudEvent, fakeClock, fakeLogger } from '../helpers.js';

const RECEIVED_AT = '2026-03-01T10:00:00.000Z';

describe('createIngestionPipeline', () => {
  let clock: ReturnType<typeof fakeClock>;
  let store: InMemoryEventStore;
  let gate: InMemoryIdempotencyGate;
  let deps: IngestionDeps;

  beforeEach(() => {
    clock = fakeClock();
    store = new InMemoryEventStore({ shape: 'latest', historyMaxEntries: 1000, clock: clock.now });
    gate = new InMemoryIdempotencyGate(clock.now);
    deps = {
      store,
      idempotency: gate,
      recordTtlSeconds: 86400,
      idempotencyTtlSeconds: 3600,
      log: fakeLogger(),
      clock: clock.now,
    };
  });

  // ─── open profile ──────────────────────────────────────────

  describe('open profile', () => {
    it('stores the payload verbatim under its to field', async () => {
      const pipeline = createIngestionPipeline(MESSAGES_PROFILE, deps);
      const body = { to: '555', message: { text: 'hey' } };

      const result = await pipeline.ingest(body);

      expect(result).toEqual({
        outcome: 'stored',
        key: '555',
        record: { key: '555', receivedAt: RECEIVED_AT, payload: body },
      });
      expect((await store.getLatest('555'))?.payload).toEqual(body);
    });

    it('only ever yields a stored outcome', async () => {
      const pipeline = createIngestionPipeline(MESSAGES_PROFILE, deps);
      expectTypeOf(pipeline.ingest).returns.resolves.toEqualTypeOf<StoredOutcome>();
      expectTypeOf(createIngestionPipeline(SESSIONS_PROFILE, deps).ingest)
        .returns.resolves.toEqualTypeOf<IngestOutcome>();

      const result = await pipeline.ingest({ to: '555' });

      expect(result.key).toBe('555');
    });

    it('wraps a non-mapping body and stores it under "unknown"', async () => {
      const pipeline = createIngestionPipeline(MESSAGES_PROFILE, deps);

      const result = await pipeline.ingest([1, 2, 3]);

      expect(result.outcome).toBe('stored');
      expect(await store.getLatest('unknown')).toEqual({
        key: 'unknown',
        receivedAt: RECEIVED_AT,
        payload: { payload: [1, 2, 3] },
      });
    });

    it('does not filter or deduplicate', async () => {
      const pipeline = createIngestionPipeline(MESSAGES_PROFILE, deps);
      const body = cloudEvent({ type: 'something.else', to: '777' });

      await pipeline.ingest(body);
      const second = await pipeline.ingest(body);

      expect(second.outcome).toBe('stored');
      expect(await gate.seen('e1')).toBe(false);
    });

    it('overwrites the previous payload for the same key', async () => {
      const pipeline = createIngestionPipeline(MESSAGES_PROFILE, deps);

      await pipeline.ingest({ to: '555', n: 1 });
      await pipeline.ingest({ to: '555', n: 2 });

      expect((await store.getLatest('555'))?.payload).toEqual({ to: '555', n: 2 });
    });
  });

  // ─── cloudevent profile ────────────────────────────────────

  describe('cloudevent profile', () => {
    it('stores an enriched record keyed by data.serviceId', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);
      const body = cloudEvent();

      const result = await pipeline.ingest(body);

      expect(result.outcome).toBe('stored');
      expect(await store.getLatest('svc1')).toEqual({
        key: 'svc1',
        receivedAt: RECEIVED_AT,
        payload: body,
        eventId: 'e1',
        messageId: 'm1',
        text: 'hi',
        sentBy: 'user',
        createdAt: '2026-03-01T09:59:58Z',
        sentAt: '2026-03-01T09:59:59Z',
        serviceId: 'svc1',
      });
    });

    it('stores an empty text when the message carries none', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      await pipeline.ingest(cloudEvent({}, { text: undefined }));

      expect((await store.getLatest('svc1'))?.text).toBe('');
    });

    it('ignores a duplicate event id and keeps the first record', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      await pipeline.ingest(cloudEvent());
      const second = await pipeline.ingest(cloudEvent({}, { id: 'm2', text: 'changed' }));

      expect(second).toEqual({ outcome: 'ignored', reason: 'duplicate event', eventId: 'e1' });
      expect((await store.getLatest('svc1'))?.text).toBe('hi');
    });

    it('detects duplicates by event id even when the key differs', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      await pipeline.ingest(cloudEvent());
      const second = await pipeline.ingest(cloudEvent({}, { serviceId: 'svc2' }));

      expect(second.outcome).toBe('ignored');
      expect(await store.getLatest('svc2')).toBeNull();
    });

    it('ignores an unsupported event type without marking it', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      const result = await pipeline.ingest(cloudEvent({ type: 'amber.service:conversation:closed' }));

      expect(result).toEqual({ outcome: 'ignored', reason: 'unsupported type', eventId: 'e1' });
      expect(await gate.seen('e1')).toBe(false);
      expect(await store.getLatest('svc1')).toBeNull();
    });

    it('ignores an unsupported data.type after marking the id', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      const first = await pipeline.ingest(cloudEvent({}, { type: 'image' }));
      const retry = await pipeline.ingest(cloudEvent());

      expect(first).toEqual({ outcome: 'ignored', reason: 'unsupported data.type', eventId: 'e1' });
      expect(retry).toEqual({ outcome: 'ignored', reason: 'duplicate event', eventId: 'e1' });
      expect(await store.getLatest('svc1')).toBeNull();
    });

    it('accepts the same id again once its mark has expired', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      await pipeline.ingest(cloudEvent());
      clock.advance(3600);
      const again = await pipeline.ingest(cloudEvent({}, { text: 'again' }));

      expect(again.outcome).toBe('stored');
      expect((await store.getLatest('svc1'))?.text).toBe('again');
    });

    it('reports envelope mismatches as invalid', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);
      const body = cloudEvent();
      delete body['specversion'];

      const result = await pipeline.ingest(body);

      expect(result.outcome).toBe('invalid');
      if (result.outcome === 'invalid') {
        expect(result.issues.map((issue) => issue.path.join('.'))).toEqual(['specversion']);
      }
    });

    it('reports a non-mapping body as invalid', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      const result = await pipeline.ingest(['not', 'an', 'event']);

      expect(result.outcome).toBe('invalid');
    });

    it('stores every delivery when deduplication is off', async () => {
      const pipeline = createIngestionPipeline({ ...SESSIONS_PROFILE, deduplicate: false }, deps);

      await pipeline.ingest(cloudEvent());
      const second = await pipeline.ingest(cloudEvent({}, { text: 'again' }));

      expect(second.outcome).toBe('stored');
      expect(await gate.seen('e1')).toBe(false);
    });

    it('refuses a deduplicating profile without a gate', () => {
      const { idempotency: _unused, ...withoutGate } = deps;

      expect(() => createIngestionPipeline(SESSIONS_PROFILE, withoutGate)).toThrow(
        "Profile 'sessions' deduplicates but no idempotency gate was provided",
      );
    });

    it('logs ignored events with their reason', async () => {
      const pipeline = createIngestionPipeline(SESSIONS_PROFILE, deps);

      await pipeline.ingest(cloudEvent({ type: 'other' }));

      expect(deps.log.info).toHaveBeenCalledWith(
        { profile: 'sessions', event_id: 'e1', reason: 'unsupported type' },
        'Ignored webhook event',
      );
    });
  });

  // ─── backend failures ──────────────────────────────────────

  it('propagates store unavailability', async () => {
    vi.spyOn(store, 'put').mockRejectedValue(new StoreUnavailableError('put', new Error('down')));
    const pipeline = createIngestionPipeline(MESSAGES_PROFILE, deps);

    await expect(pipeline.ingest({ to: '555' })).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('writes with the configured record TTL', async () => {
    const put = vi.spyOn(store, 'put');
    const pipeline = createIngestionPipeline(MESSAGES_PROFILE, deps);

    await pipeline.ingest({ to: '555' });

    expect(put).toHaveBeenCalledWith('555', expect.objectContaining({ key: '555' }), 86400);
  });
});
