import { z } from 'zod';
import type { StoredRecord } from '../../domain/index.js';
import { RecordDecodeError } from '../../errors.js';

const storedRecordSchema = z.object({
  key: z.string(),
  receivedAt: z.string(),
  payload: z.record(z.string(), z.unknown()),
  eventId: z.string().optional(),
  messageId: z.string().optional(),
  text: z.string().optional(),
  sentBy: z.string().optional(),
  createdAt: z.string().optional(),
  sentAt: z.string().optional(),
  serviceId: z.string().optional(),
});

export function encodeRecord(record: StoredRecord): string {
  return JSON.stringify(record);
}

/**
 * Parses a value read from Redis back into a StoredRecord.
 * `storageKey` is only used for the error message.
 */
export function decodeRecord(storageKey: string, raw: string): StoredRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new RecordDecodeError(storageKey, err);
  }

  const parsed = storedRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw new RecordDecodeError(storageKey, parsed.error);
  }
  return parsed.data;
}
