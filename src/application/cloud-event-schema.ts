import { z } from 'zod';

/** The only CloudEvents `type` that carries a conversation message. */
export const CONVERSATION_MESSAGE_TYPE = 'amber.service:conversation:message';

/** The only `data.type` that is persisted. */
export const TEXT_MESSAGE_TYPE = 'text';

/**
 * Zod schema for the message carried in `data`.
 *
 * `text` is optional: non-text messages (media, system notices) omit it.
 */
export const messageDataSchema = z.object({
  id: z.string(),
  type: z.string(),
  createdAt: z.string(),
  sentAt: z.string(),
  by: z.string(),
  serviceId: z.string(),
  text: z.string().nullish(),
});

/**
 * Zod schema for the structured webhook envelope.
 *
 * Only the envelope shape is enforced here. Whether the event is
 * supported (type, data.type, duplicates) is decided during ingestion.
 */
export const cloudEventSchema = z.object({
  specversion: z.string(),
  id: z.string(),
  type: z.string(),
  source: z.string(),
  subject: z.string(),
  time: z.string(),
  datacontenttype: z.string(),
  data: messageDataSchema,
});

export type CloudEventMessage = z.infer<typeof cloudEventSchema>;
