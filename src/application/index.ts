export {
  cloudEventSchema,
  messageDataSchema,
  CONVERSATION_MESSAGE_TYPE,
  TEXT_MESSAGE_TYPE,
} from './cloud-event-schema.js';
export type { CloudEventMessage } from './cloud-event-schema.js';
export {
  createIngestionPipeline,
  MESSAGES_PROFILE,
  SESSIONS_PROFILE,
} from './ingest-webhook.js';
export type {
  IngestionProfile,
  OpenIngestionProfile,
  CloudEventIngestionProfile,
  IngestionDeps,
  IngestionPipeline,
  IngestOutcome,
  StoredOutcome,
  IgnoreReason,
} from './ingest-webhook.js';
export {
  getLatestRecord,
  getRecordHistory,
  removeRecords,
  listResidentKeys,
} from './query-records.js';
export type { ListKeysParams } from './query-records.js';
export { checkHealth } from './check-health.js';
export type { HealthSettings, HealthReport, HealthCheck } from './check-health.js';
