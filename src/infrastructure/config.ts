import { z } from 'zod';
import type { StoreBackend, StoreShape } from '../domain/index.js';
import { ConfigError } from '../errors.js';

/**
 * Runtime configuration, read once from the environment at startup.
 */
export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  backend: StoreBackend;
  shape: StoreShape;
  redisUrl: string;
  namespace: string;
  recordTtlSeconds: number;
  idempotencyTtlSeconds: number;
  historyMaxEntries: number;
  messagesWebhookPath: string;
  sessionsWebhookPath: string;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const positiveInt = z.coerce.number().int().positive();
const routePath = z.string().regex(/^\/\S*$/, 'Must be an absolute path');

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: positiveInt.default(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STORE_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  STORE_SHAPE: z.enum(['latest', 'history']).default('latest'),
  REDIS_URL: z.string().min(1).default('redis://127.0.0.1:6379/0'),
  KEY_NAMESPACE: z.string().min(1).default('hooklog'),
  RECORD_TTL_SECONDS: positiveInt.default(86400),
  IDEMPOTENCY_TTL_SECONDS: positiveInt.optional(),
  HISTORY_MAX_ENTRIES: positiveInt.default(1000),
  MESSAGES_WEBHOOK_PATH: routePath.default('/webhooks/messages'),
  SESSIONS_WEBHOOK_PATH: routePath.default('/webhooks/events'),
});

/**
 * Validates the environment and maps it onto `AppConfig`.
 *
 * Empty variables count as unset. `IDEMPOTENCY_TTL_SECONDS` defaults to the
 * record TTL. Throws `ConfigError` listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') present[name] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    backend: e.STORE_BACKEND,
    shape: e.STORE_SHAPE,
    redisUrl: e.REDIS_URL,
    namespace: e.KEY_NAMESPACE,
    recordTtlSeconds: e.RECORD_TTL_SECONDS,
    idempotencyTtlSeconds: e.IDEMPOTENCY_TTL_SECONDS ?? e.RECORD_TTL_SECONDS,
    historyMaxEntries: e.HISTORY_MAX_ENTRIES,
    messagesWebhookPath: e.MESSAGES_WEBHOOK_PATH,
    sessionsWebhookPath: e.SESSIONS_WEBHOOK_PATH,
  };
}
