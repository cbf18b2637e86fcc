import { systemClock } from '../domain/index.js';
import type { Clock, EventStore, StoreShape } from '../domain/index.js';

export interface HealthSettings {
  recordTtlSeconds: number;
  idempotencyTtlSeconds: number;
  shape: StoreShape;
  historyMaxEntries: number;
}

export interface HealthReport {
  status: 'up' | 'degraded';
  now_utc: string;
  backend: string;
  backend_reachable: boolean;
  ttl_seconds: number;
  idempotency_ttl_seconds: number;
  store_shape: StoreShape;
  history_max_entries: number | null;
}

export interface HealthCheck {
  report: HealthReport;
  /** Error raised by the backend's liveness check; set only when degraded. */
  cause?: unknown;
}

/**
 * Liveness snapshot: backend reachability plus the TTL/shape settings in force.
 * `history_max_entries` is null when the store keeps only the latest record.
 */
export async function checkHealth(
  store: EventStore,
  settings: HealthSettings,
  clock: Clock = systemClock,
): Promise<HealthCheck> {
  const health = await store.health();

  const report: HealthReport = {
    status: health.reachable ? 'up' : 'degraded',
    now_utc: new Date(clock()).toISOString(),
    backend: health.backend,
    backend_reachable: health.reachable,
    ttl_seconds: settings.recordTtlSeconds,
    idempotency_ttl_seconds: settings.idempotencyTtlSeconds,
    store_shape: settings.shape,
    history_max_entries: settings.shape === 'history' ? settings.historyMaxEntries : null,
  };

  return health.reachable ? { report } : { report, cause: health.error };
}
