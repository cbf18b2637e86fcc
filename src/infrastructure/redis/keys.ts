import type { StoreScope, StoreShape } from '../../domain/index.js';

/**
 * Persisted key layout — one flat namespace, no secondary indexes.
 *
 *   {ns}:to:{key}                latest record for an open delivery
 *   {ns}:to:{key}:messages       history list for an open delivery
 *   {ns}:session:{key}           latest record for a CloudEvents delivery
 *   {ns}:session:{key}:messages  history list for a CloudEvents delivery
 *   {ns}:event:{eventId}         idempotency mark
 */
export function recordKey(
  namespace: string,
  scope: StoreScope,
  key: string,
  shape: StoreShape,
): string {
  const base = `${namespace}:${scope}:${key}`;
  return shape === 'history' ? `${base}:messages` : base;
}

export function eventMarkKey(namespace: string, eventId: string): string {
  return `${namespace}:event:${eventId}`;
}
