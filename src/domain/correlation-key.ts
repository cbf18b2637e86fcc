import type { Payload } from './record.js';

/**
 * Result of classifying an inbound body before any field lookup.
 */
export type InboundBody =
  | { readonly kind: 'mapping'; readonly body: Payload }
  | { readonly kind: 'other'; readonly value: unknown };

/** Ordered candidate field paths plus the sentinel used when none match. */
export interface KeyRule {
  readonly paths: readonly (readonly string[])[];
  readonly fallback: string;
}

/** `to` — open/generic deliveries. */
export const TO_KEY_RULE: KeyRule = {
  paths: [['to']],
  fallback: 'unknown',
};

/** `data.serviceId`, then `session_id`, then `id` — CloudEvents deliveries. */
export const SESSION_KEY_RULE: KeyRule = {
  paths: [['data', 'serviceId'], ['session_id'], ['id']],
  fallback: 'default',
};

export function isMapping(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function classifyBody(input: unknown): InboundBody {
  return isMapping(input)
    ? { kind: 'mapping', body: input }
    : { kind: 'other', value: input };
}

/**
 * Guarantees a mapping root: anything else is wrapped as `{ payload: <input> }`.
 */
export function normalizePayload(input: unknown): Payload {
  const classified = classifyBody(input);
  return classified.kind === 'mapping'
    ? classified.body
    : { payload: classified.value };
}

function lookup(payload: Payload, path: readonly string[]): unknown {
  let current: unknown = payload;
  for (const segment of path) {
    if (!isMapping(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function asKey(value: unknown): string | undefined {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

/**
 * Returns the first usable candidate of `rule`, or its sentinel.
 *
 * Usable means a non-empty string or a finite number. The result is never
 * empty.
 */
export function deriveCorrelationKey(payload: Payload, rule: KeyRule): string {
  for (const path of rule.paths) {
    const key = asKey(lookup(payload, path));
    if (key !== undefined) return key;
  }
  return rule.fallback;
}
