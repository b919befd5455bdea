/**
 * services/keyService.ts
 *
 * Validates key-generation requests and runs them through the codec.
 * Transport-free: routes/keys.ts maps the outcome onto HTTP.
 *
 * Codec failures come back as `{ ok: false, code }` with the codec's own
 * error code (InvalidKey, OrderingViolation, Exhausted, …). Anything that
 * is not an OrderKeyError is a bug and is rethrown.
 */
import {
  BASE_62_DIGITS,
  generateKeyBetween,
  generateNKeysBetween,
} from '../lib/fractionalIndex';
import { isOrderKeyError } from '../lib/orderKeyError';
import {
  KeyBetweenRequestSchema,
  makeKeysBetweenRequestSchema,
} from '../validation/keySchema';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ServiceResult<T> {
  ok:    true;
  data:  T;
}

export interface ServiceError {
  ok:    false;
  code:  string;
  message: string;
}

export type ServiceOutcome<T> = ServiceResult<T> | ServiceError;

// ── Helpers ───────────────────────────────────────────────────────────────────

function runCodec<T>(label: string, fn: () => T): ServiceOutcome<T> {
  try {
    return { ok: true, data: fn() };
  } catch (err) {
    if (isOrderKeyError(err)) {
      return { ok: false, code: err.code, message: err.message };
    }
    console.error(`[keyService.${label}]`, err);
    throw err;
  }
}

// ── Operations ────────────────────────────────────────────────────────────────

/** One key strictly between `a` and `b`. */
export function keyBetween(raw: unknown): ServiceOutcome<{ key: string }> {
  const parsed = KeyBetweenRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, code: 'VALIDATION_ERROR', message: parsed.error.message };
  }

  const { a, b, digits = BASE_62_DIGITS } = parsed.data;
  return runCodec('keyBetween', () => ({
    key: generateKeyBetween(a, b, digits),
  }));
}

/** `n` ascending keys strictly between `a` and `b`. */
export function keysBetween(
  raw:      unknown,
  maxBatch: number,
): ServiceOutcome<{ keys: string[] }> {
  const parsed = makeKeysBetweenRequestSchema(maxBatch).safeParse(raw);
  if (!parsed.success) {
    return { ok: false, code: 'VALIDATION_ERROR', message: parsed.error.message };
  }

  const { a, b, n, digits = BASE_62_DIGITS } = parsed.data;
  return runCodec('keysBetween', () => ({
    keys: generateNKeysBetween(a, b, n, digits),
  }));
}
