/**
 * validation/keySchema.ts
 *
 * Zod schemas for the key-generation endpoints.
 * Shape checks only: whether a key is well formed is decided by the codec,
 * which reports its own error codes.
 */
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

/** Upper bound on stored key length accepted over HTTP. */
export const MAX_KEY_LENGTH = 512;

export const OrderKeySchema = z
  .string({ invalid_type_error: 'key must be a string' })
  .min(1, 'key must not be empty')
  .max(MAX_KEY_LENGTH, 'key too long');

/** Absent, null and a key are all accepted; absent is read as null. */
const boundSchema = OrderKeySchema.nullable()
  .optional()
  .transform((value) => value ?? null);

function isStrictlyAscending(digits: string): boolean {
  for (let i = 1; i < digits.length; i++) {
    if (digits.charCodeAt(i - 1) >= digits.charCodeAt(i)) return false;
  }
  return true;
}

/**
 * Digit alphabet — at least two characters, strictly ascending by
 * character code. The codec trusts its alphabet, so this is the only check.
 */
export const DigitsSchema = z
  .string({ invalid_type_error: 'digits must be a string' })
  .min(2, 'digits must contain at least two characters')
  .refine(isStrictlyAscending, {
    message: 'digits must be strictly ascending by character code',
  });

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/** POST /api/keys/between */
export const KeyBetweenRequestSchema = z.object({
  a:      boundSchema,
  b:      boundSchema,
  digits: DigitsSchema.optional(),
});
export type KeyBetweenRequest = z.infer<typeof KeyBetweenRequestSchema>;

/** POST /api/keys/batch — `n` is capped by the configured MAX_BATCH. */
export function makeKeysBetweenRequestSchema(maxBatch: number) {
  return KeyBetweenRequestSchema.extend({
    n: z
      .number({ invalid_type_error: 'n must be a number' })
      .int({ message: 'n must be an integer' })
      .nonnegative({ message: 'n must not be negative' })
      .max(maxBatch, { message: `n must be at most ${maxBatch}` }),
  });
}
export type KeysBetweenRequest = z.infer<
  ReturnType<typeof makeKeysBetweenRequestSchema>
>;
