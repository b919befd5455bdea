/**
 * lib/orderKeyError.ts
 *
 * Error type thrown by the key codec. Every failure is a deterministic
 * validation failure, so callers switch on `code` rather than retrying.
 */

export type OrderKeyErrorCode =
  | 'InvalidHead'
  | 'InvalidIntegerPart'
  | 'InvalidKey'
  | 'OrderingViolation'
  | 'TrailingZero'
  | 'Exhausted'
  | 'InvalidCount';

export class OrderKeyError extends Error {
  readonly code: OrderKeyErrorCode;

  constructor(code: OrderKeyErrorCode, message: string) {
    super(message);
    this.name = 'OrderKeyError';
    this.code = code;
  }
}

export function isOrderKeyError(value: unknown): value is OrderKeyError {
  return value instanceof OrderKeyError;
}
