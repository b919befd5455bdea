/**
 * Public surface of the key codec, for callers that link it in-process
 * instead of going through the HTTP API.
 */
export {
  BASE_10_DIGITS,
  BASE_62_DIGITS,
  INTEGER_ZERO,
  SMALLEST_INTEGER,
  generateKeyBetween,
  generateNKeysBetween,
  validateOrderKey,
} from './lib/fractionalIndex';
export { OrderKeyError, isOrderKeyError, type OrderKeyErrorCode } from './lib/orderKeyError';
export { VERSION } from './lib/version';
