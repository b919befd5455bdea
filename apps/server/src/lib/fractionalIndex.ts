/**
 * lib/fractionalIndex.ts
 *
 * String order keys that can always be placed between two existing keys.
 *
 * A key is an integer part followed by a fractional part:
 *
 *   a1V   →  integer "a1", fraction "V"
 *   Zz    →  integer "Zz", no fraction
 *   b00   →  integer "b00", no fraction
 *
 * The first character of the integer part (the head) fixes its length:
 * `a` is two characters long, `b` three, … `z` twenty-seven. Uppercase
 * heads are the negative mirror: `Z` is two characters, `A` twenty-seven.
 * Because length grows with the head, plain string comparison orders keys
 * the same way as the numbers they encode.
 *
 * Rules:
 *   new item at top:    generateKeyBetween(null, first)
 *   new item at bottom: generateKeyBetween(last, null)
 *   between two items:  generateKeyBetween(prev, next)
 *
 * Nothing here holds state; every function maps strings to strings.
 */
import { OrderKeyError } from './orderKeyError';

export const BASE_62_DIGITS =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

export const BASE_10_DIGITS = '0123456789';

/** Smallest integer part. Reserved: never valid as a key on its own. */
export const SMALLEST_INTEGER = 'A' + '0'.repeat(26);

/** The key handed out when a list is empty. */
export const INTEGER_ZERO = 'a0';

// ── Integer-part codec ────────────────────────────────────────────────────────

/**
 * Total length of an integer part, given its head character.
 */
export function headLength(head: string): number {
  if (head >= 'a' && head <= 'z' && head.length === 1) {
    return head.charCodeAt(0) - 'a'.charCodeAt(0) + 2;
  }
  if (head >= 'A' && head <= 'Z' && head.length === 1) {
    return 'Z'.charCodeAt(0) - head.charCodeAt(0) + 2;
  }
  throw new OrderKeyError('InvalidHead', `invalid order key head: ${head}`);
}

/** Leading integer part of `key`. */
export function integerPart(key: string): string {
  const length = headLength(key.charAt(0));
  if (length > key.length) {
    throw new OrderKeyError('InvalidKey', `invalid order key: ${key}`);
  }
  return key.slice(0, length);
}

export function validateInteger(int: string): void {
  if (int.length !== headLength(int.charAt(0))) {
    throw new OrderKeyError(
      'InvalidIntegerPart',
      `invalid integer part of order key: ${int}`,
    );
  }
}

/**
 * Throws unless `key` could have been produced by generateKeyBetween()
 * over `digits`.
 */
export function validateOrderKey(key: string, digits: string = BASE_62_DIGITS): void {
  if (key === SMALLEST_INTEGER) {
    throw new OrderKeyError('InvalidKey', `invalid order key: ${key}`);
  }
  // integerPart() throws on a bad head or a key shorter than its head implies
  const int = integerPart(key);
  for (let i = 1; i < key.length; i++) {
    if (!digits.includes(key.charAt(i))) {
      throw new OrderKeyError('InvalidKey', `invalid order key: ${key}`);
    }
  }
  const fraction = key.slice(int.length);
  if (fraction.endsWith(digits.charAt(0))) {
    throw new OrderKeyError('InvalidKey', `invalid order key: ${key}`);
  }
}

// ── Integer arithmetic ────────────────────────────────────────────────────────

/**
 * Adds one to an integer part. Returns null once the largest `z…` value
 * has been reached.
 */
export function incrementInteger(int: string, digits: string): string | null {
  validateInteger(int);
  const zero = digits.charAt(0);
  const head = int.charAt(0);
  const body = int.slice(1);

  // Walk right to left; `kept` is the untouched prefix, `tail` the rewritten suffix.
  let tail = '';
  for (let i = body.length - 1; i >= 0; i--) {
    const next = digits.indexOf(body.charAt(i)) + 1;
    if (next < digits.length) {
      return head + body.slice(0, i) + digits.charAt(next) + tail;
    }
    tail = zero + tail;
  }

  // Every digit rolled over
  if (head === 'Z') return 'a' + zero;
  if (head === 'z') return null;

  const nextHead = String.fromCharCode(head.charCodeAt(0) + 1);
  return nextHead > 'a'
    ? nextHead + tail + zero
    : nextHead + tail.slice(0, -1);
}

/**
 * Subtracts one from an integer part. Returns null once the smallest
 * `A…` value has been reached.
 */
export function decrementInteger(int: string, digits: string): string | null {
  validateInteger(int);
  const zero = digits.charAt(0);
  const last = digits.charAt(digits.length - 1);
  const head = int.charAt(0);
  const body = int.slice(1);

  let tail = '';
  for (let i = body.length - 1; i >= 0; i--) {
    const digit = body.charAt(i);
    if (digit !== zero) {
      const prev = digits.indexOf(digit) - 1;
      return head + body.slice(0, i) + digits.charAt(prev) + tail;
    }
    tail = last + tail;
  }

  // Every digit borrowed
  if (head === 'a') return 'Z' + last;
  if (head === 'A') return null;

  const prevHead = String.fromCharCode(head.charCodeAt(0) - 1);
  return prevHead < 'Z'
    ? prevHead + tail + last
    : prevHead + tail.slice(0, -1);
}

export function incrementIntegerOrThrow(int: string, digits: string): string {
  const result = incrementInteger(int, digits);
  if (result === null) {
    throw new OrderKeyError('Exhausted', `cannot increment ${int} any further`);
  }
  return result;
}

export function decrementIntegerOrThrow(int: string, digits: string): string {
  const result = decrementInteger(int, digits);
  if (result === null) {
    throw new OrderKeyError('Exhausted', `cannot decrement ${int} any further`);
  }
  return result;
}

// ── Midpoint ──────────────────────────────────────────────────────────────────

/**
 * Returns the shortest fraction strictly between `a` and `b`.
 *
 * @param a  Lower bound, possibly empty.
 * @param b  Upper bound, or null for "no upper bound". Non-empty when given.
 * @param digits  Alphabet, ascending by character code.
 */
export function midpoint(a: string, b: string | null, digits: string): string {
  const zero = digits.charAt(0);

  if (b !== null && a >= b) {
    throw new OrderKeyError('OrderingViolation', `${a} >= ${b}`);
  }
  if (a.endsWith(zero) || (b !== null && b.endsWith(zero))) {
    throw new OrderKeyError('TrailingZero', 'trailing zero');
  }

  if (b !== null) {
    // Strip the common prefix, reading `a` as zero-padded. `b` needs no
    // padding: it cannot end inside a prefix it shares with a smaller `a`.
    let n = 0;
    while (n < b.length && (n < a.length ? a.charAt(n) : zero) === b.charAt(n)) {
      n++;
    }
    if (n > 0) {
      return b.slice(0, n) + midpoint(a.slice(n), b.slice(n), digits);
    }
  }

  const digitA = a.length > 0 ? digits.indexOf(a.charAt(0)) : 0;
  const digitB = b !== null ? digits.indexOf(b.charAt(0)) : digits.length;

  if (digitB - digitA > 1) {
    return digits.charAt(Math.round(0.5 * (digitA + digitB)));
  }

  // First digits are consecutive
  if (b !== null && b.length > 1) {
    return b.charAt(0);
  }

  // e.g. midpoint('49', '5') → '4' + midpoint('9', null) → '495'
  return digits.charAt(digitA) + midpoint(a.slice(1), null, digits);
}

// ── Key generation ────────────────────────────────────────────────────────────

/**
 * Returns a key that sorts strictly between `a` and `b`.
 *
 * @param a  Key of the item above, or null if inserting at the top.
 * @param b  Key of the item below, or null if inserting at the bottom.
 */
export function generateKeyBetween(
  a: string | null,
  b: string | null,
  digits: string = BASE_62_DIGITS,
): string {
  if (a !== null && b !== null && a >= b) {
    throw new OrderKeyError('OrderingViolation', `${a} >= ${b}`);
  }
  if (a !== null) validateOrderKey(a, digits);
  if (b !== null) validateOrderKey(b, digits);

  if (a === null) {
    if (b === null) return INTEGER_ZERO;

    const ib = integerPart(b);
    const fb = b.slice(ib.length);
    if (ib === SMALLEST_INTEGER) {
      return ib + midpoint('', fb, digits);
    }
    if (ib < b) {
      return ib;
    }
    return decrementIntegerOrThrow(ib, digits);
  }

  const ia = integerPart(a);
  const fa = a.slice(ia.length);

  if (b === null) {
    return incrementInteger(ia, digits) ?? ia + midpoint(fa, null, digits);
  }

  const ib = integerPart(b);
  const fb = b.slice(ib.length);

  if (ia === ib) {
    return ia + midpoint(fa, fb, digits);
  }

  const next = incrementIntegerOrThrow(ia, digits);
  return next < b ? next : ia + midpoint(fa, null, digits);
}

/**
 * Returns `n` ascending keys between `a` and `b`.
 *
 * With one bound open the keys are consecutive integers (a0, a1, a2, …);
 * with both bounds present the range is bisected so keys stay short.
 */
export function generateNKeysBetween(
  a: string | null,
  b: string | null,
  n: number,
  digits: string = BASE_62_DIGITS,
): string[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new OrderKeyError('InvalidCount', `invalid key count: ${n}`);
  }
  if (n === 0) return [];
  if (n === 1) return [generateKeyBetween(a, b, digits)];

  if (b === null) {
    const keys: string[] = [];
    let lower = a;
    for (let i = 0; i < n; i++) {
      lower = generateKeyBetween(lower, null, digits);
      keys.push(lower);
    }
    return keys;
  }

  if (a === null) {
    const keys: string[] = [];
    let upper = b;
    for (let i = 0; i < n; i++) {
      upper = generateKeyBetween(null, upper, digits);
      keys.push(upper);
    }
    return keys.reverse();
  }

  const mid = Math.floor(n / 2);
  const c = generateKeyBetween(a, b, digits);
  return [
    ...generateNKeysBetween(a, c, mid, digits),
    c,
    ...generateNKeysBetween(c, b, n - mid - 1, digits),
  ];
}
