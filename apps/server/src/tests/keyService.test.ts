import { describe, it } from 'node:test';
import assert from 'node:assert';
import { keyBetween, keysBetween } from '../services/keyService';
import { SMALLEST_INTEGER, isOrderKeyError, OrderKeyError } from '../index';

describe('keyService', () => {
  describe('keyBetween', () => {
    it('should return a0 for an empty list', () => {
      assert.deepStrictEqual(keyBetween({}), { ok: true, data: { key: 'a0' } });
    });

    it('should return a key between two keys', () => {
      assert.deepStrictEqual(
        keyBetween({ a: 'a1', b: 'a2' }),
        { ok: true, data: { key: 'a1V' } },
      );
    });

    it('should honour a custom alphabet', () => {
      assert.deepStrictEqual(
        keyBetween({ a: 'a0', b: 'a1', digits: '0123456789' }),
        { ok: true, data: { key: 'a05' } },
      );
    });

    it('should report codec errors by code', () => {
      const reversed = keyBetween({ a: 'b', b: 'a' });
      assert.strictEqual(reversed.ok, false);
      if (!reversed.ok) {
        assert.strictEqual(reversed.code, 'OrderingViolation');
        assert.strictEqual(reversed.message, 'b >= a');
      }

      const sentinel = keyBetween({ a: SMALLEST_INTEGER });
      assert.strictEqual(sentinel.ok, false);
      if (!sentinel.ok) {
        assert.strictEqual(sentinel.code, 'InvalidKey');
      }
    });

    it('should reject keys with digits outside the requested alphabet', () => {
      assert.deepStrictEqual(
        keyBetween({ a: 'a1V', b: 'a2', digits: '0123456789' }),
        { ok: false, code: 'InvalidKey', message: 'invalid order key: a1V' },
      );
    });

    it('should report malformed requests as VALIDATION_ERROR', () => {
      const wrongType = keyBetween({ a: 5 });
      assert.strictEqual(wrongType.ok, false);
      if (!wrongType.ok) assert.strictEqual(wrongType.code, 'VALIDATION_ERROR');

      const badDigits = keyBetween({ digits: 'ba' });
      assert.strictEqual(badDigits.ok, false);
      if (!badDigits.ok) assert.strictEqual(badDigits.code, 'VALIDATION_ERROR');
    });
  });

  describe('isOrderKeyError', () => {
    it('should tell codec errors from other errors', () => {
      assert.strictEqual(isOrderKeyError(new OrderKeyError('Exhausted', 'x')), true);
      assert.strictEqual(isOrderKeyError(new Error('x')), false);
      assert.strictEqual(isOrderKeyError('Exhausted'), false);
    });
  });

  describe('keysBetween', () => {
    it('should return n consecutive keys', () => {
      assert.deepStrictEqual(
        keysBetween({ a: 'a4', n: 3, digits: '0123456789' }, 100),
        { ok: true, data: { keys: ['a5', 'a6', 'a7'] } },
      );
    });

    it('should return an empty batch for n = 0', () => {
      assert.deepStrictEqual(
        keysBetween({ a: 'a0', b: 'a1', n: 0 }, 100),
        { ok: true, data: { keys: [] } },
      );
    });

    it('should enforce the batch limit', () => {
      const result = keysBetween({ n: 101 }, 100);
      assert.strictEqual(result.ok, false);
      if (!result.ok) assert.strictEqual(result.code, 'VALIDATION_ERROR');
    });

    it('should report codec errors by code', () => {
      const result = keysBetween({ a: 'a00', n: 2 }, 100);
      assert.strictEqual(result.ok, false);
      if (!result.ok) assert.strictEqual(result.code, 'InvalidKey');
    });
  });
});
