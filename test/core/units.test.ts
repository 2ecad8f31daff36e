import { describe, it, expect } from 'vitest';
import {
  RAY,
  parseUnits,
  formatUnits,
  toRay,
  formatRay,
  assertUint256,
  mulDiv,
  mulU256,
  addU256,
} from '../../src/core/units.js';
import { U256_MAX } from '../../src/core/types.js';
import { ArithmeticOverflowError } from '../../src/errors.js';

describe('unit conversions', () => {
  describe('parseUnits', () => {
    it('parses decimal strings', () => {
      expect(parseUnits('1.5', 18)).toBe(15n * 10n ** 17n);
      expect(parseUnits('0.000001', 6)).toBe(1n);
      expect(parseUnits('42', 0)).toBe(42n);
      expect(parseUnits('.5', 1)).toBe(5n);
    });

    it('truncates excess decimals', () => {
      expect(parseUnits('1.23456789', 6)).toBe(1234567n);
    });

    it('handles negative values', () => {
      expect(parseUnits('-2.5', 1)).toBe(-25n);
    });

    it('rejects malformed numbers', () => {
      expect(() => parseUnits('1.2.3', 18)).toThrow('Invalid number');
      expect(() => parseUnits('abc', 18)).toThrow('Invalid number');
      expect(() => parseUnits('', 18)).toThrow('Invalid number');
      expect(() => parseUnits('1', -1)).toThrow('Invalid decimals');
    });
  });

  describe('formatUnits', () => {
    it('formats with trailing zeros removed', () => {
      expect(formatUnits(15n * 10n ** 17n, 18)).toBe('1.5');
      expect(formatUnits(10n ** 18n, 18)).toBe('1');
      expect(formatUnits(1n, 6)).toBe('0.000001');
      expect(formatUnits(-25n, 1)).toBe('-2.5');
      expect(formatUnits(7n, 0)).toBe('7');
    });
  });

  describe('RAY ratios', () => {
    it('converts decimal ratios', () => {
      expect(RAY).toBe(10n ** 27n);
      expect(toRay('1.1')).toBe(11n * 10n ** 26n);
      expect(toRay(0.5)).toBe(5n * 10n ** 26n);
      expect(toRay(3n)).toBe(3n);
    });

    it('formats ratios', () => {
      expect(formatRay(12n * 10n ** 26n)).toBe('1.2');
      expect(formatRay(RAY)).toBe('1');
    });

    it('rejects negative ratios', () => {
      expect(() => toRay('-1')).toThrow(ArithmeticOverflowError);
    });
  });

  describe('checked arithmetic', () => {
    it('assertUint256 accepts the full range', () => {
      expect(() => assertUint256(0n, 'test')).not.toThrow();
      expect(() => assertUint256(U256_MAX, 'test')).not.toThrow();
      expect(() => assertUint256(U256_MAX + 1n, 'test')).toThrow(ArithmeticOverflowError);
      expect(() => assertUint256(-1n, 'test')).toThrow(ArithmeticOverflowError);
    });

    it('mulDiv truncates', () => {
      expect(mulDiv(7n, 3n, 2n)).toBe(10n);
      expect(mulDiv(1_178_880_000_000_000n, 11n * 10n ** 26n, RAY)).toBe(1_296_768_000_000_000n);
    });

    it('mulDiv allows a wide intermediate product', () => {
      expect(mulDiv(U256_MAX, 2n, 2n)).toBe(U256_MAX);
    });

    it('mulDiv rejects results that do not fit', () => {
      try {
        mulDiv(U256_MAX, 2n, 1n);
        expect.unreachable('mulDiv should overflow');
      } catch (error) {
        expect(error).toBeInstanceOf(ArithmeticOverflowError);
        expect(error).toMatchObject({ code: 'ARITHMETIC_OVERFLOW' });
      }
    });

    it('mulDiv rejects a zero denominator', () => {
      expect(() => mulDiv(1n, 1n, 0n)).toThrow('denominator must be positive');
    });

    it('mulU256 and addU256 check bounds', () => {
      expect(mulU256(3n, 4n)).toBe(12n);
      expect(addU256(3n, 4n)).toBe(7n);
      expect(() => mulU256(U256_MAX, 2n)).toThrow(ArithmeticOverflowError);
      expect(() => addU256(U256_MAX, 1n)).toThrow(ArithmeticOverflowError);
    });
  });
});
