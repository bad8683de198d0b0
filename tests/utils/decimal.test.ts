/**
 * Unit tests for exact decimal arithmetic.
 */

import { describe, test, expect } from 'vitest';
import {
  addDecimals,
  compareDecimals,
  isDecimal,
  normalizeDecimal,
  sumDecimals,
} from '../../src/utils/decimal.js';

describe('isDecimal', () => {
  test('accepts signed integers and fractions', () => {
    expect(isDecimal('40')).toBe(true);
    expect(isDecimal('40.00')).toBe(true);
    expect(isDecimal('-12.50')).toBe(true);
  });

  test('rejects text that is not a plain decimal', () => {
    expect(isDecimal('')).toBe(false);
    expect(isDecimal('.5')).toBe(false);
    expect(isDecimal('5.')).toBe(false);
    expect(isDecimal('1e3')).toBe(false);
    expect(isDecimal('12,50')).toBe(false);
    expect(isDecimal('+5')).toBe(false);
  });
});

describe('normalizeDecimal', () => {
  test('trims whitespace and drops a leading plus sign', () => {
    expect(normalizeDecimal(' +40.00 ')).toBe('40.00');
  });

  test('keeps the digits exactly as written', () => {
    expect(normalizeDecimal('12.500')).toBe('12.500');
    expect(normalizeDecimal('-0.5')).toBe('-0.5');
  });

  test('returns undefined instead of coercing bad input to zero', () => {
    expect(normalizeDecimal('')).toBeUndefined();
    expect(normalizeDecimal('abc')).toBeUndefined();
    expect(normalizeDecimal('12,50')).toBeUndefined();
    expect(normalizeDecimal('NaN')).toBeUndefined();
  });
});

describe('addDecimals', () => {
  test('adds a refund and an expense exactly', () => {
    expect(addDecimals('-12.50', '40.00')).toBe('27.50');
  });

  test('keeps the larger scale', () => {
    expect(addDecimals('1.5', '2.25')).toBe('3.75');
    expect(addDecimals('10', '0.05')).toBe('10.05');
  });

  test('does not drift like binary floating point', () => {
    expect(addDecimals('0.1', '0.2')).toBe('0.3');
  });

  test('prints a zero result without a sign', () => {
    expect(addDecimals('-12.50', '12.50')).toBe('0.00');
  });

  test('handles results between -1 and 0', () => {
    expect(addDecimals('5', '-5.25')).toBe('-0.25');
  });

  test('throws on text that is not a decimal', () => {
    expect(() => addDecimals('abc', '1')).toThrow('Not a decimal amount: abc');
  });
});

describe('sumDecimals', () => {
  test('returns "0" for no values', () => {
    expect(sumDecimals([])).toBe('0');
  });

  test('sums mixed signs and scales', () => {
    expect(sumDecimals(['0.1', '0.2', '0.3'])).toBe('0.6');
    expect(sumDecimals(['-0.50', '0.5'])).toBe('0.00');
    expect(sumDecimals(['-12.50', '40.00', '3'])).toBe('30.50');
  });

  test('stays exact beyond the safe integer range', () => {
    expect(sumDecimals(['9007199254740993.01', '0.01'])).toBe('9007199254740993.02');
  });
});

describe('compareDecimals', () => {
  test('compares by value regardless of scale', () => {
    expect(compareDecimals('1.0', '1')).toBe(0);
    expect(compareDecimals('-2', '1.5')).toBe(-1);
    expect(compareDecimals('10.01', '10.001')).toBe(1);
  });
});
