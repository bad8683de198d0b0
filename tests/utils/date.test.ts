/**
 * Unit tests for date utilities.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { getMonthRange, isValidDate, monthOf, parsePeriod } from '../../src/utils/date.js';

describe('isValidDate', () => {
  test('accepts real calendar days', () => {
    expect(isValidDate('2024-03-01')).toBe(true);
    expect(isValidDate('2024-12-31')).toBe(true);
  });

  test('accepts February 29 only in leap years', () => {
    expect(isValidDate('2024-02-29')).toBe(true);
    expect(isValidDate('2000-02-29')).toBe(true);
    expect(isValidDate('2023-02-29')).toBe(false);
    expect(isValidDate('1900-02-29')).toBe(false);
  });

  test('rejects days past the end of the month', () => {
    expect(isValidDate('2024-04-31')).toBe(false);
    expect(isValidDate('2024-02-30')).toBe(false);
  });

  test('rejects out-of-range months and days', () => {
    expect(isValidDate('2024-13-01')).toBe(false);
    expect(isValidDate('2024-00-10')).toBe(false);
    expect(isValidDate('2024-01-00')).toBe(false);
  });

  test('rejects other formats', () => {
    expect(isValidDate('2024-3-1')).toBe(false);
    expect(isValidDate('03/01/2024')).toBe(false);
    expect(isValidDate('2024-03-01T00:00:00Z')).toBe(false);
    expect(isValidDate('')).toBe(false);
  });
});

describe('monthOf', () => {
  test('returns the YYYY-MM prefix', () => {
    expect(monthOf('2024-03-15')).toBe('2024-03');
  });
});

describe('parsePeriod', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("parses 'this_month' period", () => {
    vi.setSystemTime(new Date('2026-01-15T12:00:00Z'));
    const [start, end] = parsePeriod('this_month');
    expect(start).toBe('2026-01-01');
    expect(end).toBe('2026-01-31');
  });

  test("parses 'last_month' period across a year boundary", () => {
    vi.setSystemTime(new Date('2026-01-15T12:00:00Z'));
    const [start, end] = parsePeriod('last_month');
    expect(start).toBe('2025-12-01');
    expect(end).toBe('2025-12-31');
  });

  test("parses 'last_month' when the previous month is February", () => {
    vi.setSystemTime(new Date('2026-03-15T12:00:00Z'));
    const [start, end] = parsePeriod('last_month');
    expect(start).toBe('2026-02-01');
    expect(end).toBe('2026-02-28');
  });

  test("parses 'this_year' and 'last_year' periods", () => {
    vi.setSystemTime(new Date('2026-01-15T12:00:00Z'));
    expect(parsePeriod('this_year')).toEqual(['2026-01-01', '2026-12-31']);
    expect(parsePeriod('last_year')).toEqual(['2025-01-01', '2025-12-31']);
  });

  test("parses rolling 'last_N_days' periods", () => {
    vi.setSystemTime(new Date('2026-01-15T12:00:00Z'));
    expect(parsePeriod('last_7_days')).toEqual(['2026-01-08', '2026-01-15']);
    expect(parsePeriod('last_30_days')).toEqual(['2025-12-16', '2026-01-15']);
    expect(parsePeriod('last_90_days')).toEqual(['2025-10-17', '2026-01-15']);
  });

  test("parses 'ytd' (year to date) period", () => {
    vi.setSystemTime(new Date('2026-01-15T12:00:00Z'));
    expect(parsePeriod('ytd')).toEqual(['2026-01-01', '2026-01-15']);
  });

  test('throws error for invalid period', () => {
    expect(() => parsePeriod('invalid_period')).toThrow('Unknown period');
  });
});

describe('getMonthRange', () => {
  test('gets range for January', () => {
    expect(getMonthRange(2026, 1)).toEqual(['2026-01-01', '2026-01-31']);
  });

  test('gets range for February in non-leap and leap years', () => {
    expect(getMonthRange(2026, 2)).toEqual(['2026-02-01', '2026-02-28']);
    expect(getMonthRange(2024, 2)).toEqual(['2024-02-01', '2024-02-29']);
  });

  test('gets range for April (30 days)', () => {
    expect(getMonthRange(2026, 4)).toEqual(['2026-04-01', '2026-04-30']);
  });

  test('throws error for invalid month', () => {
    expect(() => getMonthRange(2026, 13)).toThrow('Month must be between 1 and 12, got 13');
    expect(() => getMonthRange(2026, 0)).toThrow('Month must be between 1 and 12, got 0');
  });
});
