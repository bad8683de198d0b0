/**
 * Unit tests for the flat-file row codec.
 */

import { describe, test, expect } from 'vitest';
import {
  decodeRecord,
  decodeRow,
  encodeRow,
  escapeField,
  expenseCodec,
  userCodec,
} from '../../src/core/codec.js';

describe('escapeField', () => {
  test('leaves ordinary text untouched', () => {
    expect(escapeField('Lunch, with friends')).toBe('Lunch, with friends');
  });

  test('escapes backslash, tab, newline and carriage return', () => {
    expect(escapeField('a\tb\nc\\d\re')).toBe('a\\tb\\nc\\\\d\\re');
  });
});

describe('encodeRow / decodeRow', () => {
  test('joins escaped fields with tabs', () => {
    expect(encodeRow(['1', 'x\ty', ''])).toBe('1\tx\\ty\t');
  });

  test('splits on raw tabs and unescapes', () => {
    expect(decodeRow('1\tx\\ty\t')).toEqual({ ok: true, value: ['1', 'x\ty', ''] });
  });

  test('an empty line is one empty field', () => {
    expect(decodeRow('')).toEqual({ ok: true, value: [''] });
  });

  test('round-trips fields holding every special character', () => {
    const fields = ['tab\there', 'line\nbreak', 'back\\slash', 'cr\r', '\\t literal', ''];
    const decoded = decodeRow(encodeRow(fields));
    expect(decoded).toEqual({ ok: true, value: fields });
  });

  test('rejects an unknown escape sequence', () => {
    expect(decodeRow('a\\qb')).toEqual({
      ok: false,
      reason: 'invalid escape sequence "\\q" at column 2',
    });
  });

  test('rejects a trailing lone backslash', () => {
    expect(decodeRow('abc\\')).toEqual({
      ok: false,
      reason: 'row ends with an unfinished escape',
    });
  });

  test('rejects a raw line break', () => {
    expect(decodeRow('a\rb')).toEqual({
      ok: false,
      reason: 'unescaped line break at column 2',
    });
  });
});

describe('decodeRecord', () => {
  test('decodes a valid expense row', () => {
    const result = decodeRecord(expenseCodec, ['1', '2', '-12.50', '2024-03-01', 'refund', '']);
    expect(result).toEqual({
      ok: true,
      value: {
        expense_id: 1,
        user_id: 2,
        amount: '-12.50',
        date: '2024-03-01',
        category: 'refund',
        description: '',
      },
    });
  });

  test('decodes a valid user row', () => {
    expect(decodeRecord(userCodec, ['3', 'Ada'])).toEqual({
      ok: true,
      value: { user_id: 3, name: 'Ada' },
    });
  });

  test('rejects the wrong field count', () => {
    expect(decodeRecord(expenseCodec, ['1', '1'])).toEqual({
      ok: false,
      reason: 'expected 6 fields, got 2',
    });
  });

  test('rejects an unparsable amount instead of coercing it', () => {
    const result = decodeRecord(expenseCodec, ['1', '1', 'abc', '2024-03-01', 'food', '']);
    expect(result).toEqual({ ok: false, reason: 'amount: Amount must be a decimal number' });
  });

  test('rejects an empty amount', () => {
    const result = decodeRecord(expenseCodec, ['1', '1', '', '2024-03-01', 'food', '']);
    expect(result).toEqual({ ok: false, reason: 'amount: Amount must be a decimal number' });
  });

  test('rejects an impossible date', () => {
    const result = decodeRecord(expenseCodec, ['1', '1', '5.00', '2024-02-30', 'food', '']);
    expect(result).toEqual({
      ok: false,
      reason: 'date: Date must be a calendar date in YYYY-MM-DD format',
    });
  });

  test('names the column of a malformed id', () => {
    const result = decodeRecord(expenseCodec, ['01', '1', '5.00', '2024-03-01', 'food', '']);
    expect(result).toEqual({ ok: false, reason: 'expense_id: must be a positive integer' });
  });

  test('rejects an id that a number cannot hold exactly', () => {
    expect(decodeRecord(userCodec, ['9007199254740993', 'Ada'])).toEqual({
      ok: false,
      reason: 'user_id: must not exceed 9007199254740991',
    });
    expect(decodeRecord(userCodec, ['9007199254740991', 'Ada'])).toEqual({
      ok: true,
      value: { user_id: 9007199254740991, name: 'Ada' },
    });
  });

  test('rejects an empty category', () => {
    const result = decodeRecord(expenseCodec, ['1', '1', '5.00', '2024-03-01', '', '']);
    expect(result).toEqual({ ok: false, reason: 'category: Category must not be empty' });
  });
});

describe('entity codecs', () => {
  test('expense fields follow the column order', () => {
    const fields = expenseCodec.toFields({
      expense_id: 7,
      user_id: 1,
      amount: '40.00',
      date: '2024-03-15',
      category: 'food',
      description: 'groceries',
    });
    expect(fields).toEqual(['7', '1', '40.00', '2024-03-15', 'food', 'groceries']);
    expect(expenseCodec.columns).toEqual([
      'expense_id',
      'user_id',
      'amount',
      'date',
      'category',
      'description',
    ]);
  });

  test('withId and toDraft are inverses', () => {
    const draft = { name: 'Ada' };
    const user = userCodec.withId(draft, 4);
    expect(user).toEqual({ user_id: 4, name: 'Ada' });
    expect(userCodec.toDraft(user)).toEqual(draft);
  });
});
