/**
 * Flat-file row codec.
 *
 * Each record is one line of TAB-separated fields. Backslash, TAB, LF and CR
 * inside a field are written as two-character escapes, so a physical line
 * always holds exactly one record and a raw TAB is always a field boundary.
 */

import type { z } from 'zod';
import {
  EXPENSE_COLUMNS,
  ExpenseRowSchema,
  ExpenseSchema,
  USER_COLUMNS,
  UserRowSchema,
  UserSchema,
  describeIssues,
  type Expense,
  type NewExpense,
  type NewUser,
  type User,
} from '../models/index.js';
import type { EntityType } from './errors.js';

export const FIELD_DELIMITER = '\t';
export const RECORD_TERMINATOR = '\n';

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\t': '\\t',
  '\n': '\\n',
  '\r': '\\r',
};

const UNESCAPES: Record<string, string> = {
  '\\': '\\',
  t: '\t',
  n: '\n',
  r: '\r',
};

/**
 * Result of decoding untrusted text: a value, or the reason it was rejected.
 */
export type DecodeResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Escape a field so it contains no delimiter and no line break.
 */
export function escapeField(value: string): string {
  return value.replace(/[\\\t\n\r]/g, (ch) => ESCAPES[ch] ?? ch);
}

/**
 * Encode fields as one row, without the terminator.
 */
export function encodeRow(fields: readonly string[]): string {
  return fields.map(escapeField).join(FIELD_DELIMITER);
}

/**
 * Split one row into unescaped fields.
 */
export function decodeRow(line: string): DecodeResult<string[]> {
  const fields: string[] = [];
  let current = '';

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === FIELD_DELIMITER) {
      fields.push(current);
      current = '';
    } else if (ch === '\\') {
      const next = line[i + 1];
      const unescaped = next === undefined ? undefined : UNESCAPES[next];
      if (unescaped === undefined) {
        return {
          ok: false,
          reason:
            next === undefined
              ? 'row ends with an unfinished escape'
              : `invalid escape sequence "\\${next}" at column ${i + 1}`,
        };
      }
      current += unescaped;
      i++;
    } else if (ch === '\r' || ch === '\n') {
      return { ok: false, reason: `unescaped line break at column ${i + 1}` };
    } else {
      current += ch;
    }
  }
  fields.push(current);

  return { ok: true, value: fields };
}

/**
 * Describes how one entity type maps to rows of a backing file.
 *
 * @typeParam T - Stored record, id included
 * @typeParam TDraft - Record before an id is assigned
 */
export interface RecordCodec<T, TDraft> {
  readonly entity: EntityType;
  /** Header and field order of the backing file */
  readonly columns: readonly string[];
  /** Validates a complete in-memory record before it is written */
  readonly schema: z.ZodType<T>;
  /** Converts raw string fields into a validated record */
  readonly rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  idOf(record: T): number;
  withId(draft: TDraft, id: number): T;
  toDraft(record: T): TDraft;
  toFields(record: T): string[];
}

/**
 * Decode a field list with a codec's row schema.
 */
export function decodeRecord<T, TDraft>(
  codec: RecordCodec<T, TDraft>,
  fields: readonly string[]
): DecodeResult<T> {
  if (fields.length !== codec.columns.length) {
    return {
      ok: false,
      reason: `expected ${codec.columns.length} fields, got ${fields.length}`,
    };
  }
  const parsed = codec.rowSchema.safeParse(fields);
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error, codec.columns) };
  }
  return { ok: true, value: parsed.data };
}

export const userCodec: RecordCodec<User, NewUser> = {
  entity: 'user',
  columns: USER_COLUMNS,
  schema: UserSchema,
  rowSchema: UserRowSchema,
  idOf: (user) => user.user_id,
  withId: (draft, id) => ({ user_id: id, name: draft.name }),
  toDraft: (user) => ({ name: user.name }),
  toFields: (user) => [String(user.user_id), user.name],
};

export const expenseCodec: RecordCodec<Expense, NewExpense> = {
  entity: 'expense',
  columns: EXPENSE_COLUMNS,
  schema: ExpenseSchema,
  rowSchema: ExpenseRowSchema,
  idOf: (expense) => expense.expense_id,
  withId: (draft, id) => ({
    expense_id: id,
    user_id: draft.user_id,
    amount: draft.amount,
    date: draft.date,
    category: draft.category,
    description: draft.description,
  }),
  toDraft: (expense) => ({
    user_id: expense.user_id,
    amount: expense.amount,
    date: expense.date,
    category: expense.category,
    description: expense.description,
  }),
  toFields: (expense) => [
    String(expense.expense_id),
    String(expense.user_id),
    expense.amount,
    expense.date,
    expense.category,
    expense.description,
  ],
};
