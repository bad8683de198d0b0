/**
 * Expense model.
 *
 * Amounts are decimal strings and dates are "YYYY-MM-DD" strings; both are
 * kept as text so that what is written is exactly what is read back.
 * Negative amounts are refunds or corrections.
 */

import { z } from 'zod';
import { DECIMAL_PATTERN } from '../utils/decimal.js';
import { isValidDate } from '../utils/date.js';
import { idColumn, text } from './common.js';

export const ExpenseSchema = z
  .object({
    expense_id: z.number().int().positive(),
    user_id: z.number().int().positive(),
    amount: z.string().regex(DECIMAL_PATTERN, 'Amount must be a decimal number'),
    date: z.string().refine(isValidDate, {
      message: 'Date must be a calendar date in YYYY-MM-DD format',
    }),
    category: text.refine((value) => value.length > 0, 'Category must not be empty'),
    description: text,
  })
  .strict();

export type Expense = z.infer<typeof ExpenseSchema>;

/**
 * An expense before an id has been assigned.
 */
export type NewExpense = Omit<Expense, 'expense_id'>;

/**
 * Fields that may be corrected after creation. Ownership never changes.
 */
export type ExpensePatch = Partial<Pick<Expense, 'amount' | 'date' | 'category' | 'description'>>;

/**
 * Column order of the expenses file.
 */
export const EXPENSE_COLUMNS = [
  'expense_id',
  'user_id',
  'amount',
  'date',
  'category',
  'description',
] as const;

/**
 * Decodes one raw row of the expenses file.
 */
export const ExpenseRowSchema = z
  .tuple([idColumn, idColumn, z.string(), z.string(), z.string(), z.string()])
  .transform(([expense_id, user_id, amount, date, category, description]) => ({
    expense_id,
    user_id,
    amount,
    date,
    category,
    description,
  }))
  .pipe(ExpenseSchema);
