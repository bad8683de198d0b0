/**
 * Argument schemas for the ledger tools.
 *
 * Each tool parses its arguments through one of these before touching the
 * database.
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { describeIssues } from '../models/index.js';
import { normalizeDecimal } from '../utils/decimal.js';
import { PERIODS, isValidDate } from '../utils/date.js';

/** Largest page a list query may request */
export const MAX_QUERY_LIMIT = 10000;

const id = z.number().int().positive();

const amount = z.string().transform((value, ctx) => {
  const normalized = normalizeDecimal(value);
  if (normalized === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid amount "${value}"` });
    return z.NEVER;
  }
  return normalized;
});

const date = z
  .string()
  .refine(isValidDate, (value) => ({ message: `Invalid date "${value}", expected YYYY-MM-DD` }));

const name = z.string().trim().min(1, 'Name must not be empty');

const category = z.string().trim().min(1, 'Category must not be empty');

export const AddUserArgsSchema = z.object({ name });

export const UserIdArgsSchema = z.object({ user_id: id });

export const RenameUserArgsSchema = z.object({ user_id: id, name });

export const AddExpenseArgsSchema = z.object({
  user_id: id,
  amount,
  date,
  category,
  description: z.string().optional(),
});

export const ExpenseIdArgsSchema = z.object({
  expense_id: id,
  /** When given, the expense must belong to this user */
  user_id: id.optional(),
});

export const UpdateExpenseArgsSchema = ExpenseIdArgsSchema.extend({
  amount: amount.optional(),
  date: date.optional(),
  category: category.optional(),
  description: z.string().optional(),
});

export const FilterArgsSchema = z.object({
  user_id: id.optional(),
  period: z.enum(PERIODS).optional(),
  start_date: date.optional(),
  end_date: date.optional(),
  category: z.string().optional(),
  category_pattern: z.string().optional(),
  search: z.string().optional(),
  min_amount: amount.optional(),
  max_amount: amount.optional(),
});

export const ListExpensesArgsSchema = FilterArgsSchema.extend({
  sort_by: z.enum(['id', 'date', 'amount', 'category']).optional(),
  order: z.enum(['asc', 'desc']).optional(),
  limit: z.number().int().min(1).max(MAX_QUERY_LIMIT).optional(),
  offset: z.number().int().min(0).optional(),
});

export type AddUserArgs = z.input<typeof AddUserArgsSchema>;
export type UserIdArgs = z.input<typeof UserIdArgsSchema>;
export type RenameUserArgs = z.input<typeof RenameUserArgsSchema>;
export type AddExpenseArgs = z.input<typeof AddExpenseArgsSchema>;
export type ExpenseIdArgs = z.input<typeof ExpenseIdArgsSchema>;
export type UpdateExpenseArgs = z.input<typeof UpdateExpenseArgsSchema>;
export type FilterArgs = z.input<typeof FilterArgsSchema>;
export type ListExpensesArgs = z.input<typeof ListExpensesArgsSchema>;

/** Filter arguments after validation and normalization */
export type FilterOptions = z.output<typeof FilterArgsSchema>;

/**
 * Arguments of a tool: the documented shape, or whatever object a client
 * sent. Either way they go through the tool's schema first.
 */
export type ToolArgs<T> = T | Record<string, unknown>;

/**
 * Parse tool arguments, raising ValidationError on the first bad field.
 * Missing arguments are treated as an empty object.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path[0];
    throw new ValidationError(
      describeIssues(parsed.error),
      typeof field === 'string' ? field : undefined
    );
  }
  return parsed.data;
}
