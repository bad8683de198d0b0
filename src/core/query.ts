/**
 * Read-only queries and aggregations over expenses.
 *
 * Everything here is a pure function of the expense sequence it is given;
 * nothing is mutated.
 */

import type { Expense } from '../models/index.js';
import { compareDecimals, sumDecimals } from '../utils/decimal.js';
import { monthOf } from '../utils/date.js';

/**
 * Predicate set for selecting expenses. Every present constraint must hold;
 * absent constraints impose nothing.
 */
export interface ExpenseFilter {
  /** Owner, exact match */
  userId?: number;
  /** Inclusive lower bound (YYYY-MM-DD) */
  startDate?: string;
  /** Inclusive upper bound (YYYY-MM-DD) */
  endDate?: string;
  /** A string matches exactly; a RegExp is tested against the category */
  category?: string | RegExp;
  /** Case-insensitive substring of the description */
  search?: string;
  /** Inclusive lower bound on the signed amount */
  minAmount?: string;
  /** Inclusive upper bound on the signed amount */
  maxAmount?: string;
}

export type SortKey = 'id' | 'date' | 'amount' | 'category';
export type SortOrder = 'asc' | 'desc';

export interface SortOptions {
  sortBy: SortKey;
  order?: SortOrder;
}

/**
 * Keys an aggregation can group by.
 */
export type GroupKey = 'category' | 'month';

export interface ExpenseSummary {
  total: string;
  count: number;
  by_category: Record<string, string>;
  by_month: Record<string, string>;
}

function matchesCategory(category: string, wanted: string | RegExp): boolean {
  if (typeof wanted === 'string') {
    return category === wanted;
  }
  // Global and sticky patterns carry state between test() calls
  wanted.lastIndex = 0;
  return wanted.test(category);
}

function compareBy(key: SortKey): (a: Expense, b: Expense) => number {
  switch (key) {
    case 'id':
      return (a, b) => a.expense_id - b.expense_id;
    case 'date':
      return (a, b) => a.date.localeCompare(b.date);
    case 'amount':
      return (a, b) => compareDecimals(a.amount, b.amount);
    case 'category':
      return (a, b) => a.category.localeCompare(b.category);
  }
}

/**
 * Select the expenses matching a predicate set.
 *
 * Results keep the input (insertion) order unless a sort is requested.
 * Sorting is stable, so ties keep insertion order as well.
 */
export function filterExpenses(
  expenses: readonly Expense[],
  filter: ExpenseFilter = {},
  sort?: SortOptions
): Expense[] {
  const { userId, startDate, endDate, category, search, minAmount, maxAmount } = filter;
  const searchLower = search?.toLowerCase();

  const result = expenses.filter((expense) => {
    if (userId !== undefined && expense.user_id !== userId) return false;
    if (startDate !== undefined && expense.date < startDate) return false;
    if (endDate !== undefined && expense.date > endDate) return false;
    if (category !== undefined && !matchesCategory(expense.category, category)) return false;
    if (searchLower !== undefined && !expense.description.toLowerCase().includes(searchLower)) {
      return false;
    }
    if (minAmount !== undefined && compareDecimals(expense.amount, minAmount) < 0) return false;
    if (maxAmount !== undefined && compareDecimals(expense.amount, maxAmount) > 0) return false;
    return true;
  });

  if (sort) {
    const compare = compareBy(sort.sortBy);
    const direction = sort.order === 'desc' ? -1 : 1;
    result.sort((a, b) => direction * compare(a, b));
  }

  return result;
}

/**
 * Exact sum of amounts. No expenses sum to "0".
 */
export function totalAmount(expenses: readonly Expense[]): string {
  return sumDecimals(expenses.map((expense) => expense.amount));
}

/**
 * Sum amounts per category or per month ("YYYY-MM").
 *
 * Only keys that occur appear in the result, in order of first occurrence.
 */
export function groupBy(expenses: readonly Expense[], key: GroupKey): Map<string, string> {
  const buckets = new Map<string, string[]>();
  for (const expense of expenses) {
    const bucketKey = key === 'category' ? expense.category : monthOf(expense.date);
    const amounts = buckets.get(bucketKey);
    if (amounts) {
      amounts.push(expense.amount);
    } else {
      buckets.set(bucketKey, [expense.amount]);
    }
  }

  const totals = new Map<string, string>();
  for (const [bucketKey, amounts] of buckets) {
    totals.set(bucketKey, sumDecimals(amounts));
  }
  return totals;
}

/**
 * Total, count and per-category / per-month breakdowns of the given expenses.
 */
export function summarize(expenses: readonly Expense[]): ExpenseSummary {
  return {
    total: totalAmount(expenses),
    count: expenses.length,
    by_category: Object.fromEntries(groupBy(expenses, 'category')),
    by_month: Object.fromEntries(groupBy(expenses, 'month')),
  };
}
