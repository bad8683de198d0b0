/**
 * Database layer for the expense ledger.
 *
 * Owns one record store per entity type and answers queries by reading
 * through them. Writes go straight to the stores.
 */

import { join } from 'path';
import { RecordStore } from './record-store.js';
import { expenseCodec, userCodec } from './codec.js';
import { NotFoundError } from './errors.js';
import {
  filterExpenses,
  groupBy,
  summarize,
  totalAmount,
  type ExpenseFilter,
  type ExpenseSummary,
  type GroupKey,
  type SortOptions,
} from './query.js';
import type { Expense, ExpensePatch, NewExpense, NewUser, User } from '../models/index.js';
import { sumDecimals } from '../utils/decimal.js';

/** File holding users inside the data directory */
export const USERS_FILE = 'users.tsv';

/** File holding expenses inside the data directory */
export const EXPENSES_FILE = 'expenses.tsv';

/**
 * Per-category statistics.
 */
export interface CategoryStats {
  category: string;
  count: number;
  total: string;
}

/**
 * File-backed expense database.
 */
export class ExpenseDatabase {
  private readonly dataDir: string;
  private readonly users: RecordStore<User, NewUser>;
  private readonly expenses: RecordStore<Expense, NewExpense>;

  /**
   * @param dataDir - Directory holding the backing files. Created on first write.
   */
  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.users = new RecordStore(userCodec, join(dataDir, USERS_FILE));
    this.expenses = new RecordStore(expenseCodec, join(dataDir, EXPENSES_FILE));
  }

  /**
   * Get the data directory.
   */
  getDataDir(): string {
    return this.dataDir;
  }

  // ============================================
  // Users
  // ============================================

  addUser(user: NewUser): User {
    return this.users.append(user);
  }

  getUsers(): User[] {
    return this.users.loadAll();
  }

  /**
   * @throws NotFoundError if the user does not exist
   */
  getUser(userId: number): User {
    const user = this.users.get(userId);
    if (!user) {
      throw new NotFoundError('user', userId);
    }
    return user;
  }

  /**
   * Look up a user by exact name.
   */
  findUserByName(name: string): User | undefined {
    return this.users.loadAll().find((user) => user.name === name);
  }

  renameUser(userId: number, name: string): User {
    return this.users.update(userId, { name });
  }

  // ============================================
  // Expenses
  // ============================================

  /**
   * Store a new expense for an existing user.
   *
   * @throws NotFoundError if the owning user does not exist
   */
  addExpense(expense: NewExpense): Expense {
    this.getUser(expense.user_id);
    return this.expenses.append(expense);
  }

  getExpense(expenseId: number): Expense | undefined {
    return this.expenses.get(expenseId);
  }

  /**
   * Get expenses matching a predicate set, in insertion order unless a
   * sort is given.
   */
  getExpenses(filter: ExpenseFilter = {}, sort?: SortOptions): Expense[] {
    return filterExpenses(this.expenses.loadAll(), filter, sort);
  }

  /**
   * @throws NotFoundError if the expense does not exist
   */
  updateExpense(expenseId: number, patch: ExpensePatch): Expense {
    return this.expenses.update(expenseId, patch);
  }

  deleteExpense(expenseId: number): boolean {
    return this.expenses.delete(expenseId);
  }

  // ============================================
  // Aggregations
  // ============================================

  /**
   * Exact sum of amounts over the matching expenses; "0" if none match.
   */
  total(filter: ExpenseFilter = {}): string {
    return totalAmount(this.getExpenses(filter));
  }

  /**
   * Sum of amounts per category or month over the matching expenses.
   */
  groupBy(key: GroupKey, filter: ExpenseFilter = {}): Map<string, string> {
    return groupBy(this.getExpenses(filter), key);
  }

  summary(filter: ExpenseFilter = {}): ExpenseSummary {
    return summarize(this.getExpenses(filter));
  }

  /**
   * Distinct categories among the matching expenses with their counts and
   * totals, sorted by name.
   */
  getCategories(filter: ExpenseFilter = {}): CategoryStats[] {
    const amountsByCategory = new Map<string, string[]>();
    for (const expense of this.getExpenses(filter)) {
      const amounts = amountsByCategory.get(expense.category) ?? [];
      amounts.push(expense.amount);
      amountsByCategory.set(expense.category, amounts);
    }

    return Array.from(amountsByCategory, ([category, amounts]) => ({
      category,
      count: amounts.length,
      total: sumDecimals(amounts),
    })).sort((a, b) => a.category.localeCompare(b.category));
  }
}
