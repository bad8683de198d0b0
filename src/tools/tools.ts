/**
 * Ledger tool definitions.
 *
 * The function surface through which clients (the MCP server, scripts,
 * tests) read and change the ledger. Arguments use snake_case keys, the
 * same shape the MCP clients send.
 */

import { utils } from 'xlsx';
import { ExpenseDatabase, type CategoryStats } from '../core/database.js';
import { NotFoundError, ValidationError } from '../core/errors.js';
import type { ExpenseFilter, ExpenseSummary, SortOptions } from '../core/query.js';
import {
  EXPENSE_COLUMNS,
  type Expense,
  type ExpensePatch,
  type User,
} from '../models/index.js';
import { DEFAULT_CATEGORIES, isDefaultCategory } from '../utils/categories.js';
import { parsePeriod } from '../utils/date.js';
import {
  AddExpenseArgsSchema,
  AddUserArgsSchema,
  ExpenseIdArgsSchema,
  FilterArgsSchema,
  ListExpensesArgsSchema,
  MAX_QUERY_LIMIT,
  RenameUserArgsSchema,
  UpdateExpenseArgsSchema,
  UserIdArgsSchema,
  parseArgs,
  type AddExpenseArgs,
  type AddUserArgs,
  type ExpenseIdArgs,
  type FilterArgs,
  type FilterOptions,
  type ListExpensesArgs,
  type RenameUserArgs,
  type ToolArgs,
  type UpdateExpenseArgs,
  type UserIdArgs,
} from './schemas.js';

/** Line ending of exported CSV rows */
const CSV_ROW_TERMINATOR = '\n';

/**
 * Result of {@link ExpenseLedgerTools.listCategories}.
 */
export interface CategoryListing {
  categories: Array<CategoryStats & { is_default: boolean }>;
  /** Default categories not used yet */
  suggestions: string[];
}

/**
 * Build the engine's predicate set from parsed filter arguments.
 *
 * An explicit start_date or end_date overrides the matching bound of a period.
 */
function toFilter({
  user_id,
  period,
  start_date,
  end_date,
  category,
  category_pattern,
  search,
  min_amount,
  max_amount,
}: FilterOptions): ExpenseFilter {
  if (category !== undefined && category_pattern !== undefined) {
    throw new ValidationError('Use either category or category_pattern, not both', 'category');
  }

  const [periodStart, periodEnd] = period ? parsePeriod(period) : [undefined, undefined];

  return {
    userId: user_id,
    startDate: start_date ?? periodStart,
    endDate: end_date ?? periodEnd,
    category: category_pattern !== undefined ? compilePattern(category_pattern) : category,
    search,
    minAmount: min_amount,
    maxAmount: max_amount,
  };
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'i');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid category_pattern: ${detail}`, 'category_pattern');
  }
}

/**
 * Collection of tools over an expense database.
 *
 * Every method validates its own arguments, so callers may pass what a
 * client sent without checking it first.
 */
export class ExpenseLedgerTools {
  private db: ExpenseDatabase;

  /**
   * @param database - ExpenseDatabase instance
   */
  constructor(database: ExpenseDatabase) {
    this.db = database;
  }

  // ============================================
  // Users
  // ============================================

  /**
   * Register a user. Names are unique.
   */
  addUser(args: ToolArgs<AddUserArgs>): User {
    const { name } = parseArgs(AddUserArgsSchema, args);
    if (this.db.findUserByName(name)) {
      throw new ValidationError(`User already exists: ${name}`, 'name');
    }
    return this.db.addUser({ name });
  }

  listUsers(): User[] {
    return this.db.getUsers();
  }

  getUser(args: ToolArgs<UserIdArgs>): User {
    const { user_id } = parseArgs(UserIdArgsSchema, args);
    return this.db.getUser(user_id);
  }

  renameUser(args: ToolArgs<RenameUserArgs>): User {
    const { user_id, name } = parseArgs(RenameUserArgsSchema, args);
    const existing = this.db.findUserByName(name);
    if (existing && existing.user_id !== user_id) {
      throw new ValidationError(`User already exists: ${name}`, 'name');
    }
    return this.db.renameUser(user_id, name);
  }

  // ============================================
  // Expenses
  // ============================================

  /**
   * Record an expense. Amount and date are validated before anything is
   * written; a negative amount records a refund or correction.
   */
  addExpense(args: ToolArgs<AddExpenseArgs>): Expense {
    const { user_id, amount, date, category, description } = parseArgs(AddExpenseArgsSchema, args);
    return this.db.addExpense({
      user_id,
      amount,
      date,
      category,
      description: description ?? '',
    });
  }

  /**
   * Get one expense, optionally scoped to its owner.
   */
  getExpense(args: ToolArgs<ExpenseIdArgs>): Expense {
    const { expense_id, user_id } = parseArgs(ExpenseIdArgsSchema, args);
    return this.findOwnedExpense(expense_id, user_id);
  }

  /**
   * List expenses matching the filters, in insertion order unless sort_by
   * is given. offset and limit page the filtered, sorted list; without a
   * limit everything from offset on is returned.
   */
  listExpenses(args: ToolArgs<ListExpensesArgs> = {}): Expense[] {
    const { sort_by, order, limit, offset = 0, ...filter } = parseArgs(
      ListExpensesArgsSchema,
      args
    );
    const sort: SortOptions | undefined = sort_by ? { sortBy: sort_by, order } : undefined;
    const expenses = this.db.getExpenses(toFilter(filter), sort);
    return limit === undefined ? expenses.slice(offset) : expenses.slice(offset, offset + limit);
  }

  /**
   * Correct amount, date, category or description of an expense. Fields
   * that are not given keep their stored values.
   */
  updateExpense(args: ToolArgs<UpdateExpenseArgs>): Expense {
    const { expense_id, user_id, amount, date, category, description } = parseArgs(
      UpdateExpenseArgsSchema,
      args
    );
    const existing = this.findOwnedExpense(expense_id, user_id);

    const patch: ExpensePatch = {};
    if (amount !== undefined) patch.amount = amount;
    if (date !== undefined) patch.date = date;
    if (category !== undefined) patch.category = category;
    if (description !== undefined) patch.description = description;

    if (Object.keys(patch).length === 0) {
      return existing;
    }
    return this.db.updateExpense(expense_id, patch);
  }

  /**
   * Delete an expense.
   *
   * @returns false if no such expense exists (or it belongs to another user)
   */
  deleteExpense(args: ToolArgs<ExpenseIdArgs>): boolean {
    const { expense_id, user_id } = parseArgs(ExpenseIdArgsSchema, args);
    if (user_id !== undefined) {
      const expense = this.db.getExpense(expense_id);
      if (!expense || expense.user_id !== user_id) {
        return false;
      }
    }
    return this.db.deleteExpense(expense_id);
  }

  // ============================================
  // Reports
  // ============================================

  /**
   * Total, count and per-category / per-month sums of matching expenses.
   */
  summary(args: ToolArgs<FilterArgs> = {}): ExpenseSummary {
    return this.db.summary(toFilter(parseArgs(FilterArgsSchema, args)));
  }

  /**
   * Categories in use with counts and totals, plus the default categories
   * not used yet.
   */
  listCategories(args: ToolArgs<FilterArgs> = {}): CategoryListing {
    const categories = this.db.getCategories(toFilter(parseArgs(FilterArgsSchema, args)));
    const used = new Set(categories.map((stats) => stats.category.toLowerCase()));
    const suggestions = DEFAULT_CATEGORIES.filter((name) => !used.has(name.toLowerCase()));
    return {
      categories: categories.map((stats) => ({
        ...stats,
        is_default: isDefaultCategory(stats.category),
      })),
      suggestions,
    };
  }

  /**
   * Matching expenses as CSV, oldest first. Every row, the last one
   * included, ends with a line feed.
   */
  exportExpenses(args: ToolArgs<FilterArgs> = {}): string {
    const expenses = this.db.getExpenses(toFilter(parseArgs(FilterArgsSchema, args)), {
      sortBy: 'date',
    });
    const sheet = utils.aoa_to_sheet([
      [...EXPENSE_COLUMNS],
      ...expenses.map((expense) => [
        String(expense.expense_id),
        String(expense.user_id),
        expense.amount,
        expense.date,
        expense.category,
        expense.description,
      ]),
    ]);
    const csv = utils.sheet_to_csv(sheet, { FS: ',', RS: CSV_ROW_TERMINATOR });
    return csv.endsWith(CSV_ROW_TERMINATOR) ? csv : csv + CSV_ROW_TERMINATOR;
  }

  private findOwnedExpense(expenseId: number, userId: number | undefined): Expense {
    const expense = this.db.getExpense(expenseId);
    if (!expense || (userId !== undefined && expense.user_id !== userId)) {
      throw new NotFoundError('expense', expenseId);
    }
    return expense;
  }
}

/**
 * JSON Schema of one tool property.
 */
export interface ToolProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
  pattern?: string;
  enum?: readonly string[];
  minimum?: number;
  maximum?: number;
  default?: string | number | boolean;
}

/**
 * Tool schema definition.
 */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, ToolProperty>;
    required?: string[];
  };
  annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
  };
}

const DATE_PROPERTY_PATTERN = '^\\d{4}-\\d{2}-\\d{2}$';

const USER_ID_PROPERTY: ToolProperty = {
  type: 'integer',
  description: 'User ID',
  minimum: 1,
};

const EXPENSE_ID_PROPERTY: ToolProperty = {
  type: 'integer',
  description: 'Expense ID',
  minimum: 1,
};

const FILTER_PROPERTIES: Record<string, ToolProperty> = {
  user_id: { ...USER_ID_PROPERTY, description: 'Only expenses of this user' },
  period: {
    type: 'string',
    description:
      'Period shorthand: this_month, last_month, ' +
      'last_7_days, last_30_days, last_90_days, ytd, ' +
      'this_year, last_year',
  },
  start_date: {
    type: 'string',
    description: 'Start date, inclusive (YYYY-MM-DD)',
    pattern: DATE_PROPERTY_PATTERN,
  },
  end_date: {
    type: 'string',
    description: 'End date, inclusive (YYYY-MM-DD)',
    pattern: DATE_PROPERTY_PATTERN,
  },
  category: {
    type: 'string',
    description: 'Exact category',
  },
  category_pattern: {
    type: 'string',
    description: 'Case-insensitive regular expression matched against the category',
  },
  search: {
    type: 'string',
    description: 'Case-insensitive text contained in the description',
  },
  min_amount: {
    type: 'string',
    description: 'Minimum amount, inclusive (decimal string)',
  },
  max_amount: {
    type: 'string',
    description: 'Maximum amount, inclusive (decimal string)',
  },
};

/**
 * Create MCP tool schemas for all tools.
 *
 * @returns List of tool schema definitions
 */
export function createToolSchemas(): ToolSchema[] {
  return [
    {
      name: 'add_user',
      description: 'Register a new user. Names must be unique.',
      inputSchema: {
        type: 'object',
        properties: {
          name: { type: 'string', description: 'Display name' },
        },
        required: ['name'],
      },
    },
    {
      name: 'list_users',
      description: 'List all registered users.',
      inputSchema: { type: 'object', properties: {} },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'get_user',
      description: 'Get one user by ID.',
      inputSchema: {
        type: 'object',
        properties: { user_id: USER_ID_PROPERTY },
        required: ['user_id'],
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'rename_user',
      description: "Change a user's display name.",
      inputSchema: {
        type: 'object',
        properties: {
          user_id: USER_ID_PROPERTY,
          name: { type: 'string', description: 'New display name' },
        },
        required: ['user_id', 'name'],
      },
    },
    {
      name: 'add_expense',
      description:
        'Record an expense. Amounts are decimal strings such as "12.50"; ' +
        'negative amounts record refunds or corrections.',
      inputSchema: {
        type: 'object',
        properties: {
          user_id: { ...USER_ID_PROPERTY, description: 'Owner of the expense' },
          amount: { type: 'string', description: 'Signed decimal amount, e.g. "-12.50"' },
          date: { type: 'string', description: 'Date (YYYY-MM-DD)', pattern: DATE_PROPERTY_PATTERN },
          category: { type: 'string', description: 'Category label, e.g. Food' },
          description: { type: 'string', description: 'Optional free text' },
        },
        required: ['user_id', 'amount', 'date', 'category'],
      },
    },
    {
      name: 'get_expense',
      description: 'Get one expense by ID, optionally only if it belongs to user_id.',
      inputSchema: {
        type: 'object',
        properties: { expense_id: EXPENSE_ID_PROPERTY, user_id: USER_ID_PROPERTY },
        required: ['expense_id'],
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'list_expenses',
      description:
        'List expenses matching all given filters. Results are in the order they ' +
        'were recorded unless sort_by is given.',
      inputSchema: {
        type: 'object',
        properties: {
          ...FILTER_PROPERTIES,
          sort_by: {
            type: 'string',
            description: 'Sort key',
            enum: ['id', 'date', 'amount', 'category'],
          },
          order: {
            type: 'string',
            description: 'Sort direction (default: asc)',
            enum: ['asc', 'desc'],
          },
          limit: {
            type: 'integer',
            description: `Maximum number of results, up to ${MAX_QUERY_LIMIT} (default: all)`,
            minimum: 1,
            maximum: MAX_QUERY_LIMIT,
          },
          offset: {
            type: 'integer',
            description: 'Number of results to skip for pagination (default: 0)',
            minimum: 0,
            default: 0,
          },
        },
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'update_expense',
      description:
        'Correct the amount, date, category or description of an expense. ' +
        'Fields not given are left unchanged.',
      inputSchema: {
        type: 'object',
        properties: {
          expense_id: EXPENSE_ID_PROPERTY,
          user_id: { ...USER_ID_PROPERTY, description: 'Require the expense to belong to this user' },
          amount: { type: 'string', description: 'New signed decimal amount' },
          date: { type: 'string', description: 'New date (YYYY-MM-DD)', pattern: DATE_PROPERTY_PATTERN },
          category: { type: 'string', description: 'New category' },
          description: { type: 'string', description: 'New description' },
        },
        required: ['expense_id'],
      },
    },
    {
      name: 'delete_expense',
      description: 'Delete an expense. Reports whether a record was removed.',
      inputSchema: {
        type: 'object',
        properties: {
          expense_id: EXPENSE_ID_PROPERTY,
          user_id: { ...USER_ID_PROPERTY, description: 'Require the expense to belong to this user' },
        },
        required: ['expense_id'],
      },
      annotations: { destructiveHint: true },
    },
    {
      name: 'get_summary',
      description:
        'Total, count, and sums by category and by month (YYYY-MM) of the ' +
        'expenses matching all given filters. Totals are exact decimal strings.',
      inputSchema: { type: 'object', properties: FILTER_PROPERTIES },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'list_categories',
      description:
        'Categories in use with their expense counts and totals, plus default ' +
        'categories not used yet.',
      inputSchema: { type: 'object', properties: FILTER_PROPERTIES },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'export_expenses',
      description: 'Export the expenses matching all given filters as CSV, oldest first.',
      inputSchema: { type: 'object', properties: FILTER_PROPERTIES },
      annotations: { readOnlyHint: true },
    },
  ];
}
