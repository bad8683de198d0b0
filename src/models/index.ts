/**
 * Data models for the expense ledger.
 */

export { UserSchema, UserRowSchema, USER_COLUMNS, type User, type NewUser } from './user.js';

export {
  ExpenseSchema,
  ExpenseRowSchema,
  EXPENSE_COLUMNS,
  type Expense,
  type NewExpense,
  type ExpensePatch,
} from './expense.js';

export { describeIssues, idColumn } from './common.js';
