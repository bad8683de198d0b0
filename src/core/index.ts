/**
 * Core functionality for expense ledger data access.
 */

export { ExpenseDatabase, USERS_FILE, EXPENSES_FILE, type CategoryStats } from './database.js';
export { RecordStore } from './record-store.js';
export {
  decodeRow,
  encodeRow,
  escapeField,
  decodeRecord,
  userCodec,
  expenseCodec,
  type DecodeResult,
  type RecordCodec,
} from './codec.js';
export {
  filterExpenses,
  totalAmount,
  groupBy,
  summarize,
  type ExpenseFilter,
  type ExpenseSummary,
  type GroupKey,
  type SortKey,
  type SortOrder,
  type SortOptions,
} from './query.js';
export {
  ExpenseLedgerError,
  ValidationError,
  CorruptRecordError,
  NotFoundError,
  type EntityType,
} from './errors.js';
