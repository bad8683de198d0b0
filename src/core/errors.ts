/**
 * Error taxonomy for the expense ledger.
 *
 * The core never logs or retries; these errors propagate to the caller,
 * which decides how to present them.
 */

/**
 * Entity kinds held by the ledger.
 */
export type EntityType = 'user' | 'expense';

/**
 * Base class for every error raised by the ledger core.
 */
export class ExpenseLedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed input at the API boundary. Raised before any write happens.
 */
export class ValidationError extends ExpenseLedgerError {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message);
    this.field = field;
  }
}

/**
 * A backing file holds a row that cannot be decoded.
 */
export class CorruptRecordError extends ExpenseLedgerError {
  readonly filePath: string;
  readonly lineNumber: number;
  readonly reason: string;

  constructor(filePath: string, lineNumber: number, reason: string) {
    super(`${filePath}:${lineNumber}: ${reason}`);
    this.filePath = filePath;
    this.lineNumber = lineNumber;
    this.reason = reason;
  }
}

/**
 * An operation targeted an id that does not exist.
 */
export class NotFoundError extends ExpenseLedgerError {
  readonly entity: EntityType;
  readonly id: number;

  constructor(entity: EntityType, id: number) {
    super(`${entity === 'user' ? 'User' : 'Expense'} not found: ${id}`);
    this.entity = entity;
    this.id = id;
  }
}
