/**
 * Ledger tools.
 */

export {
  ExpenseLedgerTools,
  createToolSchemas,
  type CategoryListing,
  type ToolSchema,
  type ToolProperty,
} from './tools.js';
export * from './schemas.js';
