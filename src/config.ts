/**
 * Runtime configuration for the ledger server.
 */

import { resolve } from 'path';

/**
 * Environment variable naming the data directory.
 */
export const DATA_DIR_ENV = 'EXPENSE_LEDGER_DATA_DIR';

export interface LedgerConfig {
  /** Absolute directory holding users.tsv and expenses.tsv */
  dataDir: string;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `
Expense Ledger MCP Server - Track personal expenses through MCP

Usage:
  expense-ledger-mcp [options]

Options:
  --data-dir <path>   Directory holding the ledger files
                      (default: $${DATA_DIR_ENV}, else the working directory)
  --verbose, -v       Enable verbose logging
  --help, -h          Show this help message

Environment:
  The server uses stdio transport and logs to stderr.
  MCP clients communicate with it via stdin/stdout.
`;

/**
 * Parse command-line arguments and environment into a configuration.
 *
 * Precedence for the data directory: --data-dir, then the environment
 * variable, then the working directory.
 *
 * @param argv - Arguments after the executable and script name
 * @param env - Process environment
 * @param cwd - Directory relative paths resolve against
 */
export function parseArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): LedgerConfig {
  let dataDir: string | undefined;
  let verbose = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === '--data-dir' && value !== undefined) {
      dataDir = value;
      i++;
    } else if (arg === '--verbose' || arg === '-v') {
      verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      help = true;
    }
  }

  const fromEnv = env[DATA_DIR_ENV];
  const chosen = dataDir ?? (fromEnv ? fromEnv : undefined) ?? cwd;

  return { dataDir: resolve(cwd, chosen), verbose, help };
}
