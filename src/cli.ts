#!/usr/bin/env node
/**
 * CLI entry point for the expense ledger MCP server.
 */

import { USAGE, parseArgs } from './config.js';
import { runServer } from './server.js';

/**
 * Configure logging.
 */
function configureLogging(verbose: boolean): void {
  // Everything goes to stderr (MCP uses stdout for protocol)
  const originalError = console.error;

  if (verbose) {
    console.log = (...args: unknown[]) => {
      originalError('[LOG]', new Date().toISOString(), ...args);
    };
    console.error = (...args: unknown[]) => {
      originalError('[ERROR]', new Date().toISOString(), ...args);
    };
  } else {
    // In non-verbose mode, suppress console.log but keep console.error
    console.log = () => {};
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2));

  if (config.help) {
    console.error(USAGE);
    process.exit(0);
  }

  configureLogging(config.verbose);

  try {
    console.log('Starting expense ledger MCP server...');
    console.log(`Using data directory: ${config.dataDir}`);

    await runServer(config.dataDir);
  } catch (error) {
    console.error('Server error:', error);
    process.exit(1);
  }
}

// Handle unhandled rejections
process.on('unhandledRejection', (error) => {
  console.error('Unhandled rejection:', error);
  process.exit(1);
});

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
