/**
 * MCP server for the expense ledger.
 *
 * Exposes the ledger tools through the Model Context Protocol.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { ExpenseDatabase } from './core/database.js';
import { ExpenseLedgerTools, createToolSchemas } from './tools/index.js';

// Read version from package.json
import { createRequire } from 'module';
const require = createRequire(import.meta.url);
const { version: SERVER_VERSION } = require('../package.json') as { version: string };

/**
 * MCP server for expense ledger data.
 */
export class ExpenseLedgerServer {
  private db: ExpenseDatabase;
  private tools: ExpenseLedgerTools;
  private server: Server;

  /**
   * Initialize the MCP server.
   *
   * @param dataDir - Directory holding the ledger files
   */
  constructor(dataDir: string) {
    this.db = new ExpenseDatabase(dataDir);
    this.tools = new ExpenseLedgerTools(this.db);
    this.server = new Server(
      {
        name: 'expense-ledger-mcp',
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.registerHandlers();
  }

  /**
   * Handle list tools request.
   * Exposed for testing purposes.
   */
  handleListTools(): { tools: Tool[] } {
    const schemas = createToolSchemas();
    const tools: Tool[] = schemas.map((schema) => ({
      name: schema.name,
      description: schema.description,
      inputSchema: schema.inputSchema,
      annotations: schema.annotations,
    }));

    return { tools };
  }

  /**
   * Handle tool call request.
   * Exposed for testing purposes.
   *
   * @param name - Tool name
   * @param args - Tool arguments
   */
  async handleCallTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
    try {
      let result: unknown;

      switch (name) {
        case 'add_user':
          result = this.tools.addUser(args);
          break;

        case 'list_users':
          result = this.tools.listUsers();
          break;

        case 'get_user':
          result = this.tools.getUser(args);
          break;

        case 'rename_user':
          result = this.tools.renameUser(args);
          break;

        case 'add_expense':
          result = this.tools.addExpense(args);
          break;

        case 'get_expense':
          result = this.tools.getExpense(args);
          break;

        case 'list_expenses': {
          const expenses = this.tools.listExpenses(args);
          result = { count: expenses.length, expenses };
          break;
        }

        case 'update_expense':
          result = this.tools.updateExpense(args);
          break;

        case 'delete_expense': {
          // deleteExpense has validated expense_id by the time it returns
          const deleted = this.tools.deleteExpense(args);
          result = { expense_id: args.expense_id, deleted };
          break;
        }

        case 'get_summary':
          result = this.tools.summary(args);
          break;

        case 'list_categories':
          result = this.tools.listCategories(args);
          break;

        case 'export_expenses':
          return {
            content: [
              {
                type: 'text' as const,
                text: this.tools.exportExpenses(args),
              },
            ],
          };

        default:
          return {
            content: [
              {
                type: 'text' as const,
                text: `Unknown tool: ${name}`,
              },
            ],
            isError: true,
          };
      }

      // Format response
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      // Validation, not-found and corrupt-file errors are reported to the client
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        content: [
          {
            type: 'text' as const,
            text: `Error: ${errorMessage}`,
          },
        ],
        isError: true,
      };
    }
  }

  /**
   * Register MCP protocol handlers.
   */
  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, () => this.handleListTools());

    this.server.setRequestHandler(CallToolRequestSchema, (request) => {
      const { name, arguments: args } = request.params;
      return this.handleCallTool(name, args);
    });
  }

  /**
   * Run the MCP server using stdio transport.
   */
  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    // Handle process signals for graceful shutdown
    process.on('SIGINT', () => {
      void this.server.close().then(() => process.exit(0));
    });
    process.on('SIGTERM', () => {
      void this.server.close().then(() => process.exit(0));
    });
  }
}

/**
 * Run the expense ledger MCP server.
 *
 * @param dataDir - Directory holding the ledger files
 */
export async function runServer(dataDir: string): Promise<void> {
  const server = new ExpenseLedgerServer(dataDir);
  await server.run();
}
