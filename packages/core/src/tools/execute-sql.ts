import { runSelect } from '../db/sqlite.js';
import { startsWithSelect } from '../db/sql-check.js';
import { errorMessage } from '../errors.js';
import type { Tool } from './types.js';

/**
 * Execute a statement and serialize every row as JSON. The SELECT guard
 * repeats the verifier's check because the verifier's verdict is advisory.
 */
export async function executeSqlQuery(sql: string, databasePath: string): Promise<string> {
  if (!startsWithSelect(sql)) {
    return 'Error: Only SELECT queries are allowed';
  }
  try {
    const rows = await runSelect(databasePath, sql);
    return JSON.stringify(rows, null, 2);
  } catch (err: unknown) {
    return `Error executing query: ${errorMessage(err)}`;
  }
}

export const executeSqlTool: Tool = {
  definition: {
    name: 'execute_sql_query',
    description: 'Execute SQL query and get results',
    parameters: {
      type: 'object',
      properties: {
        sql_query: { type: 'string', description: 'SQL query to execute' },
        database_path: { type: 'string', description: 'Path to SQLite database' },
      },
      required: ['sql_query', 'database_path'],
    },
  },
  run: (args) => executeSqlQuery(args.sql_query, args.database_path),
};
