import { inspectSchema, toSchemaDescription } from '../db/sqlite.js';
import { errorMessage } from '../errors.js';
import type { Tool } from './types.js';

export async function discoverDatabaseSchema(databasePath: string): Promise<string> {
  try {
    const snapshot = await inspectSchema(databasePath);
    return JSON.stringify(toSchemaDescription(snapshot), null, 2);
  } catch (err: unknown) {
    return `Error discovering schema: ${errorMessage(err)}`;
  }
}

export const discoverSchemaTool: Tool = {
  definition: {
    name: 'discover_database_schema',
    description: 'Discover database schema (tables and columns)',
    parameters: {
      type: 'object',
      properties: {
        database_path: { type: 'string', description: 'Path to SQLite database' },
      },
      required: ['database_path'],
    },
  },
  run: (args) => discoverDatabaseSchema(args.database_path),
};
