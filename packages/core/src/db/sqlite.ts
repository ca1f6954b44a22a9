/**
 * SQLite access via better-sqlite3.
 * Every call opens its own read-only handle and closes it before returning.
 */

import Database from 'better-sqlite3';
import type { Row, SchemaDescription, SchemaSnapshot, TableInfo } from './types.js';

function openDatabase(path: string): Database.Database {
  if (!path?.trim()) {
    throw new Error('SQLite database path is required.');
  }
  return new Database(path, { readonly: true, fileMustExist: true });
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export async function testConnection(
  path: string,
): Promise<{ ok: boolean; error?: string; serverVersion?: string }> {
  try {
    const db = openDatabase(path);
    try {
      const versionRow = db.prepare('SELECT sqlite_version() as version').get() as { version?: string } | undefined;
      return { ok: true, serverVersion: versionRow?.version ?? 'sqlite' };
    } finally {
      db.close();
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

export async function inspectSchema(path: string): Promise<SchemaSnapshot> {
  const db = openDatabase(path);
  try {
    const tables = db
      .prepare(`
        SELECT name
        FROM sqlite_master
        WHERE type = 'table'
          AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `)
      .all() as Array<{ name: string }>;

    const tableInfos: TableInfo[] = [];
    for (const { name } of tables) {
      const columns = db.prepare(`PRAGMA table_info(${quoteIdent(name)})`).all() as Array<{
        name: string;
        type: string;
        notnull: 0 | 1;
        pk: number;
      }>;

      const countRow = db.prepare(`SELECT COUNT(*) as c FROM ${quoteIdent(name)}`).get() as
        | { c: number }
        | undefined;

      tableInfos.push({
        name,
        rowCount: Number(countRow?.c ?? 0),
        columns: columns.map((column) => ({
          name: column.name,
          type: column.type,
          nullable: column.notnull === 0,
          primaryKey: column.pk > 0,
        })),
      });
    }

    return { tables: tableInfos, capturedAt: new Date() };
  } finally {
    db.close();
  }
}

export function toSchemaDescription(snapshot: SchemaSnapshot): SchemaDescription {
  const description: SchemaDescription = {};
  for (const table of snapshot.tables) {
    description[table.name] = table.columns.map(({ name, type, nullable }) => ({ name, type, nullable }));
  }
  return description;
}

/**
 * Make a column value JSON-safe without losing information: integers outside
 * the safe range become decimal strings and BLOBs become hex text.
 */
export function toJsonValue(value: unknown): unknown {
  if (typeof value === 'bigint') {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('hex');
  }
  return value;
}

/**
 * Run a row-returning statement. Throws on SQLite errors and on statements
 * that do not return rows; callers decide how to report that.
 */
export async function runSelect(path: string, sql: string): Promise<Row[]> {
  const db = openDatabase(path);
  try {
    const stmt = db.prepare(sql);
    if (!stmt.reader) {
      throw new Error('Statement does not return rows.');
    }
    const rows = stmt.safeIntegers(true).all() as Row[];
    return rows.map((row) => {
      const converted: Row = {};
      for (const [key, value] of Object.entries(row)) {
        converted[key] = toJsonValue(value);
      }
      return converted;
    });
  } finally {
    db.close();
  }
}
