/**
 * StructuredResponse: the single artifact returned for a question.
 *
 * Inside the conversation it travels as JSON with the keys
 * `response`, `sql_query`, `data_results` and `row_count`.
 */

import type { Row } from './db/types.js';
import { formatAjvErrors, validateStructuredResponseWire, type StructuredResponseWire } from './llm/validate.js';

export interface StructuredResponse {
  readonly answer: string;
  readonly sql: string;
  readonly rows: readonly Readonly<Row>[];
  readonly rowCount: number;
}

export const NO_SQL = 'N/A';

export function createResponse(fields: {
  answer: string;
  sql: string;
  rows?: Row[];
  rowCount?: number;
}): StructuredResponse {
  // rows are copied so later changes to the caller's objects do not leak in
  const rows = Object.freeze((fields.rows ?? []).map((row) => Object.freeze({ ...row })));
  return Object.freeze({
    answer: fields.answer,
    sql: fields.sql,
    rows,
    rowCount: fields.rowCount ?? rows.length,
  });
}

export function fallbackResponse(answer: string, sql: string = NO_SQL): StructuredResponse {
  return createResponse({ answer, sql, rows: [], rowCount: 0 });
}

function isRow(value: unknown): value is Row {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '' || value === false || value === 0) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isRow(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Row count of parsed execution results: the length of a list, 1 for a
 * single non-empty value, 0 for anything empty.
 */
export function countRows(parsed: unknown): number {
  if (Array.isArray(parsed)) return parsed.length;
  return isEmptyValue(parsed) ? 0 : 1;
}

/**
 * Rows of parsed execution results. Scalars are wrapped as `{ value }` so
 * that the row list always lines up with countRows().
 */
export function normalizeRows(parsed: unknown): Row[] {
  const items: unknown[] = Array.isArray(parsed) ? parsed : isEmptyValue(parsed) ? [] : [parsed];
  return items.map((item) => (isRow(item) ? item : { value: item }));
}

/**
 * Parse the serialized rows an execute_sql_query call produced. Text that is
 * not JSON (an error message, say) counts as no rows.
 */
export function parseResults(results: string): { rows: Row[]; rowCount: number } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(results);
  } catch {
    parsed = [];
  }
  return { rows: normalizeRows(parsed), rowCount: countRows(parsed) };
}

export function toWire(response: StructuredResponse): StructuredResponseWire {
  return {
    response: response.answer,
    sql_query: response.sql,
    data_results: [...response.rows],
    row_count: response.rowCount,
  };
}

export function serializeResponse(response: StructuredResponse): string {
  return JSON.stringify(toWire(response), null, 2);
}

/** Throws when the text is not a serialized StructuredResponse. */
export function parseResponse(text: string): StructuredResponse {
  const parsed: unknown = JSON.parse(text);
  if (!validateStructuredResponseWire(parsed)) {
    throw new Error(`Malformed structured response: ${formatAjvErrors(validateStructuredResponseWire.errors)}`);
  }
  return createResponse({
    answer: parsed.response,
    sql: parsed.sql_query,
    rows: parsed.data_results,
    rowCount: parsed.row_count,
  });
}
