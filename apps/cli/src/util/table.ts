/**
 * ASCII table for result rows: header, separator, one line per row.
 */

const MAX_COLUMN_WIDTH = 60;

export function formatTable(columns: string[], rows: readonly Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, MAX_COLUMN_WIDTH));
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatValue(row[columns[i]]);
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_COLUMN_WIDTH);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of rows) {
    lines.push(columns.map((col, i) => fit(formatValue(row[col]), widths[i])).join(' | '));
  }
  return lines.join('\n');
}

/** Column order of the first row, then any keys that only later rows carry. */
export function columnsOf(rows: readonly Record<string, unknown>[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

function fit(val: string, width: number): string {
  return val.length > width ? `${val.slice(0, width - 1)}…` : val.padEnd(width);
}

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
