import type { SqlValue } from '../sqlite/db.js';

export function formatCell(value: SqlValue | undefined): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Uint8Array) return `<blob ${value.length} bytes>`;
  return String(value);
}

/**
 * Plain-text grid of a result, one line per row:
 *
 *   name  | total
 *   ------+------
 *   Basic | 12
 */
export function renderTable(columns: readonly string[], rows: readonly (readonly SqlValue[])[]): string {
  const cells = rows.map((row) => columns.map((_, i) => formatCell(row[i])));
  const widths = columns.map((column, i) => Math.max(column.length, ...cells.map((r) => r[i].length)));

  const line = (values: string[]) => values.map((v, i) => v.padEnd(widths[i])).join(' | ').trimEnd();
  const rule = widths.map((w) => '-'.repeat(w)).join('-+-');

  return [line([...columns]), rule, ...cells.map(line)].join('\n');
}
