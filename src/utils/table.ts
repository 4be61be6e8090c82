import type { Row } from '../db.js';

export function formatCell(value: unknown): string {
  if (value == null) return 'null';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Renders rows as a plain text table: one header line, one line per row,
 * every cell right-aligned to its column's widest value.
 */
export function formatTable(columns: readonly string[], rows: readonly Row[]): string {
  const cells = rows.map((row) => columns.map((column) => formatCell(row[column])));
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index].length))
  );
  const render = (line: readonly string[]) =>
    line.map((cell, index) => cell.padStart(widths[index])).join('  ');

  const lines = [render(columns), ...cells.map(render)];
  if (!rows.length) {
    lines.push('(no rows)');
  }
  return lines.join('\n');
}
