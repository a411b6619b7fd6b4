import { formatDate } from './coerce.js';

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDate(value);
  return String(value);
}

/**
 * Render rows as a plain-text table with a header and a dashed rule.
 * Numbers are right-aligned, everything else left-aligned.
 */
export function formatTable<T extends object, K extends keyof T & string>(
  rows: readonly T[],
  columns: readonly K[],
): string {
  const cells = rows.map((row) => columns.map((column) => formatValue(row[column])));
  const widths = columns.map((column, i) =>
    Math.max(column.length, ...cells.map((line) => line[i]?.length ?? 0)),
  );
  const numeric = columns.map((column) =>
    rows.some((row) => typeof row[column] === 'number'),
  );

  const render = (values: string[]) =>
    values
      .map((value, i) => (numeric[i] ? value.padStart(widths[i] ?? 0) : value.padEnd(widths[i] ?? 0)))
      .join('  ')
      .trimEnd();

  return [
    render([...columns]),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...cells.map(render),
  ].join('\n');
}
