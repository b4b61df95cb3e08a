import type { Column } from './types';
import { toTextRows } from './columns';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Renders rows as RFC 4180 CSV with `\n` line endings. The header row is always present.
 */
export function renderCsv<T>(columns: readonly Column<T>[], rows: readonly T[]): string {
  const lines = [columns.map(column => column.header), ...toTextRows(columns, rows)];
  return lines.map(cells => cells.map(escapeCsvField).join(',')).join('\n');
}
