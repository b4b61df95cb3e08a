import type { Column } from './types';
import { toTextRows } from './columns';

export function escapeMarkdownCell(value: string): string {
  return value.replace(/\r?\n|\r/g, ' ').replace(/\|/g, '\\|');
}

function renderLine(cells: readonly string[]): string {
  return `| ${cells.map(escapeMarkdownCell).join(' | ')} |`;
}

/**
 * Renders rows as a Markdown pipe table. An empty row set still yields the header and separator.
 */
export function renderMarkdown<T>(columns: readonly Column<T>[], rows: readonly T[]): string {
  const header = renderLine(columns.map(column => column.header));
  const separator = `| ${columns.map(() => '---').join(' | ')} |`;
  return [header, separator, ...toTextRows(columns, rows).map(renderLine)].join('\n');
}
