import chalk from 'chalk';
import stringWidth from 'string-width';
import type { FlatTreeEntry } from '../core/forest';
import type { Group } from '../models/group';
import type { Column, RenderContext } from './types';
import { cellText } from './columns';

type Palette = chalk.Chalk;

type Tone = 'green' | 'red' | 'blue' | 'yellow' | 'gray' | 'magenta';

const STATUS_TONES: Readonly<Record<string, Tone>> = {
  success: 'green',
  merged: 'blue',
  opened: 'green',
  active: 'green',
  failed: 'red',
  closed: 'red',
  blocked: 'red',
  running: 'blue',
  created: 'yellow',
  pending: 'yellow',
  preparing: 'yellow',
  waiting_for_resource: 'yellow',
  awaiting: 'yellow',
  locked: 'yellow',
  canceling: 'gray',
  canceled: 'gray',
  skipped: 'gray',
  inactive: 'gray',
  manual: 'magenta',
  scheduled: 'magenta',
};

/**
 * Builds a chalk instance whose colour level comes from the render context, never from the
 * terminal it happens to run in.
 */
export function createPalette(context: RenderContext): Palette {
  return new chalk.Instance({ level: context.color ? 1 : 0 });
}

function singleLine(text: string): string {
  return text.replace(/\s*(\r?\n|\r)\s*/g, ' ');
}

/**
 * Pads to a terminal column count; wide CJK characters and emoji take two columns.
 */
function padDisplay(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - stringWidth(text)));
}

interface TableCell {
  text: string;
  status: boolean;
}

/**
 * Draws a box grid. Widths are display widths of the plain text; colour is applied after padding.
 */
export function drawGrid(headers: readonly string[], rows: readonly TableCell[][], palette: Palette): string {
  const widths = headers.map((header, index) =>
    rows.reduce((width, row) => Math.max(width, stringWidth(row[index]?.text ?? '')), stringWidth(header)),
  );

  const border = (left: string, middle: string, right: string) =>
    `${left}${widths.map(width => '─'.repeat(width + 2)).join(middle)}${right}`;

  const headerLine = `│ ${headers.map((header, index) => palette.bold(padDisplay(header, widths[index]))).join(' │ ')} │`;
  const bodyLines = rows.map(
    row =>
      `│ ${row
        .map((cell, index) => {
          const padded = padDisplay(cell.text, widths[index]);
          return cell.status ? colorStatus(cell.text, padded, palette) : padded;
        })
        .join(' │ ')} │`,
  );

  return [border('┌', '┬', '┐'), headerLine, border('├', '┼', '┤'), ...bodyLines, border('└', '┴', '┘')].join('\n');
}

function colorStatus(status: string, padded: string, palette: Palette): string {
  const tone = STATUS_TONES[status];
  return tone ? palette[tone](padded) : padded;
}

export function renderTable<T>(columns: readonly Column<T>[], rows: readonly T[], context: RenderContext): string {
  const cells = rows.map(row =>
    columns.map(column => ({ text: singleLine(cellText(column.value(row))), status: Boolean(column.status) })),
  );
  return drawGrid(
    columns.map(column => column.header),
    cells,
    createPalette(context),
  );
}

/**
 * Group tables indent the path column by depth so the hierarchy stays visible.
 */
export function renderGroupTable(
  columns: readonly Column<FlatTreeEntry<Group>>[],
  entries: readonly FlatTreeEntry<Group>[],
  context: RenderContext,
): string {
  const cells = entries.map(entry =>
    columns.map(column => {
      const text = singleLine(cellText(column.value(entry)));
      if (column.header === 'Full Path' && entry.depth > 0) {
        return { text: `${'  '.repeat(entry.depth)}└─ ${text}`, status: false };
      }
      return { text, status: Boolean(column.status) };
    }),
  );
  return drawGrid(
    columns.map(column => column.header),
    cells,
    createPalette(context),
  );
}
