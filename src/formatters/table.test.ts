import { buildForest, flattenForest } from '../core/forest';
import { GROUP_COLUMNS } from './columns';
import { renderGroupTable, renderTable } from './table';
import type { Column } from './types';
import { aGroup } from '../testing/fixtures';

interface Row {
  id: number;
  status: string;
}

const COLUMNS: Column<Row>[] = [
  { header: 'ID', value: row => row.id },
  { header: 'Status', value: row => row.status, status: true },
];

const ROWS: Row[] = [
  { id: 1, status: 'success' },
  { id: 22, status: 'failed' },
];

describe('renderTable', () => {
  it('draws a plain box grid without colour', () => {
    expect(renderTable(COLUMNS, ROWS, { color: false }).split('\n')).toEqual([
      '┌────┬─────────┐',
      '│ ID │ Status  │',
      '├────┼─────────┤',
      '│ 1  │ success │',
      '│ 22 │ failed  │',
      '└────┴─────────┘',
    ]);
  });

  it('aligns wide characters by their display width', () => {
    const titles: Column<string>[] = [{ header: 'Title', value: title => title }];

    expect(renderTable(titles, ['日本語', 'api 🚀'], { color: false }).split('\n')).toEqual([
      '┌────────┐',
      '│ Title  │',
      '├────────┤',
      '│ 日本語 │',
      '│ api 🚀 │',
      '└────────┘',
    ]);
  });

  it('colours status cells after padding when colour is on', () => {
    const lines = renderTable(COLUMNS, ROWS, { color: true }).split('\n');

    expect(lines[1]).toBe('│ \u001b[1mID\u001b[22m │ \u001b[1mStatus \u001b[22m │');
    expect(lines[3]).toBe('│ 1  │ \u001b[32msuccess\u001b[39m │');
    expect(lines[4]).toBe('│ 22 │ \u001b[31mfailed \u001b[39m │');
  });

  it('collapses multi-line cell values', () => {
    const lines = renderTable(COLUMNS, [{ id: 3, status: 'first\nsecond' }], { color: false }).split('\n');

    expect(lines[3]).toBe('│ 3  │ first second │');
  });

  it('still draws the header for no rows', () => {
    expect(renderTable(COLUMNS, [], { color: false }).split('\n')).toHaveLength(4);
  });
});

describe('renderGroupTable', () => {
  it('indents nested group paths by depth', () => {
    const forest = buildForest([
      aGroup(),
      aGroup({ id: 2, name: 'Platform', fullPath: 'acme/platform', parentId: 1 }),
      aGroup({ id: 3, name: 'Infra', fullPath: 'acme/platform/infra', parentId: 2 }),
    ]);

    const lines = renderGroupTable(GROUP_COLUMNS, flattenForest(forest), { color: false }).split('\n');

    expect(lines[3].startsWith('│ 1  │ acme ')).toBe(true);
    expect(lines[4].startsWith('│ 2  │   └─ acme/platform ')).toBe(true);
    expect(lines[5].startsWith('│ 3  │     └─ acme/platform/infra │')).toBe(true);
  });
});
