import { MEMBER_COLUMNS } from './columns';
import { escapeMarkdownCell, renderMarkdown } from './markdown';
import { aMember } from '../testing/fixtures';

describe('renderMarkdown', () => {
  it('escapes pipes and flattens newlines in cells', () => {
    const markdown = renderMarkdown(MEMBER_COLUMNS, [
      { groupPath: 'acme', member: aMember({ name: 'Ada | Bob\nSmith' }) },
    ]);

    expect(markdown).toBe(
      [
        '| Group | Username | Name | Role | User Status | Membership Status |',
        '| --- | --- | --- | --- | --- | --- |',
        '| acme | ada | Ada \\| Bob Smith | Owner | active | active |',
      ].join('\n'),
    );
  });

  it('keeps the header and separator for no records', () => {
    expect(renderMarkdown(MEMBER_COLUMNS, []).split('\n')).toHaveLength(2);
  });

  it('escapes a single cell', () => {
    expect(escapeMarkdownCell('a|b\r\nc')).toBe('a\\|b c');
  });
});
