import { buildForest } from '../core/forest';
import { renderGroupTree } from './tree';
import { aGroup, aMember } from '../testing/fixtures';

describe('renderGroupTree', () => {
  it('draws members before subgroups with guide lines', () => {
    const forest = buildForest([
      aGroup({ members: [aMember()] }),
      aGroup({ id: 2, name: 'Platform', fullPath: 'acme/platform', parentId: 1 }),
      aGroup({ id: 9, name: 'Labs', fullPath: 'labs' }),
    ]);

    expect(renderGroupTree(forest, { color: false }).split('\n')).toEqual([
      'Groups',
      '├── Acme (acme)',
      '│   ├── Members',
      '│   │   └── ● ada - Ada Lovelace (Owner)',
      '│   └── Platform (acme/platform)',
      '└── Labs (labs)',
    ]);
  });

  it('leaves out the members branch when members were not loaded or are empty', () => {
    const forest = buildForest([aGroup({ members: [] })]);

    expect(renderGroupTree(forest, { color: false })).toBe('Groups\n└── Acme (acme)');
  });
});
