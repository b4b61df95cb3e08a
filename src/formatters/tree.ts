import type { TreeNode } from '../core/forest';
import type { Group, GroupMember } from '../models/group';
import type { RenderContext } from './types';
import { createPalette } from './table';

type Palette = ReturnType<typeof createPalette>;

interface Branch {
  label: string;
  children: Branch[];
}

function memberBranch(member: GroupMember, palette: Palette): Branch {
  const indicator = member.state === 'active' ? palette.green('●') : palette.red('●');
  return {
    label: `${indicator} ${palette.yellow(member.username)} - ${member.name} ${palette.dim(`(${member.accessLevelDescription})`)}`,
    children: [],
  };
}

function groupBranch(node: TreeNode<Group>, palette: Palette): Branch {
  const group = node.item;
  const members = group.members ?? [];
  return {
    label: `${palette.cyan(group.name)} ${palette.dim(`(${group.fullPath})`)}`,
    children: [
      ...(members.length > 0
        ? [{ label: palette.green('Members'), children: members.map(member => memberBranch(member, palette)) }]
        : []),
      ...node.children.map(child => groupBranch(child, palette)),
    ],
  };
}

function drawBranch(branch: Branch, prefix: string, isLast: boolean, palette: Palette, lines: string[]): void {
  lines.push(`${palette.dim(`${prefix}${isLast ? '└── ' : '├── '}`)}${branch.label}`);
  const childPrefix = `${prefix}${isLast ? '    ' : '│   '}`;
  branch.children.forEach((child, index) => {
    drawBranch(child, childPrefix, index === branch.children.length - 1, palette, lines);
  });
}

/**
 * Renders a group forest with guide lines. Members appear under their group when they were loaded.
 */
export function renderGroupTree(forest: readonly TreeNode<Group>[], context: RenderContext): string {
  const palette = createPalette(context);
  const lines: string[] = [palette.bold.cyan('Groups')];
  forest.forEach((node, index) => {
    drawBranch(groupBranch(node, palette), '', index === forest.length - 1, palette, lines);
  });
  return lines.join('\n');
}
