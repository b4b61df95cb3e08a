/**
 * Minimal shape the tree builder needs: a unique id and an optional reference to a parent id.
 */
export interface Hierarchical {
  id: number;
  parentId: number | null;
}

export interface TreeNode<T> {
  item: T;
  children: TreeNode<T>[];
}

export interface FlatTreeEntry<T> {
  node: TreeNode<T>;
  depth: number;
}

/**
 * Links a flat, ordered list into a forest.
 *
 * The first pass indexes every record by id; the second attaches each node to its parent's
 * children when that parent is in the batch, and makes it a root otherwise (orphans surface at the
 * top level rather than disappearing). Sibling order follows input order. Each record is attached
 * exactly once and parents are never followed upwards, so a cyclic parent chain cannot loop; its
 * members simply hang off each other and none of them becomes a root.
 */
export function buildForest<T extends Hierarchical>(records: readonly T[]): TreeNode<T>[] {
  const index = new Map<number, TreeNode<T>>();
  for (const record of records) {
    if (!index.has(record.id)) {
      index.set(record.id, { item: record, children: [] });
    }
  }

  const roots: TreeNode<T>[] = [];
  const linked = new Set<number>();
  for (const record of records) {
    const node = index.get(record.id);
    // duplicate ids keep their first occurrence
    if (!node || linked.has(record.id)) {
      continue;
    }
    linked.add(record.id);

    const parent = record.parentId !== null ? index.get(record.parentId) : undefined;
    if (parent && parent !== node) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }

  return roots;
}

/**
 * Pre-order walk of a forest with each node's depth (roots are depth 0).
 */
export function flattenForest<T>(forest: readonly TreeNode<T>[]): FlatTreeEntry<T>[] {
  const entries: FlatTreeEntry<T>[] = [];
  const stack: FlatTreeEntry<T>[] = [];

  for (let i = forest.length - 1; i >= 0; i--) {
    stack.push({ node: forest[i], depth: 0 });
  }

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) {
      break;
    }
    entries.push(entry);
    const { children } = entry.node;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], depth: entry.depth + 1 });
    }
  }

  return entries;
}

export function countForest<T>(forest: readonly TreeNode<T>[]): number {
  return flattenForest(forest).length;
}
