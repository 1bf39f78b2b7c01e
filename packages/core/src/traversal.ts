/**
 * Recursive Traversal
 *
 * Whole-tree depth-first walks: substring search, aggregate statistics,
 * and the enumeration diagram renderers draw from.
 *
 * @module @treefs/core/traversal
 */

import type { NamespaceNode, DirectoryNode } from './namespace-node.js';
import type { NamespaceStats, TreeEntry } from './namespace-types.js';
import { SEPARATOR } from './namespace-types.js';
import { joinPath } from './path-resolver.js';

/**
 * Find every file whose name contains `query`.
 *
 * Pre-order, children in insertion order. Directories are descended into
 * but never matched. An empty query matches every file.
 *
 * @returns absolute paths of the matching files
 */
export function searchFiles(root: DirectoryNode, query: string): string[] {
  const results: string[] = [];

  const visit = (node: NamespaceNode, path: string): void => {
    if (node.kind === 'file') {
      if (node.name.includes(query)) {
        results.push(path);
      }
      return;
    }
    for (const child of node.children) {
      visit(child, joinPath(path, child.name));
    }
  };

  visit(root, SEPARATOR);
  return results;
}

/**
 * Count directories (root included), files and total content bytes.
 */
export function collectStats(root: DirectoryNode): NamespaceStats {
  const stats: NamespaceStats = { directories: 0, files: 0, totalSize: 0 };

  const visit = (node: NamespaceNode): void => {
    if (node.kind === 'file') {
      stats.files++;
      stats.totalSize += node.size;
      return;
    }
    stats.directories++;
    for (const child of node.children) {
      visit(child);
    }
  };

  visit(root);
  return stats;
}

/**
 * Flatten the tree depth-first, root first.
 *
 * @param current - node to flag with `isCurrent`
 */
export function enumerateTree(root: DirectoryNode, current: NamespaceNode): TreeEntry[] {
  const entries: TreeEntry[] = [];

  const visit = (node: NamespaceNode, path: string, depth: number): void => {
    const entry: TreeEntry = {
      name: node.name,
      path,
      kind: node.kind,
      depth,
      isCurrent: node === current,
    };
    if (node.kind === 'file') {
      entry.size = node.size;
      entries.push(entry);
      return;
    }
    entries.push(entry);
    for (const child of node.children) {
      visit(child, joinPath(path, child.name), depth + 1);
    }
  };

  visit(root, SEPARATOR, 0);
  return entries;
}
