/**
 * Path Resolver
 *
 * Absolute paths are never stored; they are rebuilt from parent links
 * each time they are asked for.
 */

import { SEPARATOR } from './namespace-types.js';
import type { NamespaceNode } from './namespace-node.js';

/**
 * Resolve the absolute path of a node by walking up to the root.
 * The root (any node without a parent) resolves to "/".
 */
export function resolvePath(node: NamespaceNode): string {
  const names: string[] = [];
  let current: NamespaceNode = node;

  while (current.parent) {
    names.push(current.name);
    current = current.parent;
  }

  return SEPARATOR + names.reverse().join(SEPARATOR);
}

/**
 * Append a child name to an absolute directory path.
 */
export function joinPath(parentPath: string, name: string): string {
  return parentPath.endsWith(SEPARATOR)
    ? parentPath + name
    : parentPath + SEPARATOR + name;
}
