/**
 * Namespace Engine
 *
 * Owns the tree and the current directory, and is the only thing that
 * mutates either. Every name-taking operation resolves the name against
 * the current directory's child index. Operations are all-or-nothing:
 * validation and lookup finish before anything changes.
 *
 * @module @treefs/core/namespace-engine
 */

import { DirectoryNode, FileNode, type NamespaceNode } from './namespace-node.js';
import { resolvePath } from './path-resolver.js';
import { collectStats, enumerateTree, searchFiles } from './traversal.js';
import { assertValidEntryName, isValidEntryName } from './entry-name.js';
import {
  AlreadyExistsError,
  DirectoryNotEmptyError,
  DirectoryNotFoundError,
  FileNotFoundError,
} from './namespace-errors.js';
import {
  ROOT_NAME,
  SEPARATOR,
  type DirectoryListing,
  type FileInfo,
  type ListingEntry,
  type NamespaceStats,
  type TreeEntry,
} from './namespace-types.js';
import type { EngineEventBus } from './engine-event-bus.js';

/**
 * Target of `changeDirectory` that moves to the parent.
 */
export const PARENT_DIRECTORY = '..';

/**
 * Options for NamespaceEngine.
 */
export interface NamespaceEngineOptions {
  /** Bus to publish structural changes on */
  events?: EngineEventBus;
  /** Time source for node timestamps (defaults to the wall clock) */
  clock?: () => Date;
}

/**
 * In-memory hierarchical namespace.
 *
 * @example
 * ```typescript
 * const engine = new NamespaceEngine();
 * engine.createDirectory('docs');
 * engine.changeDirectory('docs');
 * engine.createFile('notes.txt', 'hello');
 * engine.getCurrentPath(); // "/docs"
 * engine.searchFile('notes'); // ["/docs/notes.txt"]
 * ```
 */
export class NamespaceEngine {
  private readonly root: DirectoryNode;
  private currentDir: DirectoryNode;
  private readonly events?: EngineEventBus;
  private readonly clock: () => Date;

  constructor(options: NamespaceEngineOptions = {}) {
    this.events = options.events;
    this.clock = options.clock ?? (() => new Date());
    this.root = new DirectoryNode(ROOT_NAME, this.clock());
    this.currentDir = this.root;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Creation
  // ─────────────────────────────────────────────────────────────────────

  /**
   * Create a file in the current directory.
   *
   * @throws InvalidNameError if the name is empty or contains "/"
   * @throws AlreadyExistsError if a file or directory of that name exists
   */
  createFile(name: string, content: string = ''): FileInfo {
    this.assertCreatable(name);

    const file = new FileNode(name, this.clock());
    if (content) {
      file.write(content, file.createdAt);
    }
    this.currentDir.addChild(file);

    const info = this.describe(file);
    this.events?.emit('created', { path: info.path, kind: 'file' });
    return info;
  }

  /**
   * Create an empty directory in the current directory.
   *
   * @throws InvalidNameError if the name is empty or contains "/"
   * @throws AlreadyExistsError if a file or directory of that name exists
   */
  createDirectory(name: string): FileInfo {
    this.assertCreatable(name);

    const dir = new DirectoryNode(name, this.clock());
    this.currentDir.addChild(dir);

    const info = this.describe(dir);
    this.events?.emit('created', { path: info.path, kind: 'directory' });
    return info;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────

  /**
   * Move the current directory.
   *
   * - `".."` moves to the parent (fails at root)
   * - `"/"` moves to root (always succeeds)
   * - anything else must name a child directory; a file of that name
   *   is treated as not found
   *
   * @returns the new current path
   * @throws DirectoryNotFoundError
   */
  changeDirectory(target: string): string {
    const from = this.getCurrentPath();
    let next: DirectoryNode;

    if (target === PARENT_DIRECTORY) {
      if (!this.currentDir.parent) {
        throw new DirectoryNotFoundError(target, 'Already at root');
      }
      next = this.currentDir.parent;
    } else if (target === SEPARATOR) {
      next = this.root;
    } else {
      const child = this.lookup(target);
      if (!child || child.kind !== 'directory') {
        throw new DirectoryNotFoundError(target);
      }
      next = child;
    }

    this.currentDir = next;
    const to = this.getCurrentPath();
    this.events?.emit('directoryChanged', { from, to });
    return to;
  }

  /**
   * Absolute path of the current directory.
   */
  getCurrentPath(): string {
    return resolvePath(this.currentDir);
  }

  // ─────────────────────────────────────────────────────────────────────
  // File content
  // ─────────────────────────────────────────────────────────────────────

  /**
   * Replace a file's content.
   *
   * @throws FileNotFoundError if there is no file of that name here
   */
  writeFile(name: string, content: string): FileInfo {
    const file = this.requireFile(name);
    file.write(content, this.clock());

    const info = this.describe(file);
    this.events?.emit('written', { path: info.path, size: info.size });
    return info;
  }

  /**
   * Read a file's content.
   *
   * @throws FileNotFoundError if there is no file of that name here
   */
  readFile(name: string): string {
    return this.requireFile(name).content;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Deletion
  // ─────────────────────────────────────────────────────────────────────

  /**
   * Delete a file or an empty directory from the current directory.
   * Never recursive: a directory must be emptied first.
   *
   * @returns metadata of the removed entry, captured before removal
   * @throws FileNotFoundError if nothing of that name exists here
   * @throws DirectoryNotEmptyError if the target directory has children
   */
  deleteEntry(name: string): FileInfo {
    const node = this.lookup(name);
    if (!node) {
      throw new FileNotFoundError(name);
    }
    if (node.kind === 'directory' && !node.isEmpty) {
      throw new DirectoryNotEmptyError(name);
    }

    const info = this.describe(node);
    this.currentDir.removeChild(name);
    node.dispose();

    this.events?.emit('deleted', { path: info.path, kind: info.kind });
    return info;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Inspection
  // ─────────────────────────────────────────────────────────────────────

  /**
   * Metadata for a file or directory in the current directory.
   *
   * @throws FileNotFoundError if nothing of that name exists here
   */
  fileInfo(name: string): FileInfo {
    const node = this.lookup(name);
    if (!node) {
      throw new FileNotFoundError(name);
    }
    return this.describe(node);
  }

  /**
   * Children of the current directory in insertion order.
   */
  listDirectory(): DirectoryListing {
    const entries = this.currentDir.children.map((child): ListingEntry => {
      if (child.kind === 'file' && child.content.length > 0) {
        return { name: child.name, kind: child.kind, size: child.size };
      }
      return { name: child.name, kind: child.kind };
    });

    return {
      path: this.getCurrentPath(),
      entries,
      isEmpty: entries.length === 0,
    };
  }

  /**
   * Whole-tree counts, independent of the current directory.
   */
  displayStats(): NamespaceStats {
    return collectStats(this.root);
  }

  /**
   * Absolute paths of every file anywhere in the tree whose name
   * contains `query` (case-sensitive).
   */
  searchFile(query: string): string[] {
    return searchFiles(this.root, query);
  }

  /**
   * Depth-first enumeration of the whole tree for diagram renderers.
   */
  enumerateTree(): TreeEntry[] {
    return enumerateTree(this.root, this.currentDir);
  }

  // ─────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────

  private assertCreatable(name: string): void {
    assertValidEntryName(name);
    if (this.currentDir.hasChild(name)) {
      throw new AlreadyExistsError(name);
    }
  }

  /**
   * An invalid name can never match a child, so it is simply not found.
   */
  private lookup(name: string): NamespaceNode | undefined {
    if (!isValidEntryName(name)) {
      return undefined;
    }
    return this.currentDir.getChild(name);
  }

  private requireFile(name: string): FileNode {
    const node = this.lookup(name);
    if (!node || node.kind !== 'file') {
      throw new FileNotFoundError(name);
    }
    return node;
  }

  private describe(node: NamespaceNode): FileInfo {
    return {
      name: node.name,
      path: resolvePath(node),
      kind: node.kind,
      size: node.kind === 'file' ? node.size : 0,
      createdAt: node.createdAt,
      modifiedAt: node.modifiedAt,
    };
  }
}
