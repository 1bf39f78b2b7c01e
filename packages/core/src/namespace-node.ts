/**
 * Namespace Nodes
 *
 * The unit of the tree. Directories own their children through an
 * insertion-ordered array and keep a name -> child Map index in step with it.
 * `parent` is a plain back-reference and never owns anything.
 *
 * @module @treefs/core/namespace-node
 */

import type { NodeKind } from './namespace-types.js';

const encoder = new TextEncoder();

/**
 * Any node in the tree.
 */
export type NamespaceNode = FileNode | DirectoryNode;

/**
 * State shared by files and directories.
 */
abstract class BaseNode {
  abstract readonly kind: NodeKind;

  /** Owning directory; null for the root and for detached nodes */
  parent: DirectoryNode | null = null;

  /** Epoch milliseconds; exposed only as fresh Date copies */
  private readonly createdMs: number;
  protected modifiedMs: number;

  constructor(
    public readonly name: string,
    createdAt: Date
  ) {
    this.createdMs = createdAt.getTime();
    this.modifiedMs = this.createdMs;
  }

  get createdAt(): Date {
    return new Date(this.createdMs);
  }

  get modifiedAt(): Date {
    return new Date(this.modifiedMs);
  }

  /**
   * Release this node. Subclasses release what they own first.
   */
  dispose(): void {
    this.parent = null;
  }
}

/**
 * A file with text content.
 */
export class FileNode extends BaseNode {
  readonly kind = 'file' as const;
  private data = '';

  get content(): string {
    return this.data;
  }

  /** Content length in UTF-8 bytes */
  get size(): number {
    return encoder.encode(this.data).byteLength;
  }

  /**
   * Replace the content and stamp the modification time.
   * A clock reading earlier than `createdAt` is clamped to it.
   */
  write(content: string, at: Date): void {
    this.data = content;
    this.modifiedMs = Math.max(at.getTime(), this.createdAt.getTime());
  }
}

/**
 * A directory owning an ordered set of uniquely named children.
 */
export class DirectoryNode extends BaseNode {
  readonly kind = 'directory' as const;
  private readonly entries: NamespaceNode[] = [];
  private readonly index = new Map<string, NamespaceNode>();

  /** Children in insertion order */
  get children(): readonly NamespaceNode[] {
    return this.entries;
  }

  get childCount(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Append a child. The caller has already checked the name is free.
   */
  addChild(node: NamespaceNode): void {
    this.entries.push(node);
    this.index.set(node.name, node);
    node.parent = this;
  }

  /**
   * Detach a child by name.
   *
   * @returns the detached node, or undefined if no child has that name
   */
  removeChild(name: string): NamespaceNode | undefined {
    const node = this.index.get(name);
    if (!node) {
      return undefined;
    }
    this.index.delete(name);
    this.entries.splice(this.entries.indexOf(node), 1);
    node.parent = null;
    return node;
  }

  getChild(name: string): NamespaceNode | undefined {
    return this.index.get(name);
  }

  hasChild(name: string): boolean {
    return this.index.has(name);
  }

  /**
   * Post-order release: every descendant is disposed before this directory.
   */
  dispose(): void {
    for (const child of this.entries) {
      child.dispose();
    }
    this.entries.length = 0;
    this.index.clear();
    super.dispose();
  }
}
