/**
 * Namespace Types
 *
 * Result shapes returned by the namespace engine.
 */

/**
 * Path separator. Names may never contain it.
 */
export const SEPARATOR = '/';

/**
 * Sentinel name given to the root directory.
 */
export const ROOT_NAME = 'root';

/**
 * Kind discriminator of a node.
 */
export type NodeKind = 'file' | 'directory';

/**
 * Metadata for a single entry.
 */
export interface FileInfo {
  name: string;
  /** Absolute path of the entry */
  path: string;
  kind: NodeKind;
  /** Content length in bytes; 0 for directories */
  size: number;
  createdAt: Date;
  modifiedAt: Date;
}

/**
 * One row of a directory listing.
 */
export interface ListingEntry {
  name: string;
  kind: NodeKind;
  /** Present only for files with non-empty content */
  size?: number;
}

/**
 * Contents of the current directory, in insertion order.
 */
export interface DirectoryListing {
  path: string;
  entries: ListingEntry[];
  isEmpty: boolean;
}

/**
 * Whole-tree aggregate counts.
 */
export interface NamespaceStats {
  /** Every directory, root included */
  directories: number;
  files: number;
  /** Sum of all file content lengths in bytes */
  totalSize: number;
}

/**
 * One node of the depth-first tree enumeration.
 */
export interface TreeEntry {
  name: string;
  path: string;
  kind: NodeKind;
  /** Root is depth 0 */
  depth: number;
  /** Files only */
  size?: number;
  /** True exactly for the engine's current directory */
  isCurrent: boolean;
}
