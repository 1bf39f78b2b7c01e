/**
 * @treefs/core
 *
 * In-memory hierarchical namespace engine.
 * Front ends consume it only through NamespaceEngine's public operations.
 *
 * @module @treefs/core
 */

// Engine
export { NamespaceEngine, PARENT_DIRECTORY } from './namespace-engine.js';
export type { NamespaceEngineOptions } from './namespace-engine.js';

// Result types
export { SEPARATOR, ROOT_NAME } from './namespace-types.js';
export type {
  NodeKind,
  FileInfo,
  ListingEntry,
  DirectoryListing,
  NamespaceStats,
  TreeEntry,
} from './namespace-types.js';

// Errors
export {
  NamespaceError,
  InvalidNameError,
  AlreadyExistsError,
  NotFoundError,
  FileNotFoundError,
  DirectoryNotFoundError,
  DirectoryNotEmptyError,
  isNamespaceError,
} from './namespace-errors.js';
export type { NamespaceErrorCode } from './namespace-errors.js';

// Names
export { EntryNameSchema, isValidEntryName, assertValidEntryName } from './entry-name.js';
export type { EntryName } from './entry-name.js';

// Tree building blocks (for custom traversals and tests)
export { FileNode, DirectoryNode } from './namespace-node.js';
export type { NamespaceNode } from './namespace-node.js';
export { resolvePath, joinPath } from './path-resolver.js';
export { searchFiles, collectStats, enumerateTree } from './traversal.js';

// Events
export { createEngineEventBus } from './engine-event-bus.js';
export type { EngineEventBus, EventHandler } from './engine-event-bus.js';
export type {
  EngineEvents,
  EngineEventName,
  CreatedEvent,
  WrittenEvent,
  DeletedEvent,
  DirectoryChangedEvent,
  Unsubscribe,
} from './engine-events.js';
