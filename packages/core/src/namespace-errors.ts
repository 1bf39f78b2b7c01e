/**
 * Namespace Errors
 *
 * Typed failures raised by the namespace engine.
 * Front ends inspect `code` (or use instanceof) and present
 * `toDisplayMessage()` to the user.
 *
 * @module @treefs/core/namespace-errors
 */

/**
 * Stable error codes for programmatic handling.
 */
export type NamespaceErrorCode =
  | 'INVALID_NAME'
  | 'ALREADY_EXISTS'
  | 'FILE_NOT_FOUND'
  | 'DIRECTORY_NOT_FOUND'
  | 'DIRECTORY_NOT_EMPTY';

/**
 * Base class for all namespace errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Human-readable message that names the offending entry
 * - The entry name for context
 */
export class NamespaceError extends Error {
  constructor(
    public readonly code: NamespaceErrorCode,
    message: string,
    public readonly entryName: string
  ) {
    super(message);
    this.name = 'NamespaceError';
  }

  /**
   * Get a message suitable for showing to the person at the prompt.
   * Override in subclasses for better guidance.
   */
  toDisplayMessage(): string {
    return this.message;
  }
}

/**
 * Thrown when a name is empty or contains the path separator.
 */
export class InvalidNameError extends NamespaceError {
  constructor(entryName: string, reason: string) {
    super('INVALID_NAME', `Invalid name "${entryName}": ${reason}`, entryName);
    this.name = 'InvalidNameError';
  }
}

/**
 * Thrown when a sibling with the requested name already exists.
 */
export class AlreadyExistsError extends NamespaceError {
  constructor(entryName: string) {
    super('ALREADY_EXISTS', `Entry already exists: ${entryName}`, entryName);
    this.name = 'AlreadyExistsError';
  }

  toDisplayMessage(): string {
    return `'${this.entryName}' already exists in this directory`;
  }
}

/**
 * Common parent of the not-found errors.
 * A child of the wrong kind is reported exactly like a missing child.
 */
export class NotFoundError extends NamespaceError {
  constructor(code: 'FILE_NOT_FOUND' | 'DIRECTORY_NOT_FOUND', message: string, entryName: string) {
    super(code, message, entryName);
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when a file operation names no file in the current directory.
 */
export class FileNotFoundError extends NotFoundError {
  constructor(entryName: string) {
    super('FILE_NOT_FOUND', `File not found: ${entryName}`, entryName);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown when `changeDirectory` cannot move to the requested directory.
 */
export class DirectoryNotFoundError extends NotFoundError {
  constructor(entryName: string, message: string = `Directory not found: ${entryName}`) {
    super('DIRECTORY_NOT_FOUND', message, entryName);
    this.name = 'DirectoryNotFoundError';
  }
}

/**
 * Thrown when deleting a directory that still has children.
 */
export class DirectoryNotEmptyError extends NamespaceError {
  constructor(entryName: string) {
    super('DIRECTORY_NOT_EMPTY', `Directory not empty: ${entryName}`, entryName);
    this.name = 'DirectoryNotEmptyError';
  }

  toDisplayMessage(): string {
    return `Directory '${this.entryName}' is not empty. Delete its contents first.`;
  }
}

/**
 * Type guard for NamespaceError and its subclasses.
 */
export function isNamespaceError(error: unknown): error is NamespaceError {
  return error instanceof NamespaceError;
}
