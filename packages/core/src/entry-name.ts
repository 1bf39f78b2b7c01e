/**
 * Entry Name Schema
 *
 * Zod schema for the names of files and directories.
 *
 * @module @treefs/core/entry-name
 */

import { z } from 'zod';
import { SEPARATOR } from './namespace-types.js';
import { InvalidNameError } from './namespace-errors.js';

/**
 * A valid entry name: non-empty and free of the path separator.
 * Spaces and any other characters are allowed.
 */
export const EntryNameSchema = z
  .string()
  .min(1, { message: 'name must not be empty' })
  .refine((name) => !name.includes(SEPARATOR), {
    message: `name must not contain "${SEPARATOR}"`,
  });

export type EntryName = z.infer<typeof EntryNameSchema>;

/**
 * Check a name without throwing.
 */
export function isValidEntryName(name: string): boolean {
  return EntryNameSchema.safeParse(name).success;
}

/**
 * Validate a name for a create operation.
 *
 * @throws InvalidNameError carrying the first schema issue as its reason
 */
export function assertValidEntryName(name: string): EntryName {
  const result = EntryNameSchema.safeParse(name);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'invalid name';
    throw new InvalidNameError(name, reason);
  }
  return result.data;
}
