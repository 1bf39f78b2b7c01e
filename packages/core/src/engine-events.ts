/**
 * Engine Events
 *
 * Structural changes the namespace engine publishes after each
 * successful mutation or navigation.
 *
 * @module @treefs/core/engine-events
 */

import type { NodeKind } from './namespace-types.js';

/**
 * An entry was created in the current directory.
 */
export interface CreatedEvent {
  path: string;
  kind: NodeKind;
}

/**
 * A file's content was replaced.
 */
export interface WrittenEvent {
  path: string;
  /** New size in bytes */
  size: number;
}

/**
 * An entry was removed from the current directory.
 */
export interface DeletedEvent {
  path: string;
  kind: NodeKind;
}

/**
 * The current directory moved.
 */
export interface DirectoryChangedEvent {
  from: string;
  to: string;
}

/**
 * Event name -> payload.
 */
export interface EngineEvents {
  created: CreatedEvent;
  written: WrittenEvent;
  deleted: DeletedEvent;
  directoryChanged: DirectoryChangedEvent;
}

export type EngineEventName = keyof EngineEvents;

/**
 * Function that removes a subscription.
 */
export type Unsubscribe = () => void;
