/**
 * Engine Event Bus
 *
 * Type-safe pub/sub between the namespace engine and whoever wants to
 * observe it (tracing, live diagrams). The engine only emits; it never
 * depends on anyone listening.
 *
 * @module @treefs/core/engine-event-bus
 */

import type { EngineEvents, EngineEventName, Unsubscribe } from './engine-events.js';

/**
 * Type-safe event handler
 */
export type EventHandler<T> = (data: T) => void;

/**
 * Event bus interface.
 *
 * @example
 * ```typescript
 * const bus = createEngineEventBus();
 * bus.on('created', (data) => console.log(`created ${data.path}`));
 *
 * const engine = new NamespaceEngine({ events: bus });
 * engine.createFile('notes.txt'); // logs "created /notes.txt"
 * ```
 */
export interface EngineEventBus {
  /**
   * Deliver an event to every current subscriber.
   */
  emit<K extends EngineEventName>(event: K, data: EngineEvents[K]): void;

  /**
   * Subscribe to an event.
   */
  on<K extends EngineEventName>(event: K, handler: EventHandler<EngineEvents[K]>): Unsubscribe;

  /**
   * Remove all handlers for an event
   */
  off(event: EngineEventName): void;

  /**
   * Remove all handlers for all events
   */
  clear(): void;
}

type HandlerTable = {
  [K in EngineEventName]?: Set<EventHandler<EngineEvents[K]>>;
};

/**
 * Create a new engine event bus.
 *
 * A handler that throws is reported on stderr; the remaining handlers
 * still run and the emitting operation is unaffected.
 */
export function createEngineEventBus(): EngineEventBus {
  const handlers: HandlerTable = {};

  function handlersFor<K extends EngineEventName>(event: K): Set<EventHandler<EngineEvents[K]>> {
    const existing = handlers[event];
    if (existing) {
      return existing;
    }
    const created = new Set<EventHandler<EngineEvents[K]>>();
    handlers[event] = created;
    return created;
  }

  function emit<K extends EngineEventName>(event: K, data: EngineEvents[K]): void {
    const eventHandlers = handlers[event];
    if (!eventHandlers) {
      return;
    }
    for (const handler of [...eventHandlers]) {
      try {
        handler(data);
      } catch (error) {
        console.error(`Error in event handler for "${event}":`, error);
      }
    }
  }

  function on<K extends EngineEventName>(
    event: K,
    handler: EventHandler<EngineEvents[K]>
  ): Unsubscribe {
    const eventHandlers = handlersFor(event);
    eventHandlers.add(handler);

    return () => {
      eventHandlers.delete(handler);
      if (eventHandlers.size === 0 && handlers[event] === eventHandlers) {
        delete handlers[event];
      }
    };
  }

  function off(event: EngineEventName): void {
    delete handlers[event];
  }

  function clear(): void {
    for (const event of Object.keys(handlers)) {
      if (isEngineEventName(event)) {
        delete handlers[event];
      }
    }
  }

  return { emit, on, off, clear };
}

const EVENT_NAMES: readonly EngineEventName[] = ['created', 'written', 'deleted', 'directoryChanged'];

function isEngineEventName(value: string): value is EngineEventName {
  return (EVENT_NAMES as readonly string[]).includes(value);
}
