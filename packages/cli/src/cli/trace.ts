/**
 * CLI Trace
 *
 * Trace levels decide how chatty the front ends are, and in debug mode
 * engine events from the event bus are echoed as dim trace lines.
 * Uses picocolors for styling.
 */

import pc from "picocolors";
import type { EngineEventBus, Unsubscribe } from "@treefs/core";

/**
 * Trace levels control output verbosity.
 * - quiet: Only results and errors
 * - summary: Results, errors and confirmation lines
 * - debug: Summary + one line per engine event
 */
export type TraceLevel = "quiet" | "summary" | "debug";

export const TRACE_LEVELS: readonly TraceLevel[] = ["quiet", "summary", "debug"];

/**
 * Check if a string names a trace level.
 */
export function isTraceLevel(value: string): value is TraceLevel {
  return (TRACE_LEVELS as readonly string[]).includes(value);
}

/**
 * Whether confirmation lines (`✓ ...`) are shown at this level.
 */
export function showsConfirmations(level: TraceLevel): boolean {
  return level !== "quiet";
}

/**
 * Options for the trace subscriber.
 */
export interface TraceOptions {
  /** Whether to prefix each line with an ISO timestamp */
  showTimestamps?: boolean;
  /** Emit ANSI colors (defaults to picocolors' terminal detection) */
  color?: boolean;
  /** Clock used for timestamps */
  now?: () => Date;
}

/**
 * Echo engine events to `write` as trace lines.
 *
 * Only subscribes when the level is "debug"; otherwise returns a no-op.
 *
 * @returns function that removes every subscription
 */
export function attachTrace(
  bus: EngineEventBus,
  level: TraceLevel,
  write: (line: string) => void,
  options: TraceOptions = {}
): Unsubscribe {
  if (level !== "debug") {
    return () => {};
  }

  const c = pc.createColors(options.color ?? pc.isColorSupported);
  const now = options.now ?? (() => new Date());

  const emit = (text: string): void => {
    const timestamp = options.showTimestamps ? `[${now().toISOString()}] ` : "";
    write(c.dim(`${timestamp}[trace] ${text}`));
  };

  const subscriptions = [
    bus.on("created", (e) => emit(`created ${e.kind} ${e.path}`)),
    bus.on("written", (e) => emit(`written ${e.path} (${e.size} bytes)`)),
    bus.on("deleted", (e) => emit(`deleted ${e.kind} ${e.path}`)),
    bus.on("directoryChanged", (e) => emit(`cd ${e.from} -> ${e.to}`)),
  ];

  return () => {
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
  };
}
