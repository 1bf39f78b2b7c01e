/**
 * CLI Application
 */

export {
  TRACE_LEVELS,
  attachTrace,
  isTraceLevel,
  showsConfirmations,
  type TraceLevel,
  type TraceOptions,
} from "./trace.js";

export { runCLI, type CLIStreams } from "./run.js";
