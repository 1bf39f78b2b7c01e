/**
 * Terminal Front Ends
 *
 * Vocabularies, parsing, rendering and the interactive session loop.
 */

// Vocabularies
export {
  FRONT_END_MODES,
  OPERAND_ACTIONS,
  MUTATING_ACTIONS,
  UNIX_COMMANDS,
  INTUITIVE_COMMANDS,
  LEARNING_MENU,
  findCommand,
  findMenuOption,
  isSessionAction,
  isFrontEndMode,
  type CommandAction,
  type SessionAction,
  type EngineAction,
  type FrontEndMode,
  type CommandSpec,
  type MenuOption,
} from "./commands.js";

// Command parsing
export {
  parseCommandLine,
  unquote,
  CommandParseError,
  type ParsedCommandLine,
} from "./command-parser.js";

// Rendering
export { Renderer, CURRENT_MARKER, type RendererOptions } from "./renderer.js";

// Dispatch
export {
  CommandDispatcher,
  CONTENT_TERMINATOR,
  joinContentLines,
  type CommandOutcome,
  type DispatcherOptions,
} from "./dispatcher.js";

// Session loop
export { ShellSession, type ShellSessionOptions, type SessionEndReason } from "./session.js";
