/**
 * Command Vocabularies
 *
 * The three front ends share one set of actions and differ only in how
 * they are spelled: Unix-style words, plain-English words, or a numbered
 * menu that teaches the Unix word for each choice.
 */

/**
 * Everything a front end can ask for.
 */
export type CommandAction =
  | "list"
  | "mkdir"
  | "cd"
  | "touch"
  | "cat"
  | "edit"
  | "rm"
  | "find"
  | "stat"
  | "pwd"
  | "tree"
  | "livetree"
  | "stats"
  | "help"
  | "mode"
  | "exit";

/**
 * Actions handled by the session itself rather than the dispatcher.
 */
export type SessionAction = "help" | "mode" | "exit";

/**
 * Actions the dispatcher runs against the engine.
 */
export type EngineAction = Exclude<CommandAction, SessionAction>;

/**
 * Front-end variants.
 */
export type FrontEndMode = "unix" | "intuitive" | "learning";

export const FRONT_END_MODES: readonly FrontEndMode[] = ["unix", "intuitive", "learning"];

/**
 * A word-based command.
 */
export interface CommandSpec {
  word: string;
  action: CommandAction;
  /** Operand placeholder shown in help; absent when the command takes none */
  operand?: string;
  description: string;
}

/**
 * One numbered choice of the learning menu.
 */
export interface MenuOption {
  choice: string;
  action: CommandAction;
  label: string;
  /** Question asked to collect the operand */
  prompt?: string;
  /** Operand used without asking */
  fixedOperand?: string;
  /** Unix command taught by this choice */
  lesson?: string;
}

/**
 * Actions that cannot run without an operand.
 */
export const OPERAND_ACTIONS: ReadonlySet<CommandAction> = new Set<CommandAction>([
  "mkdir",
  "cd",
  "touch",
  "cat",
  "edit",
  "rm",
  "find",
  "stat",
]);

/**
 * Actions that change the tree or the current directory.
 */
export const MUTATING_ACTIONS: ReadonlySet<CommandAction> = new Set<CommandAction>([
  "mkdir",
  "cd",
  "touch",
  "edit",
  "rm",
]);

export const UNIX_COMMANDS: readonly CommandSpec[] = [
  { word: "ls", action: "list", description: "List directory" },
  { word: "mkdir", action: "mkdir", operand: "name", description: "Create folder" },
  { word: "cd", action: "cd", operand: "name", description: "Change directory (.. for parent)" },
  { word: "touch", action: "touch", operand: "name", description: "Create file" },
  { word: "cat", action: "cat", operand: "name", description: "View file" },
  { word: "nano", action: "edit", operand: "name", description: "Edit file" },
  { word: "rm", action: "rm", operand: "name", description: "Delete file/folder" },
  { word: "find", action: "find", operand: "name", description: "Search for file" },
  { word: "stat", action: "stat", operand: "name", description: "Show file details" },
  { word: "pwd", action: "pwd", description: "Show current path" },
  { word: "tree", action: "tree", description: "Show visual tree diagram" },
  { word: "livetree", action: "livetree", description: "Enable/disable live updating tree" },
  { word: "info", action: "stats", description: "Show statistics" },
  { word: "help", action: "help", description: "Show this help" },
  { word: "mode", action: "mode", description: "Switch mode" },
  { word: "exit", action: "exit", description: "Quit" },
  { word: "quit", action: "exit", description: "Quit" },
];

export const INTUITIVE_COMMANDS: readonly CommandSpec[] = [
  { word: "list", action: "list", description: "List files in current directory" },
  { word: "createfolder", action: "mkdir", operand: "name", description: "Create a new folder" },
  { word: "openfolder", action: "cd", operand: "name", description: "Open a folder (.. for parent)" },
  { word: "createfile", action: "touch", operand: "name", description: "Create a new file" },
  { word: "editfile", action: "edit", operand: "name", description: "Edit file content" },
  { word: "view", action: "cat", operand: "name", description: "View file content" },
  { word: "delete", action: "rm", operand: "name", description: "Delete file/folder" },
  { word: "findfile", action: "find", operand: "name", description: "Search for file by name" },
  { word: "details", action: "stat", operand: "name", description: "Show file details" },
  { word: "where", action: "pwd", description: "Show current directory path" },
  { word: "tree", action: "tree", description: "Show visual tree diagram" },
  { word: "livetree", action: "livetree", description: "Enable/disable live updating tree" },
  { word: "report", action: "stats", description: "Show system statistics" },
  { word: "help", action: "help", description: "Show this help" },
  { word: "mode", action: "mode", description: "Switch mode" },
  { word: "exit", action: "exit", description: "Quit program" },
];

export const LEARNING_MENU: readonly MenuOption[] = [
  { choice: "1", action: "list", label: "See the contents of current folder", lesson: "ls" },
  { choice: "2", action: "mkdir", label: "Create a new folder", prompt: "Enter folder name: ", lesson: "mkdir" },
  { choice: "3", action: "cd", label: "Go into a folder", prompt: "Enter folder name: ", lesson: "cd" },
  { choice: "4", action: "cd", label: "Go back to parent folder", fixedOperand: "..", lesson: "cd" },
  { choice: "5", action: "touch", label: "Create a new file", prompt: "Enter file name: ", lesson: "touch" },
  { choice: "6", action: "cat", label: "View a file's content", prompt: "Enter file name: ", lesson: "cat" },
  { choice: "7", action: "edit", label: "Edit a file", prompt: "Enter file name: ", lesson: "nano" },
  { choice: "8", action: "rm", label: "Delete a file or folder", prompt: "Enter file/folder name: ", lesson: "rm" },
  { choice: "9", action: "find", label: "Find a file", prompt: "Enter search term: ", lesson: "find" },
  { choice: "10", action: "stat", label: "Show file details", prompt: "Enter file name: ", lesson: "stat" },
  { choice: "11", action: "pwd", label: "Show current location", lesson: "pwd" },
  { choice: "12", action: "tree", label: "Show visual tree diagram" },
  { choice: "13", action: "livetree", label: "Enable/disable live updating tree" },
  { choice: "14", action: "stats", label: "Show statistics", lesson: "info" },
  { choice: "15", action: "mode", label: "Switch mode" },
  { choice: "16", action: "exit", label: "Exit" },
];

/**
 * Look up a command word in a word-based vocabulary.
 * Words are matched exactly.
 */
export function findCommand(mode: "unix" | "intuitive", word: string): CommandSpec | undefined {
  const vocabulary = mode === "unix" ? UNIX_COMMANDS : INTUITIVE_COMMANDS;
  return vocabulary.find((spec) => spec.word === word);
}

/**
 * Look up a learning-menu choice.
 */
export function findMenuOption(choice: string): MenuOption | undefined {
  return LEARNING_MENU.find((option) => option.choice === choice.trim());
}

/**
 * Check if an action is handled by the session.
 */
export function isSessionAction(action: CommandAction): action is SessionAction {
  return action === "help" || action === "mode" || action === "exit";
}

/**
 * Check if a string names a front-end mode.
 */
export function isFrontEndMode(value: string): value is FrontEndMode {
  return (FRONT_END_MODES as readonly string[]).includes(value);
}
