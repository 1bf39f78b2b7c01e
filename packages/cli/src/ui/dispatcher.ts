/**
 * Command Dispatcher
 *
 * Runs one engine action and turns the result into output lines.
 * Typed engine failures become error lines; anything else is a bug
 * and propagates.
 */

import {
  PARENT_DIRECTORY,
  SEPARATOR,
  isNamespaceError,
  type NamespaceEngine,
} from "@treefs/core";
import { MUTATING_ACTIONS, OPERAND_ACTIONS, UNIX_COMMANDS, type EngineAction } from "./commands.js";
import type { Renderer } from "./renderer.js";
import { showsConfirmations, type TraceLevel } from "../cli/trace.js";

/**
 * Line that ends multi-line content entry.
 */
export const CONTENT_TERMINATOR = "END";

/**
 * Result of one dispatched command.
 */
export interface CommandOutcome {
  status: "ok" | "error";
  lines: string[];
}

/**
 * Options for CommandDispatcher.
 */
export interface DispatcherOptions {
  renderer: Renderer;
  /** Defaults to "summary" */
  traceLevel?: TraceLevel;
  /** Start with the live tree on */
  liveTree?: boolean;
}

export class CommandDispatcher {
  private readonly renderer: Renderer;
  private readonly traceLevel: TraceLevel;
  private liveTreeEnabled: boolean;

  constructor(
    private readonly engine: NamespaceEngine,
    options: DispatcherOptions
  ) {
    this.renderer = options.renderer;
    this.traceLevel = options.traceLevel ?? "summary";
    this.liveTreeEnabled = options.liveTree ?? false;
  }

  get liveTree(): boolean {
    return this.liveTreeEnabled;
  }

  /**
   * Run an action.
   *
   * @param operand - name, target or query; ignored by actions that take none
   * @param content - new file content, used by "edit"
   */
  execute(action: EngineAction, operand: string, content: string = ""): CommandOutcome {
    if (OPERAND_ACTIONS.has(action) && !operand) {
      return { status: "error", lines: [`${unixWord(action)}: missing operand`] };
    }

    let lines: string[];
    try {
      lines = this.run(action, operand, content);
    } catch (error) {
      if (isNamespaceError(error)) {
        return { status: "error", lines: [this.renderer.error(error.toDisplayMessage())] };
      }
      throw error;
    }

    if (this.liveTreeEnabled && MUTATING_ACTIONS.has(action)) {
      lines.push(...this.renderer.tree(this.engine.enumerateTree()));
    }
    return { status: "ok", lines };
  }

  private run(action: EngineAction, operand: string, content: string): string[] {
    const engine = this.engine;
    const r = this.renderer;

    switch (action) {
      case "list":
        return r.listing(engine.listDirectory());

      case "mkdir":
        engine.createDirectory(operand);
        return this.confirm(`Directory '${operand}' created`);

      case "touch":
        engine.createFile(operand);
        return this.confirm(`File '${operand}' created`);

      case "cd":
        engine.changeDirectory(operand);
        if (operand === PARENT_DIRECTORY) {
          return this.confirm("Changed to parent directory");
        }
        if (operand === SEPARATOR) {
          return this.confirm("Changed to root");
        }
        return this.confirm(`Changed to directory '${operand}'`);

      case "cat":
        return r.content(operand, engine.readFile(operand));

      case "edit": {
        const info = engine.writeFile(operand, content);
        return this.confirm(`File '${operand}' written (${info.size} bytes)`);
      }

      case "rm":
        engine.deleteEntry(operand);
        return this.confirm(`'${operand}' deleted`);

      case "find":
        return r.searchResults(operand, engine.searchFile(operand));

      case "stat":
        return r.info(engine.fileInfo(operand));

      case "pwd":
        return [engine.getCurrentPath()];

      case "tree":
        return r.tree(engine.enumerateTree());

      case "livetree":
        this.liveTreeEnabled = !this.liveTreeEnabled;
        if (!this.liveTreeEnabled) {
          return [r.success("Live tree disabled")];
        }
        return [r.success("Live tree enabled"), ...r.tree(engine.enumerateTree())];

      case "stats":
        return r.stats(engine.displayStats());
    }
  }

  private confirm(message: string): string[] {
    return showsConfirmations(this.traceLevel) ? [this.renderer.success(message)] : [];
  }
}

function unixWord(action: EngineAction): string {
  return UNIX_COMMANDS.find((spec) => spec.action === action)?.word ?? action;
}

/**
 * Join content lines the way the editor prompt collects them:
 * every line is kept and followed by a newline.
 */
export function joinContentLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}
