/**
 * Shell Session
 *
 * Terminal loop for the three front ends. Reads lines from an input
 * stream, dispatches them against one engine, and writes rendered
 * output. Each line is handled to completion before the next is read.
 */

import * as readline from "readline";
import type { NamespaceEngine } from "@treefs/core";
import {
  OPERAND_ACTIONS,
  findCommand,
  findMenuOption,
  isSessionAction,
  type CommandAction,
  type FrontEndMode,
} from "./commands.js";
import { CommandParseError, parseCommandLine, type ParsedCommandLine } from "./command-parser.js";
import { CommandDispatcher, CONTENT_TERMINATOR, joinContentLines } from "./dispatcher.js";
import { Renderer } from "./renderer.js";
import type { TraceLevel } from "../cli/trace.js";

/**
 * Options for ShellSession.
 */
export interface ShellSessionOptions {
  /** Input stream (defaults to process.stdin) */
  input?: NodeJS.ReadableStream;
  /** Output stream (defaults to process.stdout) */
  output?: NodeJS.WritableStream;
  /** Front end to start in (defaults to "unix") */
  mode?: FrontEndMode;
  /** Trace level (defaults to "summary") */
  traceLevel?: TraceLevel;
  /** ANSI colors (defaults to terminal detection) */
  color?: boolean;
  /** Show the banner and help when a front end starts (defaults to true) */
  banner?: boolean;
  /** Unix-style commands to run before the first prompt */
  startup?: string[];
}

/**
 * Why a session ended.
 */
export type SessionEndReason = "exit" | "end-of-input";

/** What a front-end loop hands back to `run` */
type LoopResult = SessionEndReason | "switch-mode";

/** Actions that cannot run from a startup list */
const STARTUP_EXCLUDED: ReadonlySet<CommandAction> = new Set<CommandAction>([
  "edit",
  "help",
  "mode",
  "exit",
]);

const MODE_CHOICES: Record<string, FrontEndMode | "exit"> = {
  "1": "intuitive",
  "2": "learning",
  "3": "unix",
  "4": "exit",
};

export class ShellSession {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly output: NodeJS.WritableStream;
  private readonly renderer: Renderer;
  private readonly dispatcher: CommandDispatcher;
  private readonly banner: boolean;
  private readonly startup: string[];
  private mode: FrontEndMode;

  constructor(
    private readonly engine: NamespaceEngine,
    options: ShellSessionOptions = {}
  ) {
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      terminal: false,
    });
    // Subscribe before any line can be emitted
    this.lines = this.rl[Symbol.asyncIterator]();

    this.renderer = new Renderer({ color: options.color });
    this.dispatcher = new CommandDispatcher(engine, {
      renderer: this.renderer,
      traceLevel: options.traceLevel,
    });
    this.mode = options.mode ?? "unix";
    this.banner = options.banner ?? true;
    this.startup = options.startup ?? [];
  }

  /**
   * Run until `exit` or the input ends.
   */
  async run(): Promise<SessionEndReason> {
    try {
      this.runStartup();

      for (;;) {
        const result = await this.runFrontEnd(this.mode);
        if (result !== "switch-mode") {
          return result;
        }
        const next = await this.chooseMode();
        if (next === "exit" || next === "end-of-input") {
          return next;
        }
        this.mode = next;
      }
    } finally {
      this.rl.close();
    }
  }

  /**
   * Write lines to the output, one per line.
   */
  print(lines: string[]): void {
    for (const line of lines) {
      this.output.write(`${line}\n`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────
  // Front ends
  // ─────────────────────────────────────────────────────────────────────

  private runFrontEnd(mode: FrontEndMode): Promise<LoopResult> {
    if (this.banner) {
      this.print([this.renderer.banner(mode)]);
    }
    return mode === "learning" ? this.runLearning() : this.runWords(mode);
  }

  private async runWords(mode: "unix" | "intuitive"): Promise<LoopResult> {
    if (this.banner) {
      this.print([...this.renderer.help(mode), ""]);
    }

    for (;;) {
      const prompt = mode === "unix" ? "$ " : `treefs:${this.engine.getCurrentPath()}> `;
      const line = await this.readLine(prompt);
      if (line === null) {
        return "end-of-input";
      }
      const result = await this.handleWordLine(mode, line);
      if (result) {
        return result;
      }
    }
  }

  private async handleWordLine(
    mode: "unix" | "intuitive",
    line: string
  ): Promise<LoopResult | undefined> {
    const parsed = this.parse(line);
    if (!parsed) {
      return undefined;
    }

    const spec = findCommand(mode, parsed.name);
    if (!spec) {
      this.print([
        mode === "unix"
          ? `Command not found: ${parsed.name}`
          : "Unknown command. Type 'mode' to switch, 'exit' to quit.",
      ]);
      return undefined;
    }

    if (OPERAND_ACTIONS.has(spec.action) && !parsed.operand) {
      this.print([
        mode === "unix" ? `${spec.word}: missing operand` : `Usage: ${spec.word} [name]`,
      ]);
      return undefined;
    }

    if (isSessionAction(spec.action)) {
      switch (spec.action) {
        case "help":
          this.print([...this.renderer.help(mode), ""]);
          return undefined;
        case "mode":
          this.print(["Switching mode..."]);
          return "switch-mode";
        case "exit":
          this.print(["Goodbye!"]);
          return "exit";
      }
    }

    return this.dispatch(spec.action, parsed.operand);
  }

  private async runLearning(): Promise<LoopResult> {
    this.print([...this.renderer.learningMenu(), ""]);

    for (;;) {
      const choice = await this.readLine("Enter option: ");
      if (choice === null) {
        return "end-of-input";
      }

      const option = findMenuOption(choice);
      if (!option) {
        this.print(["Invalid choice. Try again.", ...this.renderer.learningMenu()]);
        continue;
      }

      if (isSessionAction(option.action)) {
        switch (option.action) {
          case "help":
            this.print(this.renderer.learningMenu());
            continue;
          case "mode":
            this.print(["Switching mode..."]);
            return "switch-mode";
          case "exit":
            this.print(["Goodbye!"]);
            return "exit";
        }
      }

      let operand = option.fixedOperand ?? "";
      if (option.prompt) {
        const answer = await this.readLine(option.prompt);
        if (answer === null) {
          return "end-of-input";
        }
        operand = answer.trim();
      }

      if (OPERAND_ACTIONS.has(option.action) && !operand) {
        this.print([`${option.lesson ?? option.action}: missing operand`]);
        continue;
      }

      if (option.lesson) {
        const command = operand ? `${option.lesson} ${operand}` : option.lesson;
        this.print([this.renderer.colors.dim(`$ ${command}`)]);
      }

      const result = await this.dispatch(option.action, operand);
      if (result) {
        return result;
      }
    }
  }

  /**
   * Run an engine action, collecting content first for edits.
   */
  private async dispatch(action: CommandAction, operand: string): Promise<LoopResult | undefined> {
    if (isSessionAction(action)) {
      return undefined;
    }

    let content = "";
    if (action === "edit") {
      const collected = await this.readContent();
      if (collected === null) {
        return "end-of-input";
      }
      content = collected;
    }

    this.print(this.dispatcher.execute(action, operand, content).lines);
    return undefined;
  }

  private async readContent(): Promise<string | null> {
    this.print([`Enter content (type '${CONTENT_TERMINATOR}' on new line to finish):`]);
    const collected: string[] = [];
    for (;;) {
      const line = await this.readLine("");
      if (line === null) {
        return collected.length > 0 ? joinContentLines(collected) : null;
      }
      if (line === CONTENT_TERMINATOR) {
        return joinContentLines(collected);
      }
      collected.push(line);
    }
  }

  private async chooseMode(): Promise<FrontEndMode | SessionEndReason> {
    for (;;) {
      this.print(this.renderer.modeMenu());
      const choice = await this.readLine("Select mode: ");
      if (choice === null) {
        return "end-of-input";
      }
      const selected = MODE_CHOICES[choice.trim()];
      if (selected === "exit") {
        this.print(["Goodbye!"]);
        return "exit";
      }
      if (selected) {
        return selected;
      }
      this.print(["Invalid choice. Please try again."]);
    }
  }

  // ─────────────────────────────────────────────────────────────────────
  // Startup and input
  // ─────────────────────────────────────────────────────────────────────

  private runStartup(): void {
    for (const line of this.startup) {
      const parsed = this.parse(line);
      if (!parsed) {
        continue;
      }
      const spec = findCommand("unix", parsed.name);
      if (!spec || STARTUP_EXCLUDED.has(spec.action) || isSessionAction(spec.action)) {
        this.print([this.renderer.error(`Startup command not allowed: ${line}`)]);
        continue;
      }
      if (OPERAND_ACTIONS.has(spec.action) && !parsed.operand) {
        this.print([`${spec.word}: missing operand`]);
        continue;
      }
      this.print(this.dispatcher.execute(spec.action, parsed.operand).lines);
    }
  }

  /**
   * Parse a line, reporting quoting mistakes instead of throwing.
   */
  private parse(line: string): ParsedCommandLine | null {
    try {
      return parseCommandLine(line);
    } catch (error) {
      if (error instanceof CommandParseError) {
        this.print([this.renderer.error(error.message)]);
        return null;
      }
      throw error;
    }
  }

  private async readLine(prompt: string): Promise<string | null> {
    if (prompt) {
      this.output.write(prompt);
    }
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }
}
