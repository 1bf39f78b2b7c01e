#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Starts an interactive session over a fresh in-memory namespace.
 */

import { Command } from "commander";
import * as path from "path";
import { NamespaceEngine, createEngineEventBus } from "@treefs/core";
import {
  findProgramConfig,
  loadProgramConfigFile,
  mergeWithCLIOptions,
  type ProgramConfig,
} from "../config/index.js";
import { ShellSession } from "../ui/session.js";
import { attachTrace } from "./trace.js";

/**
 * CLI options from command line.
 */
interface CLIOptions {
  mode?: string;
  trace?: string;
  config?: string;
  /** false only when --no-color was given */
  color: boolean;
  /** false only when --no-banner was given */
  banner: boolean;
  timestamps?: boolean;
}

/**
 * Streams the session reads from and writes to.
 */
export interface CLIStreams {
  /** Defaults to process.stdin */
  input?: NodeJS.ReadableStream;
  /** Defaults to process.stdout */
  output?: NodeJS.WritableStream;
}

/**
 * Load the config named on the command line, or search for one upward
 * from the working directory.
 */
async function loadConfig(options: CLIOptions): Promise<ProgramConfig | undefined> {
  if (options.config) {
    return loadProgramConfigFile(path.resolve(options.config));
  }
  const found = await findProgramConfig(process.cwd());
  return found?.config;
}

/**
 * Main CLI execution.
 */
export async function runCLI(
  argv: string[] = process.argv,
  streams: CLIStreams = {}
): Promise<void> {
  const program = new Command();

  program
    .name("treefs")
    .description("Explore an in-memory file tree from Unix-style, plain-English or menu-driven prompts")
    .version("0.1.0")
    .option("-m, --mode <mode>", "Front end: unix, intuitive, learning")
    .option("-t, --trace <level>", "Trace level: quiet, summary, debug")
    .option("-c, --config <path>", "Config file (searched for upward if not specified)")
    .option("--no-color", "Disable colored output")
    .option("--no-banner", "Skip the banner and help shown on entry")
    .option("--timestamps", "Prefix debug trace lines with timestamps")
    .action(async (options: CLIOptions) => {
      try {
        await startSession(options, streams);
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });

  await program.parseAsync(argv);
}

async function startSession(options: CLIOptions, streams: CLIStreams): Promise<void> {
  const output = streams.output ?? process.stdout;
  const config = mergeWithCLIOptions(await loadConfig(options), {
    mode: options.mode,
    trace: options.trace,
    color: options.color ? undefined : false,
    banner: options.banner ? undefined : false,
  });

  const events = createEngineEventBus();
  const detachTrace = attachTrace(
    events,
    config.trace,
    (line) => output.write(`${line}\n`),
    { color: config.color, showTimestamps: options.timestamps }
  );

  const engine = new NamespaceEngine({ events });
  const session = new ShellSession(engine, {
    input: streams.input,
    output,
    mode: config.mode,
    traceLevel: config.trace,
    color: config.color,
    banner: config.banner,
    startup: config.startup,
  });

  try {
    await session.run();
  } finally {
    detachTrace();
    events.clear();
  }
}

// Run CLI if this is the main module
// Handle symlinks by resolving the real path
import { realpathSync } from "fs";
import { fileURLToPath } from "url";

function isMainModule(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const entryFile = realpathSync(process.argv[1]);
    return currentFile === entryFile;
  } catch {
    return false;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  runCLI().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
