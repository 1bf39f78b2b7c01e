/**
 * Program Configuration
 *
 * Schema and loader for treefs.config.yaml files.
 * The file picks the starting front end, trace level, colors, and
 * commands to run before the first prompt.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";
import { FRONT_END_MODES, type FrontEndMode } from "../ui/commands.js";
import { TRACE_LEVELS, type TraceLevel } from "../cli/trace.js";

/**
 * Complete program configuration schema.
 */
export const ProgramConfigSchema = z.object({
  /** Front end to start in */
  mode: z.enum(["unix", "intuitive", "learning"]).optional(),
  /** Output verbosity */
  trace: z.enum(["quiet", "summary", "debug"]).optional(),
  /** ANSI colors */
  color: z.boolean().optional(),
  /** Show the mode banner and command help on entry */
  banner: z.boolean().optional(),
  /** Unix-style commands run before the first prompt */
  startup: z.array(z.string().min(1)).optional(),
}).strict();

export type ProgramConfig = z.infer<typeof ProgramConfigSchema>;

/**
 * Configuration with every setting decided.
 */
export interface EffectiveConfig {
  mode: FrontEndMode;
  trace: TraceLevel;
  /** Undefined means detect from the terminal */
  color?: boolean;
  banner: boolean;
  startup: string[];
}

/**
 * Program configuration file names to look for.
 */
export const CONFIG_FILE_NAMES = [
  "treefs.config.yaml",
  "treefs.config.yml",
];

/**
 * Load program configuration from a YAML file.
 *
 * An empty file is an empty configuration.
 *
 * @param configPath - Path to the config file
 * @returns Parsed and validated program config
 * @throws Error if file can't be read, parsed, or validated
 */
export async function loadProgramConfigFile(configPath: string): Promise<ProgramConfig> {
  const content = await fs.readFile(configPath, "utf-8");
  const parsed = yaml.load(content) ?? {};

  const result = ProgramConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".")}: ${issue.message}`
    ).join("\n");
    throw new Error(`Invalid program config in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Find and load program configuration.
 *
 * Searches for treefs.config.yaml in the given directory
 * and parent directories. A file that exists but is invalid is an error,
 * not a reason to keep searching.
 *
 * @param startDir - Directory to start searching from
 * @returns Config and path if found, null otherwise
 */
export async function findProgramConfig(
  startDir: string
): Promise<{ config: ProgramConfig; configPath: string } | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (await fileExists(configPath)) {
        return { config: await loadProgramConfigFile(configPath), configPath };
      }
    }

    // Move up one directory
    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null; // Reached root
    }
    currentDir = parentDir;
  }
}

/**
 * Get default program configuration.
 */
export function getDefaultProgramConfig(): EffectiveConfig {
  return {
    mode: "unix",
    trace: "summary",
    banner: true,
    startup: [],
  };
}

/**
 * Options that can be given on the command line.
 */
export interface CLIConfigOptions {
  mode?: string;
  trace?: string;
  color?: boolean;
  banner?: boolean;
}

/**
 * Merge CLI options with program config.
 *
 * CLI options take precedence over program config, which takes
 * precedence over defaults.
 *
 * @throws Error for an unknown mode or trace level
 */
export function mergeWithCLIOptions(
  programConfig: ProgramConfig | undefined,
  cliOptions: CLIConfigOptions
): EffectiveConfig {
  const defaults = getDefaultProgramConfig();
  const config = programConfig ?? {};

  return {
    mode: parseChoice("mode", cliOptions.mode, FRONT_END_MODES) ?? config.mode ?? defaults.mode,
    trace: parseChoice("trace level", cliOptions.trace, TRACE_LEVELS) ?? config.trace ?? defaults.trace,
    color: cliOptions.color ?? config.color,
    banner: cliOptions.banner ?? config.banner ?? defaults.banner,
    startup: config.startup ?? defaults.startup,
  };
}

function parseChoice<T extends string>(
  label: string,
  value: string | undefined,
  choices: readonly T[]
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(`Invalid ${label} "${value}". Expected one of: ${choices.join(", ")}`);
  }
  return match;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
