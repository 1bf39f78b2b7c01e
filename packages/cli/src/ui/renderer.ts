/**
 * Renderer
 *
 * Turns engine results into terminal lines. Colors come from picocolors
 * and can be switched off, in which case output is plain text.
 */

import pc from "picocolors";
import boxen from "boxen";
import type {
  DirectoryListing,
  FileInfo,
  NamespaceStats,
  TreeEntry,
} from "@treefs/core";
import {
  INTUITIVE_COMMANDS,
  LEARNING_MENU,
  UNIX_COMMANDS,
  type CommandSpec,
  type FrontEndMode,
} from "./commands.js";

type Colors = ReturnType<typeof pc.createColors>;

/** Width of the command column in help listings */
const HELP_COLUMN_WIDTH = 21;

/** Marker appended to the current directory in tree diagrams */
export const CURRENT_MARKER = "<- you are here";

/**
 * Options for Renderer.
 */
export interface RendererOptions {
  /** Emit ANSI colors (defaults to picocolors' terminal detection) */
  color?: boolean;
}

export class Renderer {
  readonly colors: Colors;

  constructor(options: RendererOptions = {}) {
    this.colors = pc.createColors(options.color ?? pc.isColorSupported);
  }

  success(message: string): string {
    return this.colors.green(`✓ ${message}`);
  }

  error(message: string): string {
    return this.colors.red(`Error: ${message}`);
  }

  /**
   * Directory listing, children sorted by name.
   */
  listing(listing: DirectoryListing): string[] {
    const c = this.colors;
    const lines = [
      c.bold(`--- Directory: ${listing.path} ---`),
      `[DIR]  ..`,
      `[DIR]  .`,
    ];

    if (listing.isEmpty) {
      lines.push(c.dim("(empty)"));
      return lines;
    }

    const sorted = [...listing.entries].sort((a, b) => compareNames(a.name, b.name));
    for (const entry of sorted) {
      if (entry.kind === "directory") {
        lines.push(`[DIR]  ${c.blue(entry.name)}`);
      } else if (entry.size !== undefined) {
        lines.push(`[FILE] ${entry.name} ${c.dim(`(${entry.size} bytes)`)}`);
      } else {
        lines.push(`[FILE] ${entry.name}`);
      }
    }
    return lines;
  }

  /**
   * File content with a header. Trailing newline is not repeated.
   */
  content(name: string, content: string): string[] {
    const body = content === "" ? this.colors.dim("(empty)") : content.replace(/\n$/, "");
    return [this.colors.bold(`--- Content of ${name} ---`), body];
  }

  info(info: FileInfo): string[] {
    const c = this.colors;
    return [
      c.bold("--- File Info ---"),
      `${c.cyan("Name")}: ${info.name}`,
      `${c.cyan("Path")}: ${info.path}`,
      `${c.cyan("Type")}: ${info.kind === "directory" ? "Directory" : "File"}`,
      `${c.cyan("Size")}: ${info.size} bytes`,
      `${c.cyan("Created")}: ${info.createdAt.toISOString()}`,
      `${c.cyan("Modified")}: ${info.modifiedAt.toISOString()}`,
    ];
  }

  stats(stats: NamespaceStats): string[] {
    return [
      this.colors.bold("--- File System Statistics ---"),
      `Total Files: ${stats.files}`,
      `Total Directories: ${stats.directories}`,
      `Total Size: ${stats.totalSize} bytes`,
      `Indexed Entries: ${stats.directories + stats.files}`,
    ];
  }

  searchResults(query: string, paths: string[]): string[] {
    const lines = [`Searching for '${query}'...`];
    if (paths.length === 0) {
      lines.push(this.colors.dim("No files found"));
    } else {
      for (const path of paths) {
        lines.push(`Found: ${path}`);
      }
    }
    return lines;
  }

  /**
   * Box-drawing diagram of a depth-first enumeration.
   */
  tree(entries: TreeEntry[]): string[] {
    const c = this.colors;
    const lines: string[] = [];
    const lastAtDepth: boolean[] = [];

    entries.forEach((entry, i) => {
      const isLast = isLastSibling(entries, i);
      lastAtDepth[entry.depth] = isLast;

      let prefix = "";
      for (let depth = 1; depth < entry.depth; depth++) {
        prefix += lastAtDepth[depth] ? "    " : "│   ";
      }
      if (entry.depth > 0) {
        prefix += isLast ? "└── " : "├── ";
      }

      let label: string;
      if (entry.depth === 0) {
        label = c.blue("/");
      } else if (entry.kind === "directory") {
        label = c.blue(`${entry.name}/`);
      } else {
        label = `${entry.name} ${c.dim(`(${entry.size ?? 0} bytes)`)}`;
      }

      const marker = entry.isCurrent ? `  ${c.yellow(CURRENT_MARKER)}` : "";
      lines.push(prefix + label + marker);
    });

    return lines;
  }

  help(mode: "unix" | "intuitive"): string[] {
    const vocabulary = mode === "unix" ? UNIX_COMMANDS : INTUITIVE_COMMANDS;
    return [
      this.colors.bold("AVAILABLE COMMANDS:"),
      ...vocabulary.map((spec) => `  ${formatUsage(spec).padEnd(HELP_COLUMN_WIDTH)}- ${spec.description}`),
    ];
  }

  learningMenu(): string[] {
    return [
      this.colors.bold("What do you want to do? (enter number):"),
      ...LEARNING_MENU.map((option) => ` ${option.choice.padStart(2)}. ${option.label}`),
    ];
  }

  modeMenu(): string[] {
    return [
      this.colors.bold("MODE SELECTION:"),
      "  1. Intuitive Mode (Easy Commands)",
      "  2. CLI Learning Mode (Learn Unix)",
      "  3. Full CLI Mode (Real Unix Commands)",
      "  4. Exit",
    ];
  }

  /**
   * Framed title shown when a front end starts.
   */
  banner(mode: FrontEndMode): string {
    return boxen(this.colors.bold(MODE_TITLES[mode]), {
      padding: { left: 1, right: 1, top: 0, bottom: 0 },
      borderStyle: "round",
      borderColor: "cyan",
    });
  }
}

const MODE_TITLES: Record<FrontEndMode, string> = {
  unix: "FULL CLI MODE - Use Real Unix Commands!",
  intuitive: "INTUITIVE MODE",
  learning: "CLI LEARNING MODE",
};

function formatUsage(spec: CommandSpec): string {
  return spec.operand ? `${spec.word} [${spec.operand}]` : spec.word;
}

/**
 * Plain code-unit ordering, independent of locale.
 */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * An entry is the last of its siblings when the walk climbs above its
 * depth (or ends) before another entry at the same depth appears.
 */
function isLastSibling(entries: TreeEntry[], index: number): boolean {
  const depth = entries[index].depth;
  for (let j = index + 1; j < entries.length; j++) {
    if (entries[j].depth < depth) return true;
    if (entries[j].depth === depth) return false;
  }
  return true;
}
