/**
 * Tests for Shell Session
 */

import { describe, it, expect } from "vitest";
import { Readable, Writable } from "stream";
import { NamespaceEngine } from "@treefs/core";
import { ShellSession, type ShellSessionOptions } from "./session.js";
import { Renderer } from "./renderer.js";

// Feed lines to a session and capture everything it writes
async function runSession(
  inputLines: string[],
  options: ShellSessionOptions = {},
  engine: NamespaceEngine = new NamespaceEngine()
) {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  const input = Readable.from(inputLines.length > 0 ? [inputLines.map((line) => `${line}\n`).join("")] : []);

  const session = new ShellSession(engine, {
    input,
    output,
    color: false,
    banner: false,
    ...options,
  });
  const reason = await session.run();
  return { reason, output: chunks.join(""), engine };
}

function block(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

const plain = new Renderer({ color: false });

describe("ShellSession", () => {
  describe("unix front end", () => {
    it("runs commands until exit", async () => {
      const { reason, output } = await runSession(["mkdir docs", "cd docs", "pwd", "exit"]);

      expect(reason).toBe("exit");
      expect(output).toBe(
        "$ ✓ Directory 'docs' created\n" +
          "$ ✓ Changed to directory 'docs'\n" +
          "$ /docs\n" +
          "$ Goodbye!\n"
      );
    });

    it("accepts quit as exit", async () => {
      const { reason, output } = await runSession(["quit"]);
      expect(reason).toBe("exit");
      expect(output).toBe("$ Goodbye!\n");
    });

    it("reports unknown commands and missing operands", async () => {
      const { output } = await runSession(["createfolder docs", "mkdir", "", "exit"]);
      expect(output).toBe(
        "$ Command not found: createfolder\n" +
          "$ mkdir: missing operand\n" +
          "$ $ Goodbye!\n"
      );
    });

    it("reports an unclosed quote", async () => {
      const { output } = await runSession(['cat "oops']);
      expect(output).toBe('$ Error: Unclosed double quote in: "oops\n$ ');
    });

    it("ends when input runs out", async () => {
      const { reason, output } = await runSession(["touch a.txt"]);
      expect(reason).toBe("end-of-input");
      expect(output).toBe("$ ✓ File 'a.txt' created\n$ ");
    });

    it("collects editor content up to the terminator", async () => {
      const { output, engine } = await runSession([
        "touch a.txt",
        "nano a.txt",
        "line one",
        "",
        "END",
        "cat a.txt",
        "exit",
      ]);

      expect(engine.readFile("a.txt")).toBe("line one\n\n");
      expect(output).toBe(
        "$ ✓ File 'a.txt' created\n" +
          "$ Enter content (type 'END' on new line to finish):\n" +
          "✓ File 'a.txt' written (10 bytes)\n" +
          "$ --- Content of a.txt ---\n" +
          "line one\n\n" +
          "$ Goodbye!\n"
      );
    });

    it("keeps editor content cut short by end of input", async () => {
      const { reason, engine } = await runSession(["touch a.txt", "nano a.txt", "partial"]);
      expect(reason).toBe("end-of-input");
      expect(engine.readFile("a.txt")).toBe("partial\n");
    });

    it("omits confirmations when quiet", async () => {
      const { output, engine } = await runSession(["mkdir docs", "exit"], { traceLevel: "quiet" });
      expect(output).toBe("$ $ Goodbye!\n");
      expect(engine.listDirectory().entries).toEqual([{ name: "docs", kind: "directory" }]);
    });

    it("shows the banner and help on entry", async () => {
      const { output } = await runSession(["exit"], { banner: true });
      expect(output).toContain("FULL CLI MODE - Use Real Unix Commands!");
      expect(output).toContain(block([...plain.help("unix"), ""]) + "$ Goodbye!\n");
    });
  });

  describe("intuitive front end", () => {
    it("prompts with the current path", async () => {
      const { output } = await runSession(
        ["createfolder docs", "openfolder docs", "where", "bogus", "view", "exit"],
        { mode: "intuitive" }
      );

      expect(output).toBe(
        "treefs:/> ✓ Directory 'docs' created\n" +
          "treefs:/> ✓ Changed to directory 'docs'\n" +
          "treefs:/docs> /docs\n" +
          "treefs:/docs> Unknown command. Type 'mode' to switch, 'exit' to quit.\n" +
          "treefs:/docs> Usage: view [name]\n" +
          "treefs:/docs> Goodbye!\n"
      );
    });
  });

  describe("learning front end", () => {
    it("asks for operands and shows the unix lesson", async () => {
      const { reason, output } = await runSession(["2", "docs", "11", "99", "16"], {
        mode: "learning",
      });
      const menu = block(plain.learningMenu());

      expect(reason).toBe("exit");
      expect(output).toBe(
        menu +
          "\n" +
          "Enter option: Enter folder name: $ mkdir docs\n" +
          "✓ Directory 'docs' created\n" +
          "Enter option: $ pwd\n" +
          "/\n" +
          "Enter option: Invalid choice. Try again.\n" +
          menu +
          "Enter option: Goodbye!\n"
      );
    });

    it("reports an empty answer as a missing operand", async () => {
      const { reason, output } = await runSession(["3", "", "16"], { mode: "learning" });

      expect(reason).toBe("exit");
      expect(output.endsWith(
        "Enter option: Enter folder name: cd: missing operand\n" +
          "Enter option: Goodbye!\n"
      )).toBe(true);
    });

    it("asks for no content when the file name is empty", async () => {
      const { output, engine } = await runSession(["7", " ", "16"], { mode: "learning" });

      expect(output.endsWith(
        "Enter option: Enter file name: nano: missing operand\n" +
          "Enter option: Goodbye!\n"
      )).toBe(true);
      expect(engine.listDirectory().isEmpty).toBe(true);
    });

    it("uses the fixed operand for going back", async () => {
      const engine = new NamespaceEngine();
      engine.createDirectory("docs");
      engine.changeDirectory("docs");

      const { output } = await runSession(["4", "16"], { mode: "learning" }, engine);

      expect(engine.getCurrentPath()).toBe("/");
      expect(output).toContain("Enter option: $ cd ..\n✓ Changed to parent directory\n");
    });
  });

  describe("mode switching", () => {
    it("moves to the chosen front end", async () => {
      const { reason, output } = await runSession(["mode", "7", "1", "where", "exit"]);
      const menu = block(plain.modeMenu());

      expect(reason).toBe("exit");
      expect(output).toBe(
        "$ Switching mode...\n" +
          menu +
          "Select mode: Invalid choice. Please try again.\n" +
          menu +
          "Select mode: treefs:/> /\n" +
          "treefs:/> Goodbye!\n"
      );
    });

    it("keeps the namespace across modes", async () => {
      const { engine } = await runSession(["mkdir docs", "mode", "1", "openfolder docs", "exit"]);
      expect(engine.getCurrentPath()).toBe("/docs");
    });

    it("exits from the mode menu", async () => {
      const { reason, output } = await runSession(["mode", "4"]);
      expect(reason).toBe("exit");
      expect(output.endsWith("Select mode: Goodbye!\n")).toBe(true);
    });
  });

  describe("startup commands", () => {
    it("runs allowed commands before the first prompt", async () => {
      const { output } = await runSession(["pwd", "exit"], {
        startup: ["mkdir docs", "cd docs", "nano notes.txt", "bogus", "touch"],
      });

      expect(output).toBe(
        "✓ Directory 'docs' created\n" +
          "✓ Changed to directory 'docs'\n" +
          "Error: Startup command not allowed: nano notes.txt\n" +
          "Error: Startup command not allowed: bogus\n" +
          "touch: missing operand\n" +
          "$ /docs\n" +
          "$ Goodbye!\n"
      );
    });
  });
});
