/**
 * Tests for Command Dispatcher
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NamespaceEngine } from "@treefs/core";
import { CommandDispatcher, joinContentLines } from "./dispatcher.js";
import { Renderer } from "./renderer.js";

describe("CommandDispatcher", () => {
  let engine: NamespaceEngine;
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    engine = new NamespaceEngine();
    dispatcher = new CommandDispatcher(engine, { renderer: new Renderer({ color: false }) });
  });

  describe("confirmations", () => {
    it("confirms creation", () => {
      expect(dispatcher.execute("mkdir", "docs")).toEqual({
        status: "ok",
        lines: ["✓ Directory 'docs' created"],
      });
      expect(dispatcher.execute("touch", "a.txt").lines).toEqual(["✓ File 'a.txt' created"]);
    });

    it("confirms each kind of directory change", () => {
      engine.createDirectory("docs");
      expect(dispatcher.execute("cd", "docs").lines).toEqual(["✓ Changed to directory 'docs'"]);
      expect(dispatcher.execute("cd", "..").lines).toEqual(["✓ Changed to parent directory"]);
      expect(dispatcher.execute("cd", "/").lines).toEqual(["✓ Changed to root"]);
    });

    it("reports bytes written", () => {
      engine.createFile("a.txt");
      expect(dispatcher.execute("edit", "a.txt", "héllo\n").lines).toEqual([
        "✓ File 'a.txt' written (7 bytes)",
      ]);
      expect(engine.readFile("a.txt")).toBe("héllo\n");
    });

    it("confirms deletion", () => {
      engine.createFile("a.txt");
      expect(dispatcher.execute("rm", "a.txt").lines).toEqual(["✓ 'a.txt' deleted"]);
      expect(engine.listDirectory().isEmpty).toBe(true);
    });

    it("omits confirmations when quiet", () => {
      const quiet = new CommandDispatcher(engine, {
        renderer: new Renderer({ color: false }),
        traceLevel: "quiet",
      });
      expect(quiet.execute("mkdir", "docs")).toEqual({ status: "ok", lines: [] });
      expect(quiet.execute("pwd", "").lines).toEqual(["/"]);
    });
  });

  describe("queries", () => {
    it("prints the current path", () => {
      engine.createDirectory("docs");
      engine.changeDirectory("docs");
      expect(dispatcher.execute("pwd", "").lines).toEqual(["/docs"]);
    });

    it("prints file content", () => {
      engine.createFile("a.txt", "hello\n");
      expect(dispatcher.execute("cat", "a.txt").lines).toEqual([
        "--- Content of a.txt ---",
        "hello",
      ]);
    });

    it("searches the whole tree", () => {
      engine.createDirectory("docs");
      engine.changeDirectory("docs");
      engine.createFile("report.txt");
      expect(dispatcher.execute("find", "rep").lines).toEqual([
        "Searching for 'rep'...",
        "Found: /docs/report.txt",
      ]);
    });

    it("prints statistics", () => {
      engine.createFile("a.txt", "abc");
      expect(dispatcher.execute("stats", "").lines).toEqual([
        "--- File System Statistics ---",
        "Total Files: 1",
        "Total Directories: 1",
        "Total Size: 3 bytes",
        "Indexed Entries: 2",
      ]);
    });
  });

  describe("errors", () => {
    it("turns engine errors into error lines", () => {
      expect(dispatcher.execute("cat", "missing.txt")).toEqual({
        status: "error",
        lines: ["Error: File not found: missing.txt"],
      });
    });

    it("uses display messages", () => {
      engine.createDirectory("docs");
      expect(dispatcher.execute("touch", "docs").lines).toEqual([
        "Error: 'docs' already exists in this directory",
      ]);

      engine.changeDirectory("docs");
      engine.createFile("a.txt");
      engine.changeDirectory("..");
      expect(dispatcher.execute("rm", "docs").lines).toEqual([
        "Error: Directory 'docs' is not empty. Delete its contents first.",
      ]);
    });

    it("reports invalid names", () => {
      expect(dispatcher.execute("mkdir", "a/b").lines).toEqual([
        'Error: Invalid name "a/b": name must not contain "/"',
      ]);
    });

    it("treats an empty operand as missing without touching the engine", () => {
      expect(dispatcher.execute("cd", "")).toEqual({
        status: "error",
        lines: ["cd: missing operand"],
      });
      expect(dispatcher.execute("edit", "", "text\n").lines).toEqual(["nano: missing operand"]);
      expect(engine.getCurrentPath()).toBe("/");
    });

    it("refuses to leave root", () => {
      expect(dispatcher.execute("cd", "..").lines).toEqual(["Error: Already at root"]);
    });
  });

  describe("live tree", () => {
    it("toggles and redraws after mutations only", () => {
      expect(dispatcher.liveTree).toBe(false);
      expect(dispatcher.execute("livetree", "").lines).toEqual([
        "✓ Live tree enabled",
        "/  <- you are here",
      ]);
      expect(dispatcher.liveTree).toBe(true);

      expect(dispatcher.execute("mkdir", "docs").lines).toEqual([
        "✓ Directory 'docs' created",
        "/  <- you are here",
        "└── docs/",
      ]);
      expect(dispatcher.execute("pwd", "").lines).toEqual(["/"]);

      expect(dispatcher.execute("livetree", "").lines).toEqual(["✓ Live tree disabled"]);
      expect(dispatcher.execute("touch", "a.txt").lines).toEqual(["✓ File 'a.txt' created"]);
    });

    it("does not redraw after a failed mutation", () => {
      const live = new CommandDispatcher(engine, {
        renderer: new Renderer({ color: false }),
        liveTree: true,
      });
      expect(live.execute("rm", "missing").lines).toEqual(["Error: File not found: missing"]);
    });
  });
});

describe("joinContentLines", () => {
  it("ends every line with a newline", () => {
    expect(joinContentLines(["a", "", "b"])).toBe("a\n\nb\n");
  });

  it("joins nothing to the empty string", () => {
    expect(joinContentLines([])).toBe("");
  });
});
