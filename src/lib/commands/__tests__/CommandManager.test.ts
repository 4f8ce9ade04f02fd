import { describe, test, expect, beforeEach } from "vitest";
import { CommandManager } from "../CommandManager.js";
import type { Command } from "../Command.js";

// Appends a value to a shared log; undo removes it again
function pushCommand(log: string[], value: string, col = 0): Command {
  return {
    type: "push",
    description: `Push ${value}`,
    position: { row: 0, col },
    execute: () => {
      log.push(value);
    },
    undo: () => {
      log.pop();
    },
  };
}

describe("CommandManager", () => {
  let manager: CommandManager;
  let log: string[];

  beforeEach(() => {
    manager = new CommandManager();
    log = [];
  });

  test("execute runs the command", () => {
    manager.execute(pushCommand(log, "a"));
    expect(log).toEqual(["a"]);
    expect(manager.canUndo()).toBe(true);
  });

  test("undo and redo report the command position", () => {
    manager.execute(pushCommand(log, "a", 4));
    expect(manager.undo()).toEqual({ success: true, position: { row: 0, col: 4 } });
    expect(log).toEqual([]);
    expect(manager.redo()).toEqual({ success: true, position: { row: 0, col: 4 } });
    expect(log).toEqual(["a"]);
  });

  test("undo on empty history fails", () => {
    expect(manager.undo()).toEqual({ success: false });
    expect(manager.redo()).toEqual({ success: false });
  });

  test("a new command clears the redo stack", () => {
    manager.execute(pushCommand(log, "a"));
    manager.undo();
    manager.execute(pushCommand(log, "b"));
    expect(manager.canRedo()).toBe(false);
  });

  test("batch groups commands into one undo step", () => {
    manager.batch(() => {
      manager.execute(pushCommand(log, "a", 1));
      manager.execute(pushCommand(log, "b", 2));
    }, "Push both");

    expect(manager.getUndoDescription()).toBe("Push both");
    expect(manager.undo()).toEqual({ success: true, position: { row: 0, col: 1 } });
    expect(log).toEqual([]);
    expect(manager.canUndo()).toBe(false);
  });

  test("a batch of one keeps the command itself", () => {
    manager.batch(() => {
      manager.execute(pushCommand(log, "a"));
    }, "Unused");
    expect(manager.getUndoDescription()).toBe("Push a");
  });

  test("an empty batch records nothing", () => {
    manager.batch(() => {}, "Nothing");
    expect(manager.canUndo()).toBe(false);
  });

  test("nested batches fold into the outer one", () => {
    manager.batch(() => {
      manager.execute(pushCommand(log, "a"));
      manager.batch(() => {
        manager.execute(pushCommand(log, "b"));
      }, "Inner");
    }, "Outer");

    expect(manager.getUndoDescription()).toBe("Outer");
    manager.undo();
    expect(log).toEqual([]);
  });

  test("a throwing batch still records what ran", () => {
    expect(() =>
      manager.batch(() => {
        manager.execute(pushCommand(log, "a"));
        throw new Error("boom");
      }, "Fails"),
    ).toThrow("boom");
    expect(manager.canUndo()).toBe(true);
  });

  test("history is trimmed to maxSize", () => {
    manager = new CommandManager({ maxSize: 2 });
    manager.execute(pushCommand(log, "a"));
    manager.execute(pushCommand(log, "b"));
    manager.execute(pushCommand(log, "c"));
    manager.undo();
    manager.undo();
    expect(manager.undo().success).toBe(false);
    expect(log).toEqual(["a"]);
  });

  test("clear drops both stacks", () => {
    manager.execute(pushCommand(log, "a"));
    manager.undo();
    manager.execute(pushCommand(log, "b"));
    manager.clear();
    expect(manager.canUndo()).toBe(false);
    expect(manager.canRedo()).toBe(false);
    expect(manager.getRedoDescription()).toBeNull();
  });
});
