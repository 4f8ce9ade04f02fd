import type { Command } from "./Command.js";
import { BatchCommand } from "./Command.js";
import type { Position } from "../vim/types.js";

/**
 * Result of an undo/redo operation.
 */
export interface UndoRedoResult {
  success: boolean;
  position?: Position;
}

export interface CommandManagerOptions {
  /** Maximum number of undo steps kept (default 100) */
  maxSize?: number;
}

/**
 * Manages undo/redo stacks for commands.
 *
 * Usage:
 * - execute(cmd) to run a command and add it to history
 * - undo() to undo the last command
 * - redo() to redo the last undone command
 * - batch(() => { ... }) to group multiple commands as one undo unit
 */
export class CommandManager {
  private undoStack: Command[] = [];
  private redoStack: Command[] = [];
  private batchQueue: Command[] | null = null;
  private readonly maxSize: number;

  constructor(options: CommandManagerOptions = {}) {
    this.maxSize = options.maxSize ?? 100;
  }

  /**
   * Execute a command and add it to the undo stack.
   */
  execute(command: Command): void {
    if (this.batchQueue) {
      // In batch mode, queue the command
      this.batchQueue.push(command);
      command.execute();
    } else {
      command.execute();
      this.push(command);
    }
  }

  /**
   * Group multiple commands into a single undo unit.
   * Nested batches fold into the outermost one.
   */
  batch(fn: () => void, description: string): void {
    if (this.batchQueue) {
      fn();
      return;
    }

    this.batchQueue = [];
    try {
      fn();
    } finally {
      const commands = this.batchQueue;
      this.batchQueue = null;

      if (commands.length === 1 && commands[0]) {
        this.push(commands[0]);
      } else if (commands.length > 1) {
        this.push(new BatchCommand(commands, description));
      }
    }
  }

  /**
   * Undo the last command.
   * Returns result with success flag and cursor position to restore.
   */
  undo(): UndoRedoResult {
    const cmd = this.undoStack.pop();
    if (!cmd) return { success: false };

    cmd.undo();
    this.redoStack.push(cmd);
    return { success: true, position: cmd.position };
  }

  /**
   * Redo the last undone command.
   * Returns result with success flag and cursor position to restore.
   */
  redo(): UndoRedoResult {
    const cmd = this.redoStack.pop();
    if (!cmd) return { success: false };

    cmd.execute();
    this.undoStack.push(cmd);
    return { success: true, position: cmd.position };
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Get the description of the command that would be undone.
   */
  getUndoDescription(): string | null {
    const cmd = this.undoStack[this.undoStack.length - 1];
    return cmd?.description ?? null;
  }

  /**
   * Get the description of the command that would be redone.
   */
  getRedoDescription(): string | null {
    const cmd = this.redoStack[this.redoStack.length - 1];
    return cmd?.description ?? null;
  }

  /**
   * Clear all history.
   */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }

  private push(command: Command): void {
    this.undoStack.push(command);
    this.redoStack = []; // Clear redo on new action

    // Trim to max size
    if (this.undoStack.length > this.maxSize) {
      this.undoStack.shift();
    }
  }
}
