import type { Position } from "../vim/types.js";

/**
 * Base interface for all commands.
 * Commands encapsulate a single undoable edit.
 */
export interface Command {
  readonly type: string;
  readonly description: string;

  /** Where the edit happened; undo/redo put the cursor back here */
  readonly position: Position;

  /** Execute the command (do/redo) */
  execute(): void;

  /** Undo the command */
  undo(): void;
}

/**
 * Batch multiple commands into a single undoable unit.
 */
export class BatchCommand implements Command {
  readonly type = "batch";
  readonly description: string;
  readonly position: Position;

  constructor(
    private commands: Command[],
    description: string,
  ) {
    this.description = description;
    // Use first command's position
    this.position = commands[0]?.position ?? { row: 0, col: 0 };
  }

  execute(): void {
    for (const cmd of this.commands) {
      cmd.execute();
    }
  }

  undo(): void {
    // Undo in reverse order
    for (let i = this.commands.length - 1; i >= 0; i--) {
      this.commands[i]?.undo();
    }
  }
}
