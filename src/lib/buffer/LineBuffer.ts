import { CommandManager, type UndoRedoResult } from "../commands/index.js";
import {
  DeleteRangeCommand,
  InsertTextCommand,
  textInRange,
  type LineStore,
} from "./EditCommands.js";
import { orderPositions, samePosition } from "../vim/position.js";
import type { Position, Selection, TextBuffer } from "../vim/types.js";

type CharClass = "space" | "word" | "punct";

function classOf(char: string): CharClass {
  if (/\s/.test(char)) return "space";
  if (/\w/.test(char)) return "word";
  return "punct";
}

export interface LineBufferOptions {
  /** Maximum number of undo steps kept */
  maxHistory?: number;
}

/**
 * Multi-line text buffer with a cursor, a selection and command-based
 * undo/redo. Every motion clamps at the document edges.
 */
export class LineBuffer implements TextBuffer {
  private lines: string[];
  private cursor: Position = { row: 0, col: 0 };
  private selection: Selection = {
    anchor: { row: 0, col: 0 },
    active: { row: 0, col: 0 },
  };
  private readonly history: CommandManager;
  private readonly store: LineStore;
  private version = 0;
  private listeners: Set<() => void> = new Set();

  constructor(text = "", options: LineBufferOptions = {}) {
    this.lines = text.split("\n");
    this.history = new CommandManager({ maxSize: options.maxHistory });
    this.store = {
      getLines: () => this.lines,
      setLines: (lines) => {
        this.lines = lines.length > 0 ? lines : [""];
      },
    };
  }

  // ==========================================================================
  // Reading
  // ==========================================================================

  getText(): string {
    return this.lines.join("\n");
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  getLine(row: number): string {
    return this.lines[row] ?? "";
  }

  getLineCount(): number {
    return this.lines.length;
  }

  documentEnd(): Position {
    const row = this.lines.length - 1;
    return { row, col: this.getLine(row).length };
  }

  getCursor(): Position {
    return { ...this.cursor };
  }

  getSelection(): Selection {
    return {
      anchor: { ...this.selection.anchor },
      active: { ...this.selection.active },
    };
  }

  getSelectedText(): string {
    const { start, end } = orderPositions(
      this.selection.anchor,
      this.selection.active,
    );
    return textInRange(this.lines, start, end);
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  // ==========================================================================
  // Cursor
  // ==========================================================================

  setCursor(pos: Position): void {
    this.cursor = this.clamp(pos);
    this.selection = { anchor: { ...this.cursor }, active: { ...this.cursor } };
    this.notifyListeners();
  }

  setSelection(anchor: Position, active: Position): void {
    const clampedActive = this.clamp(active);
    this.selection = { anchor: this.clamp(anchor), active: clampedActive };
    this.cursor = { ...clampedActive };
    this.notifyListeners();
  }

  cursorLeft(): void {
    this.setCursor({ row: this.cursor.row, col: this.cursor.col - 1 });
  }

  cursorRight(): void {
    this.setCursor({ row: this.cursor.row, col: this.cursor.col + 1 });
  }

  cursorUp(): void {
    this.setCursor({ row: this.cursor.row - 1, col: this.cursor.col });
  }

  cursorDown(): void {
    this.setCursor({ row: this.cursor.row + 1, col: this.cursor.col });
  }

  cursorLineStart(): void {
    this.setCursor({ row: this.cursor.row, col: 0 });
  }

  cursorLineEnd(): void {
    this.setCursor({
      row: this.cursor.row,
      col: this.getLine(this.cursor.row).length,
    });
  }

  /**
   * Move to the start of the next word, crossing at most one line break.
   */
  cursorWordRight(): void {
    let { row, col } = this.cursor;
    let line = this.getLine(row);

    if (col >= line.length) {
      if (row >= this.lines.length - 1) return;
      row++;
      col = 0;
      line = this.getLine(row);
    } else {
      const cls = classOf(line[col] ?? "");
      if (cls !== "space") {
        while (col < line.length && classOf(line[col] ?? "") === cls) col++;
      }
    }

    while (col < line.length && classOf(line[col] ?? "") === "space") col++;

    if (col >= line.length && row < this.lines.length - 1 && row === this.cursor.row) {
      row++;
      col = 0;
      line = this.getLine(row);
      while (col < line.length && classOf(line[col] ?? "") === "space") col++;
    }

    this.setCursor({ row, col });
  }

  /**
   * Move to the start of the previous word, crossing at most one line break.
   */
  cursorWordLeft(): void {
    let { row, col } = this.cursor;

    if (col === 0) {
      if (row === 0) return;
      row--;
      col = this.getLine(row).length;
    }

    const line = this.getLine(row);
    col = Math.min(col, line.length);
    while (col > 0 && classOf(line[col - 1] ?? "") === "space") col--;
    if (col > 0) {
      const cls = classOf(line[col - 1] ?? "");
      while (col > 0 && classOf(line[col - 1] ?? "") === cls) col--;
    }

    this.setCursor({ row, col });
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  insert(text: string): void {
    if (text === "") return;
    const command = new InsertTextCommand(this.store, this.cursor, text);
    this.history.execute(command);
    this.setCursor(command.end);
  }

  delete(start: Position, end: Position): void {
    const span = orderPositions(this.clamp(start), this.clamp(end));
    if (samePosition(span.start, span.end)) {
      this.setCursor(span.start);
      return;
    }
    this.history.execute(new DeleteRangeCommand(this.store, span.start, span.end));
    this.setCursor(span.start);
  }

  /**
   * Backspace. Joins with the previous line at column 0.
   */
  deleteLeft(): void {
    const { row, col } = this.cursor;
    if (col > 0) {
      this.delete({ row, col: col - 1 }, this.cursor);
    } else if (row > 0) {
      this.delete({ row: row - 1, col: this.getLine(row - 1).length }, this.cursor);
    }
  }

  /**
   * Delete the character under the cursor. Joins with the next line at
   * the end of a line.
   */
  deleteRight(): void {
    const { row, col } = this.cursor;
    if (col < this.getLine(row).length) {
      this.delete(this.cursor, { row, col: col + 1 });
    } else if (row < this.lines.length - 1) {
      this.delete(this.cursor, { row: row + 1, col: 0 });
    }
  }

  deleteToLineEnd(): void {
    const { row } = this.cursor;
    this.delete(this.cursor, { row, col: this.getLine(row).length });
  }

  batch(description: string, edit: () => void): void {
    this.history.batch(edit, description);
  }

  undo(): void {
    this.restore(this.history.undo());
  }

  redo(): void {
    this.restore(this.history.redo());
  }

  /**
   * Replace the whole content and forget the undo history.
   */
  setText(text: string): void {
    this.lines = text.split("\n");
    this.history.clear();
    this.setCursor(this.documentEnd());
  }

  // ==========================================================================
  // Subscriptions
  // ==========================================================================

  /**
   * Subscribe to content, cursor and selection changes.
   */
  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  };

  getVersion = (): number => this.version;

  private notifyListeners(): void {
    this.version++;
    for (const listener of this.listeners) {
      listener();
    }
  }

  private restore(result: UndoRedoResult): void {
    if (!result.success) return;
    this.setCursor(result.position ?? this.cursor);
  }

  private clamp(pos: Position): Position {
    const row = Math.max(0, Math.min(pos.row, this.lines.length - 1));
    const col = Math.max(0, Math.min(pos.col, this.getLine(row).length));
    return { row, col };
  }
}
