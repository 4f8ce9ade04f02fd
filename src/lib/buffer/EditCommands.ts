import type { Command } from "../commands/index.js";
import type { Position } from "../vim/types.js";

// Line storage accessors passed to commands
export interface LineStore {
  getLines: () => readonly string[];
  setLines: (lines: string[]) => void;
}

/**
 * Position just past `text` when it is inserted at `at`.
 */
export function endOfInsertion(at: Position, text: string): Position {
  const segments = text.split("\n");
  if (segments.length === 1) {
    return { row: at.row, col: at.col + text.length };
  }
  const last = segments[segments.length - 1] ?? "";
  return { row: at.row + segments.length - 1, col: last.length };
}

export function insertText(
  lines: readonly string[],
  at: Position,
  text: string,
): string[] {
  const line = lines[at.row] ?? "";
  const before = line.slice(0, at.col);
  const after = line.slice(at.col);
  const inserted = (before + text + after).split("\n");
  return [...lines.slice(0, at.row), ...inserted, ...lines.slice(at.row + 1)];
}

export function textInRange(
  lines: readonly string[],
  start: Position,
  end: Position,
): string {
  if (start.row === end.row) {
    return (lines[start.row] ?? "").slice(start.col, end.col);
  }
  const parts = [(lines[start.row] ?? "").slice(start.col)];
  for (let row = start.row + 1; row < end.row; row++) {
    parts.push(lines[row] ?? "");
  }
  parts.push((lines[end.row] ?? "").slice(0, end.col));
  return parts.join("\n");
}

export function removeRange(
  lines: readonly string[],
  start: Position,
  end: Position,
): string[] {
  const head = (lines[start.row] ?? "").slice(0, start.col);
  const tail = (lines[end.row] ?? "").slice(end.col);
  return [...lines.slice(0, start.row), head + tail, ...lines.slice(end.row + 1)];
}

/**
 * Insert text at a position.
 */
export class InsertTextCommand implements Command {
  readonly type = "insertText";
  readonly description: string;
  readonly position: Position;
  /** Cursor position after the insertion */
  readonly end: Position;

  constructor(
    private store: LineStore,
    at: Position,
    private text: string,
  ) {
    this.position = { ...at };
    this.end = endOfInsertion(at, text);
    this.description = `Insert ${JSON.stringify(text)}`;
  }

  execute(): void {
    this.store.setLines(insertText(this.store.getLines(), this.position, this.text));
  }

  undo(): void {
    this.store.setLines(removeRange(this.store.getLines(), this.position, this.end));
  }
}

/**
 * Delete the text between two ordered positions.
 */
export class DeleteRangeCommand implements Command {
  readonly type = "deleteRange";
  readonly description: string;
  readonly position: Position;
  readonly end: Position;

  // Captured on first execute
  private removed: string | null = null;

  constructor(
    private store: LineStore,
    start: Position,
    end: Position,
  ) {
    this.position = { ...start };
    this.end = { ...end };
    this.description = `Delete ${start.row}:${start.col}-${end.row}:${end.col}`;
  }

  /** The deleted text, available once executed */
  get deletedText(): string {
    return this.removed ?? "";
  }

  execute(): void {
    const lines = this.store.getLines();
    if (this.removed === null) {
      this.removed = textInRange(lines, this.position, this.end);
    }
    this.store.setLines(removeRange(lines, this.position, this.end));
  }

  undo(): void {
    this.store.setLines(
      insertText(this.store.getLines(), this.position, this.removed ?? ""),
    );
  }
}
