import {
  applyOperator,
  clampPosition,
  runLineOperator,
  runOperatorMotion,
  visualSpan,
  type EditTarget,
} from "./operators.js";
import type { LastChange, TextBuffer } from "./types.js";

export interface ChangeResult {
  /** False when the change found nothing to act on */
  applied: boolean;
  /** Mode to enter afterwards, null to stay */
  nextMode: "insert" | null;
}

const APPLIED: ChangeResult = { applied: true, nextMode: null };
const NOT_APPLIED: ChangeResult = { applied: false, nextMode: null };
const INSERT: ChangeResult = { applied: true, nextMode: "insert" };

function deleteChars(buffer: TextBuffer, count: number): void {
  buffer.batch("Delete characters", () => {
    for (let i = 0; i < count; i++) {
      buffer.deleteRight();
    }
  });
}

function deleteCharsBefore(buffer: TextBuffer, count: number): void {
  buffer.batch("Delete characters before cursor", () => {
    for (let i = 0; i < count; i++) {
      buffer.deleteLeft();
    }
  });
}

function replaceChars(buffer: TextBuffer, char: string, count: number): boolean {
  const { row, col } = buffer.getCursor();
  if (col + count > buffer.getLine(row).length) return false;

  buffer.batch("Replace characters", () => {
    buffer.delete({ row, col }, { row, col: col + count });
    buffer.insert(char.repeat(count));
    // Replace doesn't advance past the last replaced character
    buffer.setCursor({ row, col: col + count - 1 });
  });
  return true;
}

function joinLines(buffer: TextBuffer): boolean {
  const { row } = buffer.getCursor();
  if (row >= buffer.getLineCount() - 1) return false;

  const joinCol = buffer.getLine(row).length;
  buffer.batch("Join lines", () => {
    buffer.cursorLineEnd();
    buffer.deleteRight();
    buffer.insert(" ");
    buffer.setCursor({ row, col: joinCol });
  });
  return true;
}

function openLine(buffer: TextBuffer, above: boolean): void {
  buffer.batch("Open line", () => {
    if (above) {
      buffer.cursorLineStart();
      buffer.insert("\n");
      buffer.cursorUp();
    } else {
      buffer.cursorLineEnd();
      buffer.insert("\n");
    }
  });
}

/**
 * Run one replayable command shape from the current cursor position.
 * Both the original key command and . go through here.
 */
export function performChange(
  target: EditTarget,
  change: LastChange,
): ChangeResult {
  const { buffer } = target;

  switch (change.kind) {
    case "delete-char":
      deleteChars(buffer, change.count);
      return APPLIED;

    case "delete-char-before":
      deleteCharsBefore(buffer, change.count);
      return APPLIED;

    case "delete-to-line-end":
      buffer.deleteToLineEnd();
      return APPLIED;

    case "change-to-line-end":
      buffer.deleteToLineEnd();
      return INSERT;

    case "substitute-char":
      buffer.deleteRight();
      return INSERT;

    case "substitute-line":
      buffer.batch("Substitute line", () => {
        buffer.cursorLineStart();
        buffer.deleteToLineEnd();
      });
      return INSERT;

    case "join-lines":
      return joinLines(buffer) ? APPLIED : NOT_APPLIED;

    case "replace-char":
      return replaceChars(buffer, change.char, change.count)
        ? APPLIED
        : NOT_APPLIED;

    case "open-line":
      openLine(buffer, change.above);
      return INSERT;

    case "line-operator":
      runLineOperator(target, change.operator, change.count);
      return change.operator === "change" ? INSERT : APPLIED;

    case "operator-motion": {
      const applied = runOperatorMotion(
        target,
        change.operator,
        change.motion,
        change.count,
      );
      if (!applied) return NOT_APPLIED;
      return change.operator === "change" ? INSERT : APPLIED;
    }

    case "visual-operator": {
      const start = buffer.getCursor();
      const active =
        change.lineSpan === 0
          ? { row: start.row, col: start.col + change.endColumn }
          : { row: start.row + change.lineSpan, col: change.endColumn };
      const span = visualSpan(buffer, start, clampPosition(buffer, active));
      applyOperator(target, change.operator, span, "char");
      return change.operator === "change" ? INSERT : APPLIED;
    }
  }
}

/**
 * The same change with a new count, for `.` preceded by a count.
 */
export function withCount(change: LastChange, count: number): LastChange {
  switch (change.kind) {
    case "delete-char":
    case "delete-char-before":
    case "replace-char":
    case "line-operator":
    case "operator-motion":
      return { ...change, count };
    default:
      return change;
  }
}
