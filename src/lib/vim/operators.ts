import { isInclusive, moveCursor } from "./motions.js";
import type { Register } from "./registers.js";
import { orderPositions, samePosition } from "./position.js";
import type {
  Motion,
  Operator,
  Position,
  RegisterType,
  Span,
  TextBuffer,
} from "./types.js";

// What an operator reads from and writes to
export interface EditTarget {
  buffer: TextBuffer;
  register: Register;
}

export function clampPosition(buffer: TextBuffer, pos: Position): Position {
  const row = Math.max(0, Math.min(pos.row, buffer.getLineCount() - 1));
  const col = Math.max(0, Math.min(pos.col, buffer.getLine(row).length));
  return { row, col };
}

/**
 * Position just past the character at pos; the line break counts as a
 * character except on the last line.
 */
export function charAfter(buffer: TextBuffer, pos: Position): Position {
  const line = buffer.getLine(pos.row);
  if (pos.col < line.length) return { row: pos.row, col: pos.col + 1 };
  if (pos.row < buffer.getLineCount() - 1) return { row: pos.row + 1, col: 0 };
  return { ...pos };
}

/**
 * Whole lines from the cursor row, count lines down. Includes the trailing
 * line break unless the last covered line is the document's last line.
 */
export function lineSpan(buffer: TextBuffer, count: number): Span {
  const { row } = buffer.getCursor();
  const lastRow = buffer.getLineCount() - 1;
  const endRow = Math.min(row + Math.max(count, 1) - 1, lastRow);
  const start = { row, col: 0 };

  if (endRow < lastRow) {
    return { start, end: { row: endRow + 1, col: 0 } };
  }
  return { start, end: { row: endRow, col: buffer.getLine(endRow).length } };
}

/**
 * Normalized selection between anchor and active, including the character
 * under its far end.
 */
export function visualSpan(
  buffer: TextBuffer,
  anchor: Position,
  active: Position,
): Span {
  const { start, end } = orderPositions(
    clampPosition(buffer, anchor),
    clampPosition(buffer, active),
  );
  return { start, end: charAfter(buffer, end) };
}

/**
 * Span covered by a motion from the cursor. The cursor is left at the
 * motion target; null (cursor untouched) when the motion has no target.
 */
export function motionSpan(
  buffer: TextBuffer,
  motion: Motion,
  count: number,
): Span | null {
  const origin = buffer.getCursor();
  if (!moveCursor(buffer, motion, count)) return null;

  let target = buffer.getCursor();
  // A word motion that crosses onto a later line stops at the end of the
  // starting line
  if (motion.kind === "word-right" && target.row > origin.row) {
    target = { row: origin.row, col: buffer.getLine(origin.row).length };
  }

  const span = orderPositions(origin, target);
  if (isInclusive(motion)) {
    span.end = charAfter(buffer, span.end);
  }
  return span;
}

/**
 * Apply an operator to a span: the span text goes to the register, delete
 * and change remove it, and the cursor ends at the span start.
 */
export function applyOperator(
  target: EditTarget,
  operator: Operator,
  span: Span,
  type: RegisterType,
): void {
  const { buffer, register } = target;

  buffer.setSelection(span.start, span.end);
  register.store(buffer.getSelectedText(), type);

  if (operator === "yank") {
    buffer.setCursor(span.start);
    return;
  }
  buffer.delete(span.start, span.end);
}

/**
 * Operator + motion (dw, c$, yb, df, ...). Returns false when nothing was
 * operated on.
 */
export function runOperatorMotion(
  target: EditTarget,
  operator: Operator,
  motion: Motion,
  count: number,
): boolean {
  const { buffer } = target;
  const origin = buffer.getCursor();
  const span = motionSpan(buffer, motion, count);

  if (!span || samePosition(span.start, span.end)) {
    buffer.setCursor(origin);
    return false;
  }

  applyOperator(target, operator, span, "char");
  return true;
}

/**
 * Doubled operator (dd, cc, yy) over count lines.
 */
export function runLineOperator(
  target: EditTarget,
  operator: Operator,
  count: number,
): void {
  applyOperator(target, operator, lineSpan(target.buffer, count), "line");
}

/**
 * Paste the register after (p) or before (P) the cursor, count times.
 * Linewise content opens new lines below/above the cursor line.
 */
export function paste(target: EditTarget, after: boolean, count: number): void {
  const { buffer, register } = target;
  const content = register.get();
  if (!content) return;

  const times = Math.max(count, 1);
  const { row, col } = buffer.getCursor();

  if (content.type === "line") {
    const body = content.text.endsWith("\n")
      ? content.text.slice(0, -1)
      : content.text;
    const block = Array.from({ length: times }, () => body).join("\n");

    buffer.batch("Paste lines", () => {
      if (after) {
        buffer.cursorLineEnd();
        buffer.insert("\n" + block);
        buffer.setCursor({ row: row + 1, col: 0 });
      } else {
        buffer.cursorLineStart();
        buffer.insert(block + "\n");
        buffer.setCursor({ row, col: 0 });
      }
    });
    return;
  }

  if (after) {
    buffer.setCursor({ row, col: Math.min(col + 1, buffer.getLine(row).length) });
  }
  buffer.insert(content.text.repeat(times));
}
