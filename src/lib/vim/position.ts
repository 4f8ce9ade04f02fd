import type { Position, Span } from "./types.js";

export function comparePositions(a: Position, b: Position): number {
  return a.row === b.row ? a.col - b.col : a.row - b.row;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Order two positions into a span (start ≤ end).
 */
export function orderPositions(a: Position, b: Position): Span {
  return comparePositions(a, b) <= 0
    ? { start: { ...a }, end: { ...b } }
    : { start: { ...b }, end: { ...a } };
}

/**
 * Linear offset of a position within text joined by "\n".
 */
export function offsetAt(lines: readonly string[], pos: Position): number {
  let offset = 0;
  for (let row = 0; row < pos.row && row < lines.length; row++) {
    offset += (lines[row]?.length ?? 0) + 1;
  }
  return offset + pos.col;
}

/**
 * Inverse of {@link offsetAt}.
 */
export function positionAt(lines: readonly string[], offset: number): Position {
  let remaining = Math.max(0, offset);
  for (let row = 0; row < lines.length; row++) {
    const length = lines[row]?.length ?? 0;
    if (remaining <= length || row === lines.length - 1) {
      return { row, col: Math.min(remaining, length) };
    }
    remaining -= length + 1;
  }
  return { row: 0, col: 0 };
}
