import { offsetAt, positionAt } from "./position.js";
import type { VimKey } from "./keys.js";
import type { CharSearch, Motion, MotionKind, TextBuffer } from "./types.js";

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

function repeat(count: number, step: () => void): void {
  for (let i = 0; i < count; i++) {
    step();
  }
}

// ============================================================================
// Key Mapping
// ============================================================================

const CHAR_MOTIONS: Record<string, Motion> = {
  h: { kind: "left" },
  l: { kind: "right" },
  j: { kind: "down" },
  k: { kind: "up" },
  w: { kind: "word-right" },
  b: { kind: "word-left" },
  e: { kind: "word-end" },
  "0": { kind: "line-start" },
  $: { kind: "line-end" },
  "^": { kind: "first-non-blank" },
  G: { kind: "document-end" },
};

const ARROW_MOTIONS: Record<string, Motion> = {
  left: { kind: "left" },
  right: { kind: "right" },
  up: { kind: "up" },
  down: { kind: "down" },
};

/** Motions an operator accepts as its span boundary */
export const OPERATOR_MOTIONS: ReadonlySet<MotionKind> = new Set<MotionKind>([
  "word-right",
  "word-left",
  "word-end",
  "line-start",
  "line-end",
  "first-non-blank",
  "left",
  "right",
]);

export const CHAR_SEARCH_KEYS: Record<string, CharSearch> = {
  f: "find-forward",
  t: "till-forward",
  F: "find-backward",
  T: "till-backward",
};

/**
 * Parse a key into a simple motion. Returns null if it's not a motion key.
 */
export function motionForKey(key: VimKey): Motion | null {
  if (key.kind === "control") {
    return ARROW_MOTIONS[key.name] ?? null;
  }
  return CHAR_MOTIONS[key.char] ?? null;
}

/**
 * Whether an operator span includes the character the motion lands on.
 */
export function isInclusive(motion: Motion): boolean {
  if (motion.kind === "word-end") return true;
  return (
    motion.kind === "find" &&
    (motion.search === "find-forward" || motion.search === "till-forward")
  );
}

// ============================================================================
// Motion Implementations
// ============================================================================

/**
 * Offset of the last character of the next word: skip the rest of the
 * current word, skip whitespace, skip the next word, then step back one.
 * Always lands on the following word, even from inside or at the end of
 * the current one.
 */
export function findWordEnd(text: string, from: number): number {
  let pos = from;
  while (pos < text.length && !isWhitespace(text[pos])) pos++;
  while (pos < text.length && isWhitespace(text[pos])) pos++;
  while (pos < text.length && !isWhitespace(text[pos])) pos++;
  if (pos > 0) pos--;
  return pos;
}

/**
 * Column of the count-th occurrence of char on the line, adjusted for
 * till searches. Null when there is no such occurrence.
 */
export function findInLine(
  line: string,
  col: number,
  search: CharSearch,
  char: string,
  count = 1,
): number | null {
  const forward = search === "find-forward" || search === "till-forward";
  let idx = col;

  for (let i = 0; i < count; i++) {
    if (forward) {
      idx = line.indexOf(char, idx + 1);
    } else {
      idx = idx - 1 < 0 ? -1 : line.lastIndexOf(char, idx - 1);
    }
    if (idx < 0) return null;
  }

  switch (search) {
    case "find-forward":
    case "find-backward":
      return idx;
    case "till-forward":
      return Math.max(col, idx - 1);
    case "till-backward":
      return Math.min(col, idx + 1);
  }
}

/**
 * First non-whitespace column of a line, or 0 when the line is blank.
 */
export function firstNonBlank(line: string): number {
  const idx = line.search(/\S/);
  return idx < 0 ? 0 : idx;
}

function moveToWordEnd(buffer: TextBuffer): void {
  const lines = buffer.getText().split("\n");
  const from = offsetAt(lines, buffer.getCursor());
  buffer.setCursor(positionAt(lines, findWordEnd(lines.join("\n"), from)));
}

/**
 * Move to column 0 of a row (clamped by the buffer).
 */
export function moveToRow(buffer: TextBuffer, row: number): void {
  buffer.setCursor({ row, col: 0 });
}

/**
 * Move the buffer cursor by a motion. Returns false when the motion has no
 * target (character search miss); the cursor is then left untouched.
 */
export function moveCursor(
  buffer: TextBuffer,
  motion: Motion,
  count = 1,
): boolean {
  switch (motion.kind) {
    case "left":
      repeat(count, () => buffer.cursorLeft());
      return true;
    case "right":
      repeat(count, () => buffer.cursorRight());
      return true;
    case "up":
      repeat(count, () => buffer.cursorUp());
      return true;
    case "down":
      repeat(count, () => buffer.cursorDown());
      return true;
    case "word-right":
      repeat(count, () => buffer.cursorWordRight());
      return true;
    case "word-left":
      repeat(count, () => buffer.cursorWordLeft());
      return true;
    case "word-end":
      repeat(count, () => moveToWordEnd(buffer));
      return true;
    case "line-start":
      buffer.cursorLineStart();
      return true;
    case "line-end":
      buffer.cursorLineEnd();
      return true;
    case "first-non-blank": {
      const { row } = buffer.getCursor();
      buffer.setCursor({ row, col: firstNonBlank(buffer.getLine(row)) });
      return true;
    }
    case "document-end":
      buffer.setCursor(buffer.documentEnd());
      return true;
    case "find": {
      const { row, col } = buffer.getCursor();
      const target = findInLine(
        buffer.getLine(row),
        col,
        motion.search,
        motion.char,
        count,
      );
      if (target === null) return false;
      buffer.setCursor({ row, col: target });
      return true;
    }
  }
}
