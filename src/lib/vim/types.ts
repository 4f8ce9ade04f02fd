// Vim mode types
export type VimMode = "insert" | "normal" | "visual";

// Operators that wait for a motion (or a doubled key)
export type Operator = "delete" | "change" | "yank";

// Operators that mutate the buffer and can be repeated with .
export type MutatingOperator = Exclude<Operator, "yank">;

// Character-search motions (f/t/F/T)
export type CharSearch =
  | "find-forward"
  | "till-forward"
  | "find-backward"
  | "till-backward";

// What the next literal character completes
export type AwaitedChar = CharSearch | "replace";

// Zero-based document position
export interface Position {
  row: number;
  col: number;
}

// Buffer selection; active is where the cursor sits
export interface Selection {
  anchor: Position;
  active: Position;
}

// Normalized range, end exclusive
export interface Span {
  start: Position;
  end: Position;
}

export type RegisterType = "char" | "line";

// What's stored in the register
export interface RegisterContent {
  text: string;
  type: RegisterType;
}

/**
 * Composition accumulated between key presses. Reset to
 * {@link EMPTY_PENDING} whenever a command completes, no-ops or is cancelled.
 */
export interface PendingComposition {
  operator: Operator | null;
  /** Digit string; empty means a multiplier of 1 */
  count: string;
  awaitedChar: AwaitedChar | null;
  awaitingSecondG: boolean;
}

export const EMPTY_PENDING: PendingComposition = Object.freeze({
  operator: null,
  count: "",
  awaitedChar: null,
  awaitingSecondG: false,
});

export function countOf(pending: PendingComposition): number {
  return pending.count === "" ? 1 : parseInt(pending.count, 10);
}

// Motions usable standalone or as an operator's span boundary
export type Motion =
  | { kind: "left" }
  | { kind: "right" }
  | { kind: "up" }
  | { kind: "down" }
  | { kind: "word-right" }
  | { kind: "word-left" }
  | { kind: "word-end" }
  | { kind: "line-start" }
  | { kind: "line-end" }
  | { kind: "first-non-blank" }
  | { kind: "document-end" }
  | { kind: "find"; search: CharSearch; char: string };

export type MotionKind = Motion["kind"];

/**
 * Minimal shape of the last mutating command, enough to replay it from
 * the current cursor position.
 */
export type LastChange =
  | { kind: "delete-char"; count: number }
  | { kind: "delete-char-before"; count: number }
  | { kind: "delete-to-line-end" }
  | { kind: "change-to-line-end" }
  | { kind: "substitute-char" }
  | { kind: "substitute-line" }
  | { kind: "join-lines" }
  | { kind: "replace-char"; char: string; count: number }
  | { kind: "open-line"; above: boolean }
  | { kind: "line-operator"; operator: MutatingOperator; count: number }
  | {
      kind: "operator-motion";
      operator: MutatingOperator;
      motion: Motion;
      count: number;
    }
  | {
      kind: "visual-operator";
      operator: MutatingOperator;
      // Rows between selection start and end
      lineSpan: number;
      // Width on a single row, otherwise the end column on the last row
      endColumn: number;
    };

/**
 * Text buffer the engine drives. The engine never touches storage directly;
 * boundary clamping is the buffer's job.
 */
export interface TextBuffer {
  getCursor(): Position;
  setCursor(pos: Position): void;
  getLine(row: number): string;
  getLineCount(): number;
  getText(): string;
  documentEnd(): Position;

  cursorLeft(): void;
  cursorRight(): void;
  cursorUp(): void;
  cursorDown(): void;
  cursorWordLeft(): void;
  cursorWordRight(): void;
  cursorLineStart(): void;
  cursorLineEnd(): void;

  deleteLeft(): void;
  deleteRight(): void;
  deleteToLineEnd(): void;
  insert(text: string): void;
  delete(start: Position, end: Position): void;

  getSelection(): Selection;
  setSelection(anchor: Position, active: Position): void;
  getSelectedText(): string;

  undo(): void;
  redo(): void;

  /** Group several edits into one undo step */
  batch(description: string, edit: () => void): void;
}
