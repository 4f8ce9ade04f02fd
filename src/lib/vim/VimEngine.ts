import { createActor, type Actor, type SnapshotFrom, type Subscription } from "xstate";
import { vimMachine, type VimMachine } from "./VimMachine.js";
import { Register } from "./registers.js";
import { performChange, withCount } from "./changes.js";
import {
  CHAR_SEARCH_KEYS,
  OPERATOR_MOTIONS,
  motionForKey,
  moveCursor,
  moveToRow,
} from "./motions.js";
import {
  applyOperator,
  paste,
  runLineOperator,
  runOperatorMotion,
  visualSpan,
  type EditTarget,
} from "./operators.js";
import { OPERATOR_KEYS, isControl, type VimKey } from "./keys.js";
import { orderPositions } from "./position.js";
import { countOf } from "./types.js";
import type {
  LastChange,
  Motion,
  MutatingOperator,
  Operator,
  PendingComposition,
  Position,
  TextBuffer,
  VimMode,
} from "./types.js";

// What a mode handler did with a key
type KeyOutcome =
  | "done" // command completed, no-op'd or was cancelled
  | "composing" // key extended the pending composition
  | "unhandled"; // host should apply its default behaviour

export type VimSnapshot = SnapshotFrom<VimMachine>;

export type ModeChangeListener = (mode: VimMode) => void;

export interface VimEngineOptions {
  /** Register to share with other engines; a private one by default */
  register?: Register;
}

export function modeOf(snapshot: VimSnapshot): VimMode {
  if (snapshot.matches("normal")) return "normal";
  if (snapshot.matches("visual")) return "visual";
  return "insert";
}

function repeat(count: number, step: () => void): void {
  for (let i = 0; i < count; i++) {
    step();
  }
}

/**
 * Modal key engine for a single text input. Routes each key to the grammar
 * of the current mode and drives the buffer accordingly.
 *
 * Usage:
 * ```
 * const engine = new VimEngine(buffer);
 * engine.onModeChange((mode) => render(mode));
 *
 * if (!engine.handleKey(key)) {
 *   // Insert mode: apply default text input
 * }
 * ```
 */
export class VimEngine {
  readonly actor: Actor<VimMachine>;
  readonly register: Register;

  private readonly target: EditTarget;
  private readonly subscription: Subscription;
  private listeners: Set<ModeChangeListener> = new Set();

  constructor(
    private readonly buffer: TextBuffer,
    options: VimEngineOptions = {},
  ) {
    this.register = options.register ?? new Register();
    this.target = { buffer, register: this.register };
    this.actor = createActor(vimMachine).start();

    // Notify once per real transition
    let previous = this.mode;
    this.subscription = this.actor.subscribe((snapshot) => {
      const mode = modeOf(snapshot);
      if (mode === previous) return;
      previous = mode;
      for (const listener of this.listeners) {
        listener(mode);
      }
    });
  }

  get mode(): VimMode {
    return modeOf(this.actor.getSnapshot());
  }

  get pending(): PendingComposition {
    return this.actor.getSnapshot().context.pending;
  }

  get lastChange(): LastChange | null {
    return this.actor.getSnapshot().context.lastChange;
  }

  get visualAnchor(): Position | null {
    return this.actor.getSnapshot().context.visualAnchor;
  }

  /**
   * Subscribe to mode transitions. Returns an unsubscribe function.
   */
  onModeChange(listener: ModeChangeListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Handle a key. Returns true if the key was consumed; false only in insert
   * mode for keys the host should apply itself.
   */
  handleKey(key: VimKey): boolean {
    const outcome = this.dispatch(key);
    if (outcome === "unhandled") return false;
    if (outcome === "done") {
      this.actor.send({ type: "CLEAR" });
    }
    return true;
  }

  /**
   * Force insert mode and drop any composition in progress.
   */
  reset(): void {
    if (this.mode === "visual") {
      this.buffer.setCursor(this.buffer.getCursor());
    }
    this.actor.send({ type: "INSERT" });
    this.actor.send({ type: "CLEAR" });
  }

  dispose(): void {
    this.subscription.unsubscribe();
    this.listeners.clear();
    this.actor.stop();
  }

  private dispatch(key: VimKey): KeyOutcome {
    switch (this.mode) {
      case "insert":
        return this.handleInsertKey(key);
      case "visual":
        return this.handleVisualKey(key);
      case "normal":
        return this.handleNormalKey(key);
    }
  }

  private enter(mode: "insert" | "normal"): void {
    this.actor.send({ type: mode === "insert" ? "INSERT" : "NORMAL" });
  }

  // ==========================================================================
  // Insert Mode
  // ==========================================================================

  private handleInsertKey(key: VimKey): KeyOutcome {
    if (!isControl(key, "escape")) return "unhandled";

    this.enter("normal");
    // Cursor goes back onto the last inserted character
    const { row, col } = this.buffer.getCursor();
    if (col > 0) {
      this.buffer.setCursor({ row, col: col - 1 });
    }
    return "done";
  }

  // ==========================================================================
  // Normal Mode
  // ==========================================================================

  private handleNormalKey(key: VimKey): KeyOutcome {
    const pending = this.pending;
    const count = countOf(pending);

    if (pending.awaitingSecondG) {
      if (key.kind === "char" && key.char === "g") {
        moveToRow(this.buffer, pending.count === "" ? 0 : count - 1);
      }
      return "done";
    }

    if (pending.awaitedChar) {
      if (key.kind === "char") {
        this.completeAwaitedChar(pending, key.char);
      }
      return "done";
    }

    // Count accumulation (digits, but not 0 at start)
    if (
      key.kind === "char" &&
      /^[0-9]$/.test(key.char) &&
      (key.char !== "0" || pending.count !== "")
    ) {
      this.actor.send({ type: "DIGIT", digit: key.char });
      return "composing";
    }

    if (pending.operator) {
      return this.handleOperatorPending(pending.operator, key, count);
    }

    if (key.kind === "control") {
      if (key.name === "ctrl+r") {
        repeat(count, () => this.buffer.redo());
      } else {
        const motion = motionForKey(key);
        if (motion) moveCursor(this.buffer, motion, count);
      }
      return "done";
    }

    return this.handleNormalChar(key.char, count, pending.count !== "");
  }

  private handleNormalChar(
    char: string,
    count: number,
    hasCount: boolean,
  ): KeyOutcome {
    const buffer = this.buffer;

    const search = CHAR_SEARCH_KEYS[char];
    if (search) {
      this.actor.send({ type: "AWAIT_CHAR", awaited: search });
      return "composing";
    }

    const operator = OPERATOR_KEYS[char];
    if (operator) {
      this.actor.send({ type: "OPERATOR", operator });
      return "composing";
    }

    switch (char) {
      // Mode switching
      case "i":
        this.enter("insert");
        return "done";
      case "I":
        buffer.cursorLineStart();
        this.enter("insert");
        return "done";
      case "a": {
        const { row, col } = buffer.getCursor();
        buffer.setCursor({
          row,
          col: Math.min(col + 1, buffer.getLine(row).length),
        });
        this.enter("insert");
        return "done";
      }
      case "A":
        buffer.cursorLineEnd();
        this.enter("insert");
        return "done";
      case "o":
        return this.change({ kind: "open-line", above: false });
      case "O":
        return this.change({ kind: "open-line", above: true });
      case "v": {
        const anchor = buffer.getCursor();
        this.actor.send({ type: "VISUAL", anchor });
        buffer.setSelection(anchor, anchor);
        return "done";
      }

      // Document motions
      case "g":
        this.actor.send({ type: "AWAIT_G" });
        return "composing";
      case "G":
        if (hasCount) {
          moveToRow(buffer, count - 1);
        } else {
          moveCursor(buffer, { kind: "document-end" });
        }
        return "done";

      case "r":
        this.actor.send({ type: "AWAIT_CHAR", awaited: "replace" });
        return "composing";

      // Standalone edits
      case "x":
        return this.change({ kind: "delete-char", count });
      case "X":
        return this.change({ kind: "delete-char-before", count });
      case "D":
        return this.change({ kind: "delete-to-line-end" });
      case "C":
        return this.change({ kind: "change-to-line-end" });
      case "s":
        return this.change({ kind: "substitute-char" });
      case "S":
        return this.change({ kind: "substitute-line" });
      case "J":
        return this.change({ kind: "join-lines" });

      // Paste never becomes the last change
      case "p":
        paste(this.target, true, count);
        return "done";
      case "P":
        paste(this.target, false, count);
        return "done";

      case "u":
        repeat(count, () => buffer.undo());
        return "done";

      case ".":
        this.repeatLastChange(hasCount ? count : null);
        return "done";
    }

    const motion = motionForKey({ kind: "char", char });
    if (motion) {
      moveCursor(buffer, motion, count);
    }
    return "done";
  }

  private handleOperatorPending(
    operator: Operator,
    key: VimKey,
    count: number,
  ): KeyOutcome {
    if (key.kind === "char") {
      // dd, cc, yy
      if (OPERATOR_KEYS[key.char] === operator) {
        this.lineOperator(operator, count);
        return "done";
      }

      const search = CHAR_SEARCH_KEYS[key.char];
      if (search) {
        this.actor.send({ type: "AWAIT_CHAR", awaited: search });
        return "composing";
      }
    }

    const motion = motionForKey(key);
    if (motion && OPERATOR_MOTIONS.has(motion.kind)) {
      this.operatorMotion(operator, motion, count);
    }
    // Anything else cancels the operator
    return "done";
  }

  private completeAwaitedChar(pending: PendingComposition, char: string): void {
    const count = countOf(pending);

    if (pending.awaitedChar === "replace") {
      this.change({ kind: "replace-char", char, count });
      return;
    }
    if (!pending.awaitedChar) return;

    const motion: Motion = { kind: "find", search: pending.awaitedChar, char };
    if (pending.operator) {
      this.operatorMotion(pending.operator, motion, count);
    } else {
      moveCursor(this.buffer, motion, count);
    }
  }

  private lineOperator(operator: Operator, count: number): void {
    if (operator === "yank") {
      runLineOperator(this.target, operator, count);
      return;
    }
    this.change({ kind: "line-operator", operator, count });
  }

  private operatorMotion(operator: Operator, motion: Motion, count: number): void {
    if (operator === "yank") {
      runOperatorMotion(this.target, operator, motion, count);
      return;
    }
    this.change({ kind: "operator-motion", operator, motion, count });
  }

  // ==========================================================================
  // Visual Mode
  // ==========================================================================

  private handleVisualKey(key: VimKey): KeyOutcome {
    const buffer = this.buffer;
    const anchor = this.visualAnchor ?? buffer.getCursor();

    if (isControl(key, "escape")) {
      buffer.setCursor(orderPositions(anchor, buffer.getCursor()).start);
      this.enter("normal");
      return "done";
    }

    // Navigation extends selection from the fixed anchor
    const motion = motionForKey(key);
    if (motion) {
      moveCursor(buffer, motion);
      buffer.setSelection(anchor, buffer.getCursor());
      return "done";
    }

    if (key.kind !== "char") return "done";

    switch (key.char) {
      case "d":
      case "x":
        this.visualOperator("delete", anchor);
        this.enter("normal");
        break;
      case "c":
        this.visualOperator("change", anchor);
        break;
      case "y":
        applyOperator(
          this.target,
          "yank",
          visualSpan(buffer, anchor, buffer.getCursor()),
          "char",
        );
        this.enter("normal");
        break;
      case "v":
        buffer.setCursor(buffer.getCursor());
        this.enter("normal");
        break;
    }
    return "done";
  }

  private visualOperator(operator: MutatingOperator, anchor: Position): void {
    const { start, end } = orderPositions(anchor, this.buffer.getCursor());
    const lineSpan = end.row - start.row;

    // Replayed from the selection start, so the original goes through the
    // same path as a later .
    this.buffer.setCursor(start);
    this.change({
      kind: "visual-operator",
      operator,
      lineSpan,
      endColumn: lineSpan === 0 ? end.col - start.col : end.col,
    });
  }

  // ==========================================================================
  // Change Recording
  // ==========================================================================

  private change(change: LastChange): KeyOutcome {
    const result = performChange(this.target, change);
    if (result.applied) {
      this.actor.send({ type: "RECORD", change });
    }
    if (result.nextMode) {
      this.enter(result.nextMode);
    }
    return "done";
  }

  private repeatLastChange(count: number | null): void {
    const last = this.lastChange;
    if (!last) return;

    const result = performChange(
      this.target,
      count === null ? last : withCount(last, count),
    );
    if (result.nextMode) {
      this.enter(result.nextMode);
    }
  }
}
