import type { Key } from "ink";
import type { AwaitedChar, Operator, PendingComposition } from "./types.js";

export type ArrowKey = "up" | "down" | "left" | "right";

// Named keys that carry no printable character
export type ControlKeyName =
  | "escape"
  | ArrowKey
  | "return"
  | "tab"
  | "backspace"
  | "delete"
  | `ctrl+${string}`;

/**
 * A key event: either a printable character or a named control key.
 */
export type VimKey =
  | { kind: "char"; char: string }
  | { kind: "control"; name: ControlKeyName };

export function charKey(char: string): VimKey {
  return { kind: "char", char };
}

export function controlKey(name: ControlKeyName): VimKey {
  return { kind: "control", name };
}

export function isControl(key: VimKey, name: ControlKeyName): boolean {
  return key.kind === "control" && key.name === name;
}

// The useInput key flags the conversion reads
export type InkKeyFlags = Pick<
  Key,
  | "escape"
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "return"
  | "tab"
  | "backspace"
  | "delete"
  | "ctrl"
>;

/**
 * Convert an Ink useInput event into key events. Pasted text arrives as a
 * single input string and becomes one key per character.
 */
export function keysFromInk(input: string, key: InkKeyFlags): VimKey[] {
  if (key.escape) return [controlKey("escape")];
  if (key.upArrow) return [controlKey("up")];
  if (key.downArrow) return [controlKey("down")];
  if (key.leftArrow) return [controlKey("left")];
  if (key.rightArrow) return [controlKey("right")];
  if (key.return) return [controlKey("return")];
  if (key.tab) return [controlKey("tab")];
  if (key.backspace) return [controlKey("backspace")];
  if (key.delete) return [controlKey("delete")];

  if (key.ctrl && input.length > 0) {
    return [controlKey(`ctrl+${input.toLowerCase()}`)];
  }

  return Array.from(input, (char) => charKey(char));
}

export const OPERATOR_KEYS: Record<string, Operator> = {
  d: "delete",
  c: "change",
  y: "yank",
};

const OPERATOR_LETTERS: Record<Operator, string> = {
  delete: "d",
  change: "c",
  yank: "y",
};

const AWAITED_LETTERS: Record<AwaitedChar, string> = {
  "find-forward": "f",
  "till-forward": "t",
  "find-backward": "F",
  "till-backward": "T",
  replace: "r",
};

/**
 * The keys typed so far for an unfinished command, e.g. "2d" or "dt".
 */
export function pendingKeys(pending: PendingComposition): string {
  let keys = pending.count;
  if (pending.operator) keys += OPERATOR_LETTERS[pending.operator];
  if (pending.awaitedChar) keys += AWAITED_LETTERS[pending.awaitedChar];
  if (pending.awaitingSecondG) keys += "g";
  return keys;
}
