import type { VimKey } from "../vim/keys.js";
import type { TextBuffer } from "../vim/types.js";

export type InsertKeyResult = "applied" | "submit" | "ignored";

/**
 * Default text-input handling for keys the modal engine leaves to the host.
 */
export function applyInsertKey(buffer: TextBuffer, key: VimKey): InsertKeyResult {
  if (key.kind === "char") {
    buffer.insert(key.char);
    return "applied";
  }

  switch (key.name) {
    // Most terminals send DEL for backspace, which Ink reports as delete
    case "backspace":
    case "delete":
      buffer.deleteLeft();
      return "applied";
    case "left":
      buffer.cursorLeft();
      return "applied";
    case "right":
      buffer.cursorRight();
      return "applied";
    case "up":
      buffer.cursorUp();
      return "applied";
    case "down":
      buffer.cursorDown();
      return "applied";
    case "ctrl+j":
      buffer.insert("\n");
      return "applied";
    case "return":
      return "submit";
    default:
      return "ignored";
  }
}
