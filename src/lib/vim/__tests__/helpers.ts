import { LineBuffer } from "../../buffer/LineBuffer.js";
import { VimEngine } from "../VimEngine.js";
import { charKey, controlKey, type VimKey } from "../keys.js";
import type { Position } from "../types.js";

export const ESC = controlKey("escape");

/**
 * Engine over a fresh buffer, already switched to normal mode with the
 * cursor at the given position.
 */
export function createEngine(text: string, cursor: Position = { row: 0, col: 0 }) {
  const buffer = new LineBuffer(text);
  const engine = new VimEngine(buffer);
  engine.handleKey(ESC);
  buffer.setCursor(cursor);
  return { buffer, engine };
}

/**
 * Feed keys to the engine. Strings are typed one character at a time.
 * Returns what handleKey reported for each key.
 */
export function press(engine: VimEngine, ...keys: (string | VimKey)[]): boolean[] {
  const results: boolean[] = [];
  for (const key of keys) {
    if (typeof key === "string") {
      for (const char of key) {
        results.push(engine.handleKey(charKey(char)));
      }
    } else {
      results.push(engine.handleKey(key));
    }
  }
  return results;
}
