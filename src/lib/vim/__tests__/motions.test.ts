import { describe, test, expect } from "vitest";
import {
  findInLine,
  findWordEnd,
  firstNonBlank,
  isInclusive,
  motionForKey,
  moveCursor,
} from "../motions.js";
import { charKey, controlKey } from "../keys.js";
import { LineBuffer } from "../../buffer/LineBuffer.js";

describe("motionForKey", () => {
  test("maps character keys", () => {
    expect(motionForKey(charKey("w"))).toEqual({ kind: "word-right" });
    expect(motionForKey(charKey("$"))).toEqual({ kind: "line-end" });
    expect(motionForKey(charKey("0"))).toEqual({ kind: "line-start" });
  });

  test("maps arrow keys", () => {
    expect(motionForKey(controlKey("left"))).toEqual({ kind: "left" });
    expect(motionForKey(controlKey("down"))).toEqual({ kind: "down" });
  });

  test("returns null for non-motion keys", () => {
    expect(motionForKey(charKey("z"))).toBeNull();
    expect(motionForKey(controlKey("escape"))).toBeNull();
  });
});

describe("isInclusive", () => {
  test("word end and forward searches include the target", () => {
    expect(isInclusive({ kind: "word-end" })).toBe(true);
    expect(isInclusive({ kind: "find", search: "find-forward", char: "x" })).toBe(true);
    expect(isInclusive({ kind: "find", search: "till-forward", char: "x" })).toBe(true);
  });

  test("other motions are exclusive", () => {
    expect(isInclusive({ kind: "word-right" })).toBe(false);
    expect(isInclusive({ kind: "find", search: "find-backward", char: "x" })).toBe(false);
  });
});

describe("findWordEnd", () => {
  test("from a word start lands on the next word's end", () => {
    expect(findWordEnd("hello world", 0)).toBe(10);
  });

  test("from inside a word lands on the next word's end", () => {
    expect(findWordEnd("hello world", 2)).toBe(10);
  });

  test("from whitespace lands on the following word's end", () => {
    expect(findWordEnd("a  bc", 1)).toBe(4);
  });

  test("from a word end moves to the next word's end", () => {
    expect(findWordEnd("hello world", 4)).toBe(10);
  });

  test("stays put when no word lies ahead", () => {
    expect(findWordEnd("hello world", 10)).toBe(10);
  });

  test("single-character words", () => {
    expect(findWordEnd("a b", 0)).toBe(2);
  });
});

describe("findInLine", () => {
  test("f finds the next occurrence", () => {
    expect(findInLine("abcabc", 0, "find-forward", "c")).toBe(2);
  });

  test("f with a count finds the nth occurrence", () => {
    expect(findInLine("abcabc", 0, "find-forward", "c", 2)).toBe(5);
  });

  test("t stops before the occurrence", () => {
    expect(findInLine("abcabc", 0, "till-forward", "c")).toBe(1);
  });

  test("t on the adjacent character does not move", () => {
    expect(findInLine("ab", 0, "till-forward", "b")).toBe(0);
  });

  test("F finds the previous occurrence", () => {
    expect(findInLine("abcabc", 5, "find-backward", "a")).toBe(3);
  });

  test("T stops after the previous occurrence", () => {
    expect(findInLine("abcabc", 5, "till-backward", "a")).toBe(4);
  });

  test("misses return null", () => {
    expect(findInLine("abcabc", 0, "find-forward", "z")).toBeNull();
    expect(findInLine("abcabc", 0, "find-backward", "a")).toBeNull();
  });
});

describe("firstNonBlank", () => {
  test("skips leading whitespace", () => {
    expect(firstNonBlank("   x")).toBe(3);
  });

  test("blank lines give column 0", () => {
    expect(firstNonBlank("   ")).toBe(0);
  });
});

describe("moveCursor", () => {
  test("w moves to the next word start", () => {
    const buffer = new LineBuffer("hello world");
    moveCursor(buffer, { kind: "word-right" });
    expect(buffer.getCursor()).toEqual({ row: 0, col: 6 });
  });

  test("e moves to the end of the next word", () => {
    const buffer = new LineBuffer("hello world");
    moveCursor(buffer, { kind: "word-end" });
    expect(buffer.getCursor()).toEqual({ row: 0, col: 10 });
  });

  test("e crosses lines", () => {
    const buffer = new LineBuffer("ab\ncd");
    buffer.setCursor({ row: 0, col: 1 });
    moveCursor(buffer, { kind: "word-end" });
    expect(buffer.getCursor()).toEqual({ row: 1, col: 1 });
  });

  test("counted j equals repeated j", () => {
    const counted = new LineBuffer("a\nb\nc\nd");
    const repeated = new LineBuffer("a\nb\nc\nd");
    moveCursor(counted, { kind: "down" }, 3);
    moveCursor(repeated, { kind: "down" });
    moveCursor(repeated, { kind: "down" });
    moveCursor(repeated, { kind: "down" });
    expect(counted.getCursor()).toEqual({ row: 3, col: 0 });
    expect(repeated.getCursor()).toEqual(counted.getCursor());
  });

  test("h at column 0 stays put", () => {
    const buffer = new LineBuffer("abc");
    moveCursor(buffer, { kind: "left" }, 5);
    expect(buffer.getCursor()).toEqual({ row: 0, col: 0 });
  });

  test("^ goes to the first non-blank column", () => {
    const buffer = new LineBuffer("   indented");
    buffer.setCursor({ row: 0, col: 8 });
    moveCursor(buffer, { kind: "first-non-blank" });
    expect(buffer.getCursor()).toEqual({ row: 0, col: 3 });
  });

  test("G goes to the document end", () => {
    const buffer = new LineBuffer("ab\ncd");
    moveCursor(buffer, { kind: "document-end" });
    expect(buffer.getCursor()).toEqual({ row: 1, col: 2 });
  });

  test("a search miss reports false and leaves the cursor", () => {
    const buffer = new LineBuffer("abc");
    buffer.setCursor({ row: 0, col: 1 });
    const moved = moveCursor(buffer, { kind: "find", search: "find-forward", char: "z" });
    expect(moved).toBe(false);
    expect(buffer.getCursor()).toEqual({ row: 0, col: 1 });
  });
});
