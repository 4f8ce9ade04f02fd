import { render } from "ink-testing-library";
import { describe, test, expect } from "vitest";
import PromptInput, { segmentLine } from "../PromptInput.js";

describe("segmentLine", () => {
  test("marks the cursor character", () => {
    expect(segmentLine("abc", 0, { row: 0, col: 1 }, null)).toEqual([
      { text: "a", kind: "plain" },
      { text: "b", kind: "cursor" },
      { text: "c", kind: "plain" },
    ]);
  });

  test("draws a cursor past the end as a space", () => {
    expect(segmentLine("ab", 0, { row: 0, col: 2 }, null)).toEqual([
      { text: "ab", kind: "plain" },
      { text: " ", kind: "cursor" },
    ]);
  });

  test("a cursor on another row leaves the line plain", () => {
    expect(segmentLine("ab", 1, { row: 0, col: 0 }, null)).toEqual([
      { text: "ab", kind: "plain" },
    ]);
  });

  test("selection includes both ends", () => {
    const selection = { start: { row: 0, col: 1 }, end: { row: 0, col: 3 } };
    expect(segmentLine("abcdef", 0, { row: 0, col: 3 }, selection)).toEqual([
      { text: "a", kind: "plain" },
      { text: "bc", kind: "selected" },
      { text: "d", kind: "cursor" },
      { text: "ef", kind: "plain" },
    ]);
  });
});

describe("<PromptInput />", () => {
  test("renders each line after the prompt column", () => {
    const { lastFrame } = render(
      <PromptInput
        lines={["hello", "world"]}
        cursor={{ row: 1, col: 5 }}
        selection={null}
        prompt="$"
      />,
    );
    const frame = lastFrame() ?? "";
    expect(frame).toContain("hello");
    expect(frame).toContain("world");
    expect(frame.indexOf("$")).toBeLessThan(frame.indexOf("hello"));
  });
});
