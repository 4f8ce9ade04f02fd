/**
 * @vitest-environment happy-dom
 */
import { describe, test, expect } from "vitest";
import { renderHook, act } from "@testing-library/react";
import { useVimMode, usePendingKeys } from "../useVimMode.js";
import { LineBuffer } from "../../lib/buffer/LineBuffer.js";
import { VimEngine } from "../../lib/vim/VimEngine.js";
import { charKey, controlKey } from "../../lib/vim/keys.js";

function createEngine() {
  return new VimEngine(new LineBuffer("hello world"));
}

describe("useVimMode", () => {
  test("starts in insert mode", () => {
    const engine = createEngine();
    const { result } = renderHook(() => useVimMode(engine));
    expect(result.current).toBe("insert");
  });

  test("follows mode transitions", () => {
    const engine = createEngine();
    const { result } = renderHook(() => useVimMode(engine));

    act(() => {
      engine.handleKey(controlKey("escape"));
    });
    expect(result.current).toBe("normal");

    act(() => {
      engine.handleKey(charKey("v"));
    });
    expect(result.current).toBe("visual");
  });
});

describe("usePendingKeys", () => {
  test("shows the composition until the command completes", () => {
    const engine = createEngine();
    const { result } = renderHook(() => usePendingKeys(engine));

    act(() => {
      engine.handleKey(controlKey("escape"));
      engine.handleKey(charKey("2"));
      engine.handleKey(charKey("d"));
    });
    expect(result.current).toBe("2d");

    act(() => {
      engine.handleKey(charKey("w"));
    });
    expect(result.current).toBe("");
  });
});
