import { useCallback, useRef, useEffect, useSyncExternalStore } from "react";
import { useInput, type Key } from "ink";
import { applyInsertKey } from "../lib/buffer/insertKeys.js";
import { keysFromInk } from "../lib/vim/keys.js";
import type { LineBuffer } from "../lib/buffer/LineBuffer.js";
import type { VimEngine } from "../lib/vim/VimEngine.js";

export interface ModalInputOptions {
  buffer: LineBuffer;
  engine: VimEngine;
  /** Route keys through the engine; plain text input when false */
  viMode: boolean;
  /** Called with the buffer text when return is pressed in insert mode */
  onSubmit: (text: string) => void;
  isActive?: boolean;
}

/**
 * Re-render whenever the buffer content, cursor or selection changes.
 */
export function useBufferVersion(buffer: LineBuffer): number {
  return useSyncExternalStore(buffer.subscribe, buffer.getVersion, buffer.getVersion);
}

/**
 * Bind terminal input to a buffer, through the modal engine when vi-mode is
 * on. Keys the engine does not consume get default text-input handling.
 */
export function useModalInput({
  buffer,
  engine,
  viMode,
  onSubmit,
  isActive = true,
}: ModalInputOptions): void {
  const onSubmitRef = useRef(onSubmit);

  // Keep callback ref up to date
  useEffect(() => {
    onSubmitRef.current = onSubmit;
  }, [onSubmit]);

  // Leaving vi-mode always lands in insert mode
  useEffect(() => {
    if (!viMode) engine.reset();
  }, [viMode, engine]);

  const handleInput = useCallback(
    (input: string, key: Key) => {
      for (const vimKey of keysFromInk(input, key)) {
        if (viMode && engine.handleKey(vimKey)) continue;

        if (applyInsertKey(buffer, vimKey) === "submit") {
          onSubmitRef.current(buffer.getText());
        }
      }
    },
    [buffer, engine, viMode],
  );

  useInput(handleInput, { isActive });
}
