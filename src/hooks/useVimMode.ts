import { useSelector } from "@xstate/react";
import { modeOf, type VimEngine, type VimSnapshot } from "../lib/vim/VimEngine.js";
import { pendingKeys } from "../lib/vim/keys.js";
import type { VimMode } from "../lib/vim/types.js";

const selectPendingKeys = (snapshot: VimSnapshot) =>
  pendingKeys(snapshot.context.pending);

/**
 * Current mode of an engine; re-renders on every transition.
 */
export function useVimMode(engine: VimEngine): VimMode {
  return useSelector(engine.actor, modeOf);
}

/**
 * Keys of the unfinished command, e.g. "2d". Empty when nothing is pending.
 */
export function usePendingKeys(engine: VimEngine): string {
  return useSelector(engine.actor, selectPendingKeys);
}
