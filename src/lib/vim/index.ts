// Vim layer exports
export * from "./types.js";
export * from "./keys.js";
export * from "./position.js";
export { vimMachine, type VimMachine, type VimEvent, type VimContext } from "./VimMachine.js";
export {
  VimEngine,
  modeOf,
  type VimSnapshot,
  type VimEngineOptions,
  type ModeChangeListener,
} from "./VimEngine.js";
export { Register } from "./registers.js";
export {
  motionForKey,
  moveCursor,
  findInLine,
  findWordEnd,
  firstNonBlank,
  isInclusive,
} from "./motions.js";
export {
  applyOperator,
  lineSpan,
  motionSpan,
  paste,
  visualSpan,
  type EditTarget,
} from "./operators.js";
export { performChange, withCount, type ChangeResult } from "./changes.js";
