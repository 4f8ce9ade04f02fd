export type { Command } from "./Command.js";
export { BatchCommand } from "./Command.js";
export { CommandManager } from "./CommandManager.js";
export type { UndoRedoResult, CommandManagerOptions } from "./CommandManager.js";
