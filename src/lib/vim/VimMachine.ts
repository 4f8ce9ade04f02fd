import { setup, assign } from "xstate";
import { EMPTY_PENDING } from "./types.js";
import type {
  AwaitedChar,
  LastChange,
  Operator,
  PendingComposition,
  Position,
} from "./types.js";

// Events the vim machine can receive
export type VimEvent =
  | { type: "DIGIT"; digit: string }
  | { type: "OPERATOR"; operator: Operator }
  | { type: "AWAIT_CHAR"; awaited: AwaitedChar }
  | { type: "AWAIT_G" }
  | { type: "CLEAR" }
  | { type: "RECORD"; change: LastChange }
  | { type: "INSERT" }
  | { type: "NORMAL" }
  | { type: "VISUAL"; anchor: Position };

// Context stored in the state machine
export interface VimContext {
  pending: PendingComposition;
  visualAnchor: Position | null;
  lastChange: LastChange | null;
}

// Create the vim state machine
export const vimMachine = setup({
  types: {
    context: {} as VimContext,
    events: {} as VimEvent,
  },
  actions: {
    appendDigit: assign({
      pending: ({ context, event }) => {
        if (event.type !== "DIGIT") return context.pending;
        return { ...context.pending, count: context.pending.count + event.digit };
      },
    }),
    setOperator: assign({
      pending: ({ context, event }) => {
        if (event.type !== "OPERATOR") return context.pending;
        return { ...context.pending, operator: event.operator };
      },
    }),
    awaitChar: assign({
      pending: ({ context, event }) => {
        if (event.type !== "AWAIT_CHAR") return context.pending;
        return { ...context.pending, awaitedChar: event.awaited };
      },
    }),
    awaitSecondG: assign({
      pending: ({ context }) => ({ ...context.pending, awaitingSecondG: true }),
    }),
    clearPending: assign({
      pending: () => ({ ...EMPTY_PENDING }),
    }),
    setVisualAnchor: assign({
      visualAnchor: ({ context, event }) => {
        if (event.type !== "VISUAL") return context.visualAnchor;
        return { ...event.anchor };
      },
    }),
    clearVisualAnchor: assign({
      visualAnchor: () => null,
    }),
    recordChange: assign({
      lastChange: ({ context, event }) => {
        if (event.type !== "RECORD") return context.lastChange;
        return event.change;
      },
    }),
  },
}).createMachine({
  id: "vim",
  initial: "insert",
  context: {
    pending: { ...EMPTY_PENDING },
    visualAnchor: null,
    lastChange: null,
  },
  on: {
    CLEAR: {
      actions: "clearPending",
    },
    RECORD: {
      actions: "recordChange",
    },
  },
  states: {
    insert: {
      on: {
        NORMAL: {
          target: "normal",
          actions: "clearPending",
        },
      },
    },
    normal: {
      on: {
        DIGIT: {
          actions: "appendDigit",
        },
        OPERATOR: {
          actions: "setOperator",
        },
        AWAIT_CHAR: {
          actions: "awaitChar",
        },
        AWAIT_G: {
          actions: "awaitSecondG",
        },
        INSERT: {
          target: "insert",
        },
        VISUAL: {
          target: "visual",
          actions: "setVisualAnchor",
        },
      },
    },
    visual: {
      exit: "clearVisualAnchor",
      on: {
        NORMAL: {
          target: "normal",
        },
        INSERT: {
          target: "insert",
        },
      },
    },
  },
});

export type VimMachine = typeof vimMachine;
