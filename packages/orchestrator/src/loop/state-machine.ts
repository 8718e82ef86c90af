/**
 * state-machine.ts: xstate v5 machine for a single goal run.
 *
 * The machine is the single source of truth for which tool may be invoked next.
 * Runs are plain data; the machine snapshot is rehydrated from `state` and
 * `context` for every query and transition.
 */

import { and, assign, setup } from "xstate";
import type { FailureLocus } from "../types/reflexion.js";

export const GOAL_STATES = [
  "INIT",
  "STRATEGY_DESIGN",
  "BACKTEST_COMPLETE",
  "DEV_GATE",
  "DEV_GATE_PASSED",
  "PRODUCT_GATE",
  "PRODUCT_GATE_PASSED",
  "COMMITTED",
  "REFLEXION",
  "ERROR",
  "CANCELLED",
] as const;

export type GoalState = (typeof GOAL_STATES)[number];

export const TERMINAL_STATES: readonly GoalState[] = ["COMMITTED", "ERROR", "CANCELLED"];

export function isGoalState(value: unknown): value is GoalState {
  return GOAL_STATES.some((s) => s === value);
}

export function isTerminalState(state: GoalState): boolean {
  return TERMINAL_STATES.includes(state);
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
export type GoalEvent =
  | { type: "GENERATE_STRATEGY" }
  | { type: "BACKTEST" }
  | { type: "RUN_TESTS" }
  | { type: "PASS" }
  | { type: "FAIL" }
  | { type: "CRV_VERIFY" }
  | { type: "COMMIT" }
  | { type: "RETRY_AVAILABLE"; locus: FailureLocus }
  | { type: "RETRIES_EXHAUSTED" }
  | { type: "CANCEL" };

export type GoalEventType = GoalEvent["type"];

/** One representative per event (both retry loci), in declaration order. */
export const EVENT_SAMPLES: readonly GoalEvent[] = [
  { type: "GENERATE_STRATEGY" },
  { type: "BACKTEST" },
  { type: "RUN_TESTS" },
  { type: "PASS" },
  { type: "FAIL" },
  { type: "CRV_VERIFY" },
  { type: "COMMIT" },
  { type: "RETRY_AVAILABLE", locus: "design" },
  { type: "RETRY_AVAILABLE", locus: "verification" },
  { type: "RETRIES_EXHAUSTED" },
  { type: "CANCEL" },
];

// ---------------------------------------------------------------------------
// Context / input
// ---------------------------------------------------------------------------
interface GoalMachineContext {
  reflexionCount: number;
  maxRetries: number;
}

export interface GoalMachineInput {
  maxRetries: number;
  reflexionCount?: number;
}

// ---------------------------------------------------------------------------
// Machine definition
// ---------------------------------------------------------------------------
export const goalGuardMachine = setup({
  types: {
    context: {} as GoalMachineContext,
    events: {} as GoalEvent,
    input: {} as GoalMachineInput,
  },
  guards: {
    hasRetriesLeft: ({ context }) => context.reflexionCount < context.maxRetries,
    retriesExhausted: ({ context }) => context.reflexionCount >= context.maxRetries,
    isVerificationLocus: ({ event }) =>
      event.type === "RETRY_AVAILABLE" && event.locus === "verification",
  },
  actions: {
    incrementReflexion: assign({
      reflexionCount: ({ context }) => context.reflexionCount + 1,
    }),
  },
}).createMachine({
  id: "goalGuard",
  context: ({ input }) => ({
    reflexionCount: input.reflexionCount ?? 0,
    maxRetries: input.maxRetries,
  }),
  initial: "INIT",
  states: {
    INIT: {
      on: { GENERATE_STRATEGY: "STRATEGY_DESIGN", CANCEL: "CANCELLED" },
    },
    STRATEGY_DESIGN: {
      on: { BACKTEST: "BACKTEST_COMPLETE", CANCEL: "CANCELLED" },
    },
    BACKTEST_COMPLETE: {
      on: { RUN_TESTS: "DEV_GATE", CANCEL: "CANCELLED" },
    },
    DEV_GATE: {
      on: {
        PASS: "DEV_GATE_PASSED",
        FAIL: { target: "REFLEXION", actions: "incrementReflexion" },
        CANCEL: "CANCELLED",
      },
    },
    DEV_GATE_PASSED: {
      on: { CRV_VERIFY: "PRODUCT_GATE", CANCEL: "CANCELLED" },
    },
    PRODUCT_GATE: {
      on: {
        PASS: "PRODUCT_GATE_PASSED",
        FAIL: { target: "REFLEXION", actions: "incrementReflexion" },
        CANCEL: "CANCELLED",
      },
    },
    PRODUCT_GATE_PASSED: {
      on: {
        COMMIT: "COMMITTED",
        // commit tool failure; retried through reflexion like any other failure
        FAIL: { target: "REFLEXION", actions: "incrementReflexion" },
        CANCEL: "CANCELLED",
      },
    },
    REFLEXION: {
      on: {
        RETRY_AVAILABLE: [
          { target: "BACKTEST_COMPLETE", guard: and(["hasRetriesLeft", "isVerificationLocus"]) },
          { target: "STRATEGY_DESIGN", guard: "hasRetriesLeft" },
        ],
        RETRIES_EXHAUSTED: { target: "ERROR", guard: "retriesExhausted" },
        CANCEL: "CANCELLED",
      },
    },
    COMMITTED: { type: "final" },
    ERROR: { type: "final" },
    CANCELLED: { type: "final" },
  },
});
