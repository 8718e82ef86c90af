// Engine
export { GoalRunner } from "./loop/goal-runner.js";
export type { GoalRunnerDeps, RunOptions } from "./loop/goal-runner.js";
export {
  createGoalRun,
  canApply,
  allowedEvents,
  assertCanApply,
  applyEvent,
  replayHistory,
  enumerateTransitions,
} from "./loop/goal-run.js";
export type { TransitionRow } from "./loop/goal-run.js";
export {
  GOAL_STATES,
  TERMINAL_STATES,
  isGoalState,
  isTerminalState,
  goalGuardMachine,
} from "./loop/state-machine.js";
export type { GoalState, GoalEvent, GoalEventType } from "./loop/state-machine.js";

// Tools and gates
export { createToolCaller } from "./tools/invoke-tool.js";
export type { ToolCaller, ToolOutcome } from "./tools/invoke-tool.js";
export { DevGate } from "./gates/dev-gate.js";
export { ProductGate } from "./gates/product-gate.js";
export type { Gate, GateCheck, GateContext, CheckOutcome } from "./gates/gate.js";

// Reflexion and readiness
export { ReflexionEngine } from "./reflexion/reflexion-engine.js";
export { improvementScore } from "./reflexion/improvement-score.js";
export { generateSuggestions } from "./reflexion/suggestions.js";
export { buildRepairPlan } from "./reflexion/repair-plan.js";
export { computeScorecard, computeComponents, findBlockers, meetsBand } from "./scorecard/promotion-scorecard.js";
export { deriveSignals } from "./scorecard/signals.js";
export { WEIGHT_PROFILES, resolveWeightProfile } from "./scorecard/weight-profiles.js";

// Storage
export { MemoryArtifactStore } from "./store/memory-artifact-store.js";
export { FileArtifactStore } from "./store/file-artifact-store.js";
export { ARTIFACT_KINDS } from "./store/artifact-store.js";
export type { ArtifactKind, ArtifactRecord, ArtifactStore, StoredArtifact } from "./store/artifact-store.js";

// Config, errors, logging
export { resolveConfig, loadConfig } from "./lib/config.js";
export { loadEnv } from "./lib/env.js";
export { createChildLogger, setLogLevels } from "./lib/logger.js";
export {
  GoalGuardError,
  InsufficientDataError,
  InvalidDatasetError,
  InvalidSequenceError,
  ToolInvocationError,
  GateCheckError,
  RetryBudgetExhaustedError,
  ConfigError,
  InvalidRequestError,
  ArtifactStoreError,
  RunInFlightError,
  classifyToolError,
  isSafeRunId,
} from "./lib/errors.js";
export type { ToolErrorClass } from "./lib/errors.js";

export * from "./types/config.js";
export type * from "./types/gate.js";
export type * from "./types/reflexion.js";
export type * from "./types/run.js";
export * from "./types/scorecard.js";
export * from "./types/tools.js";
