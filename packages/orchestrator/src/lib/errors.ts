import { GoalGuardError } from "@goalguard/kit";
import type { GoalEventType, GoalState } from "../loop/state-machine.js";
import type { GoalRun } from "../types/run.js";
import type { ToolKind } from "../types/tools.js";

export { GoalGuardError };
export { InsufficientDataError, InvalidDatasetError } from "@goalguard/validator";

/** FSM misuse: the event is not an outgoing edge of the current state. Raised before any side effect. */
export class InvalidSequenceError extends GoalGuardError {
  readonly kind = "invalid_sequence";
  readonly state: GoalState;
  readonly event: GoalEventType;

  constructor(state: GoalState, event: GoalEventType) {
    super(`Event ${event} is not allowed in state ${state}`);
    this.state = state;
    this.event = event;
  }
}

export type ToolErrorClass = "timeout" | "network" | "crash" | "unknown";

/** An external tool call failed. Always recorded, never propagated raw. */
export class ToolInvocationError extends GoalGuardError {
  readonly kind = "tool_invocation";
  readonly tool: ToolKind;
  readonly errorClass: ToolErrorClass;

  constructor(tool: ToolKind, message: string, errorClass: ToolErrorClass, options?: { cause?: unknown }) {
    super(`${tool} failed (${errorClass}): ${message}`, options);
    this.tool = tool;
    this.errorClass = errorClass;
  }
}

/** A single gate check failed or threw. Non-fatal; aggregated into the GateResult. */
export class GateCheckError extends GoalGuardError {
  readonly kind = "gate_check";
  readonly check: string;

  constructor(check: string, message: string, options?: { cause?: unknown }) {
    super(`${check}: ${message}`, options);
    this.check = check;
  }
}

/** Reflexion budget used up. Fatal; the run has been moved to ERROR. */
export class RetryBudgetExhaustedError extends GoalGuardError {
  readonly kind = "retry_budget_exhausted";
  readonly run: GoalRun;

  constructor(run: GoalRun) {
    super(`Run ${run.id} exhausted its reflexion budget after ${run.context.reflexionCount} iteration(s)`);
    this.run = run;
  }
}

/** Configuration file missing, unreadable or invalid. */
export class ConfigError extends GoalGuardError {
  readonly kind = "config";
}

const ERROR_PATTERNS: [RegExp, ToolErrorClass][] = [
  [/timeout|timed out|ETIMEDOUT/i, "timeout"],
  [/ECONNREFUSED|ECONNRESET|EAI_AGAIN|ENOTFOUND|socket hang up|fetch failed/i, "network"],
  [/ENOENT|spawn|exit code|killed|SIGTERM|SIGKILL|panic/i, "crash"],
];

/**
 * Classifies a raw tool failure message.
 * Only `unknown` failures are treated as substantive by reflexion; the rest are infrastructure.
 */
export function classifyToolError(message: string): ToolErrorClass {
  for (const [pattern, errorClass] of ERROR_PATTERNS) {
    if (pattern.test(message)) return errorClass;
  }
  return "unknown";
}

/** A goal request failed validation before a run could be created. */
export class InvalidRequestError extends GoalGuardError {
  readonly kind = "invalid_request";
}

/** The artifact store rejected a read or write. Logged and recorded on the run; never aborts a drive. */
export class ArtifactStoreError extends GoalGuardError {
  readonly kind = "artifact_store";
}

/** A second drive was started on a run that is already being driven. */
export class RunInFlightError extends GoalGuardError {
  readonly kind = "run_in_flight";
  readonly runId: string;

  constructor(runId: string) {
    super(`Run ${runId} is already being driven`);
    this.runId = runId;
  }
}

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/** Run ids become directory names in the file store: no separators, no dot segments. */
export function isSafeRunId(id: string): boolean {
  return id.length <= 128 && RUN_ID_PATTERN.test(id) && !id.includes("..");
}
