import { randomUUID } from "node:crypto";
import { createActor } from "xstate";
import { formatZodErrors } from "@goalguard/kit";
import { TimeSeriesDatasetSchema } from "@goalguard/validator";
import type { GoalGuardConfig } from "../types/config.js";
import type { GoalContext, GoalRequest, GoalRun, RunOutcome } from "../types/run.js";
import { InvalidRequestError, InvalidSequenceError, isSafeRunId } from "../lib/errors.js";
import {
  EVENT_SAMPLES,
  GOAL_STATES,
  goalGuardMachine,
  isGoalState,
  isTerminalState,
} from "./state-machine.js";
import type { GoalEvent, GoalState } from "./state-machine.js";

const DEFAULT_REASONS: Record<RunOutcome["status"], string> = {
  COMMITTED: "Strategy committed",
  ERROR: "Run failed",
  CANCELLED: "Run cancelled",
};

/** Creates a new run in INIT. The run starts with a full reflexion budget. */
export function createGoalRun(
  request: GoalRequest,
  config: GoalGuardConfig,
  now: () => Date = () => new Date(),
): GoalRun {
  if (request.goal.trim().length === 0) {
    throw new InvalidRequestError("Goal must not be empty");
  }
  if (request.id !== undefined && !isSafeRunId(request.id)) {
    throw new InvalidRequestError(`Invalid run id ${JSON.stringify(request.id)}`);
  }
  const data = TimeSeriesDatasetSchema.safeParse(request.data);
  if (!data.success) {
    throw new InvalidRequestError(`Invalid dataset: ${formatZodErrors(data.error).join("; ")}`);
  }

  return {
    id: request.id ?? randomUUID(),
    goal: request.goal,
    riskPreference: request.riskPreference,
    data: request.data,
    state: "INIT",
    context: { reflexionCount: 0, maxRetries: config.reflexion.maxRetries },
    history: [],
    toolCalls: [],
    gateResults: [],
    analyses: [],
    reflexions: [],
    scorecards: [],
    artifacts: {},
    parameters: { ...(request.parameters ?? {}) },
    metrics: {},
    storeFailures: [],
    createdAt: now().toISOString(),
  };
}

function resolveSnapshot(state: GoalState, context: GoalContext) {
  return goalGuardMachine.resolveState({ value: state, context: { ...context } });
}

function toGoalState(value: unknown): GoalState {
  if (!isGoalState(value)) {
    throw new Error(`Machine reached unknown state ${JSON.stringify(value)}`);
  }
  return value;
}

/** Legality query; never mutates the run. */
export function canApply(run: GoalRun, event: GoalEvent): boolean {
  return resolveSnapshot(run.state, run.context).can(event);
}

/** Events that are currently legal, in declaration order. */
export function allowedEvents(run: GoalRun): GoalEvent[] {
  const snapshot = resolveSnapshot(run.state, run.context);
  return EVENT_SAMPLES.filter((e) => snapshot.can(e));
}

/** Throws InvalidSequenceError naming the current state and event when the edge does not exist. */
export function assertCanApply(run: GoalRun, event: GoalEvent): void {
  if (!canApply(run, event)) {
    throw new InvalidSequenceError(run.state, event.type);
  }
}

/**
 * Advances the run by one edge and records it. Illegal events throw before the
 * run is touched. Entering a terminal state sets `outcome`.
 */
export function applyEvent(
  run: GoalRun,
  event: GoalEvent,
  opts: { reason?: string; errorKind?: string; now?: () => Date } = {},
): GoalState {
  const snapshot = resolveSnapshot(run.state, run.context);
  if (!snapshot.can(event)) {
    throw new InvalidSequenceError(run.state, event.type);
  }

  const actor = createActor(goalGuardMachine, { snapshot, input: run.context });
  actor.start();
  actor.send(event);
  const next = actor.getSnapshot();
  actor.stop();

  const to = toGoalState(next.value);
  const at = (opts.now ?? (() => new Date()))().toISOString();
  run.history.push({ seq: run.history.length + 1, from: run.state, event, to, at });
  run.state = to;
  run.context = { reflexionCount: next.context.reflexionCount, maxRetries: next.context.maxRetries };

  if (to === "COMMITTED" || to === "ERROR" || to === "CANCELLED") {
    run.outcome = {
      status: to,
      reason: opts.reason ?? DEFAULT_REASONS[to],
      ...(opts.errorKind ? { errorKind: opts.errorKind } : {}),
    };
  }
  return to;
}

/**
 * Re-applies the recorded events from INIT with a fresh budget of the run's size.
 * Returns the reached state; throws InvalidSequenceError on a tampered history.
 */
export function replayHistory(run: GoalRun): GoalState {
  const actor = createActor(goalGuardMachine, { input: { maxRetries: run.context.maxRetries } });
  actor.start();
  try {
    for (const record of run.history) {
      const snapshot = actor.getSnapshot();
      const from = toGoalState(snapshot.value);
      if (from !== record.from || !snapshot.can(record.event)) {
        throw new InvalidSequenceError(from, record.event.type);
      }
      actor.send(record.event);
    }
    return toGoalState(actor.getSnapshot().value);
  } finally {
    actor.stop();
  }
}

export interface TransitionRow {
  from: GoalState;
  event: GoalEvent;
  /** `null` when the event is rejected in `from`. */
  to: GoalState | null;
}

/**
 * The full (state, event) table for a given budget position.
 * With the default context every retry guard is open.
 */
export function enumerateTransitions(
  context: GoalContext = { reflexionCount: 0, maxRetries: 3 },
): TransitionRow[] {
  const rows: TransitionRow[] = [];
  for (const from of GOAL_STATES) {
    for (const event of EVENT_SAMPLES) {
      const snapshot = resolveSnapshot(from, context);
      if (isTerminalState(from) || !snapshot.can(event)) {
        rows.push({ from, event, to: null });
        continue;
      }
      const actor = createActor(goalGuardMachine, { snapshot, input: context });
      actor.start();
      actor.send(event);
      rows.push({ from, event, to: toGoalState(actor.getSnapshot().value) });
      actor.stop();
    }
  }
  return rows;
}
