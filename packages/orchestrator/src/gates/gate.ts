import { errorMessage } from "@goalguard/kit";
import { GateCheckError } from "../lib/errors.js";
import type { ToolInvocationError } from "../lib/errors.js";
import { createChildLogger } from "../lib/logger.js";
import type { ToolCaller } from "../tools/invoke-tool.js";
import type { GoalGuardConfig } from "../types/config.js";
import type { GateName, GateResult } from "../types/gate.js";
import type { GoalRun } from "../types/run.js";
import type { StrategyArtifact, ToolKind } from "../types/tools.js";

const log = createChildLogger("gates");

export interface GateContext {
  run: GoalRun;
  tools: ToolCaller;
  config: GoalGuardConfig;
  now: () => Date;
}

/** Never rejects: every failure ends up as a failed check in the result. */
export interface Gate {
  readonly name: GateName;
  evaluate(artifact: StrategyArtifact | undefined, context: GateContext): Promise<GateResult>;
}

export interface CheckOutcome {
  passed: boolean;
  detail?: unknown;
  errors?: string[];
  /** The check failed only because a tool could not be reached. */
  infrastructure?: boolean;
}

export interface GateCheck {
  name: string;
  /** `priorChecks` holds the verdicts of the checks already run in this evaluation. */
  run(
    artifact: StrategyArtifact | undefined,
    context: GateContext,
    priorChecks: Readonly<Record<string, boolean>>,
  ): Promise<CheckOutcome>;
}

/** Check outcome for a disabled check: passes, annotated rather than omitted. */
export function disabledCheck(): CheckOutcome {
  return { passed: true, detail: { status: "disabled" } };
}

/** Runs checks in order. A check that throws becomes a failed check carrying GateCheckError text. */
export async function runChecks(
  gate: GateName,
  checks: readonly GateCheck[],
  artifact: StrategyArtifact | undefined,
  context: GateContext,
): Promise<GateResult> {
  const result: GateResult = {
    gate,
    passed: true,
    checks: {},
    details: {},
    errors: [],
    infrastructureFailures: [],
    evaluatedAt: context.now().toISOString(),
  };

  for (const check of checks) {
    let outcome: CheckOutcome;
    try {
      outcome = await check.run(artifact, context, result.checks);
    } catch (err) {
      const failure = err instanceof GateCheckError ? err : new GateCheckError(check.name, errorMessage(err), { cause: err });
      outcome = { passed: false, detail: { error: failure.toJSON() }, errors: [failure.message] };
    }

    result.checks[check.name] = outcome.passed;
    if (outcome.detail !== undefined) result.details[check.name] = outcome.detail;
    if (outcome.errors) result.errors.push(...outcome.errors);
    if (!outcome.passed) {
      result.passed = false;
      if (outcome.infrastructure) result.infrastructureFailures.push(check.name);
    }
  }

  log.info({ runId: context.run.id, gate, passed: result.passed, checks: result.checks }, `${gate} gate evaluated`);
  return result;
}

export function isInfrastructureClass(errorClass: string | undefined): boolean {
  return errorClass === "timeout" || errorClass === "network" || errorClass === "crash";
}

/** Failed check for an artifact that an earlier tool call of this run did not produce. */
export function missingArtifact(context: GateContext, tool: ToolKind, artifact: string): CheckOutcome {
  const failure = [...context.run.toolCalls].reverse().find((c) => c.kind === tool && c.status !== "ok");
  return {
    passed: false,
    errors: [failure?.error ? `${artifact} unavailable: ${failure.error.message}` : `${artifact} unavailable`],
    infrastructure: isInfrastructureClass(failure?.error?.errorClass),
  };
}

/** Failed check for a tool call made by the check itself. */
export function toolFailed(error: ToolInvocationError): CheckOutcome {
  return { passed: false, errors: [error.message], infrastructure: isInfrastructureClass(error.errorClass) };
}
