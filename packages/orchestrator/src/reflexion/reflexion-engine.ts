import type { MetricMap } from "@goalguard/validator";
import { createChildLogger } from "../lib/logger.js";
import type { GoalGuardConfig } from "../types/config.js";
import type { GateResult } from "../types/gate.js";
import type { FailureContext, FailureLocus, ReflexionRecord, ToolFailure } from "../types/reflexion.js";
import type { GoalRun } from "../types/run.js";
import { improvementScore } from "./improvement-score.js";
import { buildRepairPlan } from "./repair-plan.js";
import { generateSuggestions } from "./suggestions.js";

const log = createChildLogger("reflexion");

export interface ReflexionInput {
  /** Must already be in REFLEXION, with the counter incremented by FAIL. */
  run: GoalRun;
  gateResult: GateResult;
  /** Free-text operator feedback, matched against keyword rules. */
  feedback?: string;
}

export class ReflexionEngine {
  constructor(private readonly config: GoalGuardConfig) {}

  /** Pure with respect to the run: the caller stores the record and applies the decision. */
  analyze(input: ReflexionInput): ReflexionRecord {
    const { run, gateResult } = input;
    const failedChecks = Object.entries(gateResult.checks)
      .filter(([, passed]) => !passed)
      .map(([name]) => name);

    const metrics = this.observedMetrics(run, failedChecks);
    const failureContext: FailureContext = {
      gate: gateResult.gate,
      failedChecks,
      errors: [...gateResult.errors],
      toolErrors: this.cycleToolErrors(run),
      metrics,
    };

    const { reflexion, walkForward, gates } = this.config;
    const suggestions = generateSuggestions(
      {
        metrics,
        failedChecks,
        texts: input.feedback ? [...gateResult.errors, input.feedback] : gateResult.errors,
        criteria: {
          sharpeHigh: reflexion.sharpeHigh,
          sharpeMedium: reflexion.sharpeMedium,
          minWinRate: reflexion.minWinRate,
          maxDrawdownLimit: gates.maxDrawdownLimit,
          maxDegradation: walkForward.maxDegradation,
        },
      },
      reflexion.maxSuggestions,
    );

    const exhausted = run.context.reflexionCount >= run.context.maxRetries;
    const record: ReflexionRecord = {
      iteration: run.context.reflexionCount,
      failureContext,
      improvementScore: improvementScore(run.id, metrics),
      suggestions,
      decision: exhausted ? "exhausted" : "retry",
      toolCallsSeen: run.toolCalls.length,
      analysesSeen: run.analyses.length,
    };

    if (!exhausted) {
      const overfitting =
        failedChecks.includes("walk_forward") ||
        (Number.isFinite(metrics.degradation) && metrics.degradation > walkForward.maxDegradation);
      record.plan = buildRepairPlan({
        locus: this.failureLocus(run, gateResult, failedChecks),
        parameters: run.parameters,
        suggestions,
        overfitting,
      });
    }

    log.info(
      {
        runId: run.id,
        iteration: record.iteration,
        decision: record.decision,
        locus: record.plan?.locus,
        improvementScore: record.improvementScore,
      },
      `Reflexion ${record.decision}`,
    );
    return record;
  }

  /**
   * `verification` only when every failed check failed because a tool could not
   * be reached and the strategy and its backtest are still on hand.
   */
  private failureLocus(run: GoalRun, gateResult: GateResult, failedChecks: readonly string[]): FailureLocus {
    const infraOnly =
      failedChecks.length > 0 && failedChecks.every((c) => gateResult.infrastructureFailures.includes(c));
    return infraOnly && run.artifacts.strategy && run.artifacts.backtest ? "verification" : "design";
  }

  /** Only an analysis produced since the previous reflexion belongs to this cycle. */
  private observedMetrics(run: GoalRun, failedChecks: readonly string[]): MetricMap {
    const since = run.reflexions.at(-1)?.analysesSeen ?? 0;
    const latest = run.analyses.length > since ? run.analyses.at(-1) : undefined;
    if (failedChecks.includes("walk_forward") && latest) {
      return { ...run.metrics, degradation: latest.avgDegradation, testSharpe: latest.avgTestSharpe };
    }
    return { ...run.metrics };
  }

  private cycleToolErrors(run: GoalRun): ToolFailure[] {
    const since = run.reflexions.at(-1)?.toolCallsSeen ?? 0;
    return run.toolCalls
      .filter((c) => c.seq > since && (c.status === "failed" || c.status === "timeout"))
      .map((c) => ({
        tool: c.kind,
        errorClass: c.error?.errorClass ?? "unknown",
        message: c.error?.message ?? "",
      }));
  }
}
