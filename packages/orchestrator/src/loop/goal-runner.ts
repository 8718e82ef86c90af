import { errorMessage } from "@goalguard/kit";
import { DevGate } from "../gates/dev-gate.js";
import { isInfrastructureClass } from "../gates/gate.js";
import type { Gate, GateContext } from "../gates/gate.js";
import { ProductGate } from "../gates/product-gate.js";
import { ArtifactStoreError, RetryBudgetExhaustedError, RunInFlightError } from "../lib/errors.js";
import type { ToolInvocationError } from "../lib/errors.js";
import { createChildLogger } from "../lib/logger.js";
import { ReflexionEngine } from "../reflexion/reflexion-engine.js";
import type { ArtifactRecord, ArtifactStore } from "../store/artifact-store.js";
import { createToolCaller } from "../tools/invoke-tool.js";
import type { ToolCaller } from "../tools/invoke-tool.js";
import type { GoalGuardConfig } from "../types/config.js";
import type { GateResult } from "../types/gate.js";
import type { GoalRequest, GoalRun } from "../types/run.js";
import type { ToolInvoker } from "../types/tools.js";
import { applyEvent, assertCanApply, createGoalRun } from "./goal-run.js";
import { isTerminalState } from "./state-machine.js";
import type { GoalEvent } from "./state-machine.js";

const log = createChildLogger("runner");

/** Runs currently being driven, across every runner in the process. */
const inFlight = new WeakSet<GoalRun>();

export interface GoalRunnerDeps {
  tools: ToolInvoker;
  store: ArtifactStore;
  config: GoalGuardConfig;
  now?: () => Date;
  devGate?: Gate;
  productGate?: Gate;
  reflexion?: ReflexionEngine;
}

export interface RunOptions {
  /** Honoured between transitions only; an in-flight tool call always completes or times out first. */
  signal?: AbortSignal;
  /** Free-text operator feedback handed to every reflexion of the run. */
  feedback?: string;
}

interface Cycle {
  run: GoalRun;
  tools: ToolCaller;
  opts: RunOptions;
}

/**
 * Drives goal runs to a terminal state. Runs share nothing but the frozen config;
 * each run is advanced strictly sequentially.
 */
export class GoalRunner {
  private readonly now: () => Date;
  private readonly devGate: Gate;
  private readonly productGate: Gate;
  private readonly reflexion: ReflexionEngine;

  constructor(private readonly deps: GoalRunnerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.devGate = deps.devGate ?? new DevGate();
    this.productGate = deps.productGate ?? new ProductGate();
    this.reflexion = deps.reflexion ?? new ReflexionEngine(deps.config);
  }

  /**
   * Creates and drives a run. Resolves with the run once it is COMMITTED or
   * CANCELLED; rejects with RetryBudgetExhaustedError (carrying the run) when
   * it ends in ERROR, with InvalidSequenceError on sequencing misuse, and with
   * RunInFlightError when the run is already being driven.
   */
  async run(request: GoalRequest, opts: RunOptions = {}): Promise<GoalRun> {
    return this.drive(createGoalRun(request, this.deps.config, this.now), opts);
  }

  /** Continues an existing, non-terminal run from its current state. One drive per run at a time. */
  async drive(run: GoalRun, opts: RunOptions = {}): Promise<GoalRun> {
    if (inFlight.has(run)) {
      throw new RunInFlightError(run.id);
    }
    inFlight.add(run);
    try {
      return await this.driveToEnd(run, opts);
    } finally {
      inFlight.delete(run);
    }
  }

  private async driveToEnd(run: GoalRun, opts: RunOptions): Promise<GoalRun> {
    const cycle: Cycle = {
      run,
      tools: createToolCaller(run, this.deps.tools, { timeoutMs: this.deps.config.tools.timeoutMs, now: this.now }),
      opts,
    };
    log.info({ runId: run.id, state: run.state, goal: run.goal }, "Driving goal run");

    while (!isTerminalState(run.state)) {
      if (opts.signal?.aborted) {
        this.transition(run, { type: "CANCEL" }, { reason: "Cancelled by caller", errorKind: "cancelled" });
        break;
      }
      await this.step(cycle);
    }

    await this.persist(run, { kind: "goal_run", runId: run.id, payload: run });
    log.info({ runId: run.id, outcome: run.outcome }, `Goal run ${run.state}`);

    if (run.state === "ERROR") {
      throw new RetryBudgetExhaustedError(run);
    }
    return run;
  }

  private async step(cycle: Cycle): Promise<void> {
    const { run } = cycle;
    switch (run.state) {
      case "INIT":
        return this.generateStrategy(cycle, { type: "GENERATE_STRATEGY" });
      case "STRATEGY_DESIGN":
        return this.backtest(cycle);
      case "BACKTEST_COMPLETE":
        return this.runTests(cycle);
      case "DEV_GATE":
        return this.evaluateGate(cycle, this.devGate);
      case "DEV_GATE_PASSED":
        return this.verify(cycle);
      case "PRODUCT_GATE":
        return this.evaluateGate(cycle, this.productGate);
      case "PRODUCT_GATE_PASSED":
        return this.commit(cycle);
      case "REFLEXION":
        return this.reflect(cycle);
      case "COMMITTED":
      case "ERROR":
      case "CANCELLED":
        return;
    }
  }

  /** Issues generate_strategy. On a retry this runs inside STRATEGY_DESIGN, before the backtest. */
  private async generateStrategy(cycle: Cycle, event?: GoalEvent): Promise<void> {
    const { run, tools } = cycle;
    if (event) assertCanApply(run, event);

    const hints = run.reflexions.at(-1)?.suggestions.map((s) => s.description) ?? [];
    const outcome = await tools.call("generate_strategy", {
      goal: run.goal,
      riskPreference: run.riskPreference,
      parameters: { ...run.parameters },
      hints,
    });
    if (outcome.ok) {
      run.artifacts.strategy = outcome.value;
      run.parameters = { ...run.parameters, ...outcome.value.parameters };
    }
    if (event) this.transition(run, event);
  }

  private async backtest(cycle: Cycle): Promise<void> {
    const { run, tools } = cycle;
    assertCanApply(run, { type: "BACKTEST" });

    if (!run.artifacts.strategy && run.reflexions.length > 0) {
      await this.generateStrategy(cycle);
    }
    const strategy = run.artifacts.strategy;
    if (strategy) {
      const outcome = await tools.call("backtest", { strategy, data: run.data });
      if (outcome.ok) {
        run.artifacts.backtest = outcome.value;
        run.metrics = { ...outcome.value.metrics };
      }
    } else {
      tools.skip("backtest", "no strategy artifact");
    }
    this.transition(run, { type: "BACKTEST" });
  }

  private async runTests(cycle: Cycle): Promise<void> {
    const { run, tools } = cycle;
    assertCanApply(run, { type: "RUN_TESTS" });

    const strategy = run.artifacts.strategy;
    if (strategy) {
      const outcome = await tools.call("run_tests", { strategy });
      if (outcome.ok) run.artifacts.testReport = outcome.value;
    } else {
      tools.skip("run_tests", "no strategy artifact");
    }
    this.transition(run, { type: "RUN_TESTS" });
  }

  private async evaluateGate(cycle: Cycle, gate: Gate): Promise<void> {
    const { run } = cycle;
    const analysesBefore = run.analyses.length;
    const scorecardsBefore = run.scorecards.length;

    const context: GateContext = { run, tools: cycle.tools, config: this.deps.config, now: this.now };
    const result = await gate.evaluate(run.artifacts.strategy, context);
    run.gateResults.push(result);

    for (const analysis of run.analyses.slice(analysesBefore)) {
      await this.persist(run, { kind: "walk_forward_analysis", runId: run.id, payload: analysis });
    }
    for (const scorecard of run.scorecards.slice(scorecardsBefore)) {
      await this.persist(run, { kind: "readiness_scorecard", runId: run.id, payload: scorecard });
    }
    await this.persist(run, { kind: "gate_result", runId: run.id, payload: result });

    this.transition(run, { type: result.passed ? "PASS" : "FAIL" });
  }

  private async verify(cycle: Cycle): Promise<void> {
    const { run, tools } = cycle;
    assertCanApply(run, { type: "CRV_VERIFY" });

    const { strategy, backtest } = run.artifacts;
    if (strategy && backtest) {
      const outcome = await tools.call("crv_verify", {
        strategy,
        backtest,
        maxDrawdownLimit: this.deps.config.gates.maxDrawdownLimit,
      });
      if (outcome.ok) run.artifacts.verification = outcome.value;
    } else {
      tools.skip("crv_verify", "verification needs a strategy and its backtest");
    }
    this.transition(run, { type: "CRV_VERIFY" });
  }

  private async commit(cycle: Cycle): Promise<void> {
    const { run, tools } = cycle;
    assertCanApply(run, { type: "COMMIT" });

    const { strategy, backtest } = run.artifacts;
    if (!strategy || !backtest) {
      tools.skip("commit", "commit needs a strategy and its backtest");
      await this.commitFailed(run, "commit prerequisites missing");
      return;
    }

    const outcome = await tools.call("commit", { strategy, backtest });
    if (!outcome.ok) {
      await this.commitFailed(run, outcome.error.message, outcome.error);
      return;
    }
    run.artifacts.committedId = outcome.value.committedId;
    this.transition(run, { type: "COMMIT" }, { reason: `Committed as ${outcome.value.committedId}` });
  }

  private async commitFailed(run: GoalRun, message: string, error?: ToolInvocationError): Promise<void> {
    const result: GateResult = {
      gate: "commit",
      passed: false,
      checks: { commit: false },
      details: error ? { commit: { error: error.toJSON(), errorClass: error.errorClass } } : {},
      errors: [message],
      infrastructureFailures: isInfrastructureClass(error?.errorClass) ? ["commit"] : [],
      evaluatedAt: this.now().toISOString(),
    };
    run.gateResults.push(result);
    await this.persist(run, { kind: "gate_result", runId: run.id, payload: result });
    this.transition(run, { type: "FAIL" });
  }

  private async reflect(cycle: Cycle): Promise<void> {
    const { run, opts } = cycle;
    const gateResult = run.gateResults.at(-1);
    if (!gateResult) {
      throw new Error(`Run ${run.id} entered REFLEXION without a gate result`);
    }

    const record = this.reflexion.analyze({ run, gateResult, feedback: opts.feedback });
    run.reflexions.push(record);
    await this.persist(run, { kind: "reflexion", runId: run.id, payload: record });

    if (record.decision === "exhausted" || !record.plan) {
      const detail = gateResult.errors.length > 0 ? `: ${gateResult.errors.slice(0, 3).join("; ")}` : "";
      this.transition(run, { type: "RETRIES_EXHAUSTED" }, {
        reason: `Retry budget of ${run.context.maxRetries} exhausted after ${gateResult.gate} failure${detail}`,
        errorKind: "retry_budget_exhausted",
      });
      return;
    }

    const { plan } = record;
    run.artifacts.testReport = undefined;
    run.artifacts.lintReport = undefined;
    run.artifacts.verification = undefined;
    run.artifacts.stress = undefined;
    if (plan.locus === "design") {
      run.artifacts.strategy = undefined;
      run.artifacts.backtest = undefined;
      run.parameters = { ...plan.parameters };
      run.metrics = {};
    }
    this.transition(run, { type: "RETRY_AVAILABLE", locus: plan.locus });
  }

  private transition(run: GoalRun, event: GoalEvent, opts: { reason?: string; errorKind?: string } = {}): void {
    const from = run.state;
    const to = applyEvent(run, event, { ...opts, now: this.now });
    log.info({ runId: run.id, from, event: event.type, to, reflexionCount: run.context.reflexionCount }, "Transition");
  }

  /** A store failure is logged and noted on the run; it never stops the run. */
  private async persist(run: GoalRun, record: ArtifactRecord): Promise<void> {
    try {
      const id = await this.deps.store.put(record);
      log.debug({ runId: record.runId, kind: record.kind, id }, "Record stored");
    } catch (err) {
      const error = new ArtifactStoreError(`Could not store ${record.kind}: ${errorMessage(err)}`, { cause: err });
      run.storeFailures.push(error.message);
      log.error({ runId: record.runId, kind: record.kind, err: error }, "Record not stored");
    }
  }
}
