import {
  analyzeWindowResults,
  createWindows,
  validate,
  windowTimeRange,
} from "@goalguard/validator";
import type { WalkForwardResult } from "@goalguard/validator";
import { computeScorecard, meetsBand } from "../scorecard/promotion-scorecard.js";
import { deriveSignals } from "../scorecard/signals.js";
import type { GateResult } from "../types/gate.js";
import type { StrategyArtifact } from "../types/tools.js";
import { disabledCheck, isInfrastructureClass, missingArtifact, runChecks, toolFailed } from "./gate.js";
import type { Gate, GateCheck, GateContext } from "./gate.js";

const crvCheck: GateCheck = {
  name: "crv",
  async run(_artifact, context) {
    const report = context.run.artifacts.verification;
    if (!report) return missingArtifact(context, "crv_verify", "verification report");
    const passed = report.passed && report.violations.length === 0;
    return {
      passed,
      detail: { violations: report.violations, parity: report.parity ?? null },
      errors: report.violations.map((v) => `crv: ${v}`),
    };
  },
};

/** Windows → per-window train/test backtests → aggregate validation. */
const walkForwardCheck: GateCheck = {
  name: "walk_forward",
  async run(artifact, context) {
    const { run, tools, config } = context;
    if (!config.gates.enableWalkForward) return disabledCheck();
    if (!artifact) {
      tools.skip("backtest", "walk-forward needs a strategy artifact");
      return missingArtifact(context, "generate_strategy", "strategy");
    }

    const windows = createWindows(run.data, config.walkForward);
    const results: WalkForwardResult[] = [];
    const errors: string[] = [];
    const toolErrorClasses: string[] = [];
    for (const window of windows) {
      const range = windowTimeRange(run.data, window);
      const train = await tools.call("backtest", { strategy: artifact, data: run.data, range: range.train });
      if (!train.ok) {
        errors.push(`window ${window.windowId}: train backtest failed: ${train.error.message}`);
        toolErrorClasses.push(train.error.errorClass);
        continue;
      }
      const test = await tools.call("backtest", { strategy: artifact, data: run.data, range: range.test });
      if (!test.ok) {
        errors.push(`window ${window.windowId}: test backtest failed: ${test.error.message}`);
        toolErrorClasses.push(test.error.errorClass);
        continue;
      }
      results.push(analyzeWindowResults(window, train.value.metrics, test.value.metrics, config.walkForward));
    }

    const analysis = validate(windows, results, config.walkForward);
    run.analyses.push(analysis);
    return {
      passed: analysis.passed && errors.length === 0,
      detail: analysis,
      errors: [...errors, ...analysis.failureReasons],
      infrastructure:
        toolErrorClasses.length > 0 &&
        toolErrorClasses.every(isInfrastructureClass) &&
        results.every((r) => !r.isOverfitting),
    };
  },
};

const stressTestCheck: GateCheck = {
  name: "stress_test",
  async run(artifact, context) {
    const { tools, config } = context;
    if (!config.gates.enableStressTest) return disabledCheck();
    if (!artifact) {
      tools.skip("stress_test", "no strategy artifact");
      return missingArtifact(context, "generate_strategy", "strategy");
    }

    const limit = config.gates.maxDrawdownLimit;
    const outcome = await tools.call("stress_test", { strategy: artifact, maxDrawdownLimit: limit });
    if (!outcome.ok) return toolFailed(outcome.error);
    context.run.artifacts.stress = outcome.value;

    const breaches = outcome.value.scenarios.filter((s) => s.maxDrawdown > limit);
    const errors = breaches.map((s) => `stress scenario ${s.name}: drawdown ${s.maxDrawdown} exceeds limit ${limit}`);
    if (!outcome.value.passed) errors.unshift("stress test reported failure");
    return {
      passed: errors.length === 0,
      detail: { scenarios: outcome.value.scenarios, breaches: breaches.map((s) => s.name) },
      errors,
    };
  },
};

const promotionReadinessCheck: GateCheck = {
  name: "promotion_readiness",
  async run(_artifact, context, priorChecks) {
    const { run, config } = context;
    if (!config.gates.enablePromotionScorecard) return disabledCheck();

    const scorecard = computeScorecard(deriveSignals(run, priorChecks), config.scorecard);
    run.scorecards.push(scorecard);
    const passed = meetsBand(scorecard.decision, config.gates.minPromotionBand);
    return {
      passed,
      detail: { decision: scorecard.decision, score: scorecard.score, blockers: scorecard.blockers },
      errors: passed ? [] : [`readiness ${scorecard.decision} (score ${scorecard.score}): ${scorecard.recommendation}`],
    };
  },
};

/**
 * CRV, walk-forward, stress test and promotion readiness. Passes only if every
 * enabled check passes; disabled checks pass with a `disabled` annotation.
 */
export class ProductGate implements Gate {
  readonly name = "product" as const;
  private readonly checks: readonly GateCheck[] = [crvCheck, walkForwardCheck, stressTestCheck, promotionReadinessCheck];

  evaluate(artifact: StrategyArtifact | undefined, context: GateContext): Promise<GateResult> {
    return runChecks(this.name, this.checks, artifact, context);
  }
}
