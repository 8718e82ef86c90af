import { stableHash } from "../lib/stable-hash.js";
import type { GateResult } from "../types/gate.js";
import type { StrategyArtifact } from "../types/tools.js";
import { isInfrastructureClass, missingArtifact, runChecks, toolFailed } from "./gate.js";
import type { Gate, GateCheck, GateContext } from "./gate.js";

const unitTestsCheck: GateCheck = {
  name: "unit_tests",
  async run(_artifact, context) {
    const report = context.run.artifacts.testReport;
    if (!report) return missingArtifact(context, "run_tests", "test report");

    const passed = report.passed && report.failed === 0;
    return {
      passed,
      detail: { total: report.total, failed: report.failed },
      errors: passed ? [] : [`unit tests failed: ${report.failed}/${report.total}`, ...report.failures],
    };
  },
};

/**
 * Re-runs the backtest `determinismRuns` times over the same inputs and
 * compares each report's digest with the original. Any divergence fails.
 */
const determinismCheck: GateCheck = {
  name: "determinism",
  async run(artifact, context) {
    const { run, tools, config } = context;
    const baseline = run.artifacts.backtest;
    if (!artifact || !baseline) {
      const missing = missingArtifact(context, artifact ? "backtest" : "generate_strategy", "baseline backtest");
      tools.skip("backtest", "determinism re-run needs a strategy and a baseline backtest");
      return missing;
    }

    const expected = stableHash(baseline);
    const digests: string[] = [];
    for (let i = 0; i < config.gates.determinismRuns; i++) {
      const outcome = await tools.call("backtest", { strategy: artifact, data: run.data });
      if (!outcome.ok) {
        return {
          passed: false,
          detail: { runs: config.gates.determinismRuns, baseline: expected, digests },
          errors: [`determinism re-run ${i + 1} failed: ${outcome.error.message}`],
          infrastructure: isInfrastructureClass(outcome.error.errorClass),
        };
      }
      digests.push(stableHash(outcome.value));
    }

    const divergent = digests.filter((d) => d !== expected).length;
    return {
      passed: divergent === 0,
      detail: { runs: config.gates.determinismRuns, baseline: expected, digests },
      errors: divergent === 0 ? [] : [`backtest output diverged in ${divergent} of ${digests.length} re-runs`],
    };
  },
};

const lintCheck: GateCheck = {
  name: "lint",
  async run(artifact, context) {
    if (!artifact) {
      context.tools.skip("lint", "no strategy artifact");
      return missingArtifact(context, "generate_strategy", "strategy");
    }
    const outcome = await context.tools.call("lint", { strategy: artifact });
    if (!outcome.ok) return toolFailed(outcome.error);

    context.run.artifacts.lintReport = outcome.value;
    return {
      passed: outcome.value.passed,
      detail: { issues: outcome.value.issues },
      errors: outcome.value.passed ? [] : outcome.value.issues.map((i) => `lint: ${i}`),
    };
  },
};

/** Unit tests, determinism, lint; all must pass. */
export class DevGate implements Gate {
  readonly name = "dev" as const;
  private readonly checks: readonly GateCheck[] = [unitTestsCheck, determinismCheck, lintCheck];

  evaluate(artifact: StrategyArtifact | undefined, context: GateContext): Promise<GateResult> {
    return runChecks(this.name, this.checks, artifact, context);
  }
}
