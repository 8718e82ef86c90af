import type { GoalRun } from "../types/run.js";
import type { ReadinessSignals } from "../types/scorecard.js";

const RISK_METRICS = ["sharpe", "maxDrawdown", "winRate"] as const;

/**
 * Readiness evidence observed on a run. `productChecks` are the verdicts of the
 * product-gate checks evaluated so far in the current cycle.
 */
export function deriveSignals(run: GoalRun, productChecks: Readonly<Record<string, boolean>>): ReadinessSignals {
  const { strategy, backtest, verification, testReport } = run.artifacts;
  const lastDevGate = [...run.gateResults].reverse().find((g) => g.gate === "dev");
  const evidenceMatches = strategy !== undefined && backtest !== undefined && backtest.strategyId === strategy.id;

  return {
    strategyId: strategy?.id ?? "",
    runIdentityPresent: run.id.length > 0 && strategy !== undefined,
    parityChecked: verification?.parity?.checked ?? false,
    parityPassed: verification?.parity?.passed ?? false,
    determinismPassed: lastDevGate?.checks.determinism === true,
    validationPassed: productChecks.walk_forward === true && productChecks.stress_test === true,
    crvAvailable: verification !== undefined,
    riskMetricsComplete:
      backtest !== undefined && RISK_METRICS.every((m) => Number.isFinite(backtest.metrics[m])),
    policyBlockReasons: verification?.passed === false ? [...verification.violations] : [],
    lineageComplete: evidenceMatches && run.history.length > 0,
    startupStatus: run.toolCalls.some((c) => c.status === "timeout") ? "degraded" : "healthy",
    evidenceStale: strategy !== undefined && backtest !== undefined && !evidenceMatches,
    maturityLabelVisible: strategy?.name !== undefined,
    // a test report that ran nothing does not honour the run_tests contract
    contractMismatch: testReport !== undefined && testReport.total === 0,
  };
}
