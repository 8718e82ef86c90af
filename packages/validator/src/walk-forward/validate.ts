import { clamp, deepFreeze, finiteOr } from "@goalguard/kit";
import { SHARPE_KEY } from "./analyze-window.js";
import type {
  OverfitCriteria,
  WalkForwardAnalysis,
  WalkForwardResult,
  WalkForwardWindow,
} from "../types/walk-forward.js";

/**
 * Aggregate per-window results into a pass/fail verdict.
 * Pure: the same windows and results always produce an identical analysis.
 */
export function validate(
  windows: readonly WalkForwardWindow[],
  results: readonly WalkForwardResult[],
  criteria: OverfitCriteria,
): WalkForwardAnalysis {
  const failureReasons: string[] = [];
  const byWindow = new Map(results.map((r) => [r.windowId, r]));

  const matched: WalkForwardResult[] = [];
  for (const w of windows) {
    const result = byWindow.get(w.windowId);
    if (result) {
      matched.push(result);
    } else {
      failureReasons.push(`window ${w.windowId}: no result`);
    }
  }

  if (matched.length === 0) {
    failureReasons.push("no window results to validate");
    return deepFreeze({
      results: [],
      avgTrainSharpe: 0,
      avgTestSharpe: 0,
      avgDegradation: 1,
      stabilityScore: 0,
      passed: false,
      failureReasons,
    });
  }

  for (const r of matched) {
    const before = failureReasons.length;
    const testSharpe = finiteOr(r.testStats[SHARPE_KEY], 0);
    if (testSharpe < criteria.minTestSharpe) {
      failureReasons.push(
        `window ${r.windowId}: test sharpe ${fmt(testSharpe)} below minimum ${criteria.minTestSharpe}`,
      );
    }
    if (r.degradation > criteria.maxDegradation) {
      failureReasons.push(
        `window ${r.windowId}: degradation ${fmt(r.degradation)} exceeds maximum ${criteria.maxDegradation}`,
      );
    }
    if (r.isOverfitting && failureReasons.length === before) {
      failureReasons.push(`window ${r.windowId}: flagged as overfitting`);
    }
  }

  const avgTrainSharpe = mean(matched.map((r) => finiteOr(r.trainStats[SHARPE_KEY], 0)));
  const avgTestSharpe = mean(matched.map((r) => finiteOr(r.testStats[SHARPE_KEY], 0)));
  const avgDegradation = mean(matched.map((r) => r.degradation));

  if (avgTestSharpe < criteria.minTestSharpe) {
    failureReasons.push(`average test sharpe ${fmt(avgTestSharpe)} below minimum ${criteria.minTestSharpe}`);
  }
  if (avgDegradation > criteria.maxDegradation) {
    failureReasons.push(`average degradation ${fmt(avgDegradation)} exceeds maximum ${criteria.maxDegradation}`);
  }

  const passed =
    matched.length === windows.length &&
    !matched.some((r) => r.isOverfitting) &&
    avgTestSharpe >= criteria.minTestSharpe &&
    avgDegradation <= criteria.maxDegradation;

  return deepFreeze({
    results: matched,
    avgTrainSharpe,
    avgTestSharpe,
    avgDegradation,
    stabilityScore: clamp(1 - avgDegradation, 0, 1),
    passed,
    failureReasons,
  });
}

function mean(values: number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function fmt(value: number): string {
  return value.toFixed(4);
}
