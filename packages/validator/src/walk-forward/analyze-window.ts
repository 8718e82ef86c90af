import { finiteOr } from "@goalguard/kit";
import type {
  MetricMap,
  OverfitCriteria,
  WalkForwardResult,
  WalkForwardWindow,
} from "../types/walk-forward.js";

export const SHARPE_KEY = "sharpe";

/**
 * Score one window: relative Sharpe drop from train to test, and whether the
 * window looks overfit. A non-positive train Sharpe counts as full degradation.
 */
export function analyzeWindowResults(
  window: WalkForwardWindow,
  trainStats: MetricMap,
  testStats: MetricMap,
  criteria: OverfitCriteria,
): WalkForwardResult {
  const trainSharpe = finiteOr(trainStats[SHARPE_KEY], 0);
  const testSharpe = finiteOr(testStats[SHARPE_KEY], 0);

  const degradation = trainSharpe > 0 ? (trainSharpe - testSharpe) / trainSharpe : 1.0;
  const isOverfitting = testSharpe < criteria.minTestSharpe || degradation > criteria.maxDegradation;

  return Object.freeze({
    windowId: window.windowId,
    trainStats: Object.freeze({ ...trainStats }),
    testStats: Object.freeze({ ...testStats }),
    degradation,
    isOverfitting,
  });
}
