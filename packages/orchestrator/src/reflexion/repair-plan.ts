import { roundTo } from "@goalguard/kit";
import type { FailureLocus, RepairPlan, Suggestion } from "../types/reflexion.js";
import type { StrategyParameters } from "../types/tools.js";

const RISK_PARAM = /risk|size|leverage|exposure/i;
const LOOKBACK_PARAM = /lookback|window|period/i;

export const RISK_SCALE = 0.8;
export const LOOKBACK_SCALE = 1.25;

export interface RepairInput {
  locus: FailureLocus;
  parameters: StrategyParameters;
  suggestions: readonly Suggestion[];
  /** Walk-forward failed or degradation exceeded its limit. */
  overfitting: boolean;
}

/**
 * Deterministic parameter repair. A verification-locus retry keeps the
 * strategy as is; a design retry scales risk sizing down on risk findings
 * and lengthens lookbacks on overfitting findings.
 */
export function buildRepairPlan(input: RepairInput): RepairPlan {
  if (input.locus === "verification") {
    return {
      locus: "verification",
      retryState: "BACKTEST_COMPLETE",
      parameters: { ...input.parameters },
      actions: ["Re-run tests and verification against the current strategy"],
    };
  }

  const riskFinding = input.suggestions.some((s) => s.category === "risk_management");
  const parameters: StrategyParameters = {};
  const actions: string[] = [];

  for (const [name, value] of Object.entries(input.parameters)) {
    let next = value;
    if (riskFinding && RISK_PARAM.test(name)) {
      next = roundTo(next * RISK_SCALE, 6);
    }
    if (input.overfitting && LOOKBACK_PARAM.test(name)) {
      next = Number.isInteger(value) ? Math.max(1, Math.round(next * LOOKBACK_SCALE)) : roundTo(next * LOOKBACK_SCALE, 6);
    }
    parameters[name] = next;
    if (next !== value) actions.push(`${name}: ${value} -> ${next}`);
  }

  actions.push(...input.suggestions.map((s) => s.description));
  if (actions.length === 0) {
    actions.push("Regenerate the strategy");
  }
  return { locus: "design", retryState: "STRATEGY_DESIGN", parameters, actions };
}
