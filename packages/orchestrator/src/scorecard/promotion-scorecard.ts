import { clamp, roundTo } from "@goalguard/kit";
import type { ReadinessBand, ScorecardConfig } from "../types/config.js";
import type {
  NextAction,
  ReadinessScorecard,
  ReadinessSignals,
  ScorecardComponent,
  ScorecardComponents,
  StartupStatus,
} from "../types/scorecard.js";
import { resolveWeightProfile } from "./weight-profiles.js";

const STARTUP_SCORES: Record<StartupStatus, number> = { healthy: 100, degraded: 60, failed: 0 };

const COMPONENT_ORDER: readonly ScorecardComponent[] = ["determinism", "risk", "policy", "ops", "user"];

const COMPONENT_ACTIONS: Record<ScorecardComponent, string> = {
  determinism: "Make backtest output reproducible and run the parity check",
  risk: "Complete the risk metrics and pass validation",
  policy: "Clear outstanding policy findings and record lineage",
  ops: "Restore healthy tool startup and refresh stale evidence",
  user: "Show the maturity label and fix contract mismatches",
};

const BAND_RANK: Record<ReadinessBand, number> = { RED: 0, AMBER: 1, GREEN: 2 };

/** Each component is independently clamped to [0, 100]. */
export function computeComponents(signals: ReadinessSignals): ScorecardComponents {
  const parity = signals.parityChecked ? (signals.parityPassed ? 40 : 0) : 20;
  return {
    determinism: clamp((signals.determinismPassed ? 60 : 0) + parity, 0, 100),
    risk: clamp(
      (signals.riskMetricsComplete ? 50 : 0) + (signals.validationPassed ? 30 : 0) + (signals.crvAvailable ? 20 : 0),
      0,
      100,
    ),
    policy: clamp(100 - 25 * signals.policyBlockReasons.length - (signals.lineageComplete ? 0 : 30), 0, 100),
    ops: clamp(STARTUP_SCORES[signals.startupStatus] - (signals.evidenceStale ? 20 : 0), 0, 100),
    user: clamp((signals.maturityLabelVisible ? 100 : 50) - (signals.contractMismatch ? 30 : 0), 0, 100),
  };
}

/** Hard blockers, evaluated independently of the score. */
export function findBlockers(signals: ReadinessSignals): string[] {
  const blockers: string[] = [];
  if (!signals.runIdentityPresent) blockers.push("missing_run_identity");
  if (signals.parityChecked && !signals.parityPassed) blockers.push("parity_check_failed");
  for (const reason of signals.policyBlockReasons) blockers.push(`policy_violation:${reason}`);
  if (!signals.lineageComplete) blockers.push("lineage_incomplete");
  return blockers;
}

export function bandFor(score: number, bands: ScorecardConfig["bands"]): ReadinessBand {
  if (score >= bands.green) return "GREEN";
  if (score >= bands.amber) return "AMBER";
  return "RED";
}

/** True when `decision` is a band at least as good as `minimum`. BLOCKED never qualifies. */
export function meetsBand(decision: ReadinessScorecard["decision"], minimum: ReadinessBand): boolean {
  return decision !== "BLOCKED" && BAND_RANK[decision] >= BAND_RANK[minimum];
}

function blockerAction(blocker: string): string {
  if (blocker === "missing_run_identity") return "Attach a run identity to the backtest evidence";
  if (blocker === "parity_check_failed") return "Resolve parity differences between backtest and verification";
  if (blocker === "lineage_incomplete") return "Record complete lineage from strategy to evidence";
  return `Resolve policy violation: ${blocker.slice("policy_violation:".length)}`;
}

function rankNextActions(
  blockers: readonly string[],
  components: ScorecardComponents,
  weights: ReadinessScorecard["weights"],
): NextAction[] {
  const targets: { target: string; action: string }[] = blockers.map((b) => ({ target: b, action: blockerAction(b) }));

  const shortfalls = COMPONENT_ORDER.map((c) => ({ component: c, gap: weights[c] * (100 - components[c]) }))
    .filter((s) => s.gap > 0)
    // stable sort keeps COMPONENT_ORDER on ties
    .sort((a, b) => b.gap - a.gap);
  for (const s of shortfalls) {
    targets.push({ target: s.component, action: COMPONENT_ACTIONS[s.component] });
  }

  if (targets.length === 0) {
    targets.push({ target: "promotion", action: "Proceed to promotion review" });
  }
  return targets.map((t, i) => ({ rank: i + 1, ...t }));
}

function recommend(decision: ReadinessScorecard["decision"], blockers: readonly string[]): string {
  switch (decision) {
    case "BLOCKED":
      return `Promotion blocked by ${blockers.join(", ")}`;
    case "GREEN":
      return "Ready for promotion";
    case "AMBER":
      return "Promotable after the listed actions are addressed";
    case "RED":
      return "Not ready for promotion";
  }
}

/**
 * Non-compensatory readiness decision: blockers force BLOCKED whatever the score.
 */
export function computeScorecard(
  signals: ReadinessSignals,
  config: ScorecardConfig,
  opts: { tenant?: string } = {},
): ReadinessScorecard {
  const profile = resolveWeightProfile(config, opts.tenant);
  const components = computeComponents(signals);
  const score = roundTo(
    COMPONENT_ORDER.reduce((sum, c) => sum + profile.weights[c] * components[c], 0),
    2,
  );
  const band = bandFor(score, config.bands);
  const blockers = findBlockers(signals);
  const decision = blockers.length > 0 ? "BLOCKED" : band;

  return {
    strategyId: signals.strategyId,
    profileVersion: profile.version,
    weights: { ...profile.weights },
    components,
    score,
    band,
    decision,
    blockers,
    nextActions: rankNextActions(blockers, components, profile.weights),
    recommendation: recommend(decision, blockers),
  };
}
