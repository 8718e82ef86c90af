import type { MetricMap } from "@goalguard/validator";
import type { Suggestion, SuggestionPriority } from "../types/reflexion.js";

export interface SuggestionCriteria {
  sharpeHigh: number;
  sharpeMedium: number;
  minWinRate: number;
  maxDrawdownLimit: number;
  maxDegradation: number;
}

export interface SuggestionInput {
  metrics: MetricMap;
  failedChecks: readonly string[];
  /** Gate errors and free-text feedback, matched against keyword rules. */
  texts: readonly string[];
  criteria: SuggestionCriteria;
}

const PRIORITY_ORDER: Record<SuggestionPriority, number> = { high: 0, medium: 1, low: 2 };

const CHECK_SUGGESTIONS: Readonly<Record<string, Suggestion>> = {
  unit_tests: {
    category: "logic",
    priority: "high",
    description: "Fix the strategy logic exercised by the failing unit tests",
    rationale: "Unit tests failed against the generated strategy",
  },
  determinism: {
    category: "logic",
    priority: "high",
    description: "Remove unseeded randomness and wall-clock reads from the strategy",
    rationale: "Repeated backtests over identical inputs produced different output",
  },
  lint: {
    category: "logic",
    priority: "low",
    description: "Resolve static analysis findings in the strategy source",
    rationale: "Lint reported issues",
  },
  crv: {
    category: "risk_management",
    priority: "high",
    description: "Bring the strategy within cross-run verification limits",
    rationale: "The external verifier reported violations",
  },
  walk_forward: {
    category: "parameter",
    priority: "high",
    description: "Lengthen lookbacks and reduce free parameters to curb overfitting",
    rationale: "Out-of-sample performance degraded across walk-forward windows",
  },
  stress_test: {
    category: "risk_management",
    priority: "high",
    description: "Reduce position sizing so stress scenarios stay within the drawdown limit",
    rationale: "The strategy failed the stress suite",
  },
  promotion_readiness: {
    category: "logic",
    priority: "medium",
    description: "Address the readiness scorecard's next actions",
    rationale: "The promotion scorecard did not reach the required band",
  },
};

const KEYWORD_RULES: readonly { pattern: RegExp; suggestion: Suggestion }[] = [
  {
    pattern: /\bvol(atility)?\b/i,
    suggestion: {
      category: "parameter",
      priority: "high",
      description: "Update volatility targeting to reduce regime sensitivity",
      rationale: "Feedback points at volatility-related performance issues",
    },
  },
  {
    pattern: /drawdown|\bloss(es)?\b/i,
    suggestion: {
      category: "risk_management",
      priority: "high",
      description: "Strengthen parameter guardrails for drawdown control",
      rationale: "Feedback highlights drawdown concerns",
    },
  },
  {
    pattern: /timing|\bentry\b|\bexit\b/i,
    suggestion: {
      category: "timing",
      priority: "medium",
      description: "Optimize entry/exit timing with adaptive filters",
      rationale: "Feedback suggests timing inefficiencies",
    },
  },
];

function metricSuggestions(metrics: MetricMap, c: SuggestionCriteria): Suggestion[] {
  const out: Suggestion[] = [];
  const { sharpe, maxDrawdown, winRate, degradation } = metrics;

  if (Number.isFinite(sharpe) && sharpe < c.sharpeMedium) {
    out.push({
      category: "risk_management",
      priority: sharpe < c.sharpeHigh ? "high" : "medium",
      description: "Improve risk-adjusted returns through volatility targeting",
      rationale: `Sharpe ratio ${sharpe.toFixed(2)} is below ${c.sharpeMedium.toFixed(2)}`,
    });
  }
  if (Number.isFinite(maxDrawdown) && maxDrawdown > c.maxDrawdownLimit) {
    out.push({
      category: "risk_management",
      priority: "high",
      description: "Implement stricter drawdown control",
      rationale: `Max drawdown ${(maxDrawdown * 100).toFixed(1)}% exceeds the ${(c.maxDrawdownLimit * 100).toFixed(1)}% limit`,
    });
  }
  if (Number.isFinite(winRate) && winRate < c.minWinRate) {
    out.push({
      category: "logic",
      priority: "medium",
      description: "Refine entry signal quality to improve win rate",
      rationale: `Win rate ${(winRate * 100).toFixed(1)}% is below ${(c.minWinRate * 100).toFixed(1)}%`,
    });
  }
  if (Number.isFinite(degradation) && degradation > c.maxDegradation) {
    out.push({
      category: "parameter",
      priority: "high",
      description: "Shorten the parameter search and re-validate out of sample",
      rationale: `Average degradation ${degradation.toFixed(2)} exceeds ${c.maxDegradation.toFixed(2)}`,
    });
  }
  return out;
}

/**
 * Metric thresholds, then failed checks, then keyword matches. Ranked by
 * priority (stable within a priority), de-duplicated by description, capped.
 */
export function generateSuggestions(input: SuggestionInput, maxSuggestions: number): Suggestion[] {
  const candidates = [
    ...metricSuggestions(input.metrics, input.criteria),
    ...input.failedChecks.flatMap((check) => {
      const suggestion = CHECK_SUGGESTIONS[check];
      return suggestion ? [suggestion] : [];
    }),
  ];
  const text = input.texts.join("\n");
  for (const rule of KEYWORD_RULES) {
    if (rule.pattern.test(text)) candidates.push(rule.suggestion);
  }

  const seen = new Set<string>();
  const unique = candidates.filter((s) => {
    if (seen.has(s.description)) return false;
    seen.add(s.description);
    return true;
  });
  return unique
    .sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority])
    .slice(0, maxSuggestions)
    .map((s) => ({ ...s }));
}
