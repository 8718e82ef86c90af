import type { MetricMap } from "@goalguard/validator";
import type { GateName } from "./gate.js";
import type { StrategyParameters } from "./tools.js";

export type SuggestionCategory = "parameter" | "logic" | "risk_management" | "timing";
export type SuggestionPriority = "high" | "medium" | "low";

export interface Suggestion {
  category: SuggestionCategory;
  priority: SuggestionPriority;
  description: string;
  rationale: string;
}

export interface ToolFailure {
  tool: string;
  errorClass: string;
  message: string;
}

export interface FailureContext {
  gate: GateName;
  failedChecks: string[];
  errors: string[];
  toolErrors: ToolFailure[];
  metrics: MetricMap;
}

/** `verification`: only tool plumbing failed, the strategy itself is kept. */
export type FailureLocus = "design" | "verification";

export interface RepairPlan {
  locus: FailureLocus;
  retryState: "STRATEGY_DESIGN" | "BACKTEST_COMPLETE";
  parameters: StrategyParameters;
  actions: string[];
}

export interface ReflexionRecord {
  iteration: number;
  failureContext: FailureContext;
  improvementScore: number;
  suggestions: Suggestion[];
  decision: "retry" | "exhausted";
  plan?: RepairPlan;
  /** Length of the run's tool-call log when this record was made; the next cycle starts after it. */
  toolCallsSeen: number;
  /** Length of the run's walk-forward analysis log at the same point. */
  analysesSeen: number;
}
