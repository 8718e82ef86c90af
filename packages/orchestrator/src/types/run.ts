import type { MetricMap, TimeSeriesDataset, WalkForwardAnalysis } from "@goalguard/validator";
import type { GoalEvent, GoalState } from "../loop/state-machine.js";
import type { GateResult } from "./gate.js";
import type { ReflexionRecord } from "./reflexion.js";
import type { ReadinessScorecard } from "./scorecard.js";
import type {
  BacktestReport,
  LintReport,
  RiskPreference,
  StrategyArtifact,
  StrategyParameters,
  StressReport,
  TestReport,
  ToolCallRecord,
  VerificationReport,
} from "./tools.js";

export interface GoalRequest {
  id?: string;
  goal: string;
  riskPreference: RiskPreference;
  data: TimeSeriesDataset;
  parameters?: StrategyParameters;
}

export interface GoalContext {
  reflexionCount: number;
  maxRetries: number;
}

export interface TransitionRecord {
  seq: number;
  from: GoalState;
  event: GoalEvent;
  to: GoalState;
  at: string;
}

/** Latest tool outputs of the current cycle. Cleared selectively on retry. */
export interface RunArtifacts {
  strategy?: StrategyArtifact;
  backtest?: BacktestReport;
  testReport?: TestReport;
  lintReport?: LintReport;
  verification?: VerificationReport;
  stress?: StressReport;
  committedId?: string;
}

export type TerminalState = "COMMITTED" | "ERROR" | "CANCELLED";

export interface RunOutcome {
  status: TerminalState;
  reason: string;
  /** Error taxonomy entry for ERROR and CANCELLED outcomes. */
  errorKind?: string;
}

export interface GoalRun {
  id: string;
  goal: string;
  riskPreference: RiskPreference;
  data: TimeSeriesDataset;
  state: GoalState;
  context: GoalContext;
  history: TransitionRecord[];
  toolCalls: ToolCallRecord[];
  gateResults: GateResult[];
  analyses: WalkForwardAnalysis[];
  reflexions: ReflexionRecord[];
  scorecards: ReadinessScorecard[];
  artifacts: RunArtifacts;
  parameters: StrategyParameters;
  /** Metrics observed by the latest successful backtest. */
  metrics: MetricMap;
  /** Records the artifact store refused; the run carried on without them. */
  storeFailures: string[];
  createdAt: string;
  outcome?: RunOutcome;
}
