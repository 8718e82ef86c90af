import { z } from "zod";
import type { TimeRange, TimeSeriesDataset } from "@goalguard/validator";

// --- Tool outputs (validated at the invocation boundary) ---

export const StrategyParametersSchema = z.record(z.string(), z.number().finite());

export const StrategyArtifactSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  parameters: StrategyParametersSchema.default({}),
  /** Content digest of the generated source, when the generator reports one. */
  digest: z.string().optional(),
});

export const BacktestReportSchema = z.object({
  strategyId: z.string().min(1),
  /** Metric name → value. `sharpe`, `maxDrawdown` and `winRate` drive gates and reflexion. */
  metrics: z.record(z.string(), z.number()),
  trades: z.number().int().min(0).optional(),
  range: z.object({ from: z.number(), to: z.number() }).optional(),
});

export const TestReportSchema = z.object({
  passed: z.boolean(),
  total: z.number().int().min(0),
  failed: z.number().int().min(0),
  failures: z.array(z.string()).default([]),
});

export const LintReportSchema = z.object({
  passed: z.boolean(),
  issues: z.array(z.string()).default([]),
});

export const VerificationReportSchema = z.object({
  passed: z.boolean(),
  violations: z.array(z.string()).default([]),
  parity: z.object({ checked: z.boolean(), passed: z.boolean() }).optional(),
});

export const StressReportSchema = z.object({
  passed: z.boolean(),
  scenarios: z.array(z.object({ name: z.string(), maxDrawdown: z.number() })).default([]),
});

export const CommitReceiptSchema = z.object({
  committedId: z.string().min(1),
});

export type StrategyParameters = z.infer<typeof StrategyParametersSchema>;
export type StrategyArtifact = z.infer<typeof StrategyArtifactSchema>;
export type BacktestReport = z.infer<typeof BacktestReportSchema>;
export type TestReport = z.infer<typeof TestReportSchema>;
export type LintReport = z.infer<typeof LintReportSchema>;
export type VerificationReport = z.infer<typeof VerificationReportSchema>;
export type StressReport = z.infer<typeof StressReportSchema>;
export type CommitReceipt = z.infer<typeof CommitReceiptSchema>;

export type RiskPreference = "conservative" | "moderate" | "aggressive";

// --- Tool requests ---

export interface GenerateStrategyRequest {
  goal: string;
  riskPreference: RiskPreference;
  /** Repaired parameters on a retry; empty on the first attempt. */
  parameters: StrategyParameters;
  /** Descriptions of the reflexion suggestions that led to this retry. */
  hints: string[];
}

export interface BacktestRequest {
  strategy: StrategyArtifact;
  data: TimeSeriesDataset;
  range?: TimeRange;
}

export interface ArtifactRequest {
  strategy: StrategyArtifact;
}

export interface VerifyRequest {
  strategy: StrategyArtifact;
  backtest: BacktestReport;
  maxDrawdownLimit: number;
}

export interface StressTestRequest {
  strategy: StrategyArtifact;
  maxDrawdownLimit: number;
}

export interface CommitRequest {
  strategy: StrategyArtifact;
  backtest: BacktestReport;
}

export interface ToolCallOptions {
  /** Aborted when the call exceeds `tools.timeoutMs`. */
  signal: AbortSignal;
}

/**
 * External collaborators. Implementations may reject with anything; the engine
 * converts every rejection into a recorded ToolInvocationError.
 */
export interface ToolInvoker {
  generateStrategy(req: GenerateStrategyRequest, opts: ToolCallOptions): Promise<StrategyArtifact>;
  backtest(req: BacktestRequest, opts: ToolCallOptions): Promise<BacktestReport>;
  runTests(req: ArtifactRequest, opts: ToolCallOptions): Promise<TestReport>;
  lint(req: ArtifactRequest, opts: ToolCallOptions): Promise<LintReport>;
  crvVerify(req: VerifyRequest, opts: ToolCallOptions): Promise<VerificationReport>;
  stressTest(req: StressTestRequest, opts: ToolCallOptions): Promise<StressReport>;
  commit(req: CommitRequest, opts: ToolCallOptions): Promise<CommitReceipt>;
}

export type ToolKind =
  | "generate_strategy"
  | "backtest"
  | "run_tests"
  | "lint"
  | "crv_verify"
  | "stress_test"
  | "commit";

export interface ToolRequests {
  generate_strategy: GenerateStrategyRequest;
  backtest: BacktestRequest;
  run_tests: ArtifactRequest;
  lint: ArtifactRequest;
  crv_verify: VerifyRequest;
  stress_test: StressTestRequest;
  commit: CommitRequest;
}

export interface ToolResults {
  generate_strategy: StrategyArtifact;
  backtest: BacktestReport;
  run_tests: TestReport;
  lint: LintReport;
  crv_verify: VerificationReport;
  stress_test: StressReport;
  commit: CommitReceipt;
}

export type ToolCallStatus = "ok" | "failed" | "timeout" | "skipped";

export interface ToolCallRecord {
  seq: number;
  kind: ToolKind;
  /** Identifiers only; datasets and artifacts are referenced, not copied. */
  input: Record<string, unknown>;
  output?: unknown;
  error?: { kind: string; errorClass?: string; message: string };
  status: ToolCallStatus;
  startedAt: string;
  durationMs: number;
}
