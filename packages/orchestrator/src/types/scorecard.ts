import { z } from "zod";
import type { ReadinessBand, ScorecardWeights } from "./config.js";

export const StartupStatusSchema = z.enum(["healthy", "degraded", "failed"]);

/** Evidence the scorecard is computed from. Missing booleans count against the strategy. */
export const ReadinessSignalsSchema = z.object({
  strategyId: z.string().default(""),
  runIdentityPresent: z.boolean().default(false),
  parityChecked: z.boolean().default(false),
  parityPassed: z.boolean().default(false),
  determinismPassed: z.boolean().default(false),
  validationPassed: z.boolean().default(false),
  crvAvailable: z.boolean().default(false),
  riskMetricsComplete: z.boolean().default(false),
  policyBlockReasons: z.array(z.string().min(1)).default([]),
  lineageComplete: z.boolean().default(false),
  startupStatus: StartupStatusSchema.default("healthy"),
  evidenceStale: z.boolean().default(false),
  maturityLabelVisible: z.boolean().default(false),
  contractMismatch: z.boolean().default(false),
});

export type StartupStatus = z.infer<typeof StartupStatusSchema>;
export type ReadinessSignals = z.infer<typeof ReadinessSignalsSchema>;

export type ScorecardComponent = keyof ScorecardWeights;
export type ScorecardComponents = Record<ScorecardComponent, number>;

export type ReadinessDecision = ReadinessBand | "BLOCKED";

export interface NextAction {
  rank: number;
  /** Blocker code or component name the action addresses. */
  target: string;
  action: string;
}

export interface ReadinessScorecard {
  strategyId: string;
  profileVersion: string;
  weights: ScorecardWeights;
  components: ScorecardComponents;
  score: number;
  band: ReadinessBand;
  decision: ReadinessDecision;
  blockers: string[];
  nextActions: NextAction[];
  recommendation: string;
}
