import { z } from "zod";
import { WalkForwardConfigSchema } from "@goalguard/validator";

// --- Zod Schemas ---

export const ReadinessBandSchema = z.enum(["GREEN", "AMBER", "RED"]);

export const GatesConfigSchema = z.object({
  enableWalkForward: z.boolean().default(false),
  enableStressTest: z.boolean().default(true),
  enablePromotionScorecard: z.boolean().default(true),
  // lowest scorecard band the product gate accepts
  minPromotionBand: ReadinessBandSchema.default("AMBER"),
  maxDrawdownLimit: z.number().gt(0).max(1).default(0.25),
  determinismRuns: z.number().int().min(2).max(10).default(3),
});

export const ReflexionConfigSchema = z.object({
  maxRetries: z.number().int().min(1).default(3),
  maxSuggestions: z.number().int().min(1).default(5),
  sharpeHigh: z.number().default(0.5),
  sharpeMedium: z.number().default(1.0),
  minWinRate: z.number().min(0).max(1).default(0.45),
});

export const ScorecardWeightsSchema = z.object({
  determinism: z.number().min(0),
  risk: z.number().min(0),
  policy: z.number().min(0),
  ops: z.number().min(0),
  user: z.number().min(0),
});

export const ScorecardConfigSchema = z
  .object({
    profile: z.string().min(1).default("drops-v1"),
    bands: z
      .object({
        green: z.number().min(0).max(100).default(85),
        amber: z.number().min(0).max(100).default(70),
      })
      .default({}),
    tenantOverrides: z.record(z.string(), ScorecardWeightsSchema.partial()).default({}),
  })
  .refine((s) => s.bands.green >= s.bands.amber, {
    message: "bands.green must be >= bands.amber",
    path: ["bands", "green"],
  });

export const ToolsConfigSchema = z.object({
  timeoutMs: z.number().int().min(1).default(300_000),
});

export const GoalGuardConfigSchema = z.object({
  walkForward: WalkForwardConfigSchema.default({}),
  gates: GatesConfigSchema.default({}),
  reflexion: ReflexionConfigSchema.default({}),
  scorecard: ScorecardConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  logLevels: z.record(z.string(), z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])).default({}),
});

// --- TypeScript types (inferred from Zod) ---

export type ReadinessBand = z.infer<typeof ReadinessBandSchema>;
export type GatesConfig = z.infer<typeof GatesConfigSchema>;
export type ReflexionConfig = z.infer<typeof ReflexionConfigSchema>;
export type ScorecardWeights = z.infer<typeof ScorecardWeightsSchema>;
export type ScorecardConfig = z.infer<typeof ScorecardConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type GoalGuardConfig = z.infer<typeof GoalGuardConfigSchema>;
