import { z } from "zod";

export const WalkForwardModeSchema = z.enum(["rolling", "anchored"]);

export const WalkForwardConfigSchema = z
  .object({
    trainRatio: z.number().gt(0).lt(1).default(0.7),
    testRatio: z.number().gt(0).lt(1).default(0.3),
    numWindows: z.number().int().min(1).default(3),
    minRowsPerWindow: z.number().int().min(2).default(10),
    // rolling = fixed-size windows; anchored = training range always starts at row 0
    mode: WalkForwardModeSchema.default("rolling"),
    // rows skipped between train and test inside a window (lookahead buffer)
    gapRows: z.number().int().min(0).default(0),
    maxDegradation: z.number().min(0).default(0.3),
    minTestSharpe: z.number().default(0.5),
  })
  .refine((c) => c.trainRatio + c.testRatio <= 1 + 1e-9, {
    message: "trainRatio + testRatio must not exceed 1",
    path: ["testRatio"],
  });

export type WalkForwardMode = z.infer<typeof WalkForwardModeSchema>;
export type WalkForwardConfig = z.infer<typeof WalkForwardConfigSchema>;

export type WindowingConfig = Pick<
  WalkForwardConfig,
  "trainRatio" | "testRatio" | "numWindows" | "minRowsPerWindow" | "mode" | "gapRows"
>;

export type OverfitCriteria = Pick<WalkForwardConfig, "maxDegradation" | "minTestSharpe">;

/** Metric name → value, as reported by the backtest tool (e.g. `sharpe`, `maxDrawdown`). */
export type MetricMap = Readonly<Record<string, number>>;

/** Row ordinals, end-exclusive. `testStart === trainEnd` unless a gap is configured. */
export interface WalkForwardWindow {
  readonly windowId: number;
  readonly trainStart: number;
  readonly trainEnd: number;
  readonly testStart: number;
  readonly testEnd: number;
}

export interface WalkForwardResult {
  readonly windowId: number;
  readonly trainStats: MetricMap;
  readonly testStats: MetricMap;
  readonly degradation: number;
  readonly isOverfitting: boolean;
}

export interface WalkForwardAnalysis {
  readonly results: readonly WalkForwardResult[];
  readonly avgTrainSharpe: number;
  readonly avgTestSharpe: number;
  readonly avgDegradation: number;
  readonly stabilityScore: number;
  readonly passed: boolean;
  readonly failureReasons: readonly string[];
}
