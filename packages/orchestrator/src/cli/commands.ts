import fs from "node:fs";
import { errorMessage, formatZodErrors } from "@goalguard/kit";
import {
  analyzeWindowResults,
  createWindows,
  TimeSeriesDatasetSchema,
  validate,
  windowTimeRange,
} from "@goalguard/validator";
import type { TimeRange, WalkForwardAnalysis, WalkForwardWindow } from "@goalguard/validator";
import { z } from "zod";
import { InvalidRequestError } from "../lib/errors.js";
import { computeScorecard } from "../scorecard/promotion-scorecard.js";
import type { GoalGuardConfig } from "../types/config.js";
import { ReadinessSignalsSchema } from "../types/scorecard.js";
import type { ReadinessScorecard } from "../types/scorecard.js";

const MetricMapSchema = z.record(z.string(), z.number());

/** Stored backtest metrics per window, keyed by window id. */
export const WindowMetricsFileSchema = z.object({
  dataset: TimeSeriesDatasetSchema,
  results: z.array(z.object({ windowId: z.number().int().min(0), train: MetricMapSchema, test: MetricMapSchema })),
});

export interface WindowRow extends WalkForwardWindow {
  train: TimeRange;
  test: TimeRange;
}

function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new InvalidRequestError(`Cannot load ${what} from ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidRequestError(`Invalid ${what} in ${filePath}: ${formatZodErrors(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

/** `goalguard windows <dataset.json>` */
export function windowsCommand(datasetPath: string, config: GoalGuardConfig): WindowRow[] {
  const dataset = readJsonFile(datasetPath, TimeSeriesDatasetSchema, "dataset");
  return createWindows(dataset, config.walkForward).map((w) => ({ ...w, ...windowTimeRange(dataset, w) }));
}

/** `goalguard scorecard <signals.json> [--tenant <id>]` */
export function scorecardCommand(
  signalsPath: string,
  config: GoalGuardConfig,
  opts: { tenant?: string } = {},
): ReadinessScorecard {
  const signals = readJsonFile(signalsPath, ReadinessSignalsSchema, "readiness signals");
  return computeScorecard(signals, config.scorecard, opts);
}

/**
 * `goalguard validate <results.json>`: re-creates the dataset's windows and
 * validates the stored per-window train/test metrics against them.
 */
export function validateCommand(resultsPath: string, config: GoalGuardConfig): WalkForwardAnalysis {
  const file = readJsonFile(resultsPath, WindowMetricsFileSchema, "window metrics");
  const windows = createWindows(file.dataset, config.walkForward);
  const byId = new Map(windows.map((w) => [w.windowId, w]));

  const results = file.results.flatMap((r) => {
    const window = byId.get(r.windowId);
    if (!window) {
      throw new InvalidRequestError(`Window ${r.windowId} does not exist; the dataset yields ${windows.length} windows`);
    }
    return [analyzeWindowResults(window, r.train, r.test, config.walkForward)];
  });
  return validate(windows, results, config.walkForward);
}
