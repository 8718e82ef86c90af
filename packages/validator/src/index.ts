export type { TimeSeriesDataset, TimeRange } from "./types/dataset.js";
export { TimeSeriesDatasetSchema } from "./types/dataset.js";
export type {
  WalkForwardMode,
  WalkForwardConfig,
  WindowingConfig,
  OverfitCriteria,
  MetricMap,
  WalkForwardWindow,
  WalkForwardResult,
  WalkForwardAnalysis,
} from "./types/walk-forward.js";
export { WalkForwardConfigSchema, WalkForwardModeSchema } from "./types/walk-forward.js";

export { InsufficientDataError, InvalidDatasetError } from "./errors.js";

export { createWindows, windowTimeRange } from "./walk-forward/create-windows.js";
export { analyzeWindowResults, SHARPE_KEY } from "./walk-forward/analyze-window.js";
export { validate } from "./walk-forward/validate.js";
