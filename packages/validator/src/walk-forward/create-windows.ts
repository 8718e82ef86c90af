import { InsufficientDataError, InvalidDatasetError } from "../errors.js";
import type { TimeRange, TimeSeriesDataset } from "../types/dataset.js";
import type { WalkForwardWindow, WindowingConfig } from "../types/walk-forward.js";

// Guards floor() against representation error, e.g. 10 * 0.7 = 6.999...
const RATIO_EPSILON = 1e-9;
const MAX_SPAN_SEARCH = 1_000_000;

/**
 * Split a time-ordered dataset into `numWindows` sequential windows of equal
 * span. Within each span the first `trainRatio` rows train, then `gapRows`
 * are skipped, then `testRatio` rows test. Trailing rows that do not fill a
 * whole span are left out.
 *
 * @throws {InvalidDatasetError} timestamps are not strictly increasing
 * @throws {InsufficientDataError} fewer rows than the windows need
 */
export function createWindows(
  dataset: TimeSeriesDataset,
  config: WindowingConfig,
): readonly WalkForwardWindow[] {
  assertChronological(dataset);

  const available = dataset.timestamps.length;
  const perWindow = Math.max(config.minRowsPerWindow, smallestFeasibleSpan(config, 1));
  const required = config.numWindows * perWindow;
  if (available < required) {
    throw new InsufficientDataError(required, available, `${config.numWindows} windows of ${perWindow} rows`);
  }

  const span = Math.floor(available / config.numWindows);
  if (!isFeasibleSpan(span, config)) {
    const next = smallestFeasibleSpan(config, span);
    throw new InsufficientDataError(
      config.numWindows * next,
      available,
      `a ${span}-row window cannot hold train, gap and test rows`,
    );
  }

  const trainLen = segmentLength(span, config.trainRatio);
  const testLen = segmentLength(span, config.testRatio);

  const windows: WalkForwardWindow[] = [];
  for (let i = 0; i < config.numWindows; i++) {
    const start = i * span;
    const trainEnd = start + trainLen;
    const testStart = trainEnd + config.gapRows;
    windows.push(
      Object.freeze({
        windowId: i,
        trainStart: config.mode === "anchored" ? 0 : start,
        trainEnd,
        testStart,
        testEnd: testStart + testLen,
      }),
    );
  }
  return Object.freeze(windows);
}

/** Inclusive timestamp bounds for the train and test rows of a window. */
export function windowTimeRange(
  dataset: TimeSeriesDataset,
  window: WalkForwardWindow,
): { train: TimeRange; test: TimeRange } {
  const ts = dataset.timestamps;
  if (window.testEnd > ts.length) {
    throw new InvalidDatasetError(
      `Window ${window.windowId} ends at row ${window.testEnd} but dataset "${dataset.id}" has ${ts.length} rows`,
    );
  }
  return {
    train: { from: ts[window.trainStart], to: ts[window.trainEnd - 1] },
    test: { from: ts[window.testStart], to: ts[window.testEnd - 1] },
  };
}

function assertChronological(dataset: TimeSeriesDataset): void {
  const ts = dataset.timestamps;
  for (let i = 0; i < ts.length; i++) {
    if (!Number.isFinite(ts[i])) {
      throw new InvalidDatasetError(`Dataset "${dataset.id}" has a non-finite timestamp at row ${i}`);
    }
    if (i > 0 && ts[i] <= ts[i - 1]) {
      throw new InvalidDatasetError(
        `Dataset "${dataset.id}" timestamps must be strictly increasing (row ${i}: ${ts[i]} <= ${ts[i - 1]})`,
      );
    }
  }
}

function segmentLength(span: number, ratio: number): number {
  return Math.floor(span * ratio + RATIO_EPSILON);
}

function isFeasibleSpan(span: number, config: WindowingConfig): boolean {
  const trainLen = segmentLength(span, config.trainRatio);
  const testLen = segmentLength(span, config.testRatio);
  return trainLen >= 1 && testLen >= 1 && trainLen + config.gapRows + testLen <= span;
}

function smallestFeasibleSpan(config: WindowingConfig, from: number): number {
  for (let span = Math.max(1, from); span < from + MAX_SPAN_SEARCH; span++) {
    if (isFeasibleSpan(span, config)) return span;
  }
  return Number.POSITIVE_INFINITY;
}
