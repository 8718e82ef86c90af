import { describe, it, expect } from "vitest";
import { createWindows, windowTimeRange } from "./create-windows.js";
import { InsufficientDataError, InvalidDatasetError } from "../errors.js";
import { WalkForwardConfigSchema } from "../types/walk-forward.js";
import type { TimeSeriesDataset } from "../types/dataset.js";

const DAY = 86_400_000;
const T0 = Date.UTC(2024, 0, 1);
const DEFAULTS = WalkForwardConfigSchema.parse({});

function makeDataset(rows: number): TimeSeriesDataset {
  return { id: "test-series", timestamps: Array.from({ length: rows }, (_, i) => T0 + i * DAY) };
}

describe("createWindows", () => {
  it("splits 30 rows into three 70/30 windows", () => {
    expect(createWindows(makeDataset(30), DEFAULTS)).toEqual([
      { windowId: 0, trainStart: 0, trainEnd: 7, testStart: 7, testEnd: 10 },
      { windowId: 1, trainStart: 10, trainEnd: 17, testStart: 17, testEnd: 20 },
      { windowId: 2, trainStart: 20, trainEnd: 27, testStart: 27, testEnd: 30 },
    ]);
  });

  it.each([30, 31, 47, 100, 301])("returns ordered, non-overlapping windows for %i rows", (rows) => {
    const windows = createWindows(makeDataset(rows), DEFAULTS);
    expect(windows).toHaveLength(3);
    windows.forEach((w, i) => {
      expect(w.windowId).toBe(i);
      expect(w.testStart).toBe(w.trainEnd);
      expect(w.trainStart).toBeLessThan(w.trainEnd);
      expect(w.testStart).toBeLessThan(w.testEnd);
      expect(w.testEnd).toBeLessThanOrEqual(rows);
      if (i > 0) expect(w.trainStart).toBeGreaterThanOrEqual(windows[i - 1].testEnd);
    });
  });

  it("honours numWindows", () => {
    expect(createWindows(makeDataset(100), { ...DEFAULTS, numWindows: 5 })).toHaveLength(5);
  });

  it("throws InsufficientDataError with required and available counts", () => {
    expect(() => createWindows(makeDataset(29), DEFAULTS)).toThrow(InsufficientDataError);
    try {
      createWindows(makeDataset(29), DEFAULTS);
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientDataError);
      if (err instanceof InsufficientDataError) {
        expect(err.required).toBe(30);
        expect(err.available).toBe(29);
        expect(err.message).toBe("Insufficient data: 30 rows required, 29 available (3 windows of 10 rows)");
      }
    }
  });

  it("never silently returns fewer windows", () => {
    expect(() => createWindows(makeDataset(40), { ...DEFAULTS, numWindows: 5 })).toThrow(InsufficientDataError);
  });

  it("leaves a gap between train and test when configured", () => {
    const windows = createWindows(makeDataset(30), { ...DEFAULTS, trainRatio: 0.6, testRatio: 0.3, gapRows: 1 });
    expect(windows[0]).toEqual({ windowId: 0, trainStart: 0, trainEnd: 6, testStart: 7, testEnd: 10 });
    expect(windows[2]).toEqual({ windowId: 2, trainStart: 20, trainEnd: 26, testStart: 27, testEnd: 30 });
  });

  it("anchors every training range at row 0 in anchored mode", () => {
    const windows = createWindows(makeDataset(30), { ...DEFAULTS, mode: "anchored" });
    expect(windows.map((w) => w.trainStart)).toEqual([0, 0, 0]);
    expect(windows[1]).toEqual({ windowId: 1, trainStart: 0, trainEnd: 17, testStart: 17, testEnd: 20 });
  });

  it("returns frozen windows", () => {
    const windows = createWindows(makeDataset(30), DEFAULTS);
    expect(Object.isFrozen(windows)).toBe(true);
    expect(Object.isFrozen(windows[0])).toBe(true);
  });

  it("rejects timestamps that are not strictly increasing", () => {
    const dataset = makeDataset(30);
    const timestamps = [...dataset.timestamps];
    timestamps[12] = timestamps[11];
    expect(() => createWindows({ id: "dup", timestamps }, DEFAULTS)).toThrow(InvalidDatasetError);
  });
});

describe("windowTimeRange", () => {
  it("maps row ordinals to inclusive timestamps", () => {
    const dataset = makeDataset(30);
    const [first] = createWindows(dataset, DEFAULTS);
    expect(windowTimeRange(dataset, first)).toEqual({
      train: { from: T0, to: T0 + 6 * DAY },
      test: { from: T0 + 7 * DAY, to: T0 + 9 * DAY },
    });
  });

  it("rejects windows that run past the dataset", () => {
    const window = { windowId: 0, trainStart: 0, trainEnd: 7, testStart: 7, testEnd: 10 };
    expect(() => windowTimeRange(makeDataset(8), window)).toThrow(InvalidDatasetError);
  });
});
