/**
 * Shared test helpers: fake tool invoker, datasets and config.
 */
import { vi } from "vitest";
import type { Mock } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { TimeSeriesDataset } from "@goalguard/validator";
import { resolveConfig } from "./lib/config.js";
import { createGoalRun } from "./loop/goal-run.js";
import type { GoalGuardConfig } from "./types/config.js";
import type { GoalRequest, GoalRun } from "./types/run.js";
import type { BacktestReport, ToolInvoker } from "./types/tools.js";

export type FakeTools = { [K in keyof ToolInvoker]: Mock<ToolInvoker[K]> };

export const FIXED_NOW = new Date("2026-01-05T09:00:00.000Z");
export const fixedClock = (): Date => FIXED_NOW;

export const HEALTHY_METRICS = { sharpe: 1.8, maxDrawdown: 0.12, winRate: 0.56 } as const;

/** `rows` timestamps one minute apart. */
export function makeDataset(rows: number, id = "dataset-1"): TimeSeriesDataset {
  return { id, timestamps: Array.from({ length: rows }, (_, i) => 1_700_000_000_000 + i * 60_000) };
}

export function makeBacktest(strategyId = "strat-1", metrics: Record<string, number> = HEALTHY_METRICS): BacktestReport {
  return { strategyId, metrics: { ...metrics } };
}

/** Every tool succeeds with a healthy report; backtests are deterministic per request. */
export function createFakeTools(): FakeTools {
  return {
    generateStrategy: vi.fn<ToolInvoker["generateStrategy"]>(async (req) => ({
      id: "strat-1",
      name: "Momentum v1",
      parameters: { lookback: 20, positionSize: 1, ...req.parameters },
    })),
    backtest: vi.fn<ToolInvoker["backtest"]>(async (req) => ({
      strategyId: req.strategy.id,
      metrics: { ...HEALTHY_METRICS },
      ...(req.range ? { range: req.range } : {}),
    })),
    runTests: vi.fn<ToolInvoker["runTests"]>(async () => ({ passed: true, total: 12, failed: 0, failures: [] })),
    lint: vi.fn<ToolInvoker["lint"]>(async () => ({ passed: true, issues: [] })),
    crvVerify: vi.fn<ToolInvoker["crvVerify"]>(async () => ({
      passed: true,
      violations: [],
      parity: { checked: true, passed: true },
    })),
    stressTest: vi.fn<ToolInvoker["stressTest"]>(async () => ({
      passed: true,
      scenarios: [{ name: "flash-crash", maxDrawdown: 0.18 }],
    })),
    commit: vi.fn<ToolInvoker["commit"]>(async () => ({ committedId: "commit-1" })),
  };
}

export function testConfig(raw: unknown = {}): GoalGuardConfig {
  return resolveConfig(raw);
}

export function makeRequest(overrides: Partial<GoalRequest> = {}): GoalRequest {
  return {
    id: "run-1",
    goal: "Trend-following strategy with Sharpe above 1",
    riskPreference: "moderate",
    data: makeDataset(60),
    ...overrides,
  };
}

export function makeRun(overrides: Partial<GoalRequest> = {}, config: GoalGuardConfig = testConfig()): GoalRun {
  return createGoalRun(makeRequest(overrides), config, fixedClock);
}

/**
 * Creates a temp dir, runs fn, cleans up in finally.
 */
export async function withTmpDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "goalguard-test-"));
  try {
    await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
