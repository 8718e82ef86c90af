import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { InvalidRequestError } from "../lib/errors.js";
import { makeDataset, testConfig, withTmpDir } from "../test-helpers.js";
import { scorecardCommand, validateCommand, windowsCommand } from "./commands.js";

function writeJson(dir: string, name: string, value: unknown): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(value));
  return file;
}

const READY_SIGNALS = {
  strategyId: "strat-1",
  runIdentityPresent: true,
  parityChecked: true,
  parityPassed: true,
  determinismPassed: true,
  validationPassed: true,
  crvAvailable: true,
  riskMetricsComplete: true,
  lineageComplete: true,
  maturityLabelVisible: true,
};

describe("windowsCommand", () => {
  it("prints row spans with their timestamp ranges", async () => {
    await withTmpDir(async (dir) => {
      const file = writeJson(dir, "dataset.json", makeDataset(30));

      const rows = windowsCommand(file, testConfig());

      expect(rows).toHaveLength(3);
      expect(rows[0]).toEqual({
        windowId: 0,
        trainStart: 0,
        trainEnd: 7,
        testStart: 7,
        testEnd: 10,
        train: { from: 1_700_000_000_000, to: 1_700_000_360_000 },
        test: { from: 1_700_000_420_000, to: 1_700_000_540_000 },
      });
    });
  });

  it("rejects a file that is not JSON", async () => {
    await withTmpDir(async (dir) => {
      const file = path.join(dir, "dataset.json");
      fs.writeFileSync(file, "not json");

      expect(() => windowsCommand(file, testConfig())).toThrow(InvalidRequestError);
      expect(() => windowsCommand(file, testConfig())).toThrow(/^Cannot load dataset from /);
    });
  });

  it("rejects a dataset that fails the schema", async () => {
    await withTmpDir(async (dir) => {
      const file = writeJson(dir, "dataset.json", { id: "d", timestamps: "yesterday" });
      expect(() => windowsCommand(file, testConfig())).toThrow(`Invalid dataset in ${file}: `);
    });
  });
});

describe("scorecardCommand", () => {
  it("blocks a run with no evidence", async () => {
    await withTmpDir(async (dir) => {
      const card = scorecardCommand(writeJson(dir, "signals.json", {}), testConfig());

      expect(card.components).toEqual({ determinism: 20, risk: 0, policy: 70, ops: 100, user: 50 });
      expect(card.score).toBe(41.5);
      expect(card.band).toBe("RED");
      expect(card.decision).toBe("BLOCKED");
      expect(card.blockers).toEqual(["missing_run_identity", "lineage_incomplete"]);
    });
  });

  it("applies the tenant's normalised weights", async () => {
    await withTmpDir(async (dir) => {
      const config = testConfig({ scorecard: { tenantOverrides: { acme: { determinism: 0.5 } } } });

      const card = scorecardCommand(writeJson(dir, "signals.json", READY_SIGNALS), config, { tenant: "acme" });

      expect(card.profileVersion).toBe("drops-v1+tenant");
      expect(card.weights).toEqual({ determinism: 0.4, risk: 0.2, policy: 0.16, ops: 0.12, user: 0.12 });
      expect(card.decision).toBe("GREEN");
      expect(card.score).toBe(100);
    });
  });
});

describe("validateCommand", () => {
  const dataset = makeDataset(30);

  it("validates stored window metrics", async () => {
    await withTmpDir(async (dir) => {
      const file = writeJson(dir, "results.json", {
        dataset,
        results: [0, 1, 2].map((windowId) => ({ windowId, train: { sharpe: 2 }, test: { sharpe: 1.5 } })),
      });

      const analysis = validateCommand(file, testConfig());

      expect(analysis.passed).toBe(true);
      expect(analysis.avgDegradation).toBe(0.25);
      expect(analysis.failureReasons).toEqual([]);
    });
  });

  it("reports windows without stored metrics", async () => {
    await withTmpDir(async (dir) => {
      const file = writeJson(dir, "results.json", {
        dataset,
        results: [{ windowId: 0, train: { sharpe: 2 }, test: { sharpe: 1.5 } }],
      });

      const analysis = validateCommand(file, testConfig());

      expect(analysis.passed).toBe(false);
      expect(analysis.failureReasons).toEqual(["window 1: no result", "window 2: no result"]);
    });
  });

  it("rejects an unknown window id", async () => {
    await withTmpDir(async (dir) => {
      const file = writeJson(dir, "results.json", {
        dataset,
        results: [{ windowId: 5, train: { sharpe: 2 }, test: { sharpe: 1.5 } }],
      });

      expect(() => validateCommand(file, testConfig())).toThrow("Window 5 does not exist; the dataset yields 3 windows");
    });
  });
});
