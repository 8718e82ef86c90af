import { describe, it, expect } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { withTmpDir } from "../test-helpers.js";
import { ConfigError } from "./errors.js";
import { loadConfig, resolveConfig } from "./config.js";

describe("resolveConfig", () => {
  it("applies every default", () => {
    const config = resolveConfig();
    expect(config.walkForward).toEqual({
      trainRatio: 0.7,
      testRatio: 0.3,
      numWindows: 3,
      minRowsPerWindow: 10,
      mode: "rolling",
      gapRows: 0,
      maxDegradation: 0.3,
      minTestSharpe: 0.5,
    });
    expect(config.gates.enableWalkForward).toBe(false);
    expect(config.gates.maxDrawdownLimit).toBe(0.25);
    expect(config.reflexion.maxRetries).toBe(3);
    expect(config.scorecard.profile).toBe("drops-v1");
    expect(config.scorecard.bands).toEqual({ green: 85, amber: 70 });
    expect(config.tools.timeoutMs).toBe(300_000);
  });

  it("returns a frozen object graph", () => {
    const config = resolveConfig({ gates: { enableWalkForward: true } });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.gates)).toBe(true);
    expect(config.gates.enableWalkForward).toBe(true);
  });

  it("reports every invalid field in one ConfigError", () => {
    expect(() => resolveConfig({ walkForward: { numWindows: 0 }, reflexion: { maxRetries: "3" } })).toThrow(
      new ConfigError(
        "Invalid configuration: walkForward.numWindows: Number must be greater than or equal to 1; reflexion.maxRetries: Expected number, received string",
      ),
    );
  });

  it("rejects train and test ratios that overlap", () => {
    expect(() => resolveConfig({ walkForward: { trainRatio: 0.8, testRatio: 0.3 } })).toThrow(
      "walkForward.testRatio: trainRatio + testRatio must not exceed 1",
    );
  });

  it("rejects an amber band above the green band", () => {
    expect(() => resolveConfig({ scorecard: { bands: { green: 60, amber: 70 } } })).toThrow(
      "scorecard.bands.green: bands.green must be >= bands.amber",
    );
  });
});

describe("loadConfig", () => {
  it("reads and validates a JSON file", async () => {
    await withTmpDir(async (dir) => {
      const file = path.join(dir, "goalguard.json");
      fs.writeFileSync(file, JSON.stringify({ reflexion: { maxRetries: 5 } }));
      expect(loadConfig(file).reflexion.maxRetries).toBe(5);
    });
  });

  it("wraps unreadable and malformed files in ConfigError", async () => {
    await withTmpDir(async (dir) => {
      expect(() => loadConfig(path.join(dir, "missing.json"))).toThrow(ConfigError);

      const file = path.join(dir, "broken.json");
      fs.writeFileSync(file, "{ not json");
      expect(() => loadConfig(file)).toThrow(/is not valid JSON/);
    });
  });
});
