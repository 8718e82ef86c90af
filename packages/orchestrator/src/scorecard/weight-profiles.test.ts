import { describe, it, expect } from "vitest";
import { ConfigError } from "../lib/errors.js";
import { testConfig } from "../test-helpers.js";
import { WEIGHT_PROFILES, resolveWeightProfile } from "./weight-profiles.js";

const scorecardConfig = (raw: unknown) => testConfig({ scorecard: raw }).scorecard;

describe("resolveWeightProfile", () => {
  it("returns the base profile without a tenant override", () => {
    const config = scorecardConfig({ tenantOverrides: { acme: { user: 0.5 } } });

    expect(resolveWeightProfile(config)).toBe(WEIGHT_PROFILES["drops-v1"]);
    expect(resolveWeightProfile(config, "globex")).toBe(WEIGHT_PROFILES["drops-v1"]);
  });

  it("normalises an override and re-versions the profile", () => {
    const config = scorecardConfig({ tenantOverrides: { acme: { determinism: 0.5 } } });

    expect(resolveWeightProfile(config, "acme")).toEqual({
      version: "drops-v1+tenant",
      weights: { determinism: 0.4, risk: 0.2, policy: 0.16, ops: 0.12, user: 0.12 },
    });
  });

  it("rejects an unknown profile", () => {
    expect(() => resolveWeightProfile(scorecardConfig({ profile: "drops-v9" }))).toThrow(
      new ConfigError('Unknown scorecard profile "drops-v9"'),
    );
  });

  it("rejects an override whose weights sum to zero", () => {
    const config = scorecardConfig({
      tenantOverrides: { zero: { determinism: 0, risk: 0, policy: 0, ops: 0, user: 0 } },
    });
    expect(() => resolveWeightProfile(config, "zero")).toThrow('Tenant "zero" weight override sums to zero');
  });
});
