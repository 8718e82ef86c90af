import { roundTo } from "@goalguard/kit";
import { ConfigError } from "../lib/errors.js";
import { createChildLogger } from "../lib/logger.js";
import type { ScorecardConfig, ScorecardWeights } from "../types/config.js";

const log = createChildLogger("scorecard");

export interface WeightProfile {
  version: string;
  weights: ScorecardWeights;
}

/** Versioned default profiles. Changing a weight means adding a new version. */
export const WEIGHT_PROFILES: Readonly<Record<string, WeightProfile>> = {
  "drops-v1": {
    version: "drops-v1",
    weights: { determinism: 0.25, risk: 0.25, policy: 0.2, ops: 0.15, user: 0.15 },
  },
};

const COMPONENTS = ["determinism", "risk", "policy", "ops", "user"] as const;

/**
 * Resolves the configured profile, applying the tenant's override when one exists.
 * Overridden weights are normalised to sum to 1 and re-versioned as `<profile>+tenant`.
 */
export function resolveWeightProfile(config: ScorecardConfig, tenant?: string): WeightProfile {
  const base = WEIGHT_PROFILES[config.profile];
  if (!base) {
    throw new ConfigError(`Unknown scorecard profile "${config.profile}"`);
  }

  const override = tenant ? config.tenantOverrides[tenant] : undefined;
  if (!tenant || !override) return base;

  const merged: ScorecardWeights = { ...base.weights, ...override };
  const total = COMPONENTS.reduce((sum, c) => sum + merged[c], 0);
  if (total <= 0) {
    throw new ConfigError(`Tenant "${tenant}" weight override sums to zero`);
  }

  const weights: ScorecardWeights = {
    determinism: roundTo(merged.determinism / total, 6),
    risk: roundTo(merged.risk / total, 6),
    policy: roundTo(merged.policy / total, 6),
    ops: roundTo(merged.ops / total, 6),
    user: roundTo(merged.user / total, 6),
  };
  const version = `${base.version}+tenant`;
  log.warn({ tenant, profile: base.version, version, weights }, "Tenant weight override applied");
  return { version, weights };
}
