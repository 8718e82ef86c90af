import { roundTo } from "@goalguard/kit";
import type { MetricMap } from "@goalguard/validator";
import { stableHash } from "../lib/stable-hash.js";

/** Finite metrics only, rounded to 6 decimals. Key order is irrelevant after canonical hashing. */
export function normalizeMetrics(metrics: MetricMap): Record<string, number> {
  const normalized: Record<string, number> = {};
  for (const [key, value] of Object.entries(metrics)) {
    if (Number.isFinite(value)) normalized[key] = roundTo(value, 6);
  }
  return normalized;
}

/**
 * Deterministic score in [-2, 2]: first 8 hex digits of the stable hash of
 * (run id, normalized metrics), mod 401, shifted and scaled.
 */
export function improvementScore(runId: string, metrics: MetricMap): number {
  const digest = stableHash(runId, normalizeMetrics(metrics));
  const raw = Number.parseInt(digest.slice(0, 8), 16) % 401;
  return (raw - 200) / 100;
}
