import type { WalkForwardAnalysis } from "@goalguard/validator";
import type { GateResult } from "../types/gate.js";
import type { ReflexionRecord } from "../types/reflexion.js";
import type { GoalRun } from "../types/run.js";
import type { ReadinessScorecard } from "../types/scorecard.js";

export type ArtifactRecord =
  | { kind: "walk_forward_analysis"; runId: string; payload: WalkForwardAnalysis }
  | { kind: "gate_result"; runId: string; payload: GateResult }
  | { kind: "readiness_scorecard"; runId: string; payload: ReadinessScorecard }
  | { kind: "reflexion"; runId: string; payload: ReflexionRecord }
  | { kind: "goal_run"; runId: string; payload: GoalRun };

export type ArtifactKind = ArtifactRecord["kind"];

export const ARTIFACT_KINDS = [
  "walk_forward_analysis",
  "gate_result",
  "readiness_scorecard",
  "reflexion",
  "goal_run",
] as const satisfies readonly ArtifactKind[];

/** A stored record as read back; payloads are opaque once they leave the process. */
export interface StoredArtifact {
  id: string;
  seq: number;
  storedAt: string;
  record: { kind: ArtifactKind; runId: string; payload: unknown };
}

/** Audit sink for structured records. The engine defines record shapes, not storage. */
export interface ArtifactStore {
  /** Resolves to the stored record's id. */
  put(record: ArtifactRecord): Promise<string>;
  list(runId: string): Promise<StoredArtifact[]>;
}

/** `<runId>/<seq>-<kind>`, seq zero-padded so lexical order is insertion order. */
export function artifactId(runId: string, seq: number, kind: ArtifactKind): string {
  return `${runId}/${String(seq).padStart(4, "0")}-${kind}`;
}
