/** `commit` is the synthetic result recorded when the commit tool fails after the product gate. */
export type GateName = "dev" | "product" | "commit";

/** Always complete: every check the gate ran appears in `checks`, in evaluation order. */
export interface GateResult {
  gate: GateName;
  passed: boolean;
  checks: Record<string, boolean>;
  details: Record<string, unknown>;
  errors: string[];
  /** Failed checks whose only cause was an unreachable tool (timeout, network, crash). */
  infrastructureFailures: string[];
  evaluatedAt: string;
}
