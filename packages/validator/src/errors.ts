import { GoalGuardError } from "@goalguard/kit";

/** The dataset cannot support the requested number of non-degenerate windows. */
export class InsufficientDataError extends GoalGuardError {
  readonly kind = "insufficient_data";
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number, detail?: string) {
    super(
      `Insufficient data: ${required} rows required, ${available} available` +
        (detail ? ` (${detail})` : ""),
    );
    this.required = required;
    this.available = available;
  }
}

/** Timestamps are missing, non-finite or not strictly increasing. */
export class InvalidDatasetError extends GoalGuardError {
  readonly kind = "invalid_dataset";
}
