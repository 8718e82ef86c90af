/**
 * Base for every error the engine raises or records. `kind` is the stable
 * taxonomy tag carried into audit records and user-facing outcomes.
 */
export abstract class GoalGuardError extends Error {
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { kind: string; message: string } {
    return { kind: this.kind, message: this.message };
  }
}
