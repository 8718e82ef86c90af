/** Message text of anything thrown; non-Error values are stringified. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
