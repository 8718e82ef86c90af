/** Returns fallback if value is missing, NaN or Infinity. Use for optional metric fields. */
export function finiteOr(value: number | null | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}
