import type { z } from "zod";
import { formatZodErrors } from "./zod-helpers.js";

/**
 * Validates an environment map (process.env by default) against a zod schema.
 * Throws a single Error listing every offending variable.
 */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: Record<string, string | undefined> = process.env,
): z.output<T> {
  const result = schema.safeParse(source);
  if (!result.success) {
    throw new Error(`Invalid environment: ${formatZodErrors(result.error).join("; ")}`);
  }
  return result.data;
}
