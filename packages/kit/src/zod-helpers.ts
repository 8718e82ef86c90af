import type { z } from "zod";

/** Flattens zod issues into "path: message" lines; root-level issues are reported under "(root)". */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}
