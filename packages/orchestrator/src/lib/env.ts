import { z } from "zod";
import { parseEnv } from "@goalguard/kit";

export const EnvSchema = z.object({
  GOALGUARD_CONFIG: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parses the process environment. The CLI loads `.env` through `dotenv/config`
 * as its first import, so the logger sees LOG_LEVEL and LOG_DIR too.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  return parseEnv(EnvSchema, source);
}
