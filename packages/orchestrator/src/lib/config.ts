import fs from "node:fs";
import { deepFreeze, errorMessage, formatZodErrors } from "@goalguard/kit";
import { GoalGuardConfigSchema } from "../types/config.js";
import type { GoalGuardConfig } from "../types/config.js";
import { ConfigError } from "./errors.js";

/**
 * Validates a raw configuration object, applies defaults and freezes the result.
 * The frozen object is the only state shared between concurrent runs.
 */
export function resolveConfig(raw: unknown = {}): GoalGuardConfig {
  const result = GoalGuardConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodErrors(result.error).join("; ")}`);
  }
  return deepFreeze(result.data);
}

/** Loads and validates a goalguard JSON config file. */
export function loadConfig(configPath: string): GoalGuardConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config ${configPath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
  return resolveConfig(json);
}
