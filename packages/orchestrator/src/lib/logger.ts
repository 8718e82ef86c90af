import pino from "pino";
import { join } from "node:path";

/** Per-module log level overrides, set at runtime via setLogLevels() */
let logLevelOverrides: Readonly<Record<string, string>> = {};
const children = new Map<string, pino.Logger>();

function getBaseLevel(): string {
  return process.env.LOG_LEVEL ?? "info";
}

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const level = getBaseLevel();
  const targets: pino.TransportTargetOptions[] = [
    { target: "pino/file", level, options: { destination: 1 } },
  ];

  const logDir = process.env.LOG_DIR;
  if (logDir) {
    targets.push({
      target: "pino/file",
      level,
      options: { destination: join(logDir, "goalguard.ndjson"), mkdir: true },
    });
  }

  return pino({ level }, pino.transport({ targets }));
}

export const logger = createPinoLogger();

/**
 * Set per-module log level overrides (called by the CLI once the config is loaded).
 * Applies to child loggers already created at module load.
 */
export function setLogLevels(overrides: Readonly<Record<string, string>>): void {
  logLevelOverrides = overrides;
  for (const [module, child] of children) {
    child.level = overrides[module] ?? logger.level;
  }
}

/** Create a child logger with per-module log level from config */
export function createChildLogger(module: string): pino.Logger {
  const existing = children.get(module);
  if (existing) return existing;

  const child = logger.child({ module });
  const level = logLevelOverrides[module];
  if (level) {
    child.level = level;
  }
  children.set(module, child);
  return child;
}
