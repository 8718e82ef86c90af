#!/usr/bin/env node
/**
 * goalguard CLI: offline inspection of walk-forward windows, stored validation
 * results and readiness scorecards.
 *
 * Usage: goalguard windows dataset.json [--config goalguard.json]
 */
import "dotenv/config";
import { cac } from "cac";
import { isMainModule } from "@goalguard/kit";
import { scorecardCommand, validateCommand, windowsCommand } from "./cli/commands.js";
import { loadConfig, resolveConfig } from "./lib/config.js";
import { loadEnv } from "./lib/env.js";
import { createChildLogger, setLogLevels } from "./lib/logger.js";
import type { GoalGuardConfig } from "./types/config.js";

const log = createChildLogger("cli");

function configFrom(path: string | undefined): GoalGuardConfig {
  const config = path ? loadConfig(path) : resolveConfig();
  setLogLevels(config.logLevels);
  return config;
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const env = loadEnv();
  const cli = cac("goalguard");
  cli.option("--config <path>", "Config JSON file (defaults to $GOALGUARD_CONFIG)");

  cli
    .command("windows <dataset>", "Print the walk-forward windows of a dataset")
    .action((dataset: string, options: { config?: string }) => {
      print(windowsCommand(dataset, configFrom(options.config ?? env.GOALGUARD_CONFIG)));
    });

  cli
    .command("scorecard <signals>", "Score readiness signals")
    .option("--tenant <id>", "Apply the tenant's weight override")
    .action((signals: string, options: { config?: string; tenant?: string }) => {
      const config = configFrom(options.config ?? env.GOALGUARD_CONFIG);
      print(scorecardCommand(signals, config, { tenant: options.tenant }));
    });

  cli
    .command("validate <results>", "Validate stored per-window backtest metrics")
    .action((results: string, options: { config?: string }) => {
      const analysis = validateCommand(results, configFrom(options.config ?? env.GOALGUARD_CONFIG));
      print(analysis);
      if (!analysis.passed) process.exitCode = 2;
    });

  cli.help();
  cli.parse(argv, { run: false });
  if (!cli.matchedCommand) {
    // cac has already printed help for --help
    if (!cli.options.help) cli.outputHelp();
    return;
  }
  await cli.runMatchedCommand();
}

if (isMainModule(import.meta.url)) {
  main().catch((err: unknown) => {
    log.error({ err }, "goalguard failed");
    process.exitCode = 1;
  });
}
