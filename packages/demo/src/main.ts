#!/usr/bin/env node
/**
 * @nestlock/demo — CLI entry point.
 *
 *   nestlock-demo [scenario.json ...]
 *
 * Runs each scenario file (or every bundled scenario when none is
 * given) and prints a report per scenario. Structured lock events go
 * to stderr through pino; the report goes to stdout. Exits non-zero
 * when any scenario does not match its expectations.
 */

import chalk from "chalk";
import pino from "pino";
import type { LockLogEntry } from "@nestlock/lock";
import { loadConfig } from "./config.js";
import { listScenarioFiles, loadScenarioFile } from "./load.js";
import { renderReport } from "./report.js";
import { runScenario } from "./runner.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger =
    config.NODE_ENV === "development"
      ? pino({
          level: config.LOG_LEVEL,
          transport: { target: "pino-pretty", options: { destination: 2 } },
        })
      : pino({ level: config.LOG_LEVEL }, pino.destination(2));

  const log = (entry: LockLogEntry): void => {
    if (entry.event === "lock.rolled_back" || entry.event === "lock.callback_rejected") {
      logger.warn(entry, entry.event);
    } else {
      logger.debug(entry, entry.event);
    }
  };

  const args = process.argv.slice(2);
  const files = args.length > 0 ? args : await listScenarioFiles();
  logger.info({ count: files.length, managerId: config.MANAGER_ID }, "Running scenarios");

  let failed = 0;
  for (const file of files) {
    const scenario = await loadScenarioFile(file);
    const report = runScenario(scenario, { config, log });

    console.log();
    for (const line of renderReport(report)) {
      console.log(line);
    }

    if (!report.passed) {
      failed++;
      logger.error({ file, failures: report.failures }, "Scenario failed");
    }
  }

  console.log();
  const summary = `  ${String(files.length - failed)}/${String(files.length)} scenario(s) passed`;
  console.log(failed === 0 ? chalk.green.bold(summary) : chalk.red.bold(summary));

  if (failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red("\n  nestlock-demo failed:"), err);
  process.exit(1);
});
