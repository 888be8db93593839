// apps/worker/src/commands/run.ts — `commitrelay run` command handler
import { Command } from "commander";
import pc from "picocolors";
import {
  ConfigurationError,
  createLogger,
  errorMessage,
  formatTarget,
  loadConfig,
} from "@commitrelay/core";
import type { RelayConfig } from "@commitrelay/core";
import { createRuntime } from "../runtime.js";
import { printCycleReport } from "../output/summary.js";
import type { CommitPoller } from "../poller.js";

interface RunCommandOpts {
  config?: string;
  once?: boolean;
}

/** Loads configuration, reporting problems on stderr. Undefined means exit. */
export async function loadConfigOrExit(
  configPath: string | undefined,
): Promise<RelayConfig | undefined> {
  try {
    return await loadConfig({ configPath });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(pc.red(err.message));
      process.exitCode = 2;
      return undefined;
    }
    throw err;
  }
}

/** One cycle for `run --once`. Resolves to the process exit code. */
export async function runOnce(poller: Pick<CommitPoller, "prepare" | "runCycle">): Promise<number> {
  await poller.prepare();
  const report = await poller.runCycle();
  printCycleReport(report);
  return report.repos.some((r) => r.status === "failed") ? 1 : 0;
}

export const runCommand = new Command("run")
  .description("Poll the configured repositories and relay new commits to the webhook.")
  .option("-c, --config <file>", "Path to commitrelay.yml")
  .option("--once", "Run a single cycle and exit")
  .action(async (opts: RunCommandOpts) => {
    const config = await loadConfigOrExit(opts.config);
    if (!config) return;

    const logger = createLogger("worker", { level: config.logLevel });
    const { poller } = createRuntime(config, logger);

    logger.info("Starting commitrelay");
    logger.info(`Config file: ${config.configFile ?? "(environment only)"}`);
    logger.info(`Tracking: ${config.repositories.map(formatTarget).join(", ")}`);
    logger.info(`Poll interval: ${config.pollIntervalMs / 1000}s`);
    logger.info(`State file: ${config.statePath}`);
    logger.info(`GitHub auth: ${config.github.token ? "token" : "anonymous"}`);
    logger.info(`Title style: ${config.titleStyle}`);
    logger.info(`Role mentions: ${config.roleIds.length}`);
    logger.info(`Init notification: ${config.notifyOnInit}`);

    try {
      if (opts.once) {
        process.exitCode = await runOnce(poller);
        return;
      }

      const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down…`);
        poller.stop();
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));

      await poller.start();
    } catch (err) {
      logger.error(`Fatal: ${errorMessage(err)}`, err);
      process.exitCode = 1;
    }
  });
