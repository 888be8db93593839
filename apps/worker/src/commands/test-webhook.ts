// apps/worker/src/commands/test-webhook.ts — `commitrelay test-webhook` command handler
import { Command } from "commander";
import { createLogger } from "@commitrelay/core";
import { createNotifier } from "@commitrelay/notifier";
import type { CommitNotifier } from "@commitrelay/notifier";
import { createSpinner } from "../ui/spinner.js";
import type { Spinner } from "../ui/spinner.js";
import { loadConfigOrExit } from "./run.js";

interface TestWebhookCommandOpts {
  config?: string;
}

/** Sends the connectivity test message. Resolves to the process exit code. */
export async function sendTestWebhook(
  notifier: Pick<CommitNotifier, "sendTestMessage">,
  spinner: Spinner,
): Promise<number> {
  spinner.start("Sending test message…");
  const result = await notifier.sendTestMessage();
  if (result.delivered) {
    spinner.succeed(`Test message delivered (HTTP ${result.status ?? 200})`);
    return 0;
  }
  spinner.fail(`Test message failed: ${result.error ?? "unknown error"}`);
  return 1;
}

export const testWebhookCommand = new Command("test-webhook")
  .description("Send a connectivity test message to the configured webhook.")
  .option("-c, --config <file>", "Path to commitrelay.yml")
  .action(async (opts: TestWebhookCommandOpts) => {
    const config = await loadConfigOrExit(opts.config);
    if (!config) return;

    const notifier = createNotifier(
      config,
      createLogger("notifier", { level: config.logLevel === "debug" ? "debug" : "silent" }),
    );
    process.exitCode = await sendTestWebhook(notifier, createSpinner());
  });
