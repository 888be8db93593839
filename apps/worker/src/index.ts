#!/usr/bin/env node
// apps/worker — commitrelay entry point
import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { runCommand } from "./commands/run.js";
import { testWebhookCommand } from "./commands/test-webhook.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  try {
    const pkg = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf8")) as {
      version?: string;
    };
    return pkg.version ?? "0.0.0";
  } catch {
    // Fall back to "0.0.0" if package.json is unreadable
    return "0.0.0";
  }
}

const program = new Command();

program
  .name("commitrelay")
  .description("Relay new commits from GitHub repositories to a Discord webhook.")
  .version(readVersion(), "-v, --version");

program.addCommand(runCommand, { isDefault: true });
program.addCommand(testWebhookCommand);

await program.parseAsync();
