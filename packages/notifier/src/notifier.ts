import {
  DeliveryFailedError,
  errorMessage,
  formatTarget,
  silentLogger,
} from "@commitrelay/core";
import type { Logger, RelayConfig, RepoTarget } from "@commitrelay/core";
import type { Commit, RepoInfo } from "@commitrelay/watcher";
import { DiscordWebhookAdapter } from "./adapters/discord.js";
import {
  buildCommitMessage,
  buildInitializedMessage,
  buildTestMessage,
  shortSha,
  splitMessage,
} from "./format.js";
import type {
  DeliveryResult,
  FormatOptions,
  WebhookAdapter,
  WebhookMessage,
} from "./types.js";

// ---------------------------------------------------------------------------
// CommitNotifier — formats commits and hands them to the webhook adapter.
// Delivery failures are logged and reported, never thrown.
// ---------------------------------------------------------------------------

export class CommitNotifier {
  private readonly logger: Logger;

  constructor(
    private readonly adapter: WebhookAdapter,
    private readonly options: FormatOptions,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  async notify(commit: Commit, info?: RepoInfo): Promise<DeliveryResult> {
    const message = buildCommitMessage(commit, this.options, info);
    const label = `${shortSha(commit.sha)} in ${formatTarget(commit)}`;
    this.logger.info(`Sending commit ${label}: ${splitMessage(commit.message).subject}`, {
      sha: commit.sha,
      url: commit.url,
    });
    return this.deliver(message, `commit ${label}`);
  }

  async notifyInitialized(
    target: RepoTarget,
    historical: number,
    info?: RepoInfo,
  ): Promise<DeliveryResult> {
    const message = buildInitializedMessage(target, historical, this.options, info);
    return this.deliver(message, `initialization notice for ${formatTarget(target)}`);
  }

  async sendTestMessage(at: Date = new Date()): Promise<DeliveryResult> {
    return this.deliver(buildTestMessage(this.options, at), "connectivity test");
  }

  private async deliver(message: WebhookMessage, what: string): Promise<DeliveryResult> {
    try {
      const { status } = await this.adapter.send(message);
      this.logger.debug(`Delivered ${what} (HTTP ${status})`);
      return { delivered: true, status };
    } catch (err) {
      if (err instanceof DeliveryFailedError) {
        this.logger.error(`Delivery failed for ${what}`, err);
        return { delivered: false, status: err.status, error: err.message };
      }
      this.logger.error(`Delivery failed for ${what}: ${errorMessage(err)}`);
      return { delivered: false, error: errorMessage(err) };
    }
  }
}

// ---------------------------------------------------------------------------
// Factory — builds the notifier from loaded configuration
// ---------------------------------------------------------------------------

export function formatOptionsFromConfig(config: RelayConfig): FormatOptions {
  return {
    titleStyle: config.titleStyle,
    embedColor: config.embedColor,
    roleIds: config.roleIds,
    messageLength: config.messageLength,
    username: config.webhook.username,
    avatarUrl: config.webhook.avatarUrl,
  };
}

export function createNotifier(config: RelayConfig, logger?: Logger): CommitNotifier {
  const adapter = new DiscordWebhookAdapter({
    url: config.webhook.url,
    timeoutMs: config.webhook.timeoutMs,
  });
  return new CommitNotifier(adapter, formatOptionsFromConfig(config), logger);
}
