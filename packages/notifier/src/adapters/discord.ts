import { DeliveryFailedError, errorMessage } from "@commitrelay/core";
import type { WebhookAdapter, WebhookMessage } from "../types.js";

// ---------------------------------------------------------------------------
// Discord webhook settings
// ---------------------------------------------------------------------------

export interface DiscordWebhookSettings {
  url: string;
  /** Timeout in milliseconds (default: 10_000) */
  timeoutMs?: number | undefined;
}

// ---------------------------------------------------------------------------
// Discord webhook adapter — one POST per message, no retries
// ---------------------------------------------------------------------------

export class DiscordWebhookAdapter implements WebhookAdapter {
  constructor(private readonly settings: DiscordWebhookSettings) {}

  async send(message: WebhookMessage): Promise<{ status: number }> {
    const timeoutMs = this.settings.timeoutMs ?? 10_000;

    let response: Response;
    try {
      response = await fetch(this.settings.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(message),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new DeliveryFailedError(`Webhook unreachable: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new DeliveryFailedError(`Webhook returned HTTP ${response.status}`, {
        status: response.status,
      });
    }

    return { status: response.status };
  }
}
