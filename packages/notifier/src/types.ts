import type { TitleStyle } from "@commitrelay/core";

// ---------------------------------------------------------------------------
// Webhook payload — Discord "execute webhook" body
// ---------------------------------------------------------------------------

export interface EmbedAuthor {
  name: string;
  url?: string | undefined;
  icon_url?: string | undefined;
}

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean | undefined;
}

export interface Embed {
  title: string;
  url?: string | undefined;
  description?: string | undefined;
  color?: number | undefined;
  timestamp?: string | undefined;
  author?: EmbedAuthor | undefined;
  fields?: EmbedField[] | undefined;
  footer?: { text: string } | undefined;
}

export interface WebhookMessage {
  content?: string | undefined;
  username?: string | undefined;
  avatar_url?: string | undefined;
  embeds: Embed[];
  allowed_mentions: { parse: []; roles?: string[] | undefined };
}

// ---------------------------------------------------------------------------
// Formatting options
// ---------------------------------------------------------------------------

export interface FormatOptions {
  titleStyle: TitleStyle;
  embedColor?: number | undefined;
  /** Role IDs mentioned ahead of each message */
  roleIds?: string[] | undefined;
  /** Maximum length of the commit body shown */
  messageLength?: number | undefined;
  username?: string | undefined;
  avatarUrl?: string | undefined;
}

// ---------------------------------------------------------------------------
// Delivery
// ---------------------------------------------------------------------------

export interface DeliveryResult {
  delivered: boolean;
  /** HTTP status, when the webhook answered */
  status?: number | undefined;
  error?: string | undefined;
}

/** Implemented by each outbound channel. Throws DeliveryFailedError. */
export interface WebhookAdapter {
  send(message: WebhookMessage): Promise<{ status: number }>;
}
