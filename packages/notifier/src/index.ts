export type {
  Embed,
  EmbedAuthor,
  EmbedField,
  WebhookMessage,
  FormatOptions,
  DeliveryResult,
  WebhookAdapter,
} from "./types.js";

export { CommitNotifier, createNotifier, formatOptionsFromConfig } from "./notifier.js";

export {
  buildCommitMessage,
  buildInitializedMessage,
  buildTestMessage,
  splitMessage,
  truncate,
  shortSha,
  TITLE_LIMIT,
  SUBJECT_LIMIT,
  DEFAULT_MESSAGE_LENGTH,
} from "./format.js";

export { DiscordWebhookAdapter } from "./adapters/discord.js";
export type { DiscordWebhookSettings } from "./adapters/discord.js";
