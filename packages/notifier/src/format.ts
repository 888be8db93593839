import { formatTarget } from "@commitrelay/core";
import type { RepoTarget } from "@commitrelay/core";
import type { Commit, RepoInfo } from "@commitrelay/watcher";
import type { Embed, EmbedAuthor, FormatOptions, WebhookMessage } from "./types.js";

export const TITLE_LIMIT = 256;
export const SUBJECT_LIMIT = 256;
export const DEFAULT_MESSAGE_LENGTH = 1024;

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Shortens `text` to at most `max` UTF-16 units, marking the cut with "…".
 * Never splits a surrogate pair.
 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  if (max < 1) return "";
  let end = max - 1;
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) end--;
  return `${text.slice(0, end).trimEnd()}…`;
}

/**
 * Splits a commit message into its subject line and body. The body starts
 * after the first blank line, or after the first newline when there is none.
 */
export function splitMessage(message: string): { subject: string; body: string | undefined } {
  const normalized = message.replace(/\r\n/g, "\n").trim();
  const blank = normalized.indexOf("\n\n");
  const newline = normalized.indexOf("\n");
  const cut = blank !== -1 ? blank : newline;
  if (cut === -1) {
    return { subject: normalized, body: undefined };
  }
  const body = normalized.slice(cut).trim();
  return {
    subject: normalized.slice(0, cut).trim(),
    body: body.length > 0 ? body : undefined,
  };
}

export function shortSha(sha: string): string {
  return sha.slice(0, 7);
}

function mentions(roleIds: string[] | undefined): Pick<WebhookMessage, "content" | "allowed_mentions"> {
  if (!roleIds || roleIds.length === 0) {
    return { allowed_mentions: { parse: [] } };
  }
  return {
    content: roleIds.map((id) => `<@&${id}>`).join(" "),
    allowed_mentions: { parse: [], roles: [...roleIds] },
  };
}

function repoAuthor(repo: string, info: RepoInfo | undefined): EmbedAuthor {
  return {
    name: info?.name ?? repo,
    url: info?.htmlUrl ?? `https://github.com/${repo}`,
    icon_url: info?.ownerAvatarUrl,
  };
}

function envelope(embed: Embed, options: FormatOptions): WebhookMessage {
  return {
    username: options.username,
    avatar_url: options.avatarUrl,
    embeds: [embed],
    allowed_mentions: { parse: [] },
  };
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export function buildCommitMessage(
  commit: Commit,
  options: FormatOptions,
  info?: RepoInfo,
): WebhookMessage {
  const repoLabel = info?.fullName ?? commit.repo;
  const { subject, body } = splitMessage(commit.message);
  const branchSuffix = commit.branch !== null ? ` [${commit.branch}]` : "";

  const title =
    options.titleStyle === "author"
      ? `New commit in ${repoLabel}${branchSuffix}`
      : `New commit by ${commit.authorName}${branchSuffix}`;

  const author: EmbedAuthor =
    options.titleStyle === "author"
      ? {
          name: truncate(commit.authorName, TITLE_LIMIT),
          url: commit.authorUrl,
          icon_url: commit.authorAvatarUrl,
        }
      : repoAuthor(commit.repo, info);

  const embed: Embed = {
    title: truncate(title, TITLE_LIMIT),
    url: commit.url,
    description: `[\`${shortSha(commit.sha)}\`](${commit.url}) ${truncate(subject, SUBJECT_LIMIT)}`,
    color: options.embedColor,
    timestamp: commit.timestamp,
    author,
    footer: {
      text: commit.branch !== null ? `${repoLabel}:${commit.branch}` : repoLabel,
    },
  };

  if (body) {
    embed.fields = [
      {
        name: "Description",
        value: truncate(body, options.messageLength ?? DEFAULT_MESSAGE_LENGTH),
      },
    ];
  }

  return { ...envelope(embed, options), ...mentions(options.roleIds) };
}

export function buildInitializedMessage(
  target: RepoTarget,
  historical: number,
  options: FormatOptions,
  info?: RepoInfo,
): WebhookMessage {
  const noun = historical === 1 ? "commit" : "commits";
  return envelope(
    {
      title: truncate(`Now tracking ${formatTarget(target)}`, TITLE_LIMIT),
      url: info?.htmlUrl ?? `https://github.com/${target.repo}`,
      description: `${historical} existing ${noun} recorded. New commits will be posted here.`,
      color: options.embedColor,
      author: repoAuthor(target.repo, info),
    },
    options,
  );
}

export function buildTestMessage(options: FormatOptions, at: Date): WebhookMessage {
  return envelope(
    {
      title: "commitrelay connected",
      description: "Webhook connectivity test. New commits will be posted to this channel.",
      color: options.embedColor,
      timestamp: at.toISOString(),
    },
    options,
  );
}
