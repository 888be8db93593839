import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import * as yaml from "js-yaml";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { LogLevel } from "./logger.js";
import { formatTarget, parseRepoTarget, targetKey } from "./targets.js";
import type { RepoTarget } from "./targets.js";

export const DEFAULT_CONFIG_FILE = "commitrelay.yml";
export const DEFAULT_GITHUB_API_URL = "https://api.github.com";

export type TitleStyle = "repo" | "author";

export interface RelayConfig {
  repositories: RepoTarget[];
  webhook: {
    url: string;
    username: string | undefined;
    avatarUrl: string | undefined;
    timeoutMs: number;
  };
  github: {
    token: string | undefined;
    apiUrl: string;
  };
  pollIntervalMs: number;
  embedColor: number | undefined;
  roleIds: string[];
  titleStyle: TitleStyle;
  notifyOnInit: boolean;
  startupTest: boolean;
  messageLength: number;
  /** Absolute path of the state file */
  statePath: string;
  logLevel: LogLevel;
  /** Config file that was read, if any */
  configFile: string | undefined;
}

// ---------------------------------------------------------------------------
// File schema — commitrelay.yml, parsed with FAILSAFE_SCHEMA so every scalar
// arrives as a string, exactly like environment variables.
// ---------------------------------------------------------------------------

const RepoEntrySchema = z.union([
  z.string(),
  z.object({ repo: z.string(), branch: z.string().optional() }).strict(),
]);

type RepoEntry = z.infer<typeof RepoEntrySchema>;

const FileSchema = z
  .object({
    repositories: z.array(RepoEntrySchema).optional(),
    webhook: z
      .object({
        url: z.string().optional(),
        username: z.string().optional(),
        avatarUrl: z.string().optional(),
        timeoutMs: z.string().optional(),
      })
      .strict()
      .optional(),
    github: z
      .object({
        token: z.string().optional(),
        apiUrl: z.string().optional(),
      })
      .strict()
      .optional(),
    interval: z.string().optional(),
    embedColor: z.string().optional(),
    roleIds: z.array(z.string()).optional(),
    titleStyle: z.string().optional(),
    notifyOnInit: z.string().optional(),
    startupTest: z.string().optional(),
    messageLength: z.string().optional(),
    statePath: z.string().optional(),
    logLevel: z.string().optional(),
  })
  .strict();

// ---------------------------------------------------------------------------
// Settings — the merged view of file + .env + process env, validated once
// ---------------------------------------------------------------------------

const SCALAR_ENV = {
  webhookUrl: "DISCORD_WEBHOOK_URL",
  webhookUsername: "WEBHOOK_USERNAME",
  webhookAvatarUrl: "WEBHOOK_AVATAR_URL",
  webhookTimeoutMs: "WEBHOOK_TIMEOUT_MS",
  githubToken: "GITHUB_TOKEN",
  githubApiUrl: "GITHUB_API_URL",
  interval: "CHECK_INTERVAL",
  embedColor: "EMBED_COLOR",
  titleStyle: "TITLE_STYLE",
  notifyOnInit: "NOTIFY_ON_INIT",
  startupTest: "STARTUP_TEST",
  messageLength: "MESSAGE_LENGTH",
  statePath: "STATE_PATH",
  logLevel: "LOG_LEVEL",
} as const;

type ScalarKey = keyof typeof SCALAR_ENV;

function isScalarKey(key: string): key is ScalarKey {
  return Object.hasOwn(SCALAR_ENV, key);
}

type RawSettings = Partial<Record<ScalarKey, string>> & {
  repositories?: RepoEntry[];
  roleIds?: string[];
};

const SETTING_LABELS: Record<ScalarKey | "repositories" | "roleIds", string> = {
  repositories: "repositories / REPOS",
  roleIds: "roleIds / ROLE_IDS",
  webhookUrl: "webhook.url / DISCORD_WEBHOOK_URL",
  webhookUsername: "webhook.username / WEBHOOK_USERNAME",
  webhookAvatarUrl: "webhook.avatarUrl / WEBHOOK_AVATAR_URL",
  webhookTimeoutMs: "webhook.timeoutMs / WEBHOOK_TIMEOUT_MS",
  githubToken: "github.token / GITHUB_TOKEN",
  githubApiUrl: "github.apiUrl / GITHUB_API_URL",
  interval: "interval / CHECK_INTERVAL",
  embedColor: "embedColor / EMBED_COLOR",
  titleStyle: "titleStyle / TITLE_STYLE",
  notifyOnInit: "notifyOnInit / NOTIFY_ON_INIT",
  startupTest: "startupTest / STARTUP_TEST",
  messageLength: "messageLength / MESSAGE_LENGTH",
  statePath: "statePath / STATE_PATH",
  logLevel: "logLevel / LOG_LEVEL",
};

function isSettingKey(key: string): key is keyof typeof SETTING_LABELS {
  return Object.hasOwn(SETTING_LABELS, key);
}

const booleanString = z
  .enum(["0", "1", "true", "false"])
  .transform((value) => value === "1" || value === "true");

const colorString = z.string().transform((value, ctx) => {
  const trimmed = value.trim();
  let parsed = Number.NaN;
  if (/^#[0-9a-fA-F]{6}$/.test(trimmed)) {
    parsed = Number.parseInt(trimmed.slice(1), 16);
  } else if (/^0x[0-9a-fA-F]{1,6}$/.test(trimmed)) {
    parsed = Number.parseInt(trimmed.slice(2), 16);
  } else if (/^\d+$/.test(trimmed)) {
    parsed = Number(trimmed);
  }
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 0xffffff) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `"${value}" is not a colour (#rrggbb, 0xrrggbb or 0-16777215)`,
    });
    return z.NEVER;
  }
  return parsed;
});

const SettingsSchema = z.object({
  repositories: z
    .array(RepoEntrySchema, {
      required_error: "at least one repository is required",
    })
    .min(1, "at least one repository is required"),
  webhookUrl: z
    .string({ required_error: "a webhook URL is required" })
    .url("must be a URL"),
  webhookUsername: z.string().min(1).optional(),
  webhookAvatarUrl: z.string().url("must be a URL").optional(),
  webhookTimeoutMs: z.coerce.number().int().min(1000).max(60_000).default(10_000),
  githubToken: z.string().min(1).optional(),
  githubApiUrl: z.string().url("must be a URL").default(DEFAULT_GITHUB_API_URL),
  interval: z.coerce.number().int().min(10, "must be at least 10 seconds").default(300),
  embedColor: colorString.optional(),
  roleIds: z
    .array(z.string().regex(/^\d+$/, "role IDs are numeric snowflakes"))
    .default([]),
  titleStyle: z.enum(["repo", "author"]).default("repo"),
  notifyOnInit: booleanString.default("false"),
  startupTest: booleanString.default("false"),
  messageLength: z.coerce.number().int().min(64).max(1024).default(1024),
  statePath: z.string().min(1).default("commit_log.json"),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

async function readConfigFile(
  cwd: string,
  configPath: string | undefined,
): Promise<{ path: string | undefined; settings: RawSettings }> {
  const filePath = configPath ? resolve(cwd, configPath) : join(cwd, DEFAULT_CONFIG_FILE);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (configPath) {
      throw new ConfigurationError([
        `cannot read config file ${filePath}: ${errorMessage(err)}`,
      ]);
    }
    return { path: undefined, settings: {} };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (err) {
    throw new ConfigurationError([`${filePath} is not valid YAML: ${errorMessage(err)}`]);
  }
  if (parsed == null) {
    return { path: filePath, settings: {} };
  }

  const result = FileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${filePath}: ${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
      { path: filePath },
    );
  }

  const file = result.data;
  const settings: RawSettings = {};
  const assign = (key: ScalarKey, value: string | undefined): void => {
    if (value !== undefined) settings[key] = value;
  };

  if (file.repositories) settings.repositories = file.repositories;
  if (file.roleIds) settings.roleIds = file.roleIds;
  assign("webhookUrl", file.webhook?.url);
  assign("webhookUsername", file.webhook?.username);
  assign("webhookAvatarUrl", file.webhook?.avatarUrl);
  assign("webhookTimeoutMs", file.webhook?.timeoutMs);
  assign("githubToken", file.github?.token);
  assign("githubApiUrl", file.github?.apiUrl);
  assign("interval", file.interval);
  assign("embedColor", file.embedColor);
  assign("titleStyle", file.titleStyle);
  assign("notifyOnInit", file.notifyOnInit);
  assign("startupTest", file.startupTest);
  assign("messageLength", file.messageLength);
  assign("statePath", file.statePath);
  assign("logLevel", file.logLevel);

  return { path: filePath, settings };
}

/** Variables from `<cwd>/.env`; none when the file is absent. */
export async function loadEnvFile(cwd: string): Promise<Record<string, string>> {
  const envPath = join(cwd, ".env");
  let contents: Buffer;
  try {
    contents = await readFile(envPath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw new ConfigurationError([`cannot read ${envPath}: ${errorMessage(err)}`], {
      path: envPath,
    });
  }
  return parseDotenv(contents);
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function applyEnv(settings: RawSettings, env: Record<string, string | undefined>): RawSettings {
  const merged: RawSettings = { ...settings };

  for (const key of Object.keys(SCALAR_ENV).filter(isScalarKey)) {
    const value = env[SCALAR_ENV[key]]?.trim();
    if (value) merged[key] = value;
  }

  const repos = env["REPOS"]?.trim();
  if (repos) merged.repositories = splitList(repos);

  const roles = env["ROLE_IDS"]?.trim();
  if (roles) merged.roleIds = splitList(roles);

  return merged;
}

function toTargets(entries: RepoEntry[], issues: string[]): RepoTarget[] {
  const targets: RepoTarget[] = [];
  const seen = new Set<string>();

  for (const entry of entries) {
    const spec =
      typeof entry === "string"
        ? entry
        : entry.branch !== undefined
          ? `${entry.repo}:${entry.branch}`
          : entry.repo;
    const parsed = parseRepoTarget(spec);
    if (!parsed.ok) {
      issues.push(`${SETTING_LABELS.repositories}: ${parsed.error}`);
      continue;
    }
    const key = targetKey(parsed.target);
    if (seen.has(key)) {
      issues.push(
        `${SETTING_LABELS.repositories}: ${formatTarget(parsed.target)} is listed more than once`,
      );
      continue;
    }
    seen.add(key);
    targets.push(parsed.target);
  }

  return targets;
}

// ---------------------------------------------------------------------------
// loadConfig — file, then .env, then process env; any problem is fatal
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  cwd?: string | undefined;
  configPath?: string | undefined;
  env?: Record<string, string | undefined> | undefined;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<RelayConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const file = await readConfigFile(cwd, options.configPath);
  const dotenvVars = await loadEnvFile(cwd);
  const env = { ...dotenvVars, ...(options.env ?? process.env) };

  const result = SettingsSchema.safeParse(applyEnv(file.settings, env));
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => {
        const [head, ...rest] = issue.path;
        const label =
          typeof head === "string" && isSettingKey(head)
            ? SETTING_LABELS[head]
            : String(head ?? "(root)");
        const suffix = rest.length > 0 ? `[${rest.join(".")}]` : "";
        return `${label}${suffix}: ${issue.message}`;
      }),
      { configFile: file.path },
    );
  }

  const settings = result.data;
  const issues: string[] = [];
  const repositories = toTargets(settings.repositories, issues);
  if (issues.length > 0) {
    throw new ConfigurationError(issues, { configFile: file.path });
  }

  return {
    repositories,
    webhook: {
      url: settings.webhookUrl,
      username: settings.webhookUsername,
      avatarUrl: settings.webhookAvatarUrl,
      timeoutMs: settings.webhookTimeoutMs,
    },
    github: {
      token: settings.githubToken,
      apiUrl: settings.githubApiUrl.replace(/\/+$/, ""),
    },
    pollIntervalMs: settings.interval * 1000,
    embedColor: settings.embedColor,
    roleIds: settings.roleIds,
    titleStyle: settings.titleStyle,
    notifyOnInit: settings.notifyOnInit,
    startupTest: settings.startupTest,
    messageLength: settings.messageLength,
    statePath: isAbsolute(settings.statePath)
      ? settings.statePath
      : resolve(cwd, settings.statePath),
    logLevel: settings.logLevel,
    configFile: file.path,
  };
}
