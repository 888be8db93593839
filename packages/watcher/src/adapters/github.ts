import { UpstreamUnavailableError, errorMessage } from "@commitrelay/core";
import type { Commit, CommitSource, RepoInfo } from "../types.js";

const GITHUB_API = "https://api.github.com";
const PER_PAGE = 100;

interface GitHubCommitResponse {
  sha: string;
  html_url: string;
  commit: {
    message: string;
    author: { name?: string | null; date?: string | null } | null;
    committer: { name?: string | null; date?: string | null } | null;
  };
  author: { login: string; avatar_url: string; html_url: string } | null;
}

interface GitHubRepoResponse {
  name: string;
  full_name: string;
  html_url: string;
  default_branch: string;
  owner: { avatar_url: string } | null;
}

export interface GitHubSourceOptions {
  token?: string | undefined;
  apiUrl?: string | undefined;
  /** Upper bound on pages per listCommits call */
  maxPages?: number | undefined;
}

function parseCommit(
  data: GitHubCommitResponse,
  repo: string,
  branch: string | null,
): Commit {
  const timestamp =
    data.commit.committer?.date ?? data.commit.author?.date ?? new Date(0).toISOString();
  return {
    sha: data.sha,
    repo,
    branch,
    authorName: data.commit.author?.name ?? data.author?.login ?? "unknown",
    authorLogin: data.author?.login,
    authorAvatarUrl: data.author?.avatar_url,
    authorUrl: data.author?.html_url,
    message: data.commit.message,
    url: data.html_url,
    timestamp,
  };
}

/** Extracts the rel="next" target from a Link header. */
export function nextPageUrl(linkHeader: string | null): string | undefined {
  if (!linkHeader) return undefined;
  for (const part of linkHeader.split(",")) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="([^"]+)"/);
    if (match?.[2]?.split(/\s+/).includes("next")) {
      return match[1];
    }
  }
  return undefined;
}

function rateLimitDetails(response: Response): {
  rateLimited: boolean;
  resetAt: Date | undefined;
} {
  const remaining = response.headers.get("x-ratelimit-remaining");
  const reset = response.headers.get("x-ratelimit-reset");
  const retryAfter = response.headers.get("retry-after");

  const limited =
    response.status === 429 ||
    (response.status === 403 && (remaining === "0" || retryAfter !== null));
  if (!limited) return { rateLimited: false, resetAt: undefined };

  if (retryAfter !== null && /^\d+$/.test(retryAfter)) {
    return {
      rateLimited: true,
      resetAt: new Date(Date.now() + Number(retryAfter) * 1000),
    };
  }
  if (reset !== null && /^\d+$/.test(reset)) {
    return { rateLimited: true, resetAt: new Date(Number(reset) * 1000) };
  }
  return { rateLimited: true, resetAt: undefined };
}

export class GitHubCommitSource implements CommitSource {
  private readonly apiUrl: string;
  private readonly maxPages: number;

  constructor(private readonly options: GitHubSourceOptions = {}) {
    this.apiUrl = (options.apiUrl ?? GITHUB_API).replace(/\/+$/, "");
    this.maxPages = options.maxPages ?? 1000;
  }

  private authHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
    };
    if (this.options.token) {
      headers["Authorization"] = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  private async request(url: string, what: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, { headers: this.authHeaders() });
    } catch (err) {
      throw new UpstreamUnavailableError(
        `GitHub API unreachable for ${what}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (!response.ok) {
      await response.body?.cancel();
      const { rateLimited, resetAt } = rateLimitDetails(response);
      throw new UpstreamUnavailableError(
        rateLimited
          ? `GitHub API rate limit exceeded for ${what}`
          : `GitHub API returned ${response.status} for ${what}`,
        { status: response.status, rateLimited, resetAt },
      );
    }

    return response;
  }

  async listCommits(
    repo: string,
    branch: string | null,
    since?: Date,
  ): Promise<Commit[]> {
    const params = new URLSearchParams({ per_page: String(PER_PAGE) });
    if (branch !== null) params.set("sha", branch);
    if (since) params.set("since", since.toISOString());

    const label = branch === null ? repo : `${repo}:${branch}`;
    const commits: Commit[] = [];
    let url: string | undefined = `${this.apiUrl}/repos/${repo}/commits?${params.toString()}`;
    let pages = 0;

    while (url && pages < this.maxPages) {
      const response = await this.request(url, `${label} commits`);
      const batch = (await response.json()) as GitHubCommitResponse[];
      for (const item of batch) {
        commits.push(parseCommit(item, repo, branch));
      }
      url = nextPageUrl(response.headers.get("link"));
      pages++;
    }

    return commits;
  }

  async getRepository(repo: string): Promise<RepoInfo> {
    const response = await this.request(`${this.apiUrl}/repos/${repo}`, repo);
    const data = (await response.json()) as GitHubRepoResponse;
    return {
      fullName: data.full_name,
      name: data.name,
      htmlUrl: data.html_url,
      ownerAvatarUrl: data.owner?.avatar_url,
      defaultBranch: data.default_branch,
    };
  }
}
