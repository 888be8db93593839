import { formatTarget, silentLogger } from "@commitrelay/core";
import type { Logger, RepoTarget } from "@commitrelay/core";
import type { Ledger } from "./ledger.js";
import type { Commit, CommitSource, FetchResult, NotifiedCommit } from "./types.js";

function timeOf(commit: Commit): number {
  return Date.parse(commit.timestamp);
}

/**
 * Oldest first. The upstream lists newest first, so reversing before the
 * stable sort keeps parents ahead of children that share a timestamp.
 */
export function sortChronologically(commits: Commit[]): Commit[] {
  return [...commits].reverse().sort((a, b) => timeOf(a) - timeOf(b));
}

function uniqueBySha(commits: Commit[]): Commit[] {
  const seen = new Set<string>();
  return commits.filter((c) => {
    if (seen.has(c.sha)) return false;
    seen.add(c.sha);
    return true;
  });
}

function toNotified(target: RepoTarget, commit: Commit): NotifiedCommit {
  return {
    repo: target.repo,
    branch: target.branch,
    sha: commit.sha,
    timestamp: commit.timestamp,
  };
}

export interface TrackerOptions {
  clock?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

// ---------------------------------------------------------------------------
// RepositoryTracker — decides which upstream commits are new for a target
// ---------------------------------------------------------------------------

export class RepositoryTracker {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly source: CommitSource,
    private readonly ledger: Ledger,
    options: TrackerOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Returns the commits on the target that have not been notified yet,
   * oldest first, and records them together with the advanced checkpoint.
   * Upstream and persistence errors propagate with nothing recorded.
   */
  async fetchNew(target: RepoTarget): Promise<FetchResult> {
    const tracked = this.ledger.getTracked(target);
    if (!tracked) {
      return this.initialize(target);
    }

    const since = new Date(tracked.lastCheckedAt);
    const sinceMs = since.getTime();
    const fetched = sortChronologically(
      await this.source.listCommits(target.repo, target.branch, since),
    );

    const commits = uniqueBySha(fetched).filter(
      (c) => timeOf(c) > sinceMs && !this.ledger.hasNotified(target, c.sha),
    );

    // Capped at now: a commit with a skewed future clock must not push the
    // window past commits that have not happened yet.
    const nowMs = this.clock().getTime();
    const newest = fetched.at(-1);
    const checkpointMs = Math.max(
      newest ? Math.min(timeOf(newest), nowMs) : nowMs,
      sinceMs,
    );
    const lastCheckedAt = new Date(checkpointMs).toISOString();

    await this.ledger.record({
      target,
      lastCheckedAt,
      notified: commits.map((c) => toNotified(target, c)),
    });

    this.logger.debug(
      `${formatTarget(target)}: ${fetched.length} fetched, ${commits.length} new, checkpoint ${lastCheckedAt}`,
    );

    return { kind: "polled", target, commits, lastCheckedAt };
  }

  /**
   * First encounter: the whole history is recorded as seen so that adding a
   * repository never floods the channel.
   */
  private async initialize(target: RepoTarget): Promise<FetchResult> {
    this.logger.info(`Initializing log for ${formatTarget(target)}`);

    const history = uniqueBySha(
      await this.source.listCommits(target.repo, target.branch),
    );
    const lastCheckedAt = this.clock().toISOString();

    await this.ledger.record({
      target,
      lastCheckedAt,
      notified: history.map((c) => toNotified(target, c)),
    });

    this.logger.info(
      `Initialized ${history.length} commits for ${formatTarget(target)}`,
    );

    return {
      kind: "initialized",
      target,
      commits: [],
      historical: history.length,
      lastCheckedAt,
    };
  }
}
