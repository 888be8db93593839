import { setTimeout as delay } from "node:timers/promises";
import {
  PersistenceError,
  UpstreamUnavailableError,
  errorMessage,
  formatTarget,
  silentLogger,
} from "@commitrelay/core";
import type { Logger, RepoTarget } from "@commitrelay/core";
import type {
  CommitSource,
  FetchResult,
  Ledger,
  RepoInfo,
  RepositoryTracker,
} from "@commitrelay/watcher";
import type { CommitNotifier } from "@commitrelay/notifier";

export type PollerState = "idle" | "polling" | "stopped";

export interface RepoCycleReport {
  target: RepoTarget;
  status: "initialized" | "polled" | "failed";
  /** New commits found, or historical commits recorded on initialization */
  found: number;
  delivered: number;
  failedDeliveries: number;
  error?: string | undefined;
}

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  repos: RepoCycleReport[];
}

export interface PollerOptions {
  targets: RepoTarget[];
  source: CommitSource;
  ledger: Ledger;
  tracker: RepositoryTracker;
  notifier: CommitNotifier;
  intervalMs: number;
  notifyOnInit?: boolean | undefined;
  startupTest?: boolean | undefined;
  logger?: Logger | undefined;
  clock?: (() => Date) | undefined;
  /** Resolves after `ms`, or early once `signal` aborts */
  wait?: ((ms: number, signal: AbortSignal) => Promise<void>) | undefined;
}

async function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

// ---------------------------------------------------------------------------
// CommitPoller — idle ⇄ polling on a fixed interval until stopped
// ---------------------------------------------------------------------------

export class CommitPoller {
  private currentState: PollerState = "idle";
  private readonly stopController = new AbortController();
  private readonly repoInfoCache = new Map<string, RepoInfo>();
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly wait: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly options: PollerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.wait = options.wait ?? abortableDelay;
  }

  get state(): PollerState {
    return this.currentState;
  }

  /**
   * Loads persisted state, forgets repositories no longer configured and
   * runs the optional connectivity test. Unreadable state is fatal.
   */
  async prepare(): Promise<void> {
    const { ledger, targets, notifier } = this.options;
    if (!ledger.isLoaded) {
      await ledger.load();
    }

    const removed = await ledger.retain(targets);
    for (const target of removed) {
      this.logger.info(`No longer tracking ${formatTarget(target)}; state removed`);
    }

    if (this.options.startupTest) {
      const result = await notifier.sendTestMessage(this.clock());
      if (result.delivered) {
        this.logger.info("Startup connectivity test delivered");
      } else {
        this.logger.warn(`Startup connectivity test failed: ${result.error ?? "unknown error"}`);
      }
    }
  }

  async start(): Promise<void> {
    await this.prepare();
    const signal = this.stopController.signal;

    while (!signal.aborted) {
      await this.runCycle();
      if (signal.aborted) break;
      this.logger.debug(`Next cycle in ${this.options.intervalMs}ms`);
      await this.wait(this.options.intervalMs, signal);
    }

    this.currentState = "stopped";
    this.logger.info("Poller stopped");
  }

  /** Ends the loop after the in-flight cycle, if any. */
  stop(): void {
    if (!this.stopController.signal.aborted) {
      this.logger.info("Stopping poller…");
      this.stopController.abort();
    }
  }

  async runCycle(): Promise<CycleReport> {
    const startedAt = this.clock().toISOString();
    this.currentState = "polling";

    const settled = await Promise.allSettled(
      this.options.targets.map((target) => this.checkTarget(target)),
    );

    const repos = settled.map((outcome, i): RepoCycleReport => {
      if (outcome.status === "fulfilled") return outcome.value;
      const target = this.options.targets[i] ?? { repo: "unknown", branch: null };
      return {
        target,
        status: "failed",
        found: 0,
        delivered: 0,
        failedDeliveries: 0,
        error: errorMessage(outcome.reason),
      };
    });

    if (!this.stopController.signal.aborted) {
      this.currentState = "idle";
    }

    const delivered = repos.reduce((n, r) => n + r.delivered, 0);
    const failed = repos.filter((r) => r.status === "failed").length;
    this.logger.info(
      `Cycle complete: ${repos.length} targets, ${delivered} notifications sent, ${failed} failed`,
    );

    return { startedAt, finishedAt: this.clock().toISOString(), repos };
  }

  private async checkTarget(target: RepoTarget): Promise<RepoCycleReport> {
    const label = formatTarget(target);
    const report: RepoCycleReport = {
      target,
      status: "failed",
      found: 0,
      delivered: 0,
      failedDeliveries: 0,
    };

    let result: FetchResult;
    try {
      result = await this.options.tracker.fetchNew(target);
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) {
        this.logger.warn(`Skipping ${label} this cycle: ${err.message}`, err);
      } else if (err instanceof PersistenceError) {
        this.logger.error(
          `State for ${label} could not be saved; nothing sent, the same window is retried next cycle`,
          err,
        );
      } else {
        this.logger.error(`Error checking ${label}: ${errorMessage(err)}`);
      }
      report.error = errorMessage(err);
      return report;
    }

    if (result.kind === "initialized") {
      report.status = "initialized";
      report.found = result.historical;
      this.logger.info(`Skipping notifications for ${label} following initialization`);
      if (this.options.notifyOnInit) {
        const info = await this.repoInfo(target.repo);
        const delivery = await this.options.notifier.notifyInitialized(
          target,
          result.historical,
          info,
        );
        if (delivery.delivered) report.delivered++;
        else report.failedDeliveries++;
      }
      return report;
    }

    report.status = "polled";
    report.found = result.commits.length;
    if (result.commits.length === 0) {
      this.logger.debug(`No new commits for ${label}`);
      return report;
    }

    const info = await this.repoInfo(target.repo);
    for (const commit of result.commits) {
      const delivery = await this.options.notifier.notify(commit, info);
      if (delivery.delivered) report.delivered++;
      else report.failedDeliveries++;
    }
    return report;
  }

  private async repoInfo(repo: string): Promise<RepoInfo | undefined> {
    const cached = this.repoInfoCache.get(repo);
    if (cached) return cached;
    try {
      const info = await this.options.source.getRepository(repo);
      this.repoInfoCache.set(repo, info);
      return info;
    } catch (err) {
      this.logger.warn(`Repository details unavailable for ${repo}; using its identifier`, err);
      return undefined;
    }
  }
}
