import { sameTarget, targetKey } from "@commitrelay/core";
import type { RepoTarget } from "@commitrelay/core";
import { emptyState } from "./types.js";
import type {
  NotifiedCommit,
  RepoUpdate,
  StateStore,
  TrackedRepo,
  TrackerState,
} from "./types.js";

function notifiedKey(repo: string, branch: string | null, sha: string): string {
  return `${targetKey({ repo, branch })}@${sha}`;
}

function applyUpdate(state: TrackerState, update: RepoUpdate): TrackerState {
  const repos = state.repos.filter((r) => !sameTarget(r, update.target));
  repos.push({
    repo: update.target.repo,
    branch: update.target.branch,
    lastCheckedAt: update.lastCheckedAt,
  });

  const known = new Set(state.notified.map((n) => notifiedKey(n.repo, n.branch, n.sha)));
  const notified = [...state.notified];
  for (const entry of update.notified) {
    const key = notifiedKey(entry.repo, entry.branch, entry.sha);
    if (known.has(key)) continue;
    known.add(key);
    notified.push({ ...entry });
  }

  return { version: 1, repos, notified };
}

/**
 * The working copy of the tracker state. Reads are synchronous against the
 * last successfully persisted state; every write goes through one queue, so
 * concurrent repository tasks never interleave their saves. A failed save
 * leaves the working copy untouched.
 */
export class Ledger {
  private state: TrackerState = emptyState();
  private notifiedIndex = new Set<string>();
  private loaded = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly store: StateStore) {}

  async load(): Promise<void> {
    const state = await this.store.load();
    this.replace(state);
    this.loaded = true;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  getTracked(target: RepoTarget): TrackedRepo | undefined {
    this.assertLoaded();
    const found = this.state.repos.find((r) => sameTarget(r, target));
    return found ? { ...found } : undefined;
  }

  hasNotified(target: RepoTarget, sha: string): boolean {
    this.assertLoaded();
    return this.notifiedIndex.has(notifiedKey(target.repo, target.branch, sha));
  }

  notifiedFor(target: RepoTarget): NotifiedCommit[] {
    this.assertLoaded();
    return this.state.notified
      .filter((n) => sameTarget(n, target))
      .map((n) => ({ ...n }));
  }

  snapshot(): TrackerState {
    return {
      version: 1,
      repos: this.state.repos.map((r) => ({ ...r })),
      notified: this.state.notified.map((n) => ({ ...n })),
    };
  }

  /** Applies and persists one repository's checkpoint and notified commits. */
  record(update: RepoUpdate): Promise<void> {
    this.assertLoaded();
    return this.exclusive(async () => {
      const next = applyUpdate(this.state, update);
      await this.store.save(next);
      this.replace(next);
    });
  }

  /**
   * Drops tracking state for repositories no longer configured. Resolves to
   * the targets that were removed.
   */
  retain(targets: RepoTarget[]): Promise<RepoTarget[]> {
    this.assertLoaded();
    return this.exclusive(async () => {
      const keep = (entry: RepoTarget): boolean => targets.some((t) => sameTarget(t, entry));
      const removed = this.state.repos
        .filter((r) => !keep(r))
        .map((r) => ({ repo: r.repo, branch: r.branch }));
      const orphaned = this.state.notified.some((n) => !keep(n));
      if (removed.length === 0 && !orphaned) return [];

      const next: TrackerState = {
        version: 1,
        repos: this.state.repos.filter(keep),
        notified: this.state.notified.filter(keep),
      };
      await this.store.save(next);
      this.replace(next);
      return removed;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(task);
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private replace(state: TrackerState): void {
    this.state = state;
    this.notifiedIndex = new Set(
      state.notified.map((n) => notifiedKey(n.repo, n.branch, n.sha)),
    );
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new Error("Ledger used before load()");
    }
  }
}
