import type { RepoTarget } from "@commitrelay/core";

// ---------------------------------------------------------------------------
// Core domain types
// ---------------------------------------------------------------------------

export interface Commit {
  sha: string;
  repo: string;
  branch: string | null;
  authorName: string;
  /** Platform login, when the commit email maps to an account */
  authorLogin?: string | undefined;
  authorAvatarUrl?: string | undefined;
  authorUrl?: string | undefined;
  message: string;
  url: string;
  /** Committer date, ISO-8601 */
  timestamp: string;
}

export interface RepoInfo {
  fullName: string;
  name: string;
  htmlUrl: string;
  ownerAvatarUrl?: string | undefined;
  defaultBranch: string;
}

// ---------------------------------------------------------------------------
// Persisted state
// ---------------------------------------------------------------------------

export interface TrackedRepo {
  repo: string;
  branch: string | null;
  /** ISO-8601; commits at or before this instant have been examined */
  lastCheckedAt: string;
}

export interface NotifiedCommit {
  repo: string;
  branch: string | null;
  sha: string;
  timestamp: string;
}

export interface TrackerState {
  version: 1;
  repos: TrackedRepo[];
  notified: NotifiedCommit[];
}

export function emptyState(): TrackerState {
  return { version: 1, repos: [], notified: [] };
}

// ---------------------------------------------------------------------------
// Collaborator interfaces
// ---------------------------------------------------------------------------

export interface CommitSource {
  /**
   * Commits on `branch` (default branch when null), newest first as the
   * upstream returns them. Without `since`, the full history.
   */
  listCommits(repo: string, branch: string | null, since?: Date): Promise<Commit[]>;
  getRepository(repo: string): Promise<RepoInfo>;
}

export interface StateStore {
  load(): Promise<TrackerState>;
  save(state: TrackerState): Promise<void>;
}

// ---------------------------------------------------------------------------
// Tracker results
// ---------------------------------------------------------------------------

export type FetchResult =
  | {
      kind: "initialized";
      target: RepoTarget;
      commits: [];
      /** Number of historical commits recorded without notifying */
      historical: number;
      lastCheckedAt: string;
    }
  | {
      kind: "polled";
      target: RepoTarget;
      /** New commits, oldest first */
      commits: Commit[];
      lastCheckedAt: string;
    };

export interface RepoUpdate {
  target: RepoTarget;
  lastCheckedAt: string;
  notified: NotifiedCommit[];
}
