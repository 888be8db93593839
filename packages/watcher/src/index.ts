export type {
  Commit,
  RepoInfo,
  TrackedRepo,
  NotifiedCommit,
  TrackerState,
  CommitSource,
  StateStore,
  FetchResult,
  RepoUpdate,
} from "./types.js";
export { emptyState } from "./types.js";

export { GitHubCommitSource, nextPageUrl } from "./adapters/index.js";
export type { GitHubSourceOptions } from "./adapters/index.js";

export { FileStateStore, InMemoryStateStore } from "./state-store.js";
export { Ledger } from "./ledger.js";
export { RepositoryTracker, sortChronologically } from "./tracker.js";
export type { TrackerOptions } from "./tracker.js";
