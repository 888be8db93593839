import type { Logger, RelayConfig } from "@commitrelay/core";
import {
  FileStateStore,
  GitHubCommitSource,
  Ledger,
  RepositoryTracker,
} from "@commitrelay/watcher";
import type { CommitSource, StateStore } from "@commitrelay/watcher";
import { createNotifier } from "@commitrelay/notifier";
import type { CommitNotifier } from "@commitrelay/notifier";
import { CommitPoller } from "./poller.js";

export interface Runtime {
  source: CommitSource;
  store: StateStore;
  ledger: Ledger;
  tracker: RepositoryTracker;
  notifier: CommitNotifier;
  poller: CommitPoller;
}

/** Wires the tracker, notifier and poller from loaded configuration. */
export function createRuntime(
  config: RelayConfig,
  logger: Logger,
  overrides: { source?: CommitSource; store?: StateStore; notifier?: CommitNotifier } = {},
): Runtime {
  const source =
    overrides.source ??
    new GitHubCommitSource({ token: config.github.token, apiUrl: config.github.apiUrl });
  const store = overrides.store ?? new FileStateStore(config.statePath);
  const ledger = new Ledger(store);
  const tracker = new RepositoryTracker(source, ledger, {
    logger: logger.child("tracker"),
  });
  const notifier = overrides.notifier ?? createNotifier(config, logger.child("notifier"));
  const poller = new CommitPoller({
    targets: config.repositories,
    source,
    ledger,
    tracker,
    notifier,
    intervalMs: config.pollIntervalMs,
    notifyOnInit: config.notifyOnInit,
    startupTest: config.startupTest,
    logger,
  });

  return { source, store, ledger, tracker, notifier, poller };
}
