import { describe, expect, it } from "vitest";
import { Ledger } from "./ledger.js";
import { InMemoryStateStore } from "./state-store.js";
import type { RepoUpdate, StateStore, TrackerState } from "./types.js";

const widgets = { repo: "acme/widgets", branch: null };
const gadgetsDev = { repo: "acme/gadgets", branch: "develop" };

const update = (
  target: { repo: string; branch: string | null },
  lastCheckedAt: string,
  shas: string[] = [],
): RepoUpdate => ({
  target,
  lastCheckedAt,
  notified: shas.map((sha) => ({
    repo: target.repo,
    branch: target.branch,
    sha,
    timestamp: lastCheckedAt,
  })),
});

class FailingStore implements StateStore {
  failNext = false;
  constructor(private readonly inner = new InMemoryStateStore()) {}

  load(): Promise<TrackerState> {
    return this.inner.load();
  }

  async save(state: TrackerState): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("disk full");
    }
    await this.inner.save(state);
  }
}

describe("Ledger", () => {
  it("refuses reads before load()", () => {
    const ledger = new Ledger(new InMemoryStateStore());
    expect(() => ledger.getTracked(widgets)).toThrow("Ledger used before load()");
  });

  it("loads persisted state", async () => {
    const store = new InMemoryStateStore({
      version: 1,
      repos: [{ ...widgets, lastCheckedAt: "2024-06-01T00:00:00.000Z" }],
      notified: [{ ...widgets, sha: "abc123", timestamp: "2024-05-31T00:00:00Z" }],
    });
    const ledger = new Ledger(store);
    await ledger.load();

    expect(ledger.isLoaded).toBe(true);
    expect(ledger.getTracked(widgets)?.lastCheckedAt).toBe("2024-06-01T00:00:00.000Z");
    expect(ledger.hasNotified(widgets, "abc123")).toBe(true);
    expect(ledger.hasNotified(gadgetsDev, "abc123")).toBe(false);
  });

  it("records a checkpoint and notified commits, and persists them", async () => {
    const store = new InMemoryStateStore();
    const ledger = new Ledger(store);
    await ledger.load();

    await ledger.record(update(widgets, "2024-06-01T00:00:00.000Z", ["a1", "a2"]));

    expect(ledger.getTracked(widgets)).toEqual({
      repo: "acme/widgets",
      branch: null,
      lastCheckedAt: "2024-06-01T00:00:00.000Z",
    });
    expect(ledger.notifiedFor(widgets).map((n) => n.sha)).toEqual(["a1", "a2"]);
    expect(await store.load()).toEqual(ledger.snapshot());
    expect(store.saves).toBe(1);
  });

  it("keeps branches of the same repository apart", async () => {
    const ledger = new Ledger(new InMemoryStateStore());
    await ledger.load();

    await ledger.record(update({ repo: "acme/gadgets", branch: null }, "2024-06-01T00:00:00.000Z", ["g1"]));
    await ledger.record(update(gadgetsDev, "2024-06-02T00:00:00.000Z", ["d1"]));

    expect(ledger.hasNotified(gadgetsDev, "g1")).toBe(false);
    expect(ledger.hasNotified(gadgetsDev, "d1")).toBe(true);
    expect(ledger.snapshot().repos).toHaveLength(2);
  });

  it("replaces the checkpoint and never duplicates a sha", async () => {
    const ledger = new Ledger(new InMemoryStateStore());
    await ledger.load();

    await ledger.record(update(widgets, "2024-06-01T00:00:00.000Z", ["a1"]));
    await ledger.record(update(widgets, "2024-06-02T00:00:00.000Z", ["a1", "a2"]));

    const state = ledger.snapshot();
    expect(state.repos).toEqual([
      { repo: "acme/widgets", branch: null, lastCheckedAt: "2024-06-02T00:00:00.000Z" },
    ]);
    expect(state.notified.map((n) => n.sha)).toEqual(["a1", "a2"]);
  });

  it("serializes concurrent writes without losing any", async () => {
    const store = new InMemoryStateStore();
    const ledger = new Ledger(store);
    await ledger.load();

    await Promise.all([
      ledger.record(update(widgets, "2024-06-01T00:00:00.000Z", ["a1"])),
      ledger.record(update(gadgetsDev, "2024-06-01T00:00:00.000Z", ["d1"])),
      ledger.record(update({ repo: "acme/tools", branch: null }, "2024-06-01T00:00:00.000Z", ["t1"])),
    ]);

    const persisted = await store.load();
    expect(persisted.repos.map((r) => r.repo)).toEqual([
      "acme/widgets",
      "acme/gadgets",
      "acme/tools",
    ]);
    expect(persisted.notified.map((n) => n.sha)).toEqual(["a1", "d1", "t1"]);
    expect(store.saves).toBe(3);
  });

  it("leaves the working copy untouched when a save fails", async () => {
    const store = new FailingStore();
    const ledger = new Ledger(store);
    await ledger.load();
    await ledger.record(update(widgets, "2024-06-01T00:00:00.000Z", ["a1"]));

    store.failNext = true;
    await expect(
      ledger.record(update(widgets, "2024-06-02T00:00:00.000Z", ["a2"])),
    ).rejects.toThrow("disk full");

    expect(ledger.getTracked(widgets)?.lastCheckedAt).toBe("2024-06-01T00:00:00.000Z");
    expect(ledger.hasNotified(widgets, "a2")).toBe(false);

    // The queue keeps working after a failure
    await ledger.record(update(widgets, "2024-06-03T00:00:00.000Z", ["a3"]));
    expect(ledger.notifiedFor(widgets).map((n) => n.sha)).toEqual(["a1", "a3"]);
  });

  it("retains only configured targets", async () => {
    const store = new InMemoryStateStore();
    const ledger = new Ledger(store);
    await ledger.load();
    await ledger.record(update(widgets, "2024-06-01T00:00:00.000Z", ["a1"]));
    await ledger.record(update(gadgetsDev, "2024-06-01T00:00:00.000Z", ["d1"]));

    const removed = await ledger.retain([widgets]);

    expect(removed).toEqual([gadgetsDev]);
    expect(ledger.getTracked(gadgetsDev)).toBeUndefined();
    expect(ledger.hasNotified(gadgetsDev, "d1")).toBe(false);
    expect((await store.load()).notified.map((n) => n.sha)).toEqual(["a1"]);
  });

  it("does not save when nothing needs removing", async () => {
    const store = new InMemoryStateStore();
    const ledger = new Ledger(store);
    await ledger.load();
    await ledger.record(update(widgets, "2024-06-01T00:00:00.000Z"));

    expect(await ledger.retain([widgets, gadgetsDev])).toEqual([]);
    expect(store.saves).toBe(1);
  });
});
