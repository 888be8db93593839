import { mkdir, mkdtemp, open, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FileHandle } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PersistenceError } from "@commitrelay/core";
import { FileStateStore, InMemoryStateStore } from "./state-store.js";
import type { TrackerState } from "./types.js";

const sampleState = (): TrackerState => ({
  version: 1,
  repos: [
    { repo: "acme/widgets", branch: null, lastCheckedAt: "2024-06-01T12:00:00.000Z" },
    { repo: "acme/gadgets", branch: "develop", lastCheckedAt: "2024-06-02T08:30:00.000Z" },
  ],
  notified: [
    {
      repo: "acme/widgets",
      branch: null,
      sha: "abc1234",
      timestamp: "2024-06-01T11:59:00Z",
    },
  ],
});

describe("FileStateStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "commitrelay-state-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns an empty state when the file does not exist", async () => {
    const store = new FileStateStore(join(dir, "commit_log.json"));
    expect(await store.load()).toEqual({ version: 1, repos: [], notified: [] });
  });

  it("reads back what it saved", async () => {
    const store = new FileStateStore(join(dir, "commit_log.json"));
    await store.save(sampleState());
    expect(await store.load()).toEqual(sampleState());
  });

  it("writes indented JSON and leaves no temp file behind", async () => {
    const path = join(dir, "commit_log.json");
    const store = new FileStateStore(path);
    await store.save(sampleState());

    const raw = await readFile(path, "utf-8");
    expect(raw).toBe(JSON.stringify(sampleState(), null, 2) + "\n");
    expect(await readdir(dir)).toEqual(["commit_log.json"]);
  });

  it("flushes the temp file to disk before replacing the state file", async () => {
    const scratch = await open(join(dir, "handle"), "w");
    const handleProto: FileHandle = Object.getPrototypeOf(scratch);
    await scratch.close();
    const sync = vi.spyOn(handleProto, "sync");

    try {
      await new FileStateStore(join(dir, "commit_log.json")).save(sampleState());
      expect(sync).toHaveBeenCalledTimes(1);
    } finally {
      sync.mockRestore();
    }
  });

  it("creates missing parent directories", async () => {
    const path = join(dir, "nested", "state", "commit_log.json");
    const store = new FileStateStore(path);
    await store.save(sampleState());
    expect(await store.load()).toEqual(sampleState());
  });

  it("rejects a file that is not JSON", async () => {
    const path = join(dir, "commit_log.json");
    await writeFile(path, "{ not json", "utf-8");

    const err = await new FileStateStore(path).load().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PersistenceError);
    expect(err).toMatchObject({
      code: "STATE_UNREADABLE",
      message: expect.stringContaining(`State file ${path} is not valid JSON`),
    });
  });

  it("rejects a file with the wrong shape", async () => {
    const path = join(dir, "commit_log.json");
    await writeFile(
      path,
      JSON.stringify({ version: 1, repos: [{ repo: "acme/widgets", branch: null }], notified: [] }),
      "utf-8",
    );

    await expect(new FileStateStore(path).load()).rejects.toThrow(
      `State file ${path} is malformed at repos.0.lastCheckedAt: Required`,
    );
  });

  it("rejects timestamps that do not parse", async () => {
    const path = join(dir, "commit_log.json");
    const state = sampleState();
    await writeFile(
      path,
      JSON.stringify({ ...state, repos: [{ ...state.repos[0], lastCheckedAt: "yesterday" }] }),
      "utf-8",
    );

    await expect(new FileStateStore(path).load()).rejects.toThrow(
      "malformed at repos.0.lastCheckedAt: not an ISO-8601 timestamp",
    );
  });

  it("raises STATE_UNWRITABLE when the target cannot be written", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "", "utf-8");
    const store = new FileStateStore(join(blocker, "commit_log.json"));

    const err = await store.save(sampleState()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PersistenceError);
    expect(err).toMatchObject({ code: "STATE_UNWRITABLE" });
  });

  it("keeps the previous file when a save fails", async () => {
    const path = join(dir, "commit_log.json");
    const store = new FileStateStore(path);
    await store.save(sampleState());

    // A directory squatting on the temp path makes the write fail before rename
    await mkdir(`${path}.${process.pid}.tmp`);
    const next = { ...sampleState(), notified: [] };
    await expect(store.save(next)).rejects.toBeInstanceOf(PersistenceError);

    expect(await store.load()).toEqual(sampleState());
  });
});

describe("InMemoryStateStore", () => {
  it("starts empty", async () => {
    const store = new InMemoryStateStore();
    expect(await store.load()).toEqual({ version: 1, repos: [], notified: [] });
  });

  it("isolates saved state from later mutation", async () => {
    const store = new InMemoryStateStore();
    const state = sampleState();
    await store.save(state);
    state.repos.length = 0;

    expect((await store.load()).repos).toHaveLength(2);
    expect(store.saves).toBe(1);
  });
});
