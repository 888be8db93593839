import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { PersistenceError, errorMessage } from "@commitrelay/core";
import { emptyState } from "./types.js";
import type { StateStore, TrackerState } from "./types.js";

// ---------------------------------------------------------------------------
// Schema — the state file is validated on every load
// ---------------------------------------------------------------------------

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: "not an ISO-8601 timestamp",
});

const TrackerStateSchema = z.object({
  version: z.literal(1),
  repos: z.array(
    z.object({
      repo: z.string().min(1),
      branch: z.string().min(1).nullable(),
      lastCheckedAt: isoTimestamp,
    }),
  ),
  notified: z.array(
    z.object({
      repo: z.string().min(1),
      branch: z.string().min(1).nullable(),
      sha: z.string().min(1),
      timestamp: isoTimestamp,
    }),
  ),
});

function cloneState(state: TrackerState): TrackerState {
  return {
    version: 1,
    repos: state.repos.map((r) => ({ ...r })),
    notified: state.notified.map((n) => ({ ...n })),
  };
}

// ---------------------------------------------------------------------------
// File store — JSON written to a temp file then renamed over the target
// ---------------------------------------------------------------------------

export class FileStateStore implements StateStore {
  constructor(readonly path: string) {}

  async load(): Promise<TrackerState> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return emptyState();
      }
      throw new PersistenceError(
        `Cannot read state file ${this.path}: ${errorMessage(err)}`,
        "STATE_UNREADABLE",
        { path: this.path, cause: err },
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(
        `State file ${this.path} is not valid JSON: ${errorMessage(err)}`,
        "STATE_UNREADABLE",
        { path: this.path, cause: err },
      );
    }

    const result = TrackerStateSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new PersistenceError(
        `State file ${this.path} is malformed at ${issue?.path.join(".") ?? "(root)"}: ${issue?.message ?? "unknown"}`,
        "STATE_UNREADABLE",
        { path: this.path },
      );
    }
    return result.data;
  }

  async save(state: TrackerState): Promise<void> {
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      const handle = await open(tmpPath, "w");
      try {
        await handle.writeFile(JSON.stringify(state, null, 2) + "\n", "utf-8");
        // Flushed before the rename so a crash cannot leave an empty state file
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch(() => undefined);
      throw new PersistenceError(
        `Cannot write state file ${this.path}: ${errorMessage(err)}`,
        "STATE_UNWRITABLE",
        { path: this.path, cause: err },
      );
    }
  }
}

// ---------------------------------------------------------------------------
// In-memory store — suitable for testing
// ---------------------------------------------------------------------------

export class InMemoryStateStore implements StateStore {
  private state: TrackerState;
  saves = 0;

  constructor(initial?: TrackerState) {
    this.state = initial ? cloneState(initial) : emptyState();
  }

  async load(): Promise<TrackerState> {
    return cloneState(this.state);
  }

  async save(state: TrackerState): Promise<void> {
    this.state = cloneState(state);
    this.saves++;
  }
}
