import { describe, expect, it } from "vitest";
import { UpstreamUnavailableError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { LogSink } from "../logger.js";

const ANSI = /\x1b\[[0-9;]*m/g;
const clock = () => new Date("2024-06-01T12:00:00.000Z");

function captureSink(): LogSink & { lines: { out: string[]; err: string[] } } {
  const lines: { out: string[]; err: string[] } = { out: [], err: [] };
  return {
    lines,
    out: (line) => {
      lines.out.push(line.replace(ANSI, ""));
    },
    err: (line) => {
      lines.err.push(line.replace(ANSI, ""));
    },
  };
}

describe("createLogger", () => {
  it("writes timestamped, scoped lines", () => {
    const sink = captureSink();
    const logger = createLogger("worker", { sink, clock });

    logger.info("Starting commitrelay");

    expect(sink.lines.out).toEqual([
      "2024-06-01T12:00:00.000Z INFO [worker] Starting commitrelay",
    ]);
  });

  it("sends warnings and errors to the error stream", () => {
    const sink = captureSink();
    const logger = createLogger("worker", { sink, clock });

    logger.warn("Skipping acme/widgets this cycle");
    logger.error("Cannot write state file");

    expect(sink.lines.out).toEqual([]);
    expect(sink.lines.err).toEqual([
      "2024-06-01T12:00:00.000Z WARN [worker] Skipping acme/widgets this cycle",
      "2024-06-01T12:00:00.000Z ERROR [worker] Cannot write state file",
    ]);
  });

  it("drops messages below the configured level", () => {
    const sink = captureSink();
    const logger = createLogger("worker", { level: "warn", sink, clock });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(sink.lines.out).toEqual([]);
    expect(sink.lines.err).toHaveLength(1);
  });

  it("writes nothing when silent", () => {
    const sink = captureSink();
    const logger = createLogger("worker", { level: "silent", sink, clock });

    logger.error("hidden");

    expect(sink.lines.err).toEqual([]);
  });

  it("nests scopes and keeps the level in children", () => {
    const sink = captureSink();
    const child = createLogger("worker", { level: "debug", sink, clock }).child("poller");

    child.debug("Cycle starting");

    expect(child.level).toBe("debug");
    expect(sink.lines.out).toEqual([
      "2024-06-01T12:00:00.000Z DEBUG [worker:poller] Cycle starting",
    ]);
  });

  it("serializes metadata", () => {
    const sink = captureSink();
    const logger = createLogger("worker", { sink, clock });

    logger.info("count", { targets: 2 });
    logger.info("plain", "detail");
    logger.warn("boom", new TypeError("bad input"));
    logger.warn("limited", new UpstreamUnavailableError("rate limited", { status: 429, rateLimited: true }));

    expect(sink.lines.out).toEqual([
      '2024-06-01T12:00:00.000Z INFO [worker] count {"targets":2}',
      "2024-06-01T12:00:00.000Z INFO [worker] plain detail",
    ]);
    expect(sink.lines.err).toEqual([
      '2024-06-01T12:00:00.000Z WARN [worker] boom {"name":"TypeError","message":"bad input"}',
      '2024-06-01T12:00:00.000Z WARN [worker] limited {"name":"UpstreamUnavailableError","code":"UPSTREAM_RATE_LIMITED","message":"rate limited","context":{"status":429}}',
    ]);
  });
});
