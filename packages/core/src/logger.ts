// packages/core/src/logger.ts — scoped console logger
import pc from "picocolors";
import { RelayError } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type WritableLevel = Exclude<LogLevel, "silent">;

const LEVEL_TAG: Record<WritableLevel, string> = {
  debug: pc.gray("DEBUG"),
  info: pc.cyan("INFO"),
  warn: pc.yellow("WARN"),
  error: pc.red("ERROR"),
};

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface LoggerOptions {
  level?: LogLevel | undefined;
  sink?: LogSink | undefined;
  clock?: (() => Date) | undefined;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  child(scope: string): Logger;
}

function serializeMeta(meta: unknown): string {
  if (meta instanceof RelayError) {
    return JSON.stringify(meta.toJSON());
  }
  if (meta instanceof Error) {
    return JSON.stringify({ name: meta.name, message: meta.message });
  }
  if (typeof meta === "string") {
    return meta;
  }
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;
  const clock = options.clock ?? (() => new Date());

  function write(at: WritableLevel, message: string, meta: unknown): void {
    if (LEVEL_RANK[at] < LEVEL_RANK[level]) return;

    let line = `${pc.dim(clock().toISOString())} ${LEVEL_TAG[at]} ${pc.bold(`[${scope}]`)} ${message}`;
    if (meta !== undefined) {
      line += ` ${pc.dim(serializeMeta(meta))}`;
    }

    if (at === "warn" || at === "error") {
      sink.err(line);
    } else {
      sink.out(line);
    }
  }

  return {
    level,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (sub) => createLogger(`${scope}:${sub}`, { level, sink, clock }),
  };
}

/** A logger that drops everything — default for library classes in tests. */
export const silentLogger: Logger = createLogger("silent", { level: "silent" });
