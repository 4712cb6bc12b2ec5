// Output sinks for the logger
// Console (interactive), file (append-only activity log) and memory (tests)

import { createWriteStream } from "node:fs";
import type { LogEntry, LogLevel, LogSink } from "./logger.ts";

type ConsoleAPI = Pick<Console, "debug" | "info" | "warn" | "error">;

/** Writes `Scope: message` lines to the console method matching the level. */
export function createConsoleSink(consoleApi: ConsoleAPI = console): LogSink {
  return {
    write(entry) {
      consoleApi[entry.level](`${entry.scope}: ${entry.message}`);
    },
  };
}

/** Format used by the file sink: `<ISO time> - [level] Scope: message`. */
export function formatLogLine(entry: LogEntry): string {
  return `${entry.timestamp.toISOString()} - [${entry.level}] ${entry.scope}: ${entry.message}`;
}

export interface FileSink extends LogSink {
  /** Flush and close the underlying stream. */
  close(): Promise<void>;
}

/** Appends one formatted line per entry to `path`. */
export function createFileSink(path: string): FileSink {
  const stream = createWriteStream(path, { encoding: "utf8", flags: "a" });
  stream.on("error", (error) => {
    console.error(`File log sink error (${path}): ${error.message}`);
  });
  return {
    close() {
      return new Promise((resolve) => {
        stream.end(() => resolve());
      });
    },
    write(entry) {
      stream.write(`${formatLogLine(entry)}\n`);
    },
  };
}

export interface MemorySink extends LogSink {
  readonly entries: LogEntry[];
  /** Messages logged at `level`, in order. */
  messages(level?: LogLevel): string[];
  clear(): void;
}

/** Keeps entries in memory; used by tests to assert on log output. */
export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    clear() {
      entries.length = 0;
    },
    entries,
    messages(level) {
      return entries
        .filter((entry) => level === undefined || entry.level === level)
        .map((entry) => entry.message);
    },
    write(entry) {
      entries.push(entry);
    },
  };
}
