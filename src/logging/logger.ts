/**
 * Leveled, scoped logger that writes to pluggable sinks.
 *
 * Each message is checked against the logger's level, stamped with a time
 * and scope, and handed to every sink whose own minimum level it meets.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Numeric order used for level comparisons. */
export const LOG_LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  error: 3,
  info: 1,
  warn: 2,
};

export interface LogEntry {
  level: LogLevel;
  /** Component that logged, e.g. `FaultMonitor`. */
  scope: string;
  message: string;
  timestamp: Date;
}

/** Output destination for log entries. */
export interface LogSink {
  write(entry: LogEntry): void;
}

/** A sink with its own minimum level. */
export interface SinkWithLevel {
  sink: LogSink;
  minLevel: LogLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger sharing level and sinks, tagged with another scope. */
  child(scope: string): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  sinks?: SinkWithLevel[];
  /** Injectable clock for deterministic timestamps in tests. */
  timeSource?: () => Date;
}

/**
 * Create a logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: "info",
 *   sinks: [
 *     { sink: consoleSink, minLevel: "info" },
 *     { sink: createFileSink("activity.log"), minLevel: "debug" },
 *   ],
 * });
 * logger.child("CycleEngine").info("Starting cycle 12");
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const shared = {
    level: options.level ?? "info",
    sinks: options.sinks ?? [],
    timeSource: options.timeSource ?? (() => new Date()),
  };

  const build = (scope: string): Logger => {
    const log = (level: LogLevel, message: string) => {
      if (LOG_LEVELS[level] < LOG_LEVELS[shared.level]) {
        return;
      }
      const entry: LogEntry = {
        level,
        message,
        scope,
        timestamp: shared.timeSource(),
      };
      for (const { sink, minLevel } of shared.sinks) {
        if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) {
          continue;
        }
        try {
          sink.write(entry);
        } catch (error) {
          // Sink failures never reach the caller.
          console.warn(`Logger sink error: ${String(error)}`);
        }
      }
    };

    return {
      child: (childScope) => build(childScope),
      debug: (message) => log("debug", message),
      error: (message) => log("error", message),
      getLevel: () => shared.level,
      info: (message) => log("info", message),
      setLevel: (level) => {
        shared.level = level;
      },
      warn: (message) => log("warn", message),
    };
  };

  return build(options.scope ?? "app");
}

/** Logger that discards everything. Default for library consumers. */
export const silentLogger: Logger = createLogger({ sinks: [] });

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}
