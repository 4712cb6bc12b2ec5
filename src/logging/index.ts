export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  silentLogger,
  type LogEntry,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
  type SinkWithLevel,
} from "./logger.ts";
export {
  createConsoleSink,
  createFileSink,
  createMemorySink,
  formatLogLine,
  type FileSink,
  type MemorySink,
} from "./sinks.ts";
