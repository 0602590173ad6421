export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LogContext,
  type LogDestination,
  type LoggingConfig,
  LOG_LEVELS,
  compareLogLevels,
  shouldLog,
  isLogLevel,
  createDefaultFormatter,
  createJsonFormatter,
  ConsoleTransport,
  FileTransport,
  StructuredLogger,
  createLogger,
  createSilentLogger,
} from "./logger.js";
