/**
 * Logging Subsystem
 *
 * Structured, leveled logging with subsystems, per-call context and
 * pluggable transports. Messages and metadata pass through the configured
 * redaction patterns before they reach a transport.
 */

import * as fs from "node:fs";
import * as path from "node:path";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  runId?: string;
  commandId?: string;
  resourceId?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
  /** Flush and close every transport. */
  close(): Promise<void>;
}

export type LogContext = {
  runId?: string;
  commandId?: string;
  resourceId?: string;
  duration?: number;
};

export type LogDestination =
  | { type: "console"; minLevel?: LogLevel; format?: "text" | "json" }
  | { type: "file"; path: string; minLevel?: LogLevel; format?: "text" | "json" };

export type LoggingConfig = {
  level?: LogLevel;
  destinations?: LogDestination[];
  redactPatterns?: string[];
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function compareLogLevels(a: LogLevel, b: LogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

// =============================================================================
// Formatters
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Human-readable single-line formatter, colored on a TTY.
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};
  const paint = (color: string, text: string): string => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.commandId) contextParts.push(`command=${entry.commandId}`);
    if (entry.resourceId) contextParts.push(`resource=${entry.resourceId}`);
    if (entry.duration !== undefined) contextParts.push(`duration=${entry.duration}ms`);
    if (contextParts.length > 0) parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) parts.push(`\n${entry.error.stack}`);
    }

    return parts.join(" ");
  };
}

/** One JSON object per line. */
export function createJsonFormatter(): LogFormatter {
  return (entry: LogEntry): string => JSON.stringify({ ...entry, timestamp: entry.timestamp.toISOString() });
}

function formatterFor(format: "text" | "json" | undefined, colors: boolean): LogFormatter {
  return format === "json" ? createJsonFormatter() : createDefaultFormatter({ colors });
}

// =============================================================================
// Console Transport
// =============================================================================

/**
 * Writes to stderr so stdout stays free for command output.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "info";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    process.stderr.write(this.formatter(entry) + "\n");
  }
}

// =============================================================================
// File Transport
// =============================================================================

/**
 * Appends formatted entries to a file. Entries are buffered and written
 * once `bufferSize` is reached or on flush/close.
 */
export class FileTransport implements LogTransport {
  name = "file";
  readonly filePath: string;
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private stream: fs.WriteStream | null = null;

  constructor(options: { filePath: string; formatter?: LogFormatter; minLevel?: LogLevel; bufferSize?: number }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createDefaultFormatter({ colors: false });
    this.minLevel = options.minLevel ?? "info";
    this.bufferSize = options.bufferSize ?? 100;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) this.drain();
  }

  async flush(): Promise<void> {
    this.drain();
  }

  async close(): Promise<void> {
    this.drain();
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  private drain(): void {
    if (this.buffer.length === 0) return;
    if (!this.stream) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.stream = fs.createWriteStream(this.filePath, { flags: "a" });
    }
    const content = this.buffer.join("\n") + "\n";
    this.buffer = [];
    this.stream.write(content);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class StructuredLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return this.derive(`${this.subsystem}/${name}`, this.context);
  }

  withContext(context: LogContext): Logger {
    return this.derive(this.subsystem, { ...this.context, ...context });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  async close(): Promise<void> {
    for (const transport of this.transports) {
      await transport.close?.();
    }
  }

  private derive(subsystem: string, context: LogContext): Logger {
    return new StructuredLogger({
      subsystem,
      level: this.level,
      transports: this.transports,
      context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const { error, ...rest } = meta ?? {};
    const metadata = error instanceof Error || error === undefined ? rest : (meta ?? {});
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      ...this.context,
      ...(Object.keys(metadata).length > 0 ? { metadata: this.redactObject(metadata) } : {}),
      ...(error instanceof Error
        ? { error: { name: error.name, message: this.redact(error.message), ...(error.stack ? { stack: error.stack } : {}) } }
        : {}),
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(`log transport "${transport.name}" failed: ${String(err)}\n`);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = this.redactValue(value);
    }
    return result;
  }

  private redactValue(value: unknown): unknown {
    if (typeof value === "string") return this.redact(value);
    if (Array.isArray(value)) return value.map((item) => this.redactValue(item));
    if (typeof value === "object" && value !== null) {
      return this.redactObject(Object.fromEntries(Object.entries(value)));
    }
    return value;
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a logger from configuration. Without destinations, logs go to the
 * console at the configured level.
 */
export function createLogger(subsystem: string, config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const colors = process.stderr.isTTY ?? false;
  const transports: LogTransport[] = (config?.destinations ?? []).map((dest) => {
    const minLevel = dest.minLevel ?? level;
    const formatter = formatterFor(dest.format, dest.type === "console" && colors);
    return dest.type === "file"
      ? new FileTransport({ filePath: dest.path, minLevel, formatter })
      : new ConsoleTransport({ minLevel, formatter });
  });

  if (transports.length === 0) {
    transports.push(new ConsoleTransport({ minLevel: level }));
  }

  return new StructuredLogger({
    subsystem,
    level,
    transports,
    redactPatterns: config?.redactPatterns,
  });
}

/** Logger that drops every entry. */
export function createSilentLogger(subsystem = "silent"): Logger {
  return new StructuredLogger({ subsystem, level: "fatal", transports: [] });
}
