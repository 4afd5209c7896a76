/**
 * Tradeflow — Structured Logger
 * One JSON object per line. Cycle decisions carry an `audit` tag so a
 * cycle's history can be rebuilt from the log stream alone.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  audit?: string;
  data?: LogData;
}

/** Receives every line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void;

/** Errors to stderr, warnings through console.warn, everything else to stdout. */
export const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  clock?: () => Date;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(RANK, value);
}

/** LOG_LEVEL when it names a level, info otherwise. */
export function resolveLogLevel(raw: string | undefined = process.env["LOG_LEVEL"]): LogLevel {
  return isLogLevel(raw) ? raw : "info";
}

// Error instances stringify to {}; keep what a reader needs.
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

export class Logger {
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly clock: () => Date;

  constructor(readonly service: string, options: LoggerOptions = {}) {
    this.threshold = RANK[options.minLevel ?? resolveLogLevel()];
    this.sink = options.sink ?? consoleSink;
    this.clock = options.clock ?? (() => new Date());
  }

  debug(message: string, data?: LogData): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.write("error", message, data);
  }

  /** A cycle decision: start, finalization, lock recovery. */
  audit(action: string, data: LogData): void {
    this.write("info", `audit: ${action}`, data, action);
  }

  private write(level: LogLevel, message: string, data?: LogData, audit?: string): void {
    if (RANK[level] < this.threshold) return;

    const entry: LogEntry = {
      timestamp: this.clock().toISOString(),
      level,
      service: this.service,
      message,
    };
    if (audit !== undefined) entry.audit = audit;
    if (data !== undefined && Object.keys(data).length > 0) entry.data = data;

    this.sink(level, JSON.stringify(entry, errorReplacer));
  }
}

export function createLogger(service: string, options?: LoggerOptions): Logger {
  return new Logger(service, options);
}
