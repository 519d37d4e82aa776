import { errorReporting } from "./error-reporting";

export enum LogLevel {
  debug = 0,
  info = 1,
  warning = 2,
  error = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.debug,
  info: LogLevel.info,
  warn: LogLevel.warning,
  warning: LogLevel.warning,
  error: LogLevel.error,
};

/**
 * Extra fields attached to a log line. The reserved keys belong to the record itself.
 */
export interface LogContext {
  message?: never;
  level?: never;
  time?: never;
  [key: string]: unknown;
}

export type LogRecord = {
  time: string;
  level: LogLevel;
  logger: string;
  message: string;
  stackTrace?: string;
  context: Record<string, unknown>;
};

export type LogWriter = (formatted: string) => void;

// stdout is reserved for command output
const stderrWriter: LogWriter = (formatted) => {
  process.stderr.write(`${formatted}\n`);
};

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "null";
  }
  if (typeof value !== "object") {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/**
 * Renders a record as a YAML-like block:
 *
 * ---
 * time: 2024-12-31T23:59:59.000Z
 * level: WARNING
 * logger: Common
 * message: "Dependency //lib:L has no deployment target"
 * context:
 *   key: "NoDeploymentTarget"
 */
export function formatRecord(record: LogRecord): string {
  const lines = [
    "---",
    `time: ${record.time}`,
    `level: ${LogLevel[record.level].toUpperCase()}`,
    `logger: ${record.logger}`,
    `message: "${record.message}"`,
  ];

  if (record.stackTrace?.trim()) {
    lines.push("stackTrace: |", ...record.stackTrace.split("\n").map((line) => `  ${line}`));
  }

  const entries = Object.entries(record.context);
  if (entries.length > 0) {
    lines.push("context:", ...entries.map(([key, value]) => `  ${key}: ${formatValue(value)}`));
  }
  return lines.join("\n");
}

/**
 * Named logger. Records below the global level are dropped; the rest are written, kept in a
 * bounded history and attached to error reports as breadcrumbs.
 */
export class Logger {
  // Shared by every logger
  static level: LogLevel = LogLevel.info;
  static writer: LogWriter = stderrWriter;

  private readonly name: string;
  private readonly history: LogRecord[] = [];
  private readonly historySize: number;

  constructor(options: { name: string; historySize?: number }) {
    this.name = options.name;
    this.historySize = options.historySize ?? 1000;
  }

  static setLevel(level: LogLevel | string): void {
    Logger.level = typeof level === "string" ? (LEVEL_NAMES[level] ?? LogLevel.info) : level;
  }

  debug(message: string, context: LogContext = {}): void {
    this.write(LogLevel.debug, message, context);
  }

  log(message: string, context: LogContext = {}): void {
    this.write(LogLevel.info, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.write(LogLevel.warning, message, context);
  }

  error(message: string, context: LogContext & { error?: unknown } = {}): void {
    const { error, ...rest } = context;
    const stackTrace = error instanceof Error ? error.stack : undefined;
    this.write(LogLevel.error, message, rest, stackTrace);
  }

  last(count: number): LogRecord[] {
    return this.history.slice(-count);
  }

  private write(level: LogLevel, message: string, context: Record<string, unknown>, stackTrace?: string): void {
    if (level < Logger.level) {
      return;
    }

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      logger: this.name,
      message,
      stackTrace,
      context,
    };
    Logger.writer(formatRecord(record));

    this.history.push(record);
    if (this.history.length > this.historySize) {
      this.history.shift();
    }
    errorReporting.addBreadcrumb({ message, category: "log", level: level >= LogLevel.warning ? "warning" : "info", data: context });
  }
}

export const commonLogger = new Logger({ name: "Common" });
