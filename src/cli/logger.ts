import type { ProgressLogger } from "../core/types.js";

/** At `error` only the CLI's own final error report gets through. */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  /** line sink; defaults to stderr so stdout stays free for results */
  write?: (line: string) => void;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Leveled, line-oriented logger for CLI runs. */
export class Logger implements ProgressLogger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? "";
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  private log(level: Exclude<LogLevel, "silent" | "error">, message: string, data?: Record<string, unknown>): void {
    if (levelPriority[level] < levelPriority[this.level]) return;
    const ctx = this.context ? ` (${this.context})` : "";
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    this.write(`[${level}]${ctx} ${message}${suffix}`);
  }
}

export function createLogger(context: string, options: Omit<LoggerOptions, "context"> = {}): Logger {
  return new Logger({ ...options, context });
}
