/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export type LogMeta = Record<string, unknown>;

/**
 * Metadata, or a function producing it; functions run only when the level
 * lets the line through
 */
export type LogMetaInput = LogMeta | (() => LogMeta);

const LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  write?: (line: string) => void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "warn";
}

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private write: (line: string) => void;

  constructor(config: LoggerConfig = { level: defaultLevel() }) {
    this.level = config.level;
    this.prefix = config.prefix || "typecensus";
    // Everything goes to stderr so stdout stays clean for rendered results
    this.write = config.write ?? ((line) => process.stderr.write(line));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, message: string, meta?: LogMetaInput): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const resolved = typeof meta === "function" ? meta() : meta;
    const suffix = resolved ? ` ${JSON.stringify(resolved)}` : "";
    this.write(
      `[${this.prefix}] ${level.toUpperCase()}: ${message}${suffix}\n`,
    );
  }

  error(message: string, meta?: LogMetaInput): void {
    this.log("error", message, meta);
  }

  warn(message: string, meta?: LogMetaInput): void {
    this.log("warn", message, meta);
  }

  info(message: string, meta?: LogMetaInput): void {
    this.log("info", message, meta);
  }

  debug(message: string, meta?: LogMetaInput): void {
    this.log("debug", message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Default logger instance
export const logger = new Logger();

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
