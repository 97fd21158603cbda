/* eslint-disable no-console */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Keys whose values never reach the console.
const REDACTED_KEYS = new Set([
  "accessKeySecret",
  "securityToken",
  "secret",
  "token",
]);

/**
 * Structured logger used throughout the refresh layer.
 *
 * Arguments after the message are key/value pairs:
 * `logger.info("Fetched credential", "accessKeyId", id, "expiresIn", "3600s")`.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function parseLogLevel(level: string): LogLevel {
  if (!level) {
    return "warn";
  }

  const normalized = level.toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return normalized;
    case "warning":
      return "warn";
  }

  throw new Error(
    `Invalid log level value: "${level}" (must be debug, info, warn, or error)`,
  );
}

export class DefaultLogger implements Logger {
  private levelValue: number;

  constructor(level: LogLevel = "warn") {
    this.levelValue = LOG_LEVELS[level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.debug) {
      console.log(formatLine("DEBUG", message, args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.info) {
      console.log(formatLine("INFO", message, args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.warn) {
      console.warn(formatLine("WARN", message, args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.error) {
      console.error(formatLine("ERROR", message, args));
    }
  }
}

/** Renders one logfmt line. Odd trailing arguments are dropped. */
export function formatLine(
  level: string,
  message: string,
  args: unknown[],
  now: Date = new Date(),
): string {
  let formatted = `time=${now.toISOString()} level=${level} msg="${message}"`;
  for (let i = 0; i + 1 < args.length; i += 2) {
    const key = String(args[i]);
    const value = REDACTED_KEYS.has(key)
      ? "[REDACTED]"
      : formatValue(args[i + 1]);
    formatted += ` ${key}=${value}`;
  }
  return formatted;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value.includes(" ") ? `"${value}"` : value;
  }
  if (value instanceof Error) {
    return `"${value.message}"`;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return `[${value.join(",")}]`;
  }
  return String(value);
}

class FilteredLogger implements Logger {
  private levelValue: number;

  constructor(
    private logger: Logger,
    level: LogLevel,
  ) {
    this.levelValue = LOG_LEVELS[level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.debug) {
      this.logger.debug(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.info) {
      this.logger.info(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.warn) {
      this.logger.warn(message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.levelValue <= LOG_LEVELS.error) {
      this.logger.error(message, ...args);
    }
  }
}

/** Logger that prepends a fixed set of key/value pairs to every line. */
class FieldLogger implements Logger {
  constructor(
    private logger: Logger,
    private fields: unknown[],
  ) {}

  debug(message: string, ...args: unknown[]): void {
    this.logger.debug(message, ...this.fields, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.logger.info(message, ...this.fields, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.logger.warn(message, ...this.fields, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.logger.error(message, ...this.fields, ...args);
  }
}

export function withFields(logger: Logger, ...fields: unknown[]): Logger {
  return new FieldLogger(logger, fields);
}

export function createLogger(logger?: Logger, logLevel: string = ""): Logger {
  const level = parseLogLevel(logLevel);

  if (logger) {
    return new FilteredLogger(logger, level);
  }

  return new DefaultLogger(level);
}
