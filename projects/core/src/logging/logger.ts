/**
 * Scoped console logger.
 *
 * Lines are prefixed with the scope tag, e.g. `[Pipeline] session started`.
 * Services take an optional Logger so they stay silent unless one is injected.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Derive a logger for a nested scope, e.g. `[Server:Summarize]`. */
  child(scope: string): Logger;
}

/**
 * Minimal sink so tests can capture output without patching `console`.
 */
export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly sink?: LogSink;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly scope: string,
    private readonly level: LogLevel,
    private readonly sink: LogSink
  ) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string, ...details: unknown[]): void {
    this.write("debug", message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write("info", message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write("warn", message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write("error", message, details);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level, this.sink);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }

    const line = `[${this.scope}] ${message}`;
    switch (level) {
      case "error":
        this.sink.error(line, ...details);
        break;
      case "warn":
        this.sink.warn(line, ...details);
        break;
      default:
        this.sink.log(line, ...details);
    }
  }
}

export function createLogger(
  scope: string,
  options?: Readonly<LoggerOptions>
): Logger {
  return new ConsoleLogger(scope, options?.level ?? "info", options?.sink ?? console);
}

/**
 * Logger that discards everything. Default for services constructed
 * without one.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/**
 * Formats an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
