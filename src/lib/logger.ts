/**
 * Structured logging for the compiler and its command-line shell
 *
 * Entries carry a level, a component and optional context. Output is
 * pretty-printed for terminals or emitted as one JSON object per line
 * in production.
 *
 */

/**
 * Available log levels in order of severity
 *
 * @public
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Lowercase level names accepted from configuration
 *
 * @public
 */
export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Log entry structure
 *
 * @public
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  levelName: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;

  /**
   * Component that generated this entry, e.g. "compiler" or "lifecycle"
   */
  component?: string;
}

/**
 * Logger configuration options
 *
 * @public
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output; falls back to LOG_LEVEL, then WARN
   */
  level?: LogLevel;

  component?: string;

  /**
   * Human-readable lines instead of JSON
   */
  prettyPrint?: boolean;

  /**
   * Custom sink (defaults to console methods)
   */
  output?: (entry: LogEntry) => void;
}

/**
 * Convert a configuration level name to a {@link LogLevel}
 *
 * @param name - Level name, case-insensitive
 * @returns Matching level, or undefined for unknown names
 *
 * @public
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.toUpperCase()) {
    case "DEBUG": {
      return LogLevel.DEBUG;
    }
    case "INFO": {
      return LogLevel.INFO;
    }
    case "WARN": {
      return LogLevel.WARN;
    }
    case "ERROR": {
      return LogLevel.ERROR;
    }
    case "SILENT": {
      return LogLevel.SILENT;
    }
    default: {
      return undefined;
    }
  }
}

/**
 * Structured logger with configurable levels and formatting
 *
 * @public
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component?: string;
  private readonly prettyPrint: boolean;
  private readonly output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.WARN;
    if ("component" in options) {
      this.component = options.component;
    }
    this.prettyPrint = options.prettyPrint ?? process.env.NODE_ENV !== "production";
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  debug(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.DEBUG, message, context, error);
  }

  info(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.INFO, message, context, error);
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Whether entries at the given level would be emitted
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Create a child logger with additional context
   *
   * @param childContext - Context merged into every child entry
   * @param childComponent - Optional component name override
   * @returns New logger writing through this logger's sink
   *
   * @example
   * ```typescript
   * const compilerLogger = new Logger({ component: "compiler" });
   * const ruleLogger = compilerLogger.child({ bucket: "logs" }, "lifecycle");
   * ruleLogger.debug("Compiled rule", { rule: "rotate-logs" });
   * ```
   */
  child(childContext: Record<string, unknown>, childComponent?: string): Logger {
    const loggerOptions: LoggerOptions = {
      level: this.level,
      prettyPrint: this.prettyPrint,
      output: (entry: LogEntry) => {
        this.output({
          ...entry,
          context: { ...childContext, ...entry.context },
        });
      },
    };

    const resolvedComponent = childComponent ?? this.component;
    if (resolvedComponent) {
      loggerOptions.component = resolvedComponent;
    }

    return new Logger(loggerOptions);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LogLevel[level],
      message,
      ...(context && { context }),
      ...(error && { error }),
      ...(this.component && { component: this.component }),
    };

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    const line = this.prettyPrint ? this.formatPretty(entry) : this.formatJson(entry);
    this.getConsoleMethod(entry.level)(line);
  }

  private formatPretty(entry: LogEntry): string {
    const timestamp = entry.timestamp.replace(/T/, " ").replace(/\..+/, "");
    const component = entry.component ? `[${entry.component}]` : "";
    const level = entry.levelName.padEnd(5);

    let line = `${timestamp} ${level} ${component} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      line += `\n  Context: ${JSON.stringify(entry.context, undefined, 2)}`;
    }

    if (entry.error) {
      line += `\n  Error: ${entry.error.stack ?? entry.error.message}`;
    }

    return line;
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      ...entry,
      error: entry.error
        ? {
            name: entry.error.name,
            message: entry.error.message,
            stack: entry.error.stack,
          }
        : undefined,
    });
  }

  // Diagnostics go to stderr so that stdout stays reserved for bundles and plans
  private getConsoleMethod(level: LogLevel): typeof console.log {
    return level >= LogLevel.WARN ? console.error : console.warn;
  }
}

/**
 * Default logger instance
 *
 * @public
 */
export const logger = new Logger({ component: "bucketc" });
