/**
 * Structured logging with configurable levels
 *
 * Log lines go to stderr so that stdout carries only the batch report,
 * which keeps `--format json` output machine-readable.
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
 * Log entry structure for consistent formatting
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
   * Component or module that generated this log
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
   * Minimum log level to output
   */
  level?: LogLevel;

  /**
   * Component name for log entries
   */
  component?: string;

  /**
   * Text placed before every message, e.g. `[DRY-RUN] `
   */
  prefix?: string;

  /**
   * Enable pretty formatting (defaults to true outside production)
   */
  prettyPrint?: boolean;

  /**
   * Custom output function (defaults to writing stderr)
   */
  output?: (entry: LogEntry) => void;
}

/**
 * Structured logger with configurable levels and formatting
 *
 * @public
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly prefix: string;
  private readonly prettyPrint: boolean;
  private readonly output: (entry: LogEntry) => void;

  /**
   * Create a new logger instance
   *
   * @param options - Logger configuration options
   */
  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? Logger.levelFromEnvironment();
    this.component = options.component;
    this.prefix = options.prefix ?? "";
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
   * Whether entries at the given level are emitted
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Create a child logger with additional context
   *
   * @param childContext - Context to add to all child log entries
   * @param childComponent - Optional component name override
   * @returns New logger instance with enriched context
   *
   * @example
   * ```typescript
   * const root = new Logger({ component: "cli", prefix: "[DRY-RUN] " });
   * const discovery = root.child({ kind: "Bucket" }, "discovery");
   * discovery.info("Listing page 1");
   * ```
   */
  child(childContext: Record<string, unknown>, childComponent?: string): Logger {
    const loggerOptions: LoggerOptions = {
      level: this.level,
      prefix: this.prefix,
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
      message: `${this.prefix}${message}`,
      ...(context && { context }),
      ...(error && { error }),
      ...(this.component && { component: this.component }),
    };

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    const line = this.prettyPrint ? Logger.formatPretty(entry) : Logger.formatJson(entry);
    process.stderr.write(`${line}\n`);
  }

  /**
   * Render an entry as a human-readable line
   *
   * @internal
   */
  static formatPretty(entry: LogEntry): string {
    const timestamp = entry.timestamp.replace(/T/, " ").replace(/\..+/, "");
    const component = entry.component ? ` [${entry.component}]` : "";
    const level = entry.levelName.padEnd(5);

    let output = `${timestamp} ${level}${component} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.stack ?? entry.error.message}`;
    }

    return output;
  }

  /**
   * Render an entry as one JSON line
   *
   * @internal
   */
  static formatJson(entry: LogEntry): string {
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

  /**
   * Resolve the level from `LOG_LEVEL`, defaulting to WARN
   *
   * @internal
   */
  static levelFromEnvironment(): LogLevel {
    switch (process.env.LOG_LEVEL?.toUpperCase()) {
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
        return LogLevel.WARN;
      }
    }
  }
}
