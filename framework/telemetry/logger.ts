/**
 * Structured Logging
 *
 * JSON-structured logging with levels and context. Warnings and errors go
 * to stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    cause?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context.
   * The child shares its parent's output.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      if (error.cause !== undefined) {
        entry.error.cause =
          error.cause instanceof Error ? error.cause.message : String(error.cause);
      }
    }

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    const line = this.format === 'json' ? JSON.stringify(entry) : this.prettyFormat(entry);
    const stream = LOG_LEVELS[entry.level] >= LOG_LEVELS.warn ? process.stderr : process.stdout;
    stream.write(line + '\n');
  }

  /**
   * Pretty format for development
   */
  private prettyFormat(entry: LogEntry): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // Cyan
      info: '\x1b[32m', // Green
      warn: '\x1b[33m', // Yellow
      error: '\x1b[31m', // Red
    };
    const reset = '\x1b[0m';
    const dim = '\x1b[2m';

    const timestamp = dim + entry.timestamp + reset;
    const level = colors[entry.level] + entry.level.toUpperCase().padEnd(5) + reset;

    let output = `${timestamp} ${level} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${dim}${JSON.stringify(entry.context)}${reset}`;
    }

    if (entry.error?.stack) {
      output += '\n' + dim + entry.error.stack + reset;
    }
    if (entry.error?.cause) {
      output += '\n' + dim + `Caused by: ${entry.error.cause}` + reset;
    }

    return output;
  }
}

// Default logger instance
let defaultLogger: Logger | null = null;

/**
 * Get the process-wide default logger, created on first use from NODE_ENV
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const env = process.env.NODE_ENV ?? 'development';
    defaultLogger = new Logger({
      level: env === 'production' ? 'info' : 'debug',
      format: env === 'production' ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

/**
 * Replace the default logger. Call once at startup, before the server listens.
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
