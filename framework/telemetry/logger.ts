/**
 * Structured Logging
 *
 * JSON-structured logging with levels and bound context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
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

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private readonly format: 'json' | 'pretty';
  private readonly context: Record<string, unknown>;
  private readonly output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? ((entry) => this.defaultOutput(entry));
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

  /**
   * Log at error level; the error's name, message and stack are attached
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
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
    error?: unknown
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error instanceof Error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    } else if (error !== undefined) {
      entry.error = { name: 'NonError', message: String(error) };
    }

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    if (this.format === 'json') {
      const line = JSON.stringify(entry);
      if (entry.level === 'error' || entry.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    } else {
      this.prettyPrint(entry);
    }
  }

  /**
   * Pretty print for development
   */
  private prettyPrint(entry: LogEntry): void {
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

    console.log(output);

    if (entry.error?.stack) {
      console.log(dim + entry.error.stack + reset);
    }
  }
}

/**
 * Per-request logging context
 */
export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
  ip?: string;
}

/**
 * Create a request logger
 */
export function createRequestLogger(baseLogger: Logger, context: RequestLogContext): Logger {
  return baseLogger.child({
    requestId: context.requestId,
    method: context.method,
    path: context.path,
    ip: context.ip,
  });
}

let defaultLogger: Logger | null = null;

/**
 * Get the default logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const env = process.env.NODE_ENV ?? 'development';
    const level = process.env.LOG_LEVEL;
    defaultLogger = new Logger({
      level: isLogLevel(level) ? level : env === 'production' ? 'info' : 'debug',
      format: env === 'production' ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

/**
 * Set the default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
