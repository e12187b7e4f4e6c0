/**
 * Log levels for filtering output.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  PERF = 4  // Performance measurements
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry, rendered to a single console line.
 */
interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  metadata?: Record<string, unknown>;
  stack?: string;
  duration?: number;
}

/**
 * Logger interface for dependency injection.
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown): void;
  perf(component: string, operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
  measure<T>(component: string, operation: string, fn: () => Promise<T>, metadata?: Record<string, unknown>): Promise<T>;
  setLevel(level: LogLevel): void;
}

/**
 * Minimal sink the logger writes to. The LSP connection console satisfies it.
 */
export interface LogSink {
  log(message: string): void;
}

/**
 * Map a configured level name onto a LogLevel.
 */
export function parseLogLevel(name: LogLevelName): LogLevel {
  switch (name) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Logging service for the Go To Implementation server.
 *
 * Messages go to the client's output channel through the connection console.
 * Components prefix their messages with `[ComponentName]`.
 *
 * Usage:
 * ```typescript
 * this.logger.info('[GoToImplementationHandler] Executing command');
 * this.logger.error('[BoundedExecutor] Search failed', error);
 * await this.logger.measure('BoundedExecutor', 'streaming search', async () => search());
 * ```
 */
export class LoggerService implements ILogger {
  private sink: LogSink;
  private currentLevel: LogLevel = LogLevel.INFO;

  constructor(connection: { console: LogSink }, level: LogLevel = LogLevel.INFO) {
    this.sink = connection.console;
    this.currentLevel = level;
  }

  /**
   * Set the minimum log level to display.
   */
  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.currentLevel <= LogLevel.DEBUG) {
      this.log('DEBUG', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.currentLevel <= LogLevel.INFO) {
      this.log('INFO', message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.currentLevel <= LogLevel.WARN) {
      this.log('WARN', message, args);
    }
  }

  /**
   * Log an error message with optional error object.
   */
  error(message: string, error?: unknown): void {
    if (this.currentLevel > LogLevel.ERROR) {
      return;
    }

    let fullMessage = message;
    let stack: string | undefined;

    if (error !== undefined && error !== null) {
      if (error instanceof Error) {
        fullMessage += `: ${error.message}`;
        stack = error.stack;
      } else if (typeof error === 'object') {
        fullMessage += `: ${this.stringify(error)}`;
      } else {
        fullMessage += `: ${String(error)}`;
      }
    }

    this.logStructured('ERROR', fullMessage, undefined, { stack });
  }

  /**
   * Log performance measurement
   */
  perf(component: string, operation: string, durationMs: number, metadata?: Record<string, unknown>): void {
    const message = `[${component}] ${operation}`;
    this.logStructured('PERF', message, metadata, { duration: durationMs });
  }

  /**
   * Measure execution time of an async operation
   */
  async measure<T>(
    component: string,
    operation: string,
    fn: () => Promise<T>,
    metadata?: Record<string, unknown>
  ): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.perf(component, operation, performance.now() - start, metadata);
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.debug(`[${component}] ${operation} ended after ${duration.toFixed(2)}ms without a result`);
      throw error;
    }
  }

  private logStructured(
    level: string,
    message: string,
    metadata?: Record<string, unknown>,
    extra?: { stack?: string; duration?: number }
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      metadata,
      ...(extra?.stack && { stack: extra.stack }),
      ...(extra?.duration !== undefined && { duration: extra.duration })
    };

    this.sink.log(this.formatForConsole(entry));
  }

  private formatForConsole(entry: LogEntry): string {
    const timestamp = entry.timestamp.split('T')[1]?.substring(0, 8) || '';
    const level = entry.level.padEnd(5);
    let message = `[${timestamp}] [${level}] ${entry.message}`;

    if (entry.duration !== undefined) {
      message += ` (${entry.duration.toFixed(2)}ms)`;
    }
    if (entry.metadata) {
      message += ` ${this.stringify(entry.metadata)}`;
    }
    if (entry.stack) {
      message += `\n${entry.stack}`;
    }

    return message;
  }

  private log(level: string, message: string, args: unknown[]): void {
    const metadata = args.length > 0 ? { args: args.map(a => this.stringify(a)) } : undefined;
    this.logStructured(level, message, metadata);
  }

  /**
   * Safely stringify any value for logging.
   */
  private stringify(value: unknown): string {
    if (value === null) {
      return 'null';
    }
    if (value === undefined) {
      return 'undefined';
    }
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }

    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
}

/**
 * Null logger for testing or disabled logging scenarios.
 */
export class NullLogger implements ILogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  perf(): void {}
  async measure<T>(_component: string, _operation: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
  setLevel(): void {}
}
