/**
 * Structured logging infrastructure.
 *
 * Log output goes through an injected sink (stderr by default) so that
 * stdout stays reserved for JSON payloads.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Destination for formatted log lines.
 */
export interface LogSink {
  write(line: string): void;
}

export const stderrSink: LogSink = {
  write(line: string): void {
    process.stderr.write(`${line}\n`);
  },
};

/**
 * Collects lines in memory. Used by tests and by callers that want to
 * inspect what a component reported.
 */
export class MemorySink implements LogSink {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  sink?: LogSink;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Simple structured logger for the archwarden CLI and core.
 */
class Logger {
  private level: LogLevel;
  private prefix: string;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
    this.sink = options.sink ?? stderrSink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.sink.write(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      this.sink.write(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.sink.write(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      this.sink.write(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.sink.write(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      this.sink.write(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.sink.write(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error) {
      if (error instanceof Error) {
        this.sink.write(chalk.red(error.stack || error.message));
      } else {
        this.sink.write(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Create a child logger with a prefix. The child shares the parent's sink.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      sink: this.sink,
    });
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
