/**
 * Leveled console logger.
 *
 * Diagnostic output (debug/info/warn/error) goes to stderr so that command
 * output on stdout (plans, JSON reports) stays machine-readable.
 */
import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_NAMES: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.has(value);
}

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  /** Children follow their root's level so one setLevel call covers all */
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.getLevel()];
  }

  private formatMessage(tag: string, message: string): string {
    return this.prefix ? `[${tag}] [${this.prefix}] ${message}` : `[${tag}] ${message}`;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.error(chalk.gray(this.formatMessage('DEBUG', message)));
    if (data) {
      console.error(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.blue(this.formatMessage('INFO', message)));
    if (data) {
      console.error(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(this.formatMessage('WARN', message)));
    if (data) {
      console.error(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(this.formatMessage('ERROR', message)));
    if (!error) return;
    if (error instanceof Error) {
      // Coded errors carry their details; a stack adds nothing for them
      const details = 'details' in error ? error.details : undefined;
      if (details && typeof details === 'object') {
        console.error(chalk.red(JSON.stringify(details, null, 2)));
      } else if (this.getLevel() === 'debug') {
        console.error(chalk.red(error.stack || error.message));
      }
    } else {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log a success line to stdout (shown unless level is above info).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure line to stdout (shown unless level is above info).
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger sharing this logger's level, with a nested prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this.parent ?? this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
