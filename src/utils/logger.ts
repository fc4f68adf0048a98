/**
 * Console logging for the planner and its CLI.
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

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Levelled console logger. Child loggers share their parent's level.
 */
class Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly parent: Logger | null;

  constructor(prefix = '', parent: Logger | null = null) {
    this.prefix = prefix;
    this.parent = parent;
    this.level = 'info';
  }

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
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
  }

  error(message: string, error?: Error): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error && this.shouldLog('debug')) {
      console.error(chalk.red(error.stack ?? error.message));
    }
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.parent ?? this);
  }
}

export const logger = new Logger();

export { Logger };
