import chalk from 'chalk';

/**
 * Log levels from most to least verbose
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

/**
 * Checks whether an arbitrary string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

type LoggerConfig = {
  level: LogLevel;
  prefix?: string;
};

/**
 * Leveled console logger with colored output.
 *
 * Child loggers read the level of the root they were created from, so a
 * level change made after `child()` still applies to them.
 */
export class Logger {
  private ownLevel: LogLevel = 'warn';
  private prefix = '';

  constructor(private readonly root?: Logger) {}

  get level(): LogLevel {
    return this.root ? this.root.level : this.ownLevel;
  }

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      if (this.root) this.root.configure({ level: config.level });
      else this.ownLevel = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(chalk.gray(this.format(message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.info(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(this.format(message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.info(chalk.green(this.format(message)), ...args);
    }
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const child = new Logger(this.root ?? this);
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
