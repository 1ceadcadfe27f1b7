/**
 * Logger - Prefixed, levelled console logging
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Log level priority for filtering */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  private readonly prefix: string;

  constructor(
    private readonly name: string,
    private level: LogLevel = 'info'
  ) {
    this.prefix = `[${name}]`;
  }

  /**
   * Create a child logger with a sub-prefix and the same level.
   */
  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`, this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(this.prefix, ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.info(this.prefix, ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.prefix, ...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.prefix, ...args);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }
}

/**
 * Create a logger for a component.
 */
export function createLogger(name: string, level?: LogLevel): Logger {
  return new Logger(name, level);
}

/** Logger that drops everything; handy in tests */
export const silentLogger = new Logger('silent', 'silent');
