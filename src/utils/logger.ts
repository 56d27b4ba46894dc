/**
 * Simple logger utility
 * @module utils/logger
 * @internal
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

export class Logger {
  constructor(
    private readonly level: LogLevel = LogLevel.INFO,
    private readonly name: string = 'x1-memo'
  ) {}

  /** Derive a logger for a sub-component, sharing this one's level */
  child(component: string): Logger {
    return new Logger(this.level, `${this.name}:${component}`);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(`[${this.name}:DEBUG]`, message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.info(`[${this.name}:INFO]`, message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(`[${this.name}:WARN]`, message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(`[${this.name}:ERROR]`, message, ...args);
    }
  }
}

/** Logger that drops everything; the default for library consumers */
export const silentLogger = new Logger(LogLevel.NONE);
