import { normalizeLogLevel, type LogLevel } from './utils.js';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private readonly prefix: string;
  private readonly level: LogLevel;
  private readonly includeTimestamp: boolean;

  constructor(prefix: string) {
    this.prefix = prefix;
    this.level = normalizeLogLevel(process.env.VITALS_LOG_LEVEL);
    this.includeTimestamp = process.env.VITALS_LOG_TIMESTAMPS !== 'false';
  }

  private formatMessage(...args: unknown[]): unknown[] {
    if (this.includeTimestamp) {
      const timestamp = new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
      return [`[${timestamp}] [${this.prefix}]`, ...args];
    }
    return [`[${this.prefix}]`, ...args];
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(this.level);
  }

  debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(...this.formatMessage(...args));
    }
  }

  info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(...this.formatMessage(...args));
    }
  }

  warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...this.formatMessage(...args));
    }
  }

  error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...this.formatMessage(...args));
    }
  }
}
