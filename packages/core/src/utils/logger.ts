import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';
import { parseEnvFlag } from './env.js';

/**
 * Console-based logger with support for different log levels.
 * Everything goes to stderr: stdout is reserved for component ids.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(level: LogLevel = LogLevel.INFO, write: (line: string) => void = (line) => console.error(line)) {
    this.level = level;
    this.write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    const currentLevelIndex = levels.indexOf(this.level);
    const messageLevelIndex = levels.indexOf(level);
    return messageLevelIndex >= currentLevelIndex;
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    const prefix = this.getPrefix(level);
    let formatted = `${timestamp} ${prefix} ${message}`;

    if (meta && typeof meta === 'object') {
      // JSON.stringify(new Error()) is {}
      const metaToLog = meta instanceof Error ? {
        name: meta.name,
        message: meta.message,
        stack: meta.stack
      } : meta;
      formatted += `\n${JSON.stringify(metaToLog, null, 2)}`;
    } else if (meta !== undefined && meta !== null && meta !== '') {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '[DEBUG]';
      case LogLevel.INFO:
        return '[INFO] ';
      case LogLevel.WARN:
        return '[WARN] ';
      case LogLevel.ERROR:
        return '[ERROR]';
      default:
        return '[LOG]  ';
    }
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.write(this.formatMessage(LogLevel.DEBUG, message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.write(this.formatMessage(LogLevel.INFO, message, meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.write(this.formatMessage(LogLevel.WARN, message, meta));
    }
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      this.write(this.formatMessage(LogLevel.ERROR, message, meta));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Starting level before any configuration is loaded. An invalid verbose flag
 * is left for the config loader to reject.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (parseEnvFlag(env[ENV_VARS.VERBOSE]) === true) {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

// Default logger instance
export const logger = new ConsoleLogger(levelFromEnv(process.env));
