/**
 * Simple logging utility for gitauto-installer
 *
 * Diagnostic output only. The step-by-step progress lines the user sees
 * are rendered by cli-output.ts.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export const LOG_LEVEL_ENV = 'GITAUTO_INSTALLER_LOG_LEVEL';

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.WARN;
  }
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV])) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  error(message: string, error?: Error | unknown): void {
    if (this.level >= LogLevel.ERROR) {
      const timestamp = new Date().toISOString();
      console.error(`[${timestamp}] ERROR: ${message}`);
      if (error instanceof Error) {
        console.error(`  ${error.message}`);
        if (this.level >= LogLevel.DEBUG && error.stack) {
          console.error(error.stack);
        }
      } else if (error) {
        console.error(`  ${String(error)}`);
      }
    }
  }

  warn(message: string): void {
    if (this.level >= LogLevel.WARN) {
      const timestamp = new Date().toISOString();
      console.warn(`[${timestamp}] WARN: ${message}`);
    }
  }

  info(message: string): void {
    if (this.level >= LogLevel.INFO) {
      const timestamp = new Date().toISOString();
      console.error(`[${timestamp}] INFO: ${message}`);
    }
  }

  debug(message: string, data?: unknown): void {
    if (this.level >= LogLevel.DEBUG) {
      const timestamp = new Date().toISOString();
      console.error(`[${timestamp}] DEBUG: ${message}`);
      if (data !== undefined) {
        console.error(`  ${JSON.stringify(data, null, 2)}`);
      }
    }
  }
}

export const logger = new Logger();
