/**
 * Logger utility for the application
 * Provides a level-filtered, scope-aware logging interface over the console
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  data?: unknown;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  private readonly logLevel: LogLevel;
  private readonly scope?: string;

  constructor(level?: string, scope?: string) {
    // Default to 'info' if LOG_LEVEL env var is not set or unknown
    const requested = level ?? process.env.LOG_LEVEL;
    this.logLevel = isLogLevel(requested) ? requested : 'info';
    this.scope = scope;
  }

  /**
   * Logger sharing this level whose lines carry a [scope] tag
   */
  child(scope: string): Logger {
    return new Logger(this.logLevel, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      scope: this.scope,
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, scope, data, error } = logMessage;
    const prefix = scope
      ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]`
      : `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '');
        break;
      case 'info':
        console.info(prefix, message, data ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, data ?? '');
        break;
      case 'error':
        console.error(prefix, message, data ?? '', error ?? '');
        break;
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error instanceof Error ? error.message : error;
      this.output(logMessage);
    }
  }
}

// Export singleton instance
export const logger = new Logger();

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
