/**
 * Centralized logging utility
 *
 * LOG LEVEL CONFIGURATION:
 * - Development: Logs all levels (debug, info, warn, error)
 * - Production: Only logs errors by default
 *
 * ENVIRONMENT VARIABLES:
 * - LOG_LEVEL or NEXT_PUBLIC_LOG_LEVEL: Override default behavior
 *   Values: 'error', 'warn', 'info', 'debug'
 *   Example: LOG_LEVEL=warn (logs error and warn only)
 */
export interface LogContext {
  [key: string]: unknown;
}

export interface LogLevel {
  DEBUG: 'debug';
  INFO: 'info';
  WARN: 'warn';
  ERROR: 'error';
}

export const LOG_LEVELS: LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevelType = typeof LOG_LEVELS[keyof typeof LOG_LEVELS];

const LEVEL_ORDER: LogLevelType[] = ['error', 'warn', 'info', 'debug'];

class Logger {
  private formatMessage(level: LogLevelType, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  // Read on every call so a changed LOG_LEVEL applies without a restart
  private shouldLog(level: LogLevelType): boolean {
    const logLevelOverride = process.env.LOG_LEVEL || process.env.NEXT_PUBLIC_LOG_LEVEL;

    if (logLevelOverride) {
      const override = logLevelOverride.toLowerCase();
      const limit = LEVEL_ORDER.findIndex((l) => l === override);
      if (limit !== -1) {
        return LEVEL_ORDER.indexOf(level) <= limit;
      }
      // Invalid log level, fall back to default behavior
    }

    if (process.env.NODE_ENV === 'production') {
      return level === 'error';
    }

    return true;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, context));
  }

  // Convenience method for logging errors with error objects
  errorWithError(message: string, error: Error, context?: LogContext): void {
    const fullContext = {
      ...context,
      errorMessage: error.message,
      errorStack: error.stack,
      errorName: error.name,
    };
    this.error(message, fullContext);
  }
}

// Create a singleton instance
export const logger = new Logger();

// Export convenience functions for direct use
export const logDebug = (message: string, context?: LogContext) => logger.debug(message, context);
export const logInfo = (message: string, context?: LogContext) => logger.info(message, context);
export const logWarn = (message: string, context?: LogContext) => logger.warn(message, context);
export const logError = (message: string, context?: LogContext) => logger.error(message, context);
export const logErrorWithError = (message: string, error: Error, context?: LogContext) => logger.errorWithError(message, error, context);
